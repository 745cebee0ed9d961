/**
 * IR Validator - checks the structural invariants of a function
 */

import { Handle } from "#infra";
import { type MessagesBySeverity, Result, Severity } from "#result";

import { Block } from "../block.js";
import type { Context } from "../context.js";
import { User } from "../def-use.js";
import { BlockEdge } from "../edge.js";
import { Error as IrError, ErrorCode } from "../errors.js";
import { Func } from "../func.js";
import { Inst } from "../inst.js";

export interface ValidatorOptions {
  /** Warn about blocks the entry block cannot reach (default: true) */
  reachabilityWarnings?: boolean;
}

export class Validator {
  private errors: IrError[] = [];
  private warnings: IrError[] = [];
  private readonly reachabilityWarnings: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.reachabilityWarnings = options.reachabilityWarnings ?? true;
  }

  validate(ctx: Context, func: Func): Result<void, IrError> {
    this.errors = [];
    this.warnings = [];

    const blocks = this.checkList(
      Func.name(ctx, func),
      [...Func.blocks(ctx, func)],
      [...Func.blocksReverse(ctx, func)],
      (block) => Block.container(ctx, block),
      func,
      (block) => Block.name(ctx, block),
    );

    for (const block of blocks) {
      this.validateBlock(ctx, func, block);
    }

    this.checkUsers(ctx, blocks);

    if (this.reachabilityWarnings) {
      this.checkReachability(ctx, func, blocks);
    }

    const messages: MessagesBySeverity<IrError> = {};
    if (this.errors.length > 0) {
      messages[Severity.Error] = this.errors;
    }
    if (this.warnings.length > 0) {
      messages[Severity.Warning] = this.warnings;
    }

    if (this.errors.length > 0) {
      return { success: false, messages };
    }
    return Result.okWith(undefined, messages);
  }

  private validateBlock(ctx: Context, func: Func, block: Block): void {
    const blockName = Block.name(ctx, block);
    const insts = this.checkList(
      blockName,
      [...Block.instructions(ctx, block)],
      [...Block.instructionsReverse(ctx, block)],
      (inst) => Inst.container(ctx, inst),
      block,
      (inst) => Inst.name(ctx, inst),
    );

    // Terminators end the block
    insts.forEach((inst, position) => {
      if (Inst.isTerminator(ctx, inst) && position !== insts.length - 1) {
        this.error(
          `${blockName}: terminator ${Inst.name(ctx, inst)} is not the last instruction`,
        );
      }
    });
    if (Block.terminator(ctx, block) === undefined) {
      this.warning(`${blockName} has no terminator`);
    }

    const edges = [...Block.successors(ctx, block)];
    for (const edge of edges) {
      this.validateEdge(ctx, func, block, edge);
    }

    // One edge per jump, one per branch arm
    for (const inst of insts) {
      const kind = Inst.kind(ctx, inst);
      if (kind !== "jump" && kind !== "branch") {
        continue;
      }
      const own = edges.filter((edge) =>
        Handle.equals(edge.terminator, inst),
      );
      const expected =
        kind === "jump"
          ? [BlockEdge.create(Inst.armTarget(ctx, inst, false), inst, false)]
          : [true, false].map((arm) =>
              BlockEdge.create(Inst.armTarget(ctx, inst, arm), inst, arm),
            );
      const missing = expected.filter(
        (edge) => !own.some((actual) => BlockEdge.equals(actual, edge)),
      );
      if (own.length !== expected.length || missing.length > 0) {
        this.error(
          `${blockName}: ${kind} ${Inst.name(ctx, inst)} has ${own.length} recorded edge(s), expected ${expected.length}`,
        );
      }
    }
  }

  private validateEdge(
    ctx: Context,
    func: Func,
    block: Block,
    edge: BlockEdge,
  ): void {
    const blockName = Block.name(ctx, block);
    if (!ctx.insts.isValid(edge.terminator)) {
      this.error(`${blockName}: edge terminator was deallocated`);
      return;
    }
    const owner = Inst.container(ctx, edge.terminator);
    if (owner === undefined || !Handle.equals(owner, block)) {
      this.error(
        `${blockName}: edge terminator ${Inst.name(ctx, edge.terminator)} is not in this block`,
      );
    }
    if (!ctx.blocks.isValid(edge.target)) {
      this.error(`${blockName}: edge target was deallocated`);
      return;
    }
    const targetOwner = Block.container(ctx, edge.target);
    if (targetOwner === undefined || !Handle.equals(targetOwner, func)) {
      this.error(
        `${blockName}: edge target ${Block.name(ctx, edge.target)} is not a block of ${Func.name(ctx, func)}`,
      );
    }
  }

  /**
   * Recorded user sets must match the operands that actually reference
   * each block and value
   */
  private checkUsers(ctx: Context, blocks: Block[]): void {
    const expected = new Map<string, Set<string>>();
    const expect = (referent: string, user: User) => {
      const users = expected.get(referent) ?? new Set<string>();
      users.add(User.key(user));
      expected.set(referent, users);
    };

    const insts = blocks.flatMap((block) => [
      ...Block.instructions(ctx, block),
    ]);
    for (const inst of insts) {
      Inst.operands(ctx, inst).forEach((operand, index) => {
        if (operand.kind === "value") {
          expect(Handle.key(operand.inst), User.create(inst, index));
        } else if (operand.kind === "block") {
          expect(Handle.key(operand.block), User.create(inst, index));
        }
      });
    }

    const compare = (referent: string, name: string, recorded: User[]) => {
      const want = expected.get(referent) ?? new Set<string>();
      const have = new Set(recorded.map(User.key));
      for (const key of want) {
        if (!have.has(key)) {
          this.error(`${name} is missing user record ${key}`);
        }
      }
      for (const user of recorded) {
        if (want.has(User.key(user))) {
          continue;
        }
        // Users outside this function are fine if the operand is real
        const operand = ctx.insts.tryDeref(user.inst)?.operands[user.operand];
        const real =
          (operand?.kind === "value" &&
            Handle.key(operand.inst) === referent) ||
          (operand?.kind === "block" &&
            Handle.key(operand.block) === referent);
        if (!real) {
          this.error(`${name} has stale user record ${User.key(user)}`);
        }
      }
    };

    for (const block of blocks) {
      compare(
        Handle.key(block),
        Block.name(ctx, block),
        Block.users(ctx, block),
      );
    }
    for (const inst of insts) {
      compare(Handle.key(inst), Inst.name(ctx, inst), Inst.users(ctx, inst));
    }
  }

  private checkReachability(ctx: Context, func: Func, blocks: Block[]): void {
    const entry = Func.entry(ctx, func);
    if (entry === undefined) {
      return;
    }

    const reached = new Set<string>([Handle.key(entry)]);
    const worklist = [entry];
    while (worklist.length > 0) {
      const block = worklist.pop();
      if (block === undefined) {
        break;
      }
      for (const edge of Block.successors(ctx, block)) {
        const key = Handle.key(edge.target);
        if (!reached.has(key) && ctx.blocks.isValid(edge.target)) {
          reached.add(key);
          worklist.push(edge.target);
        }
      }
    }

    for (const block of blocks) {
      if (!reached.has(Handle.key(block))) {
        this.warning(`${Block.name(ctx, block)} is unreachable`);
      }
    }
  }

  /**
   * Forward and backward walks must be exact reverses, without repeats,
   * and every node must name `container` as its container
   */
  private checkList<N extends Handle<string>, C extends Handle<string>>(
    listName: string,
    forward: N[],
    backward: N[],
    containerOf: (node: N) => C | undefined,
    container: C,
    describe: (node: N) => string,
  ): N[] {
    const seen = new Set<string>();
    for (const node of forward) {
      const key = Handle.key(node);
      if (seen.has(key)) {
        this.error(`${listName}: ${describe(node)} appears twice`);
      }
      seen.add(key);
      const owner = containerOf(node);
      if (owner === undefined || !Handle.equals(owner, container)) {
        this.error(`${listName}: ${describe(node)} names another container`);
      }
    }

    const mirrored = [...backward].reverse();
    const symmetric =
      mirrored.length === forward.length &&
      mirrored.every((node, i) => {
        const other = forward[i];
        return other !== undefined && Handle.equals(node, other);
      });
    if (!symmetric) {
      this.error(`${listName}: forward and backward walks disagree`);
    }

    return forward;
  }

  private error(message: string): void {
    this.errors.push(new IrError(ErrorCode.INVARIANT_VIOLATION, message));
  }

  private warning(message: string): void {
    this.warnings.push(
      new IrError(
        ErrorCode.INVARIANT_VIOLATION,
        message,
        undefined,
        Severity.Warning,
      ),
    );
  }
}
