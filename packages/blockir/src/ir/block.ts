import { Handle, KeyedSet } from "#infra";
import type { Result } from "#result";

import type { Context } from "./context.js";
import { User, type Usable } from "./def-use.js";
import { BlockEdge, EdgeSet } from "./edge.js";
import { capture, Error as IrError, ErrorCode } from "./errors.js";
import { Func } from "./func.js";
import { Inst, instructionList } from "./inst.js";

/** Basic block handle */
export type Block = Handle<"bb">;

export interface BlockData {
  readonly self: Block;
  /** Operand slots (branch targets, phi incoming blocks) naming this block */
  users: KeyedSet<User>;
  /** Sibling blocks in the owning function */
  next?: Block;
  prev?: Block;
  container?: Func;
  /** Outgoing CFG edges */
  successors: EdgeSet;
  /** First and last instruction */
  head?: Inst;
  tail?: Inst;
}

/**
 * An edge of some other block that enters this one
 */
export interface Predecessor {
  source: Block;
  edge: BlockEdge;
}

export namespace Block {
  /** Def-use view of block references */
  export const uses: Usable<Block> = {
    users: (ctx, block) => [...ctx.blocks.deref(block).users],
    insertUser: (ctx, block, user) => {
      ctx.blocks.deref(block).users.add(user);
    },
    removeUser: (ctx, block, user) => {
      ctx.blocks.deref(block).users.delete(user);
    },
  };

  /**
   * A fresh block: no instructions, edges or users, and no container
   */
  export function allocate(ctx: Context): Block {
    return ctx.blocks.allocate((self) => ({
      self,
      users: new KeyedSet(User.key),
      successors: EdgeSet.create(),
    }));
  }

  /**
   * Debug label from the arena slot index. Slots are recycled, so the
   * label is for diagnostics only.
   */
  export function name(_ctx: Context, block: Block): string {
    return `bb_${block.index}`;
  }

  /**
   * Label line, then one tab-indented line per instruction
   */
  export function display(ctx: Context, block: Block): string {
    const lines = [`${name(ctx, block)}:`];
    for (const inst of instructions(ctx, block)) {
      lines.push(`\t${Inst.display(ctx, inst)}`);
    }
    return lines.join("\n");
  }

  export function users(ctx: Context, block: Block): User[] {
    return uses.users(ctx, block);
  }

  export function container(ctx: Context, block: Block): Func | undefined {
    return ctx.blocks.deref(block).container;
  }

  export function next(ctx: Context, block: Block): Block | undefined {
    return ctx.blocks.deref(block).next;
  }

  export function prev(ctx: Context, block: Block): Block | undefined {
    return ctx.blocks.deref(block).prev;
  }

  export function head(ctx: Context, block: Block): Inst | undefined {
    return ctx.blocks.deref(block).head;
  }

  export function tail(ctx: Context, block: Block): Inst | undefined {
    return ctx.blocks.deref(block).tail;
  }

  export function instructions(
    ctx: Context,
    block: Block,
  ): IterableIterator<Inst> {
    return instructionList.iter(ctx, block);
  }

  export function instructionsReverse(
    ctx: Context,
    block: Block,
  ): IterableIterator<Inst> {
    return instructionList.iterReverse(ctx, block);
  }

  export function appendInstruction(
    ctx: Context,
    block: Block,
    inst: Inst,
  ): void {
    instructionList.append(ctx, block, inst);
  }

  export function prependInstruction(
    ctx: Context,
    block: Block,
    inst: Inst,
  ): void {
    instructionList.prepend(ctx, block, inst);
  }

  /**
   * Leading phi instructions
   */
  export function phis(ctx: Context, block: Block): Inst[] {
    const result: Inst[] = [];
    for (const inst of instructions(ctx, block)) {
      if (Inst.kind(ctx, inst) !== "phi") {
        break;
      }
      result.push(inst);
    }
    return result;
  }

  /**
   * The last instruction, if it ends the block
   */
  export function terminator(ctx: Context, block: Block): Inst | undefined {
    const last = tail(ctx, block);
    return last !== undefined && Inst.isTerminator(ctx, last)
      ? last
      : undefined;
  }

  /**
   * Detach and destroy this block. Only the owning function can see every
   * reference that must be cleaned up first, so the work is delegated to
   * it; a detached block is freed directly once it is empty.
   */
  export function remove(ctx: Context, block: Block): Result<void, IrError> {
    const owner = container(ctx, block);
    if (owner !== undefined) {
      return Func.removeBlock(ctx, owner, block);
    }

    return capture(() => {
      const data = ctx.blocks.deref(block);
      if (
        data.head !== undefined ||
        data.successors.size > 0 ||
        data.users.size > 0
      ) {
        throw new IrError(
          ErrorCode.INVARIANT_VIOLATION,
          `${name(ctx, block)} still has instructions, edges or users`,
        );
      }
      ctx.blocks.deallocate(block);
    });
  }

  /**
   * Unlink and destroy an instruction of this block
   */
  export function removeInstruction(
    ctx: Context,
    block: Block,
    inst: Inst,
  ): Result<void, IrError> {
    return capture(() => {
      requireOwned(ctx, block, inst);
      Inst.remove(ctx, inst);
    });
  }

  /**
   * Record the CFG edge that `terminator` contributes towards `target`.
   * A jump yields its single edge; a branch yields one edge per arm.
   */
  export function addSuccessor(
    ctx: Context,
    block: Block,
    target: Block,
    terminator: Inst,
    isTrueArm: boolean,
  ): Result<BlockEdge, IrError> {
    return capture(() => {
      requireOwned(ctx, block, terminator);
      const edge = edgeFor(ctx, target, terminator, isTrueArm);
      ctx.blocks.deref(block).successors.add(edge);
      return edge;
    });
  }

  /**
   * Prune one outgoing edge.
   *
   * Pruning a jump deletes it and leaves the block unterminated. Pruning
   * one arm of a branch degrades the branch into a jump to the other arm,
   * and the replacement's edge is returned.
   */
  export function removeSuccessor(
    ctx: Context,
    block: Block,
    target: Block,
    terminator: Inst,
    isTrueArm: boolean,
  ): Result<BlockEdge | undefined, IrError> {
    return capture(() => {
      requireOwned(ctx, block, terminator);
      const edge = edgeFor(ctx, target, terminator, isTrueArm);
      const successors = ctx.blocks.deref(block).successors;
      if (!successors.has(edge)) {
        throw new IrError(
          ErrorCode.STRUCTURAL_PRECONDITION,
          `${name(ctx, block)} has no edge ${describeEdge(ctx, edge)}`,
        );
      }

      if (Inst.kind(ctx, terminator) === "jump") {
        successors.delete(edge);
        Inst.remove(ctx, terminator);
        return undefined;
      }

      return degradeBranch(ctx, block, terminator, isTrueArm);
    });
  }

  export function clearSuccessors(ctx: Context, block: Block): void {
    ctx.blocks.deref(block).successors.clear();
  }

  /**
   * Replace the whole edge set, for passes that move a block's
   * terminator elsewhere
   */
  export function copySuccessors(
    ctx: Context,
    block: Block,
    edges: Iterable<BlockEdge>,
  ): void {
    ctx.blocks.deref(block).successors = EdgeSet.create(edges);
  }

  /**
   * Snapshot of the outgoing edges
   */
  export function successors(ctx: Context, block: Block): EdgeSet {
    return ctx.blocks.deref(block).successors.clone();
  }

  /**
   * Edges of sibling blocks that enter this block. Not stored: computed
   * by scanning the successor sets of the containing function.
   */
  export function predecessors(ctx: Context, block: Block): Predecessor[] {
    const owner = container(ctx, block);
    if (owner === undefined) {
      return [];
    }

    const result: Predecessor[] = [];
    for (const source of Func.blocks(ctx, owner)) {
      for (const edge of ctx.blocks.deref(source).successors) {
        if (Handle.equals(edge.target, block)) {
          result.push({ source, edge });
        }
      }
    }
    return result;
  }

  function degradeBranch(
    ctx: Context,
    block: Block,
    branch: Inst,
    prunedArm: boolean,
  ): BlockEdge {
    const successors = ctx.blocks.deref(block).successors;
    const pruned = Inst.armTarget(ctx, branch, prunedArm);
    const survivor = Inst.armTarget(ctx, branch, !prunedArm);

    // The branch is retired, so both of its arm records go
    successors.delete(BlockEdge.create(pruned, branch, prunedArm));
    successors.delete(BlockEdge.create(survivor, branch, !prunedArm));

    // Link the replacement before unlinking the branch so the block is
    // never without a terminator
    const jump = Inst.jump(ctx, survivor, Inst.location(ctx, branch));
    Inst.insertAfter(ctx, branch, jump);
    Inst.remove(ctx, branch);

    const edge = BlockEdge.create(survivor, jump, false);
    successors.add(edge);
    return edge;
  }

  function edgeFor(
    ctx: Context,
    target: Block,
    terminator: Inst,
    isTrueArm: boolean,
  ): BlockEdge {
    const kind = Inst.kind(ctx, terminator);
    switch (kind) {
      case "jump":
        requireTarget(ctx, terminator, target, false);
        return BlockEdge.create(target, terminator, false);
      case "branch":
        requireTarget(ctx, terminator, target, isTrueArm);
        return BlockEdge.create(target, terminator, isTrueArm);
      case "const":
      case "binary":
      case "phi":
      case "return":
        throw new IrError(
          ErrorCode.STRUCTURAL_PRECONDITION,
          `${kind} instruction ${Inst.name(ctx, terminator)} cannot produce control-flow edges`,
        );
    }
  }

  function requireTarget(
    ctx: Context,
    terminator: Inst,
    target: Block,
    isTrueArm: boolean,
  ): void {
    const actual = Inst.armTarget(ctx, terminator, isTrueArm);
    if (!Handle.equals(actual, target)) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `${Inst.name(ctx, terminator)} targets ${name(ctx, actual)}, not ${name(ctx, target)}`,
      );
    }
  }

  function requireOwned(ctx: Context, block: Block, inst: Inst): void {
    const owner = Inst.container(ctx, inst);
    if (owner === undefined || !Handle.equals(owner, block)) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `${Inst.name(ctx, inst)} is not an instruction of ${name(ctx, block)}`,
      );
    }
  }

  function describeEdge(ctx: Context, edge: BlockEdge): string {
    const arm = edge.isTrueArm ? "true" : "false";
    return `(${name(ctx, edge.target)}, ${Inst.name(ctx, edge.terminator)}, ${arm})`;
  }
}
