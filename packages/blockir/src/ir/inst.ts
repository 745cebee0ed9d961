import type { SourceLocation } from "#errors";
import { Handle, KeyedSet, LinkedList } from "#infra";

import type { Context } from "./context.js";
import { User, type Usable } from "./def-use.js";
import { Error as IrError, ErrorCode } from "./errors.js";
import { Block } from "./block.js";
import { Operand } from "./operand.js";

/** Instruction handle; an instruction is also the value it defines */
export type Inst = Handle<"inst">;

export interface InstData {
  readonly self: Inst;
  opcode: Inst.Opcode;
  operands: Operand[];
  /** Operand slots that read this instruction's value */
  users: KeyedSet<User>;
  next?: Inst;
  prev?: Inst;
  container?: Block;
  loc?: SourceLocation;
}

/**
 * Instructions in block order
 */
export const instructionList = new LinkedList<Context, Inst, Block>({
  describe: (ctx, inst) => Inst.name(ctx, inst),
  next: (ctx, inst) => ctx.insts.deref(inst).next,
  prev: (ctx, inst) => ctx.insts.deref(inst).prev,
  container: (ctx, inst) => ctx.insts.deref(inst).container,
  setNext: (ctx, inst, next) => {
    ctx.insts.deref(inst).next = next;
  },
  setPrev: (ctx, inst, prev) => {
    ctx.insts.deref(inst).prev = prev;
  },
  setContainer: (ctx, inst, container) => {
    ctx.insts.deref(inst).container = container;
  },
  head: (ctx, block) => ctx.blocks.deref(block).head,
  tail: (ctx, block) => ctx.blocks.deref(block).tail,
  setHead: (ctx, block, head) => {
    ctx.blocks.deref(block).head = head;
  },
  setTail: (ctx, block, tail) => {
    ctx.blocks.deref(block).tail = tail;
  },
});

export namespace Inst {
  export type BinaryOp =
    // Arithmetic
    | "add"
    | "sub"
    | "mul"
    | "div"
    | "mod"
    // Comparison
    | "eq"
    | "ne"
    | "lt"
    | "le"
    | "gt"
    | "ge"
    // Logical
    | "and"
    | "or";

  /**
   * Operand layout per kind:
   * - const: none
   * - binary: [left, right]
   * - phi: [block, value]*
   * - jump: [target]
   * - branch: [condition, trueTarget, falseTarget]
   * - return: [value?]
   */
  export type Opcode =
    | { kind: "const"; value: bigint | boolean }
    | { kind: "binary"; op: BinaryOp }
    | { kind: "phi" }
    | { kind: "jump" }
    | { kind: "branch" }
    | { kind: "return" };

  export type Kind = Opcode["kind"];

  /** Def-use view of instruction values */
  export const uses: Usable<Inst> = {
    users: (ctx, inst) => [...ctx.insts.deref(inst).users],
    insertUser: (ctx, inst, user) => {
      ctx.insts.deref(inst).users.add(user);
    },
    removeUser: (ctx, inst, user) => {
      ctx.insts.deref(inst).users.delete(user);
    },
  };

  export function constant(
    ctx: Context,
    value: bigint | boolean,
    loc?: SourceLocation,
  ): Inst {
    return create(ctx, { kind: "const", value }, [], loc);
  }

  export function binary(
    ctx: Context,
    op: BinaryOp,
    left: Operand,
    right: Operand,
    loc?: SourceLocation,
  ): Inst {
    return create(ctx, { kind: "binary", op }, [left, right], loc);
  }

  export function phi(
    ctx: Context,
    incoming: Array<[Block, Operand]>,
    loc?: SourceLocation,
  ): Inst {
    const operands = incoming.flatMap(([block, value]) => [
      Operand.block(block),
      value,
    ]);
    return create(ctx, { kind: "phi" }, operands, loc);
  }

  export function jump(
    ctx: Context,
    target: Block,
    loc?: SourceLocation,
  ): Inst {
    return create(ctx, { kind: "jump" }, [Operand.block(target)], loc);
  }

  export function branch(
    ctx: Context,
    condition: Operand,
    trueTarget: Block,
    falseTarget: Block,
    loc?: SourceLocation,
  ): Inst {
    return create(
      ctx,
      { kind: "branch" },
      [condition, Operand.block(trueTarget), Operand.block(falseTarget)],
      loc,
    );
  }

  export function ret(
    ctx: Context,
    value?: Operand,
    loc?: SourceLocation,
  ): Inst {
    return create(ctx, { kind: "return" }, value ? [value] : [], loc);
  }

  function create(
    ctx: Context,
    opcode: Opcode,
    operands: Operand[],
    loc?: SourceLocation,
  ): Inst {
    const inst = ctx.insts.allocate((self) => ({
      self,
      opcode,
      operands: [],
      users: new KeyedSet(User.key),
      loc,
    }));
    for (const operand of operands) {
      ctx.insts.deref(inst).operands.push(operand);
      register(ctx, inst, ctx.insts.deref(inst).operands.length - 1);
    }
    return inst;
  }

  export function opcode(ctx: Context, inst: Inst): Opcode {
    return ctx.insts.deref(inst).opcode;
  }

  export function kind(ctx: Context, inst: Inst): Kind {
    return ctx.insts.deref(inst).opcode.kind;
  }

  export function location(
    ctx: Context,
    inst: Inst,
  ): SourceLocation | undefined {
    return ctx.insts.deref(inst).loc;
  }

  export function isTerminator(ctx: Context, inst: Inst): boolean {
    switch (kind(ctx, inst)) {
      case "jump":
      case "branch":
      case "return":
        return true;
      case "const":
      case "binary":
      case "phi":
        return false;
    }
  }

  export function operands(ctx: Context, inst: Inst): readonly Operand[] {
    return ctx.insts.deref(inst).operands;
  }

  export function operand(ctx: Context, inst: Inst, index: number): Operand {
    const operand = ctx.insts.deref(inst).operands[index];
    if (operand === undefined) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `${name(ctx, inst)} has no operand ${index}`,
      );
    }
    return operand;
  }

  /**
   * Overwrite an operand slot, moving its def-use record from the old
   * referent to the new one
   */
  export function setOperand(
    ctx: Context,
    inst: Inst,
    index: number,
    value: Operand,
  ): void {
    operand(ctx, inst, index);
    unregister(ctx, inst, index);
    ctx.insts.deref(inst).operands[index] = value;
    register(ctx, inst, index);
  }

  /**
   * Target of a jump (index 0) or of a branch arm (0 = true, 1 = false)
   */
  export function successor(ctx: Context, inst: Inst, index: number): Block {
    const slot = kind(ctx, inst) === "branch" ? index + 1 : index;
    const target = operand(ctx, inst, slot);
    if (target.kind !== "block") {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `${name(ctx, inst)} has no successor ${index}`,
      );
    }
    return target.block;
  }

  /**
   * Target of a branch arm; a jump has a single target whatever the arm
   */
  export function armTarget(
    ctx: Context,
    inst: Inst,
    isTrueArm: boolean,
  ): Block {
    const index = kind(ctx, inst) === "branch" && !isTrueArm ? 1 : 0;
    return successor(ctx, inst, index);
  }

  /**
   * Redirect a jump, or one arm of a branch, to another block
   */
  export function setArmTarget(
    ctx: Context,
    inst: Inst,
    isTrueArm: boolean,
    target: Block,
  ): void {
    const slot = kind(ctx, inst) === "branch" ? (isTrueArm ? 1 : 2) : 0;
    armTarget(ctx, inst, isTrueArm);
    setOperand(ctx, inst, slot, Operand.block(target));
  }

  /**
   * Incoming (block, value) pairs of a phi
   */
  export function incoming(ctx: Context, phi: Inst): Array<[Block, Operand]> {
    const pairs: Array<[Block, Operand]> = [];
    const ops = operands(ctx, phi);
    for (let i = 0; i + 1 < ops.length; i += 2) {
      const block = ops[i];
      const value = ops[i + 1];
      if (block?.kind === "block" && value !== undefined) {
        pairs.push([block.block, value]);
      }
    }
    return pairs;
  }

  export function addIncoming(
    ctx: Context,
    phi: Inst,
    block: Block,
    value: Operand,
  ): void {
    requireKind(ctx, phi, "phi");
    const data = ctx.insts.deref(phi);
    data.operands.push(Operand.block(block), value);
    register(ctx, phi, data.operands.length - 2);
    register(ctx, phi, data.operands.length - 1);
  }

  /**
   * Drop every incoming pair of a phi that names `block`. Later pairs
   * shift down, so all of the phi's def-use records are rebuilt.
   */
  export function removeIncoming(ctx: Context, phi: Inst, block: Block): void {
    requireKind(ctx, phi, "phi");
    const kept = incoming(ctx, phi).filter(
      ([from]) => !Handle.equals(from, block),
    );
    dropOperands(ctx, phi);
    for (const [from, value] of kept) {
      addIncoming(ctx, phi, from, value);
    }
  }

  /**
   * Point every user of `from` at `to` instead
   */
  export function replaceAllUses<E>(
    ctx: Context,
    usable: Usable<E>,
    from: E,
    to: Operand,
  ): void {
    for (const user of usable.users(ctx, from)) {
      setOperand(ctx, user.inst, user.operand, to);
    }
  }

  /**
   * Clear every operand, releasing their def-use records
   */
  export function dropOperands(ctx: Context, inst: Inst): void {
    const count = ctx.insts.deref(inst).operands.length;
    for (let index = 0; index < count; index++) {
      unregister(ctx, inst, index);
    }
    ctx.insts.deref(inst).operands = [];
  }

  export function users(ctx: Context, inst: Inst): User[] {
    return uses.users(ctx, inst);
  }

  export function container(ctx: Context, inst: Inst): Block | undefined {
    return ctx.insts.deref(inst).container;
  }

  export function next(ctx: Context, inst: Inst): Inst | undefined {
    return ctx.insts.deref(inst).next;
  }

  export function prev(ctx: Context, inst: Inst): Inst | undefined {
    return ctx.insts.deref(inst).prev;
  }

  export function insertAfter(ctx: Context, ref: Inst, inst: Inst): void {
    instructionList.insertAfter(ctx, ref, inst);
  }

  export function insertBefore(ctx: Context, ref: Inst, inst: Inst): void {
    instructionList.insertBefore(ctx, ref, inst);
  }

  export function unlink(ctx: Context, inst: Inst): void {
    instructionList.unlink(ctx, inst);
  }

  /**
   * Destroy an instruction: drop the edges it terminates, unlink it,
   * release its operands and free its slot. Its value must be unused.
   */
  export function remove(ctx: Context, inst: Inst): void {
    const data = ctx.insts.deref(inst);
    if (data.users.size > 0) {
      throw new IrError(
        ErrorCode.INVARIANT_VIOLATION,
        `${name(ctx, inst)} still has ${data.users.size} user(s)`,
      );
    }

    if (data.container !== undefined) {
      const successors = ctx.blocks.deref(data.container).successors;
      for (const edge of [...successors]) {
        if (Handle.equals(edge.terminator, inst)) {
          successors.delete(edge);
        }
      }
      unlink(ctx, inst);
    }

    dropOperands(ctx, inst);
    ctx.insts.deallocate(inst);
  }

  /**
   * Debug name derived from the arena slot; slots are reused, so this is
   * not an identity
   */
  export function name(_ctx: Context, inst: Inst): string {
    return `%v${inst.index}`;
  }

  export function display(ctx: Context, inst: Inst): string {
    const data = ctx.insts.deref(inst);
    const fmt = (operand: Operand) => formatOperand(ctx, operand);
    const dest = name(ctx, inst);

    switch (data.opcode.kind) {
      case "const":
        return `${dest} = const ${data.opcode.value}`;
      case "binary": {
        const [left, right] = data.operands.map(fmt);
        return `${dest} = ${data.opcode.op} ${left}, ${right}`;
      }
      case "phi": {
        const sources = incoming(ctx, inst).map(
          ([block, value]) => `[bb_${block.index}: ${fmt(value)}]`,
        );
        return `${dest} = phi ${sources.join(", ")}`;
      }
      case "jump":
        return `jump ${data.operands.map(fmt).join(", ")}`;
      case "branch": {
        const [condition, ifTrue, ifFalse] = data.operands.map(fmt);
        return `branch ${condition} ? ${ifTrue} : ${ifFalse}`;
      }
      case "return":
        return data.operands.length > 0
          ? `return ${data.operands.map(fmt).join(", ")}`
          : "return void";
    }
  }

  function formatOperand(ctx: Context, operand: Operand): string {
    switch (operand.kind) {
      case "const":
        return String(operand.value);
      case "value":
        return name(ctx, operand.inst);
      case "block":
        return `bb_${operand.block.index}`;
    }
  }

  function requireKind(ctx: Context, inst: Inst, expected: Kind): void {
    const actual = kind(ctx, inst);
    if (actual !== expected) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `expected ${expected}, found ${actual} at ${name(ctx, inst)}`,
      );
    }
  }

  function register(ctx: Context, inst: Inst, index: number): void {
    const operand = ctx.insts.deref(inst).operands[index];
    const user = User.create(inst, index);
    if (operand?.kind === "value") {
      uses.insertUser(ctx, operand.inst, user);
    } else if (operand?.kind === "block") {
      Block.uses.insertUser(ctx, operand.block, user);
    }
  }

  function unregister(ctx: Context, inst: Inst, index: number): void {
    const operand = ctx.insts.deref(inst).operands[index];
    const user = User.create(inst, index);
    if (operand?.kind === "value") {
      uses.removeUser(ctx, operand.inst, user);
    } else if (operand?.kind === "block") {
      Block.uses.removeUser(ctx, operand.block, user);
    }
  }
}
