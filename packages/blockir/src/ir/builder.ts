import type { SourceLocation } from "#errors";
import { Result } from "#result";

import { Block } from "./block.js";
import type { Context } from "./context.js";
import { Error as IrError, ErrorCode } from "./errors.js";
import { Func } from "./func.js";
import { Inst } from "./inst.js";
import { Operand } from "./operand.js";

/**
 * Appends instructions at the end of a cursor block. Terminators also
 * record their CFG edges, so built IR always has one edge per jump and
 * two per branch.
 */
export class Builder {
  private current?: Block;

  constructor(
    private readonly ctx: Context,
    readonly func: Func,
  ) {}

  static forFunction(ctx: Context, name: string): Builder {
    return new Builder(ctx, Func.allocate(ctx, name));
  }

  /**
   * Allocate a block at the end of the function; the cursor stays put
   */
  createBlock(): Block {
    const block = Block.allocate(this.ctx);
    Func.appendBlock(this.ctx, this.func, block);
    return block;
  }

  positionAtEnd(block: Block): this {
    this.current = block;
    return this;
  }

  get block(): Block {
    if (this.current === undefined) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        "builder has no current block",
      );
    }
    return this.current;
  }

  constant(value: bigint | boolean, loc?: SourceLocation): Inst {
    return this.append(Inst.constant(this.ctx, value, loc));
  }

  binary(
    op: Inst.BinaryOp,
    left: Inst,
    right: Inst,
    loc?: SourceLocation,
  ): Inst {
    return this.append(
      Inst.binary(this.ctx, op, Operand.value(left), Operand.value(right), loc),
    );
  }

  phi(incoming: Array<[Block, Inst]>, loc?: SourceLocation): Inst {
    const pairs = incoming.map(
      ([block, value]): [Block, Operand] => [block, Operand.value(value)],
    );
    return this.append(Inst.phi(this.ctx, pairs, loc));
  }

  jump(target: Block, loc?: SourceLocation): Inst {
    const jump = this.append(Inst.jump(this.ctx, target, loc));
    Result.unwrap(
      Block.addSuccessor(this.ctx, this.block, target, jump, false),
    );
    return jump;
  }

  branch(
    condition: Inst | boolean,
    ifTrue: Block,
    ifFalse: Block,
    loc?: SourceLocation,
  ): Inst {
    const operand =
      typeof condition === "boolean"
        ? Operand.constant(condition)
        : Operand.value(condition);
    const branch = this.append(
      Inst.branch(this.ctx, operand, ifTrue, ifFalse, loc),
    );
    Result.unwrap(
      Block.addSuccessor(this.ctx, this.block, ifTrue, branch, true),
    );
    Result.unwrap(
      Block.addSuccessor(this.ctx, this.block, ifFalse, branch, false),
    );
    return branch;
  }

  ret(value?: Inst, loc?: SourceLocation): Inst {
    const operand = value === undefined ? undefined : Operand.value(value);
    return this.append(Inst.ret(this.ctx, operand, loc));
  }

  private append(inst: Inst): Inst {
    Block.appendInstruction(this.ctx, this.block, inst);
    return inst;
  }
}
