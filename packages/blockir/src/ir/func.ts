import { Handle, LinkedList } from "#infra";
import { Result } from "#result";

import { Block } from "./block.js";
import type { Context } from "./context.js";
import type { User } from "./def-use.js";
import type { BlockEdge } from "./edge.js";
import { capture, Error as IrError, ErrorCode } from "./errors.js";
import { Inst } from "./inst.js";

/** Function handle */
export type Func = Handle<"fn">;

export interface FuncData {
  readonly self: Func;
  /** Function name (for debugging) */
  name: string;
  /** Entry block first */
  head?: Block;
  tail?: Block;
}

/**
 * Blocks in layout order
 */
export const blockList = new LinkedList<Context, Block, Func>({
  describe: (ctx, block) => Block.name(ctx, block),
  next: (ctx, block) => ctx.blocks.deref(block).next,
  prev: (ctx, block) => ctx.blocks.deref(block).prev,
  container: (ctx, block) => ctx.blocks.deref(block).container,
  setNext: (ctx, block, next) => {
    ctx.blocks.deref(block).next = next;
  },
  setPrev: (ctx, block, prev) => {
    ctx.blocks.deref(block).prev = prev;
  },
  setContainer: (ctx, block, container) => {
    ctx.blocks.deref(block).container = container;
  },
  head: (ctx, func) => ctx.funcs.deref(func).head,
  tail: (ctx, func) => ctx.funcs.deref(func).tail,
  setHead: (ctx, func, head) => {
    ctx.funcs.deref(func).head = head;
  },
  setTail: (ctx, func, tail) => {
    ctx.funcs.deref(func).tail = tail;
  },
});

export namespace Func {
  export function allocate(ctx: Context, name: string): Func {
    return ctx.funcs.allocate((self) => ({ self, name }));
  }

  export function name(ctx: Context, func: Func): string {
    return ctx.funcs.deref(func).name;
  }

  /**
   * Header line, each block's dump, closing brace
   */
  export function display(ctx: Context, func: Func): string {
    const lines = [`function ${name(ctx, func)} {`];
    for (const block of blocks(ctx, func)) {
      lines.push(Block.display(ctx, block));
    }
    lines.push("}");
    return lines.join("\n");
  }

  /**
   * The entry block is the first block in layout order
   */
  export function entry(ctx: Context, func: Func): Block | undefined {
    return ctx.funcs.deref(func).head;
  }

  export function blocks(ctx: Context, func: Func): IterableIterator<Block> {
    return blockList.iter(ctx, func);
  }

  export function blocksReverse(
    ctx: Context,
    func: Func,
  ): IterableIterator<Block> {
    return blockList.iterReverse(ctx, func);
  }

  export function appendBlock(ctx: Context, func: Func, block: Block): void {
    blockList.append(ctx, func, block);
  }

  export function prependBlock(ctx: Context, func: Func, block: Block): void {
    blockList.prepend(ctx, func, block);
  }

  export function insertBlockAfter(
    ctx: Context,
    ref: Block,
    block: Block,
  ): void {
    blockList.insertAfter(ctx, ref, block);
  }

  export function insertBlockBefore(
    ctx: Context,
    ref: Block,
    block: Block,
  ): void {
    blockList.insertBefore(ctx, ref, block);
  }

  /**
   * Detach a block from every reference and free it.
   *
   * Edges entering the block are pruned with `Block.removeSuccessor`:
   * branches degrade into jumps to their other arm, jumps are deleted and
   * leave their block unterminated. Phi pairs naming the block are dropped.
   * Values defined in the block must not be used outside it, except as the
   * value of such a pair; that is checked before anything is changed.
   */
  export function removeBlock(
    ctx: Context,
    func: Func,
    block: Block,
  ): Result<void, IrError> {
    return capture(() => {
      const owner = Block.container(ctx, block);
      if (owner === undefined || !Handle.equals(owner, func)) {
        throw new IrError(
          ErrorCode.STRUCTURAL_PRECONDITION,
          `${Block.name(ctx, block)} is not a block of ${name(ctx, func)}`,
        );
      }

      checkRemovable(ctx, block);

      // Prune edges that enter the block from its siblings
      for (const source of blocks(ctx, func)) {
        if (Handle.equals(source, block)) {
          continue;
        }
        let edge = findEdgeTo(ctx, source, block);
        while (edge !== undefined) {
          Result.unwrap(
            Block.removeSuccessor(
              ctx,
              source,
              edge.target,
              edge.terminator,
              edge.isTrueArm,
            ),
          );
          edge = findEdgeTo(ctx, source, block);
        }
      }

      // Remaining outside references are phi incoming pairs
      for (const user of Block.users(ctx, block)) {
        if (!isInside(ctx, user.inst, block)) {
          Inst.removeIncoming(ctx, user.inst, block);
        }
      }

      // Tear down the body: release every operand first so values used
      // only within the block (including phi cycles) become unused
      Block.clearSuccessors(ctx, block);
      const body = [...Block.instructions(ctx, block)];
      for (const inst of body) {
        Inst.dropOperands(ctx, inst);
      }
      for (const inst of body) {
        Inst.remove(ctx, inst);
      }

      blockList.unlink(ctx, block);
      ctx.blocks.deallocate(block);
    });
  }

  function checkRemovable(ctx: Context, block: Block): void {
    for (const inst of Block.instructions(ctx, block)) {
      for (const user of Inst.users(ctx, inst)) {
        if (
          !isInside(ctx, user.inst, block) &&
          !isIncomingFrom(ctx, user, block)
        ) {
          throw new IrError(
            ErrorCode.INVARIANT_VIOLATION,
            `${Inst.name(ctx, inst)} of ${Block.name(ctx, block)} is used by ${Inst.name(ctx, user.inst)}`,
          );
        }
      }
    }

    for (const user of Block.users(ctx, block)) {
      if (isInside(ctx, user.inst, block)) {
        continue;
      }
      const kind = Inst.kind(ctx, user.inst);
      if (kind === "phi") {
        continue;
      }
      // A branch or jump is pruned through its recorded edge; one
      // without an edge cannot be repaired here
      const source = Inst.container(ctx, user.inst);
      const recorded =
        source !== undefined &&
        [...ctx.blocks.deref(source).successors].some(
          (edge) =>
            Handle.equals(edge.terminator, user.inst) &&
            Handle.equals(edge.target, block),
        );
      if (!recorded) {
        throw new IrError(
          ErrorCode.INVARIANT_VIOLATION,
          `${Block.name(ctx, block)} is referenced by ${kind} ${Inst.name(ctx, user.inst)} without a recorded edge`,
        );
      }
    }
  }

  function findEdgeTo(
    ctx: Context,
    source: Block,
    target: Block,
  ): BlockEdge | undefined {
    for (const edge of ctx.blocks.deref(source).successors) {
      if (Handle.equals(edge.target, target)) {
        return edge;
      }
    }
    return undefined;
  }

  /**
   * Whether `user` is the value slot of a phi pair arriving from `block`
   */
  function isIncomingFrom(ctx: Context, user: User, block: Block): boolean {
    if (Inst.kind(ctx, user.inst) !== "phi" || user.operand % 2 === 0) {
      return false;
    }
    const from = Inst.operands(ctx, user.inst)[user.operand - 1];
    return from?.kind === "block" && Handle.equals(from.block, block);
  }

  function isInside(ctx: Context, inst: Inst, block: Block): boolean {
    const owner = Inst.container(ctx, inst);
    return owner !== undefined && Handle.equals(owner, block);
  }
}
