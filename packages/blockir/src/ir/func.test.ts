import { describe, it, expect } from "vitest";

import { Result } from "#result";

import { Formatter } from "./analysis/formatter.js";
import { Block } from "./block.js";
import { Builder } from "./builder.js";
import { Context } from "./context.js";
import { BlockEdge } from "./edge.js";
import { Func } from "./func.js";
import { Inst } from "./inst.js";
import { Operand } from "./operand.js";

/**
 * bb_0 branches to bb_1 / bb_2, which both jump to bb_3; bb_3 merges
 * their constants with a phi and returns it
 */
function buildDiamond() {
  const ctx = new Context();
  const builder = Builder.forFunction(ctx, "diamond");
  const entry = builder.createBlock();
  const left = builder.createBlock();
  const right = builder.createBlock();
  const join = builder.createBlock();

  builder.positionAtEnd(entry);
  const condition = builder.constant(true);
  const branch = builder.branch(condition, left, right);

  builder.positionAtEnd(left);
  const one = builder.constant(1n);
  builder.jump(join);

  builder.positionAtEnd(right);
  const two = builder.constant(2n);
  builder.jump(join);

  builder.positionAtEnd(join);
  const phi = builder.phi([
    [left, one],
    [right, two],
  ]);
  builder.ret(phi);

  return {
    ctx,
    func: builder.func,
    entry,
    left,
    right,
    join,
    branch,
    one,
    two,
    phi,
  };
}

const format = (ctx: Context, func: Func) =>
  new Formatter().format(ctx, func);

describe("Func", () => {
  describe("block list", () => {
    it("keeps blocks in layout order with the first as entry", () => {
      const ctx = new Context();
      const func = Func.allocate(ctx, "layout");
      const a = Block.allocate(ctx);
      const b = Block.allocate(ctx);
      const c = Block.allocate(ctx);
      const d = Block.allocate(ctx);
      Func.appendBlock(ctx, func, b);
      Func.prependBlock(ctx, func, a);
      Func.insertBlockAfter(ctx, b, d);
      Func.insertBlockBefore(ctx, d, c);

      expect([...Func.blocks(ctx, func)]).toEqual([a, b, c, d]);
      expect([...Func.blocksReverse(ctx, func)]).toEqual([d, c, b, a]);
      expect(Func.entry(ctx, func)).toBe(a);
      expect(Block.container(ctx, c)).toBe(func);
      expect(Block.next(ctx, a)).toBe(b);
      expect(Block.prev(ctx, a)).toBeUndefined();
      expect(Func.name(ctx, func)).toBe("layout");
    });
  });

  it("displays every block dump between braces", () => {
    const ctx = new Context();
    const builder = Builder.forFunction(ctx, "tiny");
    const entry = builder.createBlock();
    const exit = builder.createBlock();
    builder.positionAtEnd(entry).jump(exit);
    builder.positionAtEnd(exit).ret();

    expect(Func.display(ctx, builder.func)).toBe(
      "function tiny {\nbb_0:\n\tjump bb_1\nbb_1:\n\treturn void\n}",
    );
  });

  describe("removeBlock", () => {
    it("removes an arm whose value feeds the join phi", () => {
      const { ctx, func, entry, left, right, one, phi } = buildDiamond();

      const result = Func.removeBlock(ctx, func, right);

      expect(result.success).toBe(true);
      expect(ctx.blocks.isValid(right)).toBe(false);
      expect(Inst.incoming(ctx, phi)).toEqual([[left, Operand.value(one)]]);
      expect(format(ctx, func)).toBe(
        [
          "function diamond {",
          "  bb_0:",
          "    %v0 = const true",
          "    jump bb_1",
          "  bb_1:",
          "    %v2 = const 1",
          "    jump bb_3",
          "  bb_3:",
          "    %v6 = phi [bb_1: %v2]",
          "    return %v6",
          "}",
        ].join("\n"),
      );

      const jump = Block.terminator(ctx, entry);
      if (jump === undefined) throw new Error("no terminator");
      expect([...Block.successors(ctx, entry)]).toEqual([
        BlockEdge.create(left, jump, false),
      ]);
    });

    it("refuses while a value defined in the block is used elsewhere", () => {
      const { ctx, func, right, two, phi } = buildDiamond();
      // The pair arriving from bb_1 now reads bb_2's value
      Inst.setOperand(ctx, phi, 1, Operand.value(two));
      const before = format(ctx, func);

      const result = Func.removeBlock(ctx, func, right);

      expect(result.success).toBe(false);
      expect(Result.firstError(result)?.message).toBe(
        "IR invariant violated: %v4 of bb_2 is used by %v6",
      );
      expect(format(ctx, func)).toBe(before);
    });

    it("degrades the branch that entered the block", () => {
      const { ctx, func, entry, left, right, phi } = buildDiamond();
      Inst.removeIncoming(ctx, phi, right);

      const result = Func.removeBlock(ctx, func, right);

      expect(result.success).toBe(true);
      expect(ctx.blocks.isValid(right)).toBe(false);
      expect(format(ctx, func)).toBe(
        [
          "function diamond {",
          "  bb_0:",
          "    %v0 = const true",
          "    jump bb_1",
          "  bb_1:",
          "    %v2 = const 1",
          "    jump bb_3",
          "  bb_3:",
          "    %v6 = phi [bb_1: %v2]",
          "    return %v6",
          "}",
        ].join("\n"),
      );

      const jump = Block.terminator(ctx, entry);
      if (jump === undefined) throw new Error("no terminator");
      expect([...Block.successors(ctx, entry)]).toEqual([
        BlockEdge.create(left, jump, false),
      ]);
    });

    it("deletes jumps that entered the block", () => {
      const { ctx, func, left, right, join } = buildDiamond();

      expect(Func.removeBlock(ctx, func, join).success).toBe(true);

      expect(format(ctx, func)).toBe(
        [
          "function diamond {",
          "  bb_0:",
          "    %v0 = const true",
          "    branch %v0 ? bb_1 : bb_2",
          "  bb_1:",
          "    %v2 = const 1",
          "  bb_2:",
          "    %v4 = const 2",
          "}",
        ].join("\n"),
      );
      expect(Block.successors(ctx, left).size).toBe(0);
      expect(Block.successors(ctx, right).size).toBe(0);
    });

    it("releases every value and block reference the body held", () => {
      const { ctx, func, left, join, phi } = buildDiamond();
      const one = Block.head(ctx, left);
      if (one === undefined) throw new Error("empty block");

      Result.unwrap(Func.removeBlock(ctx, func, join));

      expect(Inst.users(ctx, one)).toEqual([]);
      expect(Block.users(ctx, left)).toEqual([]);
      expect(ctx.insts.isValid(phi)).toBe(false);
    });

    it("refuses a block entered by a jump without a recorded edge", () => {
      const ctx = new Context();
      const func = Func.allocate(ctx, "loose");
      const source = Block.allocate(ctx);
      const target = Block.allocate(ctx);
      Func.appendBlock(ctx, func, source);
      Func.appendBlock(ctx, func, target);
      Block.appendInstruction(ctx, source, Inst.jump(ctx, target));

      const result = Func.removeBlock(ctx, func, target);

      expect(Result.firstError(result)?.message).toBe(
        "IR invariant violated: bb_1 is referenced by jump %v0 without a recorded edge",
      );
      expect(ctx.blocks.isValid(target)).toBe(true);
    });

    it("refuses a block of another function", () => {
      const ctx = new Context();
      const owner = Func.allocate(ctx, "owner");
      const other = Func.allocate(ctx, "other");
      const block = Block.allocate(ctx);
      Func.appendBlock(ctx, owner, block);

      const result = Func.removeBlock(ctx, other, block);

      expect(Result.firstError(result)?.message).toBe(
        "Structural precondition violated: bb_0 is not a block of other",
      );
    });

    it("drops phi pairs that name the removed block", () => {
      const ctx = new Context();
      const builder = Builder.forFunction(ctx, "loop");
      const entry = builder.createBlock();
      const body = builder.createBlock();
      const stray = builder.createBlock();

      builder.positionAtEnd(entry);
      const zero = builder.constant(0n);
      builder.jump(body);

      builder.positionAtEnd(stray);
      const five = builder.constant(5n);
      builder.ret();

      builder.positionAtEnd(body);
      const phi = builder.phi([
        [entry, zero],
        [stray, zero],
      ]);
      builder.ret(phi);

      // `five` is unused, so only the phi pair keeps `stray` referenced
      expect(Inst.users(ctx, five)).toEqual([]);
      Result.unwrap(Func.removeBlock(ctx, builder.func, stray));

      expect(Inst.display(ctx, phi)).toBe("%v4 = phi [bb_0: %v0]");
    });
  });
});

