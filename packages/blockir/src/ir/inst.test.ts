import { describe, it, expect, vi } from "vitest";

import { Block } from "./block.js";
import { Context } from "./context.js";
import { User, isUsed } from "./def-use.js";
import { Inst } from "./inst.js";
import { Operand } from "./operand.js";

function sortedKeys(users: User[]): string[] {
  return users.map(User.key).sort();
}

describe("Inst", () => {
  describe("def-use records", () => {
    it("registers a user for every value and block operand", () => {
      const ctx = new Context();
      const left = Inst.constant(ctx, 1n);
      const right = Inst.constant(ctx, 2n);
      const sum = Inst.binary(
        ctx,
        "add",
        Operand.value(left),
        Operand.value(right),
      );
      const target = Block.allocate(ctx);
      const jump = Inst.jump(ctx, target);

      expect(Inst.users(ctx, left)).toEqual([User.create(sum, 0)]);
      expect(Inst.users(ctx, right)).toEqual([User.create(sum, 1)]);
      expect(Block.users(ctx, target)).toEqual([User.create(jump, 0)]);
      expect(isUsed(ctx, Inst.uses, sum)).toBe(false);
    });

    it("records users through the def-use views", () => {
      const ctx = new Context();
      const target = Block.allocate(ctx);
      const other = Block.allocate(ctx);
      const insert = vi.spyOn(Block.uses, "insertUser");
      const remove = vi.spyOn(Block.uses, "removeUser");

      try {
        const jump = Inst.jump(ctx, target);
        Inst.setArmTarget(ctx, jump, false, other);

        expect(insert.mock.calls).toEqual([
          [ctx, target, User.create(jump, 0)],
          [ctx, other, User.create(jump, 0)],
        ]);
        expect(remove.mock.calls).toEqual([
          [ctx, target, User.create(jump, 0)],
        ]);
        expect(Block.users(ctx, target)).toEqual([]);
        expect(Block.users(ctx, other)).toEqual([User.create(jump, 0)]);
      } finally {
        insert.mockRestore();
        remove.mockRestore();
      }
    });

    it("does not record users for immediates", () => {
      const ctx = new Context();
      const target = Block.allocate(ctx);
      const branch = Inst.branch(ctx, Operand.constant(true), target, target);

      expect(Inst.operands(ctx, branch)).toEqual([
        Operand.constant(true),
        Operand.block(target),
        Operand.block(target),
      ]);
      expect(sortedKeys(Block.users(ctx, target))).toEqual([
        "inst0.0#1",
        "inst0.0#2",
      ]);
    });

    it("moves the record when an operand is overwritten", () => {
      const ctx = new Context();
      const a = Inst.constant(ctx, 1n);
      const b = Inst.constant(ctx, 2n);
      const neg = Inst.binary(ctx, "sub", Operand.value(a), Operand.value(a));

      Inst.setOperand(ctx, neg, 1, Operand.value(b));

      expect(Inst.users(ctx, a)).toEqual([User.create(neg, 0)]);
      expect(Inst.users(ctx, b)).toEqual([User.create(neg, 1)]);
    });

    it("redirects every use of a value", () => {
      const ctx = new Context();
      const a = Inst.constant(ctx, 1n);
      const b = Inst.constant(ctx, 2n);
      const product = Inst.binary(
        ctx,
        "mul",
        Operand.value(a),
        Operand.value(a),
      );

      Inst.replaceAllUses(ctx, Inst.uses, a, Operand.value(b));

      expect(Inst.users(ctx, a)).toEqual([]);
      expect(sortedKeys(Inst.users(ctx, b))).toEqual([
        "inst2.0#0",
        "inst2.0#1",
      ]);
      expect(Inst.display(ctx, product)).toBe("%v2 = mul %v1, %v1");
    });

    it("releases records when operands are dropped", () => {
      const ctx = new Context();
      const a = Inst.constant(ctx, 1n);
      const ret = Inst.ret(ctx, Operand.value(a));

      Inst.dropOperands(ctx, ret);

      expect(Inst.operands(ctx, ret)).toEqual([]);
      expect(Inst.users(ctx, a)).toEqual([]);
    });
  });

  describe("phi incoming pairs", () => {
    it("lists, adds and removes pairs by block", () => {
      const ctx = new Context();
      const left = Block.allocate(ctx);
      const right = Block.allocate(ctx);
      const one = Inst.constant(ctx, 1n);
      const two = Inst.constant(ctx, 2n);
      const phi = Inst.phi(ctx, [[left, Operand.value(one)]]);

      Inst.addIncoming(ctx, phi, right, Operand.value(two));
      expect(Inst.incoming(ctx, phi)).toEqual([
        [left, Operand.value(one)],
        [right, Operand.value(two)],
      ]);
      expect(Inst.display(ctx, phi)).toBe("%v2 = phi [bb_0: %v0], [bb_1: %v1]");

      Inst.removeIncoming(ctx, phi, left);
      expect(Inst.incoming(ctx, phi)).toEqual([[right, Operand.value(two)]]);
      expect(Block.users(ctx, left)).toEqual([]);
      expect(Inst.users(ctx, one)).toEqual([]);
      expect(Block.users(ctx, right)).toEqual([User.create(phi, 0)]);
      expect(Inst.users(ctx, two)).toEqual([User.create(phi, 1)]);
    });

    it("rejects incoming edits on other instructions", () => {
      const ctx = new Context();
      const block = Block.allocate(ctx);
      const value = Inst.constant(ctx, 1n);

      expect(() =>
        Inst.addIncoming(ctx, value, block, Operand.constant(1n)),
      ).toThrow("expected phi, found const at %v0");
    });
  });

  describe("targets", () => {
    it("reads and rewrites jump and branch targets", () => {
      const ctx = new Context();
      const a = Block.allocate(ctx);
      const b = Block.allocate(ctx);
      const c = Block.allocate(ctx);
      const jump = Inst.jump(ctx, a);
      const branch = Inst.branch(ctx, Operand.constant(false), a, b);

      expect(Inst.armTarget(ctx, jump, true)).toBe(a);
      expect(Inst.armTarget(ctx, jump, false)).toBe(a);
      expect(Inst.armTarget(ctx, branch, true)).toBe(a);
      expect(Inst.armTarget(ctx, branch, false)).toBe(b);
      expect(Inst.successor(ctx, branch, 1)).toBe(b);

      Inst.setArmTarget(ctx, branch, false, c);
      Inst.setArmTarget(ctx, jump, false, c);

      expect(Inst.display(ctx, branch)).toBe("branch false ? bb_0 : bb_2");
      expect(Inst.display(ctx, jump)).toBe("jump bb_2");
      expect(Block.users(ctx, b)).toEqual([]);
      expect(sortedKeys(Block.users(ctx, c))).toEqual([
        "inst0.0#0",
        "inst1.0#2",
      ]);
    });
  });

  describe("classification and display", () => {
    it("recognises terminators", () => {
      const ctx = new Context();
      const block = Block.allocate(ctx);
      const value = Inst.constant(ctx, 0n);

      expect(Inst.isTerminator(ctx, value)).toBe(false);
      expect(Inst.isTerminator(ctx, Inst.jump(ctx, block))).toBe(true);
      expect(Inst.isTerminator(ctx, Inst.ret(ctx))).toBe(true);
      expect(Inst.kind(ctx, value)).toBe("const");
    });

    it("renders each instruction kind", () => {
      const ctx = new Context();
      const a = Inst.constant(ctx, 10n);
      const b = Inst.constant(ctx, true);
      const lt = Inst.binary(ctx, "lt", Operand.value(a), Operand.constant(3n));

      expect(Inst.display(ctx, a)).toBe("%v0 = const 10");
      expect(Inst.display(ctx, b)).toBe("%v1 = const true");
      expect(Inst.display(ctx, lt)).toBe("%v2 = lt %v0, 3");
      expect(Inst.display(ctx, Inst.ret(ctx))).toBe("return void");
      expect(Inst.display(ctx, Inst.ret(ctx, Operand.value(lt)))).toBe(
        "return %v2",
      );
    });

    it("keeps the source location it was created with", () => {
      const ctx = new Context();
      const value = Inst.constant(ctx, 1n, { offset: 4, length: 2 });

      expect(Inst.location(ctx, value)).toEqual({ offset: 4, length: 2 });
    });
  });

  describe("remove", () => {
    it("refuses to free a value that is still used", () => {
      const ctx = new Context();
      const a = Inst.constant(ctx, 1n);
      Inst.ret(ctx, Operand.value(a));

      expect(() => Inst.remove(ctx, a)).toThrow(
        "IR invariant violated: %v0 still has 1 user(s)",
      );
      expect(ctx.insts.isValid(a)).toBe(true);
    });

    it("unlinks, releases operands and frees the slot", () => {
      const ctx = new Context();
      const block = Block.allocate(ctx);
      const a = Inst.constant(ctx, 1n);
      const ret = Inst.ret(ctx, Operand.value(a));
      Block.appendInstruction(ctx, block, a);
      Block.appendInstruction(ctx, block, ret);

      Inst.remove(ctx, ret);

      expect(ctx.insts.isValid(ret)).toBe(false);
      expect(Inst.users(ctx, a)).toEqual([]);
      expect([...Block.instructions(ctx, block)]).toEqual([a]);
      expect(Inst.next(ctx, a)).toBeUndefined();
    });
  });
});
