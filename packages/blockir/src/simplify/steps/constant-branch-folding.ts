import { Handle } from "#infra";
import * as Ir from "#ir";
import { Result } from "#result";

import { SimplifyStep } from "../step.js";

/**
 * A branch on a constant condition always takes the same arm: prune the
 * other arm, which degrades the branch into a jump.
 */
export class ConstantBranchFoldingStep extends SimplifyStep {
  readonly name = "constant-branch-folding";

  run(ctx: Ir.Context, func: Ir.Func): Result<boolean, Ir.Error> {
    return Ir.capture(() => {
      let changed = false;

      for (const block of [...Ir.Func.blocks(ctx, func)]) {
        const branch = Ir.Block.terminator(ctx, block);
        if (branch === undefined || Ir.Inst.kind(ctx, branch) !== "branch") {
          continue;
        }

        const taken = this.constantCondition(ctx, branch);
        if (taken === undefined) {
          continue;
        }

        const live = Ir.Inst.armTarget(ctx, branch, taken);
        const dead = Ir.Inst.armTarget(ctx, branch, !taken);
        Result.unwrap(
          Ir.Block.removeSuccessor(ctx, block, dead, branch, !taken),
        );

        // The dead target no longer receives control from this block
        if (!Handle.equals(live, dead)) {
          for (const phi of Ir.Block.phis(ctx, dead)) {
            Ir.Inst.removeIncoming(ctx, phi, block);
          }
        }

        this.track(
          ctx,
          "replace",
          `Folded constant branch in ${Ir.Block.name(ctx, block)} into jump ${Ir.Block.name(ctx, live)}`,
        );
        changed = true;
      }

      return changed;
    });
  }

  private constantCondition(
    ctx: Ir.Context,
    branch: Ir.Inst,
  ): boolean | undefined {
    const condition = Ir.Inst.operand(ctx, branch, 0);
    switch (condition.kind) {
      case "const":
        return truthy(condition.value);
      case "value": {
        const opcode = Ir.Inst.opcode(ctx, condition.inst);
        return opcode.kind === "const" ? truthy(opcode.value) : undefined;
      }
      case "block":
        return undefined;
    }
  }
}

function truthy(value: bigint | boolean): boolean {
  return typeof value === "boolean" ? value : value !== 0n;
}
