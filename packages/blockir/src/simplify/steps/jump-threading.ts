import { Handle } from "#infra";
import * as Ir from "#ir";
import { Result } from "#result";

import { SimplifyStep } from "../step.js";

/**
 * Edges into a block that does nothing but jump onwards are redirected to
 * the final destination. Destinations with phis are left alone, since their
 * incoming pairs would have to be duplicated.
 */
export class JumpThreadingStep extends SimplifyStep {
  readonly name = "jump-threading";

  run(ctx: Ir.Context, func: Ir.Func): Result<boolean, Ir.Error> {
    return Ir.capture(() => {
      let changed = false;

      for (const block of [...Ir.Func.blocks(ctx, func)]) {
        for (const edge of Ir.Block.successors(ctx, block)) {
          const hop = edge.target;
          const destination = this.forwardingTarget(ctx, hop);
          if (
            destination === undefined ||
            Handle.equals(hop, block) ||
            Ir.Block.phis(ctx, destination).length > 0
          ) {
            continue;
          }

          const remaining = Ir.Block.successors(ctx, block);
          remaining.delete(edge);
          Ir.Block.copySuccessors(ctx, block, remaining);
          Ir.Inst.setArmTarget(
            ctx,
            edge.terminator,
            edge.isTrueArm,
            destination,
          );
          Result.unwrap(
            Ir.Block.addSuccessor(
              ctx,
              block,
              destination,
              edge.terminator,
              edge.isTrueArm,
            ),
          );

          this.track(
            ctx,
            "retarget",
            `Threaded ${Ir.Block.name(ctx, block)} past ${Ir.Block.name(ctx, hop)} to ${Ir.Block.name(ctx, destination)}`,
          );
          changed = true;
        }
      }

      return changed;
    });
  }

  /**
   * Where control goes after a block consisting of a single jump
   */
  private forwardingTarget(
    ctx: Ir.Context,
    block: Ir.Block,
  ): Ir.Block | undefined {
    const only = Ir.Block.head(ctx, block);
    if (
      only === undefined ||
      !Handle.equals(only, Ir.Block.tail(ctx, block) ?? only) ||
      Ir.Inst.kind(ctx, only) !== "jump"
    ) {
      return undefined;
    }
    const target = Ir.Inst.armTarget(ctx, only, false);
    return Handle.equals(target, block) ? undefined : target;
  }
}
