import { Handle } from "#infra";
import * as Ir from "#ir";
import { Result } from "#result";

import { SimplifyStep } from "../step.js";

/**
 * Fold a block into its predecessor when the predecessor ends in an
 * unconditional jump to it and nothing else enters it.
 */
export class BlockMergingStep extends SimplifyStep {
  readonly name = "block-merging";

  run(ctx: Ir.Context, func: Ir.Func): Result<boolean, Ir.Error> {
    return Ir.capture(() => {
      let changed = false;
      let merged = true;

      while (merged) {
        merged = false;
        for (const block of [...Ir.Func.blocks(ctx, func)]) {
          const target = this.mergeCandidate(ctx, func, block);
          if (target !== undefined) {
            this.merge(ctx, func, block, target);
            merged = true;
            changed = true;
            break;
          }
        }
      }

      return changed;
    });
  }

  private mergeCandidate(
    ctx: Ir.Context,
    func: Ir.Func,
    block: Ir.Block,
  ): Ir.Block | undefined {
    const jump = Ir.Block.terminator(ctx, block);
    if (jump === undefined || Ir.Inst.kind(ctx, jump) !== "jump") {
      return undefined;
    }

    const target = Ir.Inst.armTarget(ctx, jump, false);
    const entry = Ir.Func.entry(ctx, func);
    if (
      Handle.equals(target, block) ||
      (entry !== undefined && Handle.equals(target, entry)) ||
      Ir.Block.predecessors(ctx, target).length !== 1 ||
      Ir.Block.phis(ctx, target).length > 0
    ) {
      return undefined;
    }
    return target;
  }

  private merge(
    ctx: Ir.Context,
    func: Ir.Func,
    block: Ir.Block,
    target: Ir.Block,
  ): void {
    const jump = Ir.Block.terminator(ctx, block);
    if (jump === undefined) {
      return;
    }
    Result.unwrap(Ir.Block.removeSuccessor(ctx, block, target, jump, false));

    for (const inst of [...Ir.Block.instructions(ctx, target)]) {
      Ir.Inst.unlink(ctx, inst);
      Ir.Block.appendInstruction(ctx, block, inst);
    }

    // The moved terminator's edges now leave `block`; anything that named
    // `target` (successor phis, a self-loop) names `block` instead
    const moved = [...Ir.Block.successors(ctx, target)].map((edge) =>
      Handle.equals(edge.target, target)
        ? Ir.BlockEdge.create(block, edge.terminator, edge.isTrueArm)
        : edge,
    );
    Ir.Block.clearSuccessors(ctx, target);
    Ir.Inst.replaceAllUses(ctx, Ir.Block.uses, target, Ir.Operand.block(block));
    Ir.Block.copySuccessors(ctx, block, moved);

    const targetName = Ir.Block.name(ctx, target);
    Result.unwrap(Ir.Func.removeBlock(ctx, func, target));

    this.track(
      ctx,
      "merge",
      `Merged ${targetName} into ${Ir.Block.name(ctx, block)}`,
    );
  }
}
