import { Handle } from "#infra";
import * as Ir from "#ir";
import { Result } from "#result";

import { SimplifyStep } from "../step.js";

/**
 * Remove blocks the entry block cannot reach
 */
export class UnreachableBlockEliminationStep extends SimplifyStep {
  readonly name = "unreachable-block-elimination";

  run(ctx: Ir.Context, func: Ir.Func): Result<boolean, Ir.Error> {
    return Ir.capture(() => {
      const reachable = this.reachableFrom(ctx, func);
      const blocks = [...Ir.Func.blocks(ctx, func)];
      const dead = blocks.filter(
        (block) => !reachable.has(Handle.key(block)),
      );
      if (dead.length === 0) {
        return false;
      }

      // Live phis forget values flowing in from dead blocks
      for (const block of blocks) {
        if (!reachable.has(Handle.key(block))) {
          continue;
        }
        for (const phi of Ir.Block.phis(ctx, block)) {
          for (const from of dead) {
            Ir.Inst.removeIncoming(ctx, phi, from);
          }
        }
      }

      // Dead blocks may use each other's values, so release every operand
      // before any of them is freed
      for (const block of dead) {
        Ir.Block.clearSuccessors(ctx, block);
        for (const inst of Ir.Block.instructions(ctx, block)) {
          Ir.Inst.dropOperands(ctx, inst);
        }
      }

      for (const block of dead) {
        const name = Ir.Block.name(ctx, block);
        Result.unwrap(Ir.Func.removeBlock(ctx, func, block));
        this.track(ctx, "delete", `Removed unreachable block ${name}`);
      }

      return true;
    });
  }

  private reachableFrom(ctx: Ir.Context, func: Ir.Func): Set<string> {
    const reached = new Set<string>();
    const entry = Ir.Func.entry(ctx, func);
    if (entry === undefined) {
      return reached;
    }

    reached.add(Handle.key(entry));
    const worklist = [entry];
    let block = worklist.pop();
    while (block !== undefined) {
      for (const edge of Ir.Block.successors(ctx, block)) {
        const key = Handle.key(edge.target);
        if (!reached.has(key)) {
          reached.add(key);
          worklist.push(edge.target);
        }
      }
      block = worklist.pop();
    }
    return reached;
  }
}
