import type * as Ir from "#ir";
import type { Result } from "#result";

/**
 * One CFG clean-up over a single function. `run` reports whether anything
 * changed; every rewrite is also recorded on the context.
 */
export abstract class SimplifyStep {
  abstract readonly name: string;

  abstract run(ctx: Ir.Context, func: Ir.Func): Result<boolean, Ir.Error>;

  protected track(
    ctx: Ir.Context,
    type: Ir.Transformation["type"],
    reason: string,
  ): void {
    ctx.trackTransformation({ type, step: this.name, reason });
  }
}
