import { Arena } from "#infra";

import type { BlockData } from "./block.js";
import type { FuncData } from "./func.js";
import type { InstData } from "./inst.js";

/**
 * Record of one IR rewrite, kept for diagnostics
 */
export interface Transformation {
  type: "delete" | "replace" | "merge" | "retarget";
  step: string;
  reason: string;
}

/**
 * Owner of every IR arena. All operations take the context explicitly;
 * independent compilation units use independent contexts.
 */
export class Context {
  readonly blocks = new Arena<"bb", BlockData>("bb");
  readonly insts = new Arena<"inst", InstData>("inst");
  readonly funcs = new Arena<"fn", FuncData>("fn");

  private transformations: Transformation[] = [];

  trackTransformation(transformation: Transformation): void {
    this.transformations.push(transformation);
  }

  getTransformations(): readonly Transformation[] {
    return this.transformations;
  }
}
