/**
 * CFG clean-up steps built on the block edge operations
 */

export { SimplifyStep } from "./step.js";
export { ConstantBranchFoldingStep } from "./steps/constant-branch-folding.js";
export { JumpThreadingStep } from "./steps/jump-threading.js";
export { BlockMergingStep } from "./steps/block-merging.js";
export {
  UnreachableBlockEliminationStep,
} from "./steps/unreachable-block-elimination.js";
