export const VERSION = "0.1.0";

export * as Ir from "#ir";

// Re-export CFG simplification steps
export {
  SimplifyStep,
  ConstantBranchFoldingStep,
  JumpThreadingStep,
  BlockMergingStep,
  UnreachableBlockEliminationStep,
} from "#simplify";

// Re-export shared infrastructure
export { Arena, Handle, KeyedSet, LinkedList, type ListLinks } from "#infra";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";
