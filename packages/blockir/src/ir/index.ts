/**
 * Basic-block / control-flow-graph layer of the IR.
 *
 * Every IR node lives in an arena owned by a `Context`; blocks, instructions
 * and functions are handles into those arenas. Blocks hold an intrusive
 * list of instructions and are themselves listed in their function; CFG
 * topology is the set of successor edges recorded on each block.
 */

export { Context, type Transformation } from "./context.js";
export { Operand } from "./operand.js";
export { User, type Usable, isUsed } from "./def-use.js";
export { BlockEdge, EdgeSet } from "./edge.js";
export { Inst, type InstData, instructionList } from "./inst.js";
export { Block, type BlockData, type Predecessor } from "./block.js";
export { Func, type FuncData, blockList } from "./func.js";
export { Builder } from "./builder.js";
export * from "./errors.js";
export * as Analysis from "./analysis/index.js";
