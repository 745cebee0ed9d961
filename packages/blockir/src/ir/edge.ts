import { Handle, KeyedSet } from "#infra";

import type { Block } from "./block.js";
import type { Inst } from "./inst.js";

/**
 * One directed control transfer out of a block: the `terminator` sends
 * control to `target`. `isTrueArm` tells the two arms of a conditional
 * branch apart and is always false for an unconditional jump.
 */
export interface BlockEdge {
  readonly target: Block;
  readonly terminator: Inst;
  readonly isTrueArm: boolean;
}

export namespace BlockEdge {
  export function create(
    target: Block,
    terminator: Inst,
    isTrueArm: boolean,
  ): BlockEdge {
    return Object.freeze({ target, terminator, isTrueArm });
  }

  export function key(edge: BlockEdge): string {
    const arm = edge.isTrueArm ? "T" : "F";
    return `${Handle.key(edge.target)}/${Handle.key(edge.terminator)}/${arm}`;
  }

  export function equals(a: BlockEdge, b: BlockEdge): boolean {
    return key(a) === key(b);
  }
}

/**
 * Successor edges of one block; equality covers all three edge fields
 */
export type EdgeSet = KeyedSet<BlockEdge>;

export namespace EdgeSet {
  export function create(edges: Iterable<BlockEdge> = []): EdgeSet {
    return new KeyedSet(BlockEdge.key, edges);
  }
}
