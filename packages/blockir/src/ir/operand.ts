import type { Block } from "./block.js";
import type { Inst } from "./inst.js";

/**
 * Operand slot contents: an immediate, another instruction's value, or a
 * block reference (branch targets, phi incoming blocks)
 */
export type Operand =
  | { kind: "const"; value: bigint | boolean }
  | { kind: "value"; inst: Inst }
  | { kind: "block"; block: Block };

export namespace Operand {
  export function constant(value: bigint | boolean): Operand {
    return { kind: "const", value };
  }

  export function value(inst: Inst): Operand {
    return { kind: "value", inst };
  }

  export function block(block: Block): Operand {
    return { kind: "block", block };
  }
}
