/**
 * Def-use bookkeeping.
 *
 * A referenceable entity records every operand slot that currently points
 * at it. Operand writes go through `Inst.setOperand`, which keeps these
 * records in step, so "is this still referenced" and "redirect every
 * reference" cost O(uses) instead of a scan of the whole function.
 */

import { Handle } from "#infra";

import type { Context } from "./context.js";
import type { Inst } from "./inst.js";

/**
 * Operand slot `operand` of instruction `inst`
 */
export interface User {
  readonly inst: Inst;
  readonly operand: number;
}

export namespace User {
  export function create(inst: Inst, operand: number): User {
    return { inst, operand };
  }

  export function key(user: User): string {
    return `${Handle.key(user.inst)}#${user.operand}`;
  }
}

export interface Usable<E> {
  users(ctx: Context, entity: E): User[];
  insertUser(ctx: Context, entity: E, user: User): void;
  removeUser(ctx: Context, entity: E, user: User): void;
}

export function isUsed<E>(ctx: Context, usable: Usable<E>, entity: E): boolean {
  return usable.users(ctx, entity).length > 0;
}
