/**
 * Generational arena storage for mutable IR nodes.
 *
 * Every node lives in exactly one arena slot and is named by a handle
 * (slot index + generation). A freed slot is recycled with its generation
 * bumped, so a stale handle keeps failing its generation check instead of
 * reaching the slot's next occupant.
 */

import { Error as IrError, ErrorCode } from "./errors.js";

/**
 * Handle into an arena. `Tag` only separates handle kinds at the type
 * level; at run time every handle is a frozen `{ kind, index, generation }`.
 */
export interface Handle<Tag extends string> {
  readonly kind: Tag;
  readonly index: number;
  readonly generation: number;
}

export namespace Handle {
  /**
   * Stable string key, for keyed collections
   */
  export function key<Tag extends string>(handle: Handle<Tag>): string {
    return `${handle.kind}${handle.index}.${handle.generation}`;
  }

  export function equals<Tag extends string>(
    a: Handle<Tag>,
    b: Handle<Tag>,
  ): boolean {
    return (
      a.kind === b.kind && a.index === b.index && a.generation === b.generation
    );
  }
}

interface Slot<Tag extends string, T> {
  generation: number;
  entry?: { handle: Handle<Tag>; data: T };
}

export class Arena<Tag extends string, T> {
  private slots: Slot<Tag, T>[] = [];
  private freeList: number[] = [];
  private live = 0;

  constructor(public readonly kind: Tag) {}

  get size(): number {
    return this.live;
  }

  /**
   * Allocate a slot. The initializer receives the handle the new node will
   * be known by, so self-referential data can be built in one step.
   */
  allocate(init: (handle: Handle<Tag>) => T): Handle<Tag> {
    const reused = this.freeList.pop();
    const index = reused ?? this.slots.length;
    const slot: Slot<Tag, T> = this.slots[index] ?? { generation: 0 };
    if (reused === undefined) {
      this.slots.push(slot);
    }

    const handle: Handle<Tag> = Object.freeze({
      kind: this.kind,
      index,
      generation: slot.generation,
    });
    let data: T;
    try {
      data = init(handle);
    } catch (error) {
      // The slot stays empty; hand its index back for the next allocation
      this.freeList.push(index);
      throw error;
    }
    slot.entry = { handle, data };
    this.live++;
    return handle;
  }

  tryDeref(handle: Handle<Tag>): T | undefined {
    const slot = this.slots[handle.index];
    if (!slot?.entry || slot.generation !== handle.generation) {
      return undefined;
    }
    return slot.entry.data;
  }

  /**
   * Dereference a handle; the returned data is the live node and may be
   * mutated in place.
   */
  deref(handle: Handle<Tag>): T {
    const data = this.tryDeref(handle);
    if (data === undefined) {
      throw new IrError(
        ErrorCode.INVALID_POINTER,
        `${this.kind}${handle.index} (generation ${handle.generation})`,
      );
    }
    return data;
  }

  isValid(handle: Handle<Tag>): boolean {
    return this.tryDeref(handle) !== undefined;
  }

  /**
   * Release a slot and return what it held. Releasing an absent slot is a
   * no-op that returns undefined.
   */
  deallocate(handle: Handle<Tag>): T | undefined {
    const slot = this.slots[handle.index];
    if (!slot?.entry || slot.generation !== handle.generation) {
      return undefined;
    }

    const { data } = slot.entry;
    slot.entry = undefined;
    slot.generation++;
    this.freeList.push(handle.index);
    this.live--;
    return data;
  }

  /**
   * Live handles, in slot order
   */
  *handles(): IterableIterator<Handle<Tag>> {
    for (const slot of this.slots) {
      if (slot.entry) {
        yield slot.entry.handle;
      }
    }
  }
}
