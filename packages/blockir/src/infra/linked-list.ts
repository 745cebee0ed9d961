/**
 * Intrusive doubly-linked lists.
 *
 * Nodes and containers store their own link fields; a `ListLinks` adapter
 * tells `LinkedList` how to read and write them. The same implementation
 * then serves every (node kind, container kind) pairing: instructions in a
 * block and blocks in a function.
 */

import { Error as IrError, ErrorCode } from "./errors.js";

export interface ListLinks<Ctx, N, C> {
  /** Describes a node in error messages */
  describe(ctx: Ctx, node: N): string;

  // Node role
  next(ctx: Ctx, node: N): N | undefined;
  prev(ctx: Ctx, node: N): N | undefined;
  container(ctx: Ctx, node: N): C | undefined;
  setNext(ctx: Ctx, node: N, next: N | undefined): void;
  setPrev(ctx: Ctx, node: N, prev: N | undefined): void;
  setContainer(ctx: Ctx, node: N, container: C | undefined): void;

  // Container role
  head(ctx: Ctx, container: C): N | undefined;
  tail(ctx: Ctx, container: C): N | undefined;
  setHead(ctx: Ctx, container: C, head: N | undefined): void;
  setTail(ctx: Ctx, container: C, tail: N | undefined): void;
}

export class LinkedList<Ctx, N, C> {
  constructor(private readonly links: ListLinks<Ctx, N, C>) {}

  /**
   * Link a detached node right after `ref`
   */
  insertAfter(ctx: Ctx, ref: N, node: N): void {
    const container = this.requireLinked(ctx, ref);
    this.requireDetached(ctx, node);

    const next = this.links.next(ctx, ref);
    this.links.setPrev(ctx, node, ref);
    this.links.setNext(ctx, node, next);
    this.links.setContainer(ctx, node, container);
    this.links.setNext(ctx, ref, node);

    if (next === undefined) {
      this.links.setTail(ctx, container, node);
    } else {
      this.links.setPrev(ctx, next, node);
    }
  }

  /**
   * Link a detached node right before `ref`
   */
  insertBefore(ctx: Ctx, ref: N, node: N): void {
    const container = this.requireLinked(ctx, ref);
    this.requireDetached(ctx, node);

    const prev = this.links.prev(ctx, ref);
    this.links.setNext(ctx, node, ref);
    this.links.setPrev(ctx, node, prev);
    this.links.setContainer(ctx, node, container);
    this.links.setPrev(ctx, ref, node);

    if (prev === undefined) {
      this.links.setHead(ctx, container, node);
    } else {
      this.links.setNext(ctx, prev, node);
    }
  }

  append(ctx: Ctx, container: C, node: N): void {
    const tail = this.links.tail(ctx, container);
    if (tail !== undefined) {
      this.insertAfter(ctx, tail, node);
      return;
    }

    this.requireDetached(ctx, node);
    this.links.setContainer(ctx, node, container);
    this.links.setHead(ctx, container, node);
    this.links.setTail(ctx, container, node);
  }

  prepend(ctx: Ctx, container: C, node: N): void {
    const head = this.links.head(ctx, container);
    if (head !== undefined) {
      this.insertBefore(ctx, head, node);
      return;
    }

    this.requireDetached(ctx, node);
    this.links.setContainer(ctx, node, container);
    this.links.setHead(ctx, container, node);
    this.links.setTail(ctx, container, node);
  }

  /**
   * Remove a node from its container. The node keeps existing; its own
   * links are cleared.
   */
  unlink(ctx: Ctx, node: N): void {
    const container = this.requireLinked(ctx, node);
    const prev = this.links.prev(ctx, node);
    const next = this.links.next(ctx, node);

    if (prev === undefined) {
      this.links.setHead(ctx, container, next);
    } else {
      this.links.setNext(ctx, prev, next);
    }

    if (next === undefined) {
      this.links.setTail(ctx, container, prev);
    } else {
      this.links.setPrev(ctx, next, prev);
    }

    this.links.setNext(ctx, node, undefined);
    this.links.setPrev(ctx, node, undefined);
    this.links.setContainer(ctx, node, undefined);
  }

  /**
   * Head-to-tail traversal. The successor is read before a node is
   * yielded, so the consumer may unlink the node it is visiting.
   */
  *iter(ctx: Ctx, container: C): IterableIterator<N> {
    let current = this.links.head(ctx, container);
    while (current !== undefined) {
      const next = this.links.next(ctx, current);
      yield current;
      current = next;
    }
  }

  /**
   * Tail-to-head traversal, with the same tolerance for unlinking
   */
  *iterReverse(ctx: Ctx, container: C): IterableIterator<N> {
    let current = this.links.tail(ctx, container);
    while (current !== undefined) {
      const prev = this.links.prev(ctx, current);
      yield current;
      current = prev;
    }
  }

  private requireLinked(ctx: Ctx, node: N): C {
    const container = this.links.container(ctx, node);
    if (container === undefined) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `${this.links.describe(ctx, node)} is not linked into any list`,
      );
    }
    return container;
  }

  private requireDetached(ctx: Ctx, node: N): void {
    if (this.links.container(ctx, node) !== undefined) {
      throw new IrError(
        ErrorCode.STRUCTURAL_PRECONDITION,
        `${this.links.describe(ctx, node)} is already linked into a list`,
      );
    }
  }
}
