/**
 * Set with value equality: members are identified by a caller-supplied key
 * rather than by object identity.
 */
export class KeyedSet<T> implements Iterable<T> {
  private members = new Map<string, T>();

  constructor(
    private readonly keyOf: (value: T) => string,
    values: Iterable<T> = [],
  ) {
    for (const value of values) {
      this.add(value);
    }
  }

  get size(): number {
    return this.members.size;
  }

  add(value: T): this {
    this.members.set(this.keyOf(value), value);
    return this;
  }

  has(value: T): boolean {
    return this.members.has(this.keyOf(value));
  }

  delete(value: T): boolean {
    return this.members.delete(this.keyOf(value));
  }

  clear(): void {
    this.members.clear();
  }

  clone(): KeyedSet<T> {
    return new KeyedSet(this.keyOf, this.members.values());
  }

  values(): IterableIterator<T> {
    return this.members.values();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.members.values();
  }
}
