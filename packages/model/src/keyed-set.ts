export interface Keyed {
  key(): string;
}

/**
 * Set of records keyed by their identity string. Adding a record whose key
 * is already present replaces the stored one.
 */
export class KeyedSet<T extends Keyed> implements Iterable<T> {
  private readonly entries = new Map<string, T>();

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  add(item: T): this {
    this.entries.set(item.key(), item);
    return this;
  }

  has(item: T): boolean {
    return this.entries.has(item.key());
  }

  get(key: string): T | undefined {
    return this.entries.get(key);
  }

  delete(item: T): boolean {
    return this.entries.delete(item.key());
  }

  /** Items ordered by key. */
  sorted(): T[] {
    return [...this.entries.keys()].sort().flatMap((key) => {
      const item = this.entries.get(key);
      return item === undefined ? [] : [item];
    });
  }

  [Symbol.iterator](): Iterator<T> {
    return this.entries.values();
  }
}
