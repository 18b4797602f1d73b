export interface Named {
  readonly name: string;
}

// item → the single Bag that currently holds it
const owners = new WeakMap<object, Bag<Named>>();

/**
 * Unordered container keyed by identity. An item lives in at most one Bag:
 * adding it here takes it out of wherever it was.
 */
export class Bag<T extends Named> implements Iterable<T> {
  private items = new Set<T>();

  static ownerOf(item: Named): Bag<Named> | undefined {
    return owners.get(item);
  }

  add(item: T): void {
    const previous = owners.get(item);
    if (previous === this) return;
    previous?.remove(item);
    this.items.add(item);
    owners.set(item, this);
  }

  /** No-op when the item is not here. */
  remove(item: T): void {
    if (!this.items.delete(item)) return;
    if (owners.get(item) === this) owners.delete(item);
  }

  has(item: T): boolean {
    return this.items.has(item);
  }

  /** Case-insensitive; the first match in insertion order wins when names repeat. */
  findByName(name: string, filter?: (item: T) => boolean): T | undefined {
    const wanted = name.trim().toLowerCase();
    for (const item of this.items) {
      if (item.name.toLowerCase() !== wanted) continue;
      if (filter && !filter(item)) continue;
      return item;
    }
    return undefined;
  }

  toArray(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.size;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
