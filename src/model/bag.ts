import type { Value } from './types.js';
import { valueKey } from './values.js';

/**
 * Bag — immutable multiset.
 *
 * Iteration follows insertion order so results are reproducible; nothing in
 * the semantics depends on that order. Every update returns a new bag.
 */
export class Bag implements Iterable<Value> {
  private readonly items: readonly Value[];
  private readonly counts: ReadonlyMap<string, number>;

  private constructor(items: readonly Value[], counts: ReadonlyMap<string, number>) {
    this.items = items;
    this.counts = counts;
  }

  static empty(): Bag {
    return EMPTY;
  }

  static of(...values: Value[]): Bag {
    return Bag.from(values);
  }

  static from(values: Iterable<Value>): Bag {
    const items: Value[] = [];
    const counts = new Map<string, number>();
    for (const v of values) {
      items.push(v);
      const key = valueKey(v);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return new Bag(items, counts);
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  has(value: Value): boolean {
    return this.counts.has(valueKey(value));
  }

  /** Number of occurrences of `value`. */
  count(value: Value): number {
    return this.counts.get(valueKey(value)) ?? 0;
  }

  insert(value: Value): Bag {
    const key = valueKey(value);
    const counts = new Map(this.counts);
    counts.set(key, (counts.get(key) ?? 0) + 1);
    return new Bag([...this.items, value], counts);
  }

  /** Remove one occurrence (the most recently inserted); no-op when absent. */
  remove(value: Value): Bag {
    const key = valueKey(value);
    const n = this.counts.get(key);
    if (n === undefined) return this;

    let index = -1;
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (valueKey(this.items[i]) === key) {
        index = i;
        break;
      }
    }
    const items = [...this.items.slice(0, index), ...this.items.slice(index + 1)];
    const counts = new Map(this.counts);
    if (n === 1) counts.delete(key);
    else counts.set(key, n - 1);
    return new Bag(items, counts);
  }

  /** Multiset difference: removes one occurrence per element of `other`. */
  removeAll(other: Iterable<Value>): Bag {
    let result: Bag = this;
    for (const v of other) result = result.remove(v);
    return result;
  }

  union(other: Bag): Bag {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return Bag.from([...this.items, ...other.items]);
  }

  values(): IterableIterator<Value> {
    return this.items[Symbol.iterator]();
  }

  [Symbol.iterator](): Iterator<Value> {
    return this.items[Symbol.iterator]();
  }

  toArray(): Value[] {
    return [...this.items];
  }

  equals(other: Bag): boolean {
    if (this.size !== other.size || this.counts.size !== other.counts.size) return false;
    for (const [key, n] of this.counts) {
      if (other.counts.get(key) !== n) return false;
    }
    return true;
  }
}

const EMPTY = Bag.from([]);
