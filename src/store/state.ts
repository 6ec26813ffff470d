/**
 * StateStore — the authoritative, exclusively-owned state handle.
 *
 * The state is an immutable map of bags. Readers capture the current
 * snapshot reference and see a consistent view however many writers commit
 * afterwards; writers build a new map and swap it in on commit.
 */

import { AsyncMutex } from '../core/mutex.js';
import { TypeMismatchError } from '../core/errors.js';
import { Bag } from '../model/bag.js';
import { HandleRegistry } from '../model/handles.js';
import { bagValue, conform, valueEquals } from '../model/values.js';
import type { Schema } from '../model/schema.js';
import type { Value } from '../model/types.js';
import type { StateView } from '../eval/environment.js';

export type StateSnapshot = ReadonlyMap<string, Bag>;

export class StateStore implements StateView {
  /** Serializes writers; queries never take it. */
  readonly writeLock = new AsyncMutex();
  private snapshot: StateSnapshot;
  private commits = 0;
  private registry: { snapshot: StateSnapshot; handles: HandleRegistry } | null = null;

  private constructor(public readonly schemaName: string, snapshot: StateSnapshot) {
    this.snapshot = snapshot;
  }

  /**
   * Create a store with one bag per declared state variable. Seeded values
   * must conform to the declared bag types, and handles sharing an id must
   * carry the same record (HandleConflictError otherwise).
   */
  static create(schema: Schema, seed: Record<string, Value[]> = schema.seed ?? {}): StateStore {
    const bags = new Map<string, Bag>();
    for (const name of Object.keys(seed)) {
      if (!(name in schema.state)) {
        throw new TypeMismatchError(`seed names unknown state "${name}"`, 'state variable', name);
      }
    }
    for (const [name, type] of Object.entries(schema.state)) {
      const bag = Bag.from(seed[name] ?? []);
      conform(bagValue(bag), type, schema, name);
      bags.set(name, bag);
    }
    const store = new StateStore(schema.name, bags);
    store.registry = { snapshot: bags, handles: HandleRegistry.of(bags) };
    return store;
  }

  /** Handles of the current snapshot by id; rebuilt lazily after a commit. */
  handles(): HandleRegistry {
    const cached = this.registry;
    if (cached && cached.snapshot === this.snapshot) return cached.handles;
    const handles = HandleRegistry.of(this.snapshot);
    this.registry = { snapshot: this.snapshot, handles };
    return handles;
  }

  get(name: string): Bag | undefined {
    return this.snapshot.get(name);
  }

  /** The current snapshot; stays valid and unchanged after later commits. */
  current(): StateSnapshot {
    return this.snapshot;
  }

  /** Number of committed operations. */
  get version(): number {
    return this.commits;
  }

  /** Swap in a new snapshot. Only the executor calls this, under `writeLock`. */
  commit(next: StateSnapshot): void {
    this.snapshot = next;
    this.commits += 1;
  }

  /** Plain copy of the current contents, in iteration order. */
  toObject(): Record<string, Value[]> {
    const out: Record<string, Value[]> = {};
    for (const [name, bag] of this.snapshot) out[name] = bag.toArray();
    return out;
  }
}

/** Structural equality of two snapshots (bags compared as multisets). */
export function snapshotsEqual(a: StateSnapshot, b: StateSnapshot): boolean {
  if (a.size !== b.size) return false;
  for (const [name, bag] of a) {
    const other = b.get(name);
    if (!other || !valueEquals(bagValue(bag), bagValue(other))) return false;
  }
  return true;
}
