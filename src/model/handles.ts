/**
 * HandleRegistry — one identity, one record.
 *
 * Handles compare by id alone, so every handle that shares an id must carry
 * the same record. The registry remembers the first record seen per id and
 * rejects any later handle that disagrees with it.
 */

import { HandleConflictError } from '../core/errors.js';
import type { Bag } from './bag.js';
import type { HandleValue, Value } from './types.js';
import { valueKey } from './values.js';

export class HandleRegistry {
  private readonly records = new Map<string, HandleValue>();

  private constructor(private readonly parent?: HandleRegistry) {}

  static empty(): HandleRegistry {
    return new HandleRegistry();
  }

  /** Registry of every handle reachable from `bags`; throws on conflict. */
  static of(bags: Iterable<[string, Bag]>): HandleRegistry {
    const registry = new HandleRegistry();
    for (const [name, bag] of bags) {
      let i = 0;
      for (const item of bag) registry.register(item, `${name}[${i++}]`);
    }
    return registry;
  }

  /** A child that sees this registry's records; registering leaves the parent alone. */
  fork(): HandleRegistry {
    return new HandleRegistry(this);
  }

  lookup(id: string): HandleValue | undefined {
    return this.records.get(id) ?? this.parent?.lookup(id);
  }

  /** Record every handle reachable from `value`, nested ones included. */
  register(value: Value, path: string): void {
    switch (value.kind) {
      case 'handle': {
        const known = this.lookup(value.id);
        if (known === value) return;
        if (known && valueKey(known.val) !== valueKey(value.val)) {
          throw new HandleConflictError(value.id, path);
        }
        if (!known) this.records.set(value.id, value);
        this.register(value.val, `${path}.val`);
        return;
      }
      case 'record':
        for (const [name, field] of Object.entries(value.fields)) this.register(field, `${path}.${name}`);
        return;
      case 'bag': {
        let i = 0;
        for (const item of value.bag) this.register(item, `${path}[${i++}]`);
        return;
      }
      default:
        return;
    }
  }
}
