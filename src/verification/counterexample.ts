/**
 * Small-scope counterexample search.
 *
 * Samples states and parameters from small value pools with a seeded PRNG,
 * keeps the samples where every invariant and the precondition hold, runs
 * the operation and reports the first post-state that breaks the target
 * invariant. The first sample is always the empty state. Handle pools are
 * minted afresh for every sample, so the records behind pooled handles vary
 * across the search. The search is deterministic for a given seed.
 */

import { EvaluationError, UnsupportedFragmentError } from '../core/errors.js';
import { Environment, mapStateView } from '../eval/environment.js';
import { Evaluator } from '../eval/evaluator.js';
import { Bag } from '../model/bag.js';
import { bagValue, boolValue, formatValue, handleValue, intValue, recordValue, stringValue } from '../model/values.js';
import type { InvariantDecl, OperationDecl, Schema } from '../model/schema.js';
import type { Type, Value } from '../model/types.js';
import { applyEffects } from '../store/effects.js';
import type { CounterexampleOptions, Witness } from './types.js';

const SMALL_INTS = [0n, 1n, 2n];
const SMALL_STRINGS = ['', 'a', 'b'];
const MAX_DEPTH = 4;

/** mulberry32: tiny 32-bit PRNG, uniform in [0, 1). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ═══════════════════════════════════════════════════════════════
// SAMPLER
// ═══════════════════════════════════════════════════════════════

class Sampler {
  private pools = new Map<string, Value[]>();
  private building = new Set<string>();
  private minted = 0;

  constructor(
    private readonly schema: Schema,
    private readonly options: CounterexampleOptions,
    private readonly random: () => number,
  ) {}

  pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length)];
  }

  /** Drop the handle pools; the next sample mints its own. */
  reset(): void {
    this.pools.clear();
  }

  size(): number {
    return Math.floor(this.random() * (this.options.maxBagSize + 1));
  }

  /** A value of `type`; handles come from the pools unless `fresh`. */
  value(type: Type, fresh = false, depth = 0): Value {
    switch (type.kind) {
      case 'int':
        return intValue(this.pick(SMALL_INTS));
      case 'bool':
        return boolValue(this.random() < 0.5);
      case 'string':
        return stringValue(this.pick(SMALL_STRINGS));
      case 'record':
        return recordValue(type.name, this.fields(type.name, depth));
      case 'handle': {
        const pool = this.pool(type.name);
        if (!fresh && pool.length > 0) return this.pick(pool);
        return this.mint(type.name, depth);
      }
      case 'bag': {
        if (type.of.kind === 'handle' && this.building.has(type.of.name)) return bagValue();
        const items: Value[] = [];
        const n = this.size();
        for (let i = 0; i < n; i++) items.push(this.value(type.of, false, depth + 1));
        return bagValue(items);
      }
    }
  }

  private pool(name: string): Value[] {
    const existing = this.pools.get(name);
    if (existing) return existing;
    if (this.building.has(name)) return [];
    this.building.add(name);
    const pool: Value[] = [];
    for (let i = 0; i < this.options.poolSize; i++) pool.push(this.mint(name, 0));
    this.building.delete(name);
    this.pools.set(name, pool);
    return pool;
  }

  private mint(name: string, depth: number): Value {
    if (depth > MAX_DEPTH) throw new UnsupportedFragmentError(`cannot sample recursive type ${name}`);
    this.minted += 1;
    return handleValue(name, this.fields(name, depth + 1), `${name.toLowerCase()}_w${this.minted}`);
  }

  private fields(name: string, depth: number): Record<string, Value> {
    const decl = this.schema.types[name];
    if (!decl) throw new UnsupportedFragmentError(`unknown type ${name}`);
    const out: Record<string, Value> = {};
    for (const [field, t] of Object.entries(decl.fields)) out[field] = this.value(t, false, depth);
    return out;
  }
}

// ═══════════════════════════════════════════════════════════════
// SEARCH
// ═══════════════════════════════════════════════════════════════

function render(state: ReadonlyMap<string, Bag>): Record<string, Value[]> {
  const out: Record<string, Value[]> = {};
  for (const [name, bag] of state) out[name] = bag.toArray();
  return out;
}

function describeState(state: Record<string, Value[]>): string {
  return Object.entries(state)
    .map(([name, values]) => `${name} = ${formatValue(bagValue(values))}`)
    .join(', ');
}

export class CounterexampleSearch {
  private readonly evaluator: Evaluator;

  constructor(
    private readonly schema: Schema,
    private readonly options: CounterexampleOptions,
    evaluator?: Evaluator,
  ) {
    this.evaluator = evaluator ?? new Evaluator();
  }

  /** Look for a state and parameters under which `op` breaks `invariant`. */
  search(op: OperationDecl, invariant: InvariantDecl): Witness | null {
    if (!this.options.enabled) return null;
    const sampler = new Sampler(this.schema, this.options, seededRandom(this.options.seed));

    for (let i = 0; i < this.options.samples; i++) {
      sampler.reset();
      const before = new Map<string, Bag>();
      for (const [name, type] of Object.entries(this.schema.state)) {
        const sampled = i === 0 ? bagValue() : sampler.value(type);
        before.set(name, sampled.kind === 'bag' ? sampled.bag : Bag.empty());
      }
      const params = new Map<string, Value>();
      for (const p of op.params) params.set(p.name, sampler.value(p.type, sampler.pick([true, false])));

      const witness = this.check(op, invariant, before, params);
      if (witness) return witness;
    }
    return null;
  }

  private check(
    op: OperationDecl,
    invariant: InvariantDecl,
    before: Map<string, Bag>,
    params: Map<string, Value>,
  ): Witness | null {
    try {
      const env = Environment.of(mapStateView(before), params);
      if (!this.schema.invariants.every((inv) => this.evaluator.test(inv.formula, env))) return null;
      if (!this.evaluator.test(op.assume, env)) return null;

      const after = applyEffects(op.effects, before, params, this.evaluator);
      if (this.evaluator.test(invariant.formula, Environment.of(mapStateView(after)))) return null;

      const b = render(before);
      const a = render(after);
      const p = Object.fromEntries(params);
      const args = [...params].map(([name, v]) => `${name} = ${formatValue(v)}`).join(', ');
      return {
        before: b,
        params: p,
        after: a,
        description: `${op.name}(${args}) from {${describeState(b)}} reaches {${describeState(a)}}`,
      };
    } catch (err) {
      if (err instanceof EvaluationError) return null;
      throw err;
    }
  }
}
