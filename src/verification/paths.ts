/**
 * Effect paths — symbolic execution of an operation body.
 *
 * Every path through the `when` branches yields the guards that select it
 * and, per written state bag, an expression for its post-state contents over
 * the old state: inserts compose to `b union [r]`, removals to `b diff [r]`.
 * `let` bindings become fresh variables pinned by an equation in the guards.
 */

import { UnsupportedFragmentError } from '../core/errors.js';
import { bag, diff, eq, not, ref, state, union } from '../lang/builders.js';
import { freshName, freshen, substitute, substituteState } from '../lang/transform.js';
import type { Effect, Expr } from '../lang/ast.js';

export interface EffectPath {
  /** Conditions over parameters and the old state that select this path. */
  guards: Expr[];
  /** Post-state contents of each written bag; unwritten bags are absent. */
  post: ReadonlyMap<string, Expr>;
}

interface PathState {
  guards: Expr[];
  post: Map<string, Expr>;
  lets: Map<string, Expr>;
}

/** Translate an expression read at this point of the body to old-state terms. */
function translate(e: Expr, at: PathState): Expr {
  return substituteState(substitute(freshen(e), at.lets), at.post);
}

function step(effects: readonly Effect[], states: PathState[], maxPaths: number): PathState[] {
  let current = states;
  for (const effect of effects) {
    const next: PathState[] = [];
    for (const at of current) {
      switch (effect.kind) {
        case 'insert':
        case 'remove': {
          const value = translate(effect.value, at);
          const before = at.post.get(effect.target) ?? state(effect.target);
          const post = new Map(at.post);
          post.set(effect.target, effect.kind === 'insert' ? union(before, bag(value)) : diff(before, bag(value)));
          next.push({ ...at, post });
          break;
        }
        case 'when': {
          const c = translate(effect.cond, at);
          next.push(...step(effect.then, [{ ...at, guards: [...at.guards, c] }], maxPaths));
          next.push(...step(effect.else, [{ ...at, guards: [...at.guards, not(c)] }], maxPaths));
          break;
        }
        case 'let': {
          const value = translate(effect.value, at);
          const name = freshName(effect.name);
          const lets = new Map(at.lets);
          lets.set(effect.name, ref(name));
          const inner = step(effect.body, [{ ...at, lets, guards: [...at.guards, eq(ref(name), value)] }], maxPaths);
          // The binding is scoped to the body.
          next.push(...inner.map((s) => ({ ...s, lets: at.lets })));
          break;
        }
      }
    }
    if (next.length > maxPaths) {
      throw new UnsupportedFragmentError(`more than ${maxPaths} effect paths`);
    }
    current = next;
  }
  return current;
}

/** Enumerate the effect paths of an operation body. */
export function effectPaths(effects: readonly Effect[], maxPaths: number): EffectPath[] {
  return step(effects, [{ guards: [], post: new Map(), lets: new Map() }], maxPaths).map(({ guards, post }) => ({
    guards,
    post,
  }));
}
