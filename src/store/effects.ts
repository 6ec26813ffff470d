import { Environment, mapStateView } from '../eval/environment.js';
import type { Evaluator } from '../eval/evaluator.js';
import type { Effect } from '../lang/ast.js';
import type { Bag } from '../model/bag.js';
import type { Value } from '../model/types.js';
import { EvaluationError } from '../core/errors.js';
import type { StateSnapshot } from './state.js';

/**
 * Apply `effects` in order to a copy of `snapshot` and return the copy.
 * Later effects see the bags written by earlier ones. The input snapshot is
 * never modified, so discarding the result is a complete rollback.
 */
export function applyEffects(
  effects: readonly Effect[],
  snapshot: StateSnapshot,
  params: ReadonlyMap<string, Value>,
  evaluator: Evaluator,
): Map<string, Bag> {
  const working = new Map(snapshot);
  run(effects, working, Environment.of(mapStateView(working), new Map(params)), evaluator);
  return working;
}

function run(effects: readonly Effect[], working: Map<string, Bag>, env: Environment, evaluator: Evaluator): void {
  for (const effect of effects) {
    switch (effect.kind) {
      case 'insert':
      case 'remove': {
        const value = evaluator.evaluate(effect.value, env);
        const bag = working.get(effect.target);
        if (!bag) throw new EvaluationError(`unknown state "${effect.target}"`);
        working.set(effect.target, effect.kind === 'insert' ? bag.insert(value) : bag.remove(value));
        break;
      }
      case 'when':
        run(evaluator.test(effect.cond, env) ? effect.then : effect.else, working, env, evaluator);
        break;
      case 'let':
        run(effect.body, working, env.bind(effect.name, evaluator.evaluate(effect.value, env)), evaluator);
        break;
    }
  }
}
