/**
 * Evaluator — pure interpreter for the expression language.
 *
 * Quantifiers are driven by a lazy generator over qualifier bindings, so
 * `exists` stops at the first satisfying binding and `all` at the first
 * violation. Evaluation never writes state.
 */

import { Bag } from '../model/bag.js';
import {
  FALSE,
  TRUE,
  bagValue,
  boolValue,
  compareValues,
  getField,
  intValue,
  recordValue,
  valueEquals,
  valueKey,
} from '../model/values.js';
import type { BagValue, Value } from '../model/types.js';
import { BagcheckError, EvaluationError } from '../core/errors.js';
import { printExpr } from '../lang/printer.js';
import type { BinaryOp, Expr, Qualifier } from '../lang/ast.js';
import type { Environment } from './environment.js';

function rethrow(err: unknown, e: Expr): never {
  if (err instanceof EvaluationError) throw err;
  const message = err instanceof Error ? err.message : String(err);
  const cause = err instanceof BagcheckError ? err : undefined;
  throw new EvaluationError(`${message} (in "${printExpr(e)}")`, cause);
}

export class Evaluator {
  /** Evaluate `e` to a value. */
  evaluate(e: Expr, env: Environment): Value {
    switch (e.kind) {
      case 'lit':
        return e.value;
      case 'var': {
        const v = env.lookup(e.name);
        if (!v) throw new EvaluationError(`unbound variable "${e.name}"`);
        return v;
      }
      case 'state':
        return bagValue(this.stateBag(e.name, env));
      case 'field': {
        const target = this.evaluate(e.target, env);
        try {
          return getField(target, e.field);
        } catch (err) {
          return rethrow(err, e);
        }
      }
      case 'val': {
        const target = this.evaluate(e.target, env);
        if (target.kind !== 'handle') {
          throw new EvaluationError(`".val" applied to ${target.kind} (in "${printExpr(e)}")`);
        }
        return target.val;
      }
      case 'record': {
        const fields: Record<string, Value> = {};
        for (const [name, f] of Object.entries(e.fields)) fields[name] = this.evaluate(f, env);
        return recordValue(e.type, fields);
      }
      case 'unary': {
        const operand = this.evaluate(e.operand, env);
        if (e.op === 'not') return boolValue(!this.asBool(operand, e.operand));
        if (operand.kind !== 'int') throw new EvaluationError(`cannot negate ${operand.kind}`);
        return intValue(-operand.value);
      }
      case 'binary':
        return this.binary(e.op, e.left, e.right, env, e);
      case 'cond':
        return this.test(e.test, env) ? this.evaluate(e.then, env) : this.evaluate(e.else, env);
      case 'bag':
        return bagValue(e.elements.map((el) => this.evaluate(el, env)));
      case 'in':
        return boolValue(this.bag(e.bag, env).has(this.evaluate(e.element, env)));
      case 'count':
        return intValue(this.bag(e.bag, env).size);
      case 'quant':
        return this.quantifier(e, env);
    }
  }

  /** Evaluate a boolean expression. */
  test(e: Expr, env: Environment): boolean {
    return this.asBool(this.evaluate(e, env), e);
  }

  /** Evaluate a bag-valued expression. */
  bag(e: Expr, env: Environment): Bag {
    return this.asBag(this.evaluate(e, env), e).bag;
  }

  /**
   * Lazily enumerate the environments produced by a qualifier list. The
   * sequence is restartable: each call starts a fresh walk.
   */
  *bindings(quals: readonly Qualifier[], env: Environment, index = 0): Generator<Environment> {
    if (index === quals.length) {
      yield env;
      return;
    }
    const q = quals[index];
    if (q.kind === 'guard') {
      if (this.test(q.cond, env)) yield* this.bindings(quals, env, index + 1);
      return;
    }
    const source = this.evaluate(q.source, env);
    if (source.kind !== 'bag') {
      throw new EvaluationError(`generator "${q.name}" ranges over ${source.kind}, not a bag (in "${printExpr(q.source)}")`);
    }
    for (const item of source.bag) {
      yield* this.bindings(quals, env.bind(q.name, item), index + 1);
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private quantifier(e: Extract<Expr, { kind: 'quant' }>, env: Environment): Value {
    switch (e.quant) {
      case 'comp': {
        const heads: Value[] = [];
        for (const b of this.bindings(e.quals, env)) heads.push(this.evaluate(e.head, b));
        return bagValue(Bag.from(heads));
      }
      case 'exists':
        return this.bindings(e.quals, env).next().done ? FALSE : TRUE;
      case 'all':
        for (const b of this.bindings(e.quals, env)) {
          if (!this.test(e.head, b)) return FALSE;
        }
        return TRUE;
      case 'unique': {
        const seen = new Set<string>();
        for (const b of this.bindings(e.quals, env)) {
          const key = valueKey(this.evaluate(e.head, b));
          if (seen.has(key)) return FALSE;
          seen.add(key);
        }
        return TRUE;
      }
    }
  }

  private binary(op: BinaryOp, left: Expr, right: Expr, env: Environment, e: Expr): Value {
    switch (op) {
      case 'and':
        return boolValue(this.test(left, env) && this.test(right, env));
      case 'or':
        return boolValue(this.test(left, env) || this.test(right, env));
      case 'implies':
        return boolValue(!this.test(left, env) || this.test(right, env));
      default:
        break;
    }

    const l = this.evaluate(left, env);
    const r = this.evaluate(right, env);
    switch (op) {
      case 'eq':
        return boolValue(valueEquals(l, r));
      case 'ne':
        return boolValue(!valueEquals(l, r));
      case 'lt':
      case 'le':
      case 'gt':
      case 'ge': {
        let c: number;
        try {
          c = compareValues(l, r);
        } catch (err) {
          return rethrow(err, e);
        }
        if (op === 'lt') return boolValue(c < 0);
        if (op === 'le') return boolValue(c <= 0);
        if (op === 'gt') return boolValue(c > 0);
        return boolValue(c >= 0);
      }
      case 'add':
      case 'sub':
      case 'mul': {
        if (l.kind !== 'int' || r.kind !== 'int') {
          throw new EvaluationError(`arithmetic on ${l.kind} and ${r.kind} (in "${printExpr(e)}")`);
        }
        if (op === 'add') return intValue(l.value + r.value);
        if (op === 'sub') return intValue(l.value - r.value);
        return intValue(l.value * r.value);
      }
      case 'union':
        return bagValue(this.asBag(l, left).bag.union(this.asBag(r, right).bag));
      case 'diff':
        return bagValue(this.asBag(l, left).bag.removeAll(this.asBag(r, right).bag));
      default:
        throw new EvaluationError(`unsupported operator "${op}"`);
    }
  }

  private stateBag(name: string, env: Environment): Bag {
    const bag = env.state.get(name);
    if (!bag) throw new EvaluationError(`unknown state "${name}"`);
    return bag;
  }

  private asBool(v: Value, e: Expr): boolean {
    if (v.kind !== 'bool') throw new EvaluationError(`expected Bool, got ${v.kind} (in "${printExpr(e)}")`);
    return v.value;
  }

  private asBag(v: Value, e: Expr): BagValue {
    if (v.kind !== 'bag') throw new EvaluationError(`expected a bag, got ${v.kind} (in "${printExpr(e)}")`);
    return v;
  }
}
