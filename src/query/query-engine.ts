/**
 * QueryEngine — read-only evaluation of declared queries.
 *
 * A query body is a comprehension. Each binding of its qualifiers yields one
 * row; rows follow generator order unless the query declares `orderBy`.
 */

import { ParameterError } from '../core/errors.js';
import { Environment } from '../eval/environment.js';
import { Evaluator } from '../eval/evaluator.js';
import { compareValues } from '../model/values.js';
import { bindParams } from '../model/params.js';
import type { HandleRegistry } from '../model/handles.js';
import type { Arguments } from '../model/params.js';
import type { QueryDecl, Schema } from '../model/schema.js';
import type { HandleValue, Value } from '../model/types.js';
import type { StateView } from '../eval/environment.js';

// ═══════════════════════════════════════════════════════════════
// RESULT ROWS
// ═══════════════════════════════════════════════════════════════

/** Materialized value: records become objects, bags become arrays. */
export type ResultValue =
  | bigint
  | boolean
  | string
  | HandleValue
  | ResultValue[]
  | { [field: string]: ResultValue };

export type ResultRow = Record<string, ResultValue>;

export function materialize(v: Value): ResultValue {
  switch (v.kind) {
    case 'int':
    case 'bool':
    case 'string':
      return v.value;
    case 'handle':
      return v;
    case 'bag':
      return v.bag.toArray().map(materialize);
    case 'record': {
      const out: Record<string, ResultValue> = {};
      for (const [name, f] of Object.entries(v.fields)) out[name] = materialize(f);
      return out;
    }
  }
}

function toRow(head: Value): ResultRow {
  if (head.kind !== 'record') return { value: materialize(head) };
  const row: ResultRow = {};
  for (const [name, f] of Object.entries(head.fields)) row[name] = materialize(f);
  return row;
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export class QueryEngine {
  private readonly evaluator: Evaluator;

  constructor(private readonly schema: Schema, evaluator?: Evaluator) {
    this.evaluator = evaluator ?? new Evaluator();
  }

  /** Resolve a declared query by name; unknown names are a ParameterError. */
  lookup(name: string): QueryDecl {
    const query = this.schema.queries.find((q) => q.name === name);
    if (!query) throw new ParameterError(`unknown query "${name}"`, name);
    return query;
  }

  /**
   * Run `query` against `state`. Parameters are validated before anything is
   * evaluated, against `handles` when given. Throws ParameterError or
   * EvaluationError.
   */
  run(query: string | QueryDecl, args: Arguments, state: StateView, handles?: HandleRegistry): ResultRow[] {
    const decl = typeof query === 'string' ? this.lookup(query) : query;
    const params = bindParams(decl.name, decl.params, args, this.schema, handles);
    const body = decl.body;
    if (body.kind !== 'quant' || body.quant !== 'comp') {
      throw new ParameterError(`query "${decl.name}" has no comprehension body`, decl.name);
    }

    const env = Environment.of(state, params);
    const rows: Array<{ row: ResultRow; key?: Value }> = [];
    for (const binding of this.evaluator.bindings(body.quals, env)) {
      const head = this.evaluator.evaluate(body.head, binding);
      const key = decl.orderBy ? this.evaluator.evaluate(decl.orderBy.key, binding) : undefined;
      rows.push({ row: toRow(head), key });
    }

    if (decl.orderBy) {
      const sign = decl.orderBy.direction === 'desc' ? -1 : 1;
      // Array.prototype.sort is stable, so equal keys keep generator order.
      rows.sort((a, b) => (a.key && b.key ? sign * compareValues(a.key, b.key) : 0));
    }
    return rows.map((r) => r.row);
  }
}
