/**
 * Builder functions for expressions, qualifiers and effects.
 *
 * @example
 * ```typescript
 * // exists [v0 | v0 <- votes, v0.val.id == v.val.id]
 * exists(ref('v0'), gen('v0', state('votes')), where(eq(path(ref('v0'), 'val', 'id'), path(ref('v'), 'val', 'id'))));
 * ```
 */

import { boolValue, intValue, stringValue } from '../model/values.js';
import type { Type } from '../model/types.js';
import type { BinaryOp, Effect, Expr, Qualifier, Quantifier } from './ast.js';

// ─── Atoms ──────────────────────────────────────────────────────

export function ref(name: string): Expr {
  return { kind: 'var', name };
}

export function state(name: string): Expr {
  return { kind: 'state', name };
}

export function int(value: number | bigint): Expr {
  return { kind: 'lit', value: intValue(value) };
}

export function bool(value: boolean): Expr {
  return { kind: 'lit', value: boolValue(value) };
}

export function str(value: string): Expr {
  return { kind: 'lit', value: stringValue(value) };
}

export const TRUE_EXPR: Expr = bool(true);
export const FALSE_EXPR: Expr = bool(false);

// ─── Projection & construction ──────────────────────────────────

export function field(target: Expr, name: string): Expr {
  return { kind: 'field', target, field: name };
}

export function val(target: Expr): Expr {
  return { kind: 'val', target };
}

/** `path(v, 'val', 'id')` is `v.val.id`; the segment `val` opens a handle. */
export function path(target: Expr, ...segments: string[]): Expr {
  return segments.reduce<Expr>((acc, seg) => (seg === 'val' ? val(acc) : field(acc, seg)), target);
}

export function record(type: string, fields: Record<string, Expr>): Expr {
  return { kind: 'record', type, fields };
}

export function bag(...elements: Expr[]): Expr {
  return { kind: 'bag', elements };
}

export function emptyBag(elementType: Type): Expr {
  return { kind: 'bag', elements: [], elementType };
}

// ─── Operators ──────────────────────────────────────────────────

function binary(op: BinaryOp, left: Expr, right: Expr): Expr {
  return { kind: 'binary', op, left, right };
}

export function not(operand: Expr): Expr {
  return { kind: 'unary', op: 'not', operand };
}

export function neg(operand: Expr): Expr {
  return { kind: 'unary', op: 'neg', operand };
}

export function and(...operands: Expr[]): Expr {
  if (operands.length === 0) return TRUE_EXPR;
  return operands.reduce((acc, e) => binary('and', acc, e));
}

export function or(...operands: Expr[]): Expr {
  if (operands.length === 0) return FALSE_EXPR;
  return operands.reduce((acc, e) => binary('or', acc, e));
}

export const implies = (l: Expr, r: Expr): Expr => binary('implies', l, r);
export const eq = (l: Expr, r: Expr): Expr => binary('eq', l, r);
export const ne = (l: Expr, r: Expr): Expr => binary('ne', l, r);
export const lt = (l: Expr, r: Expr): Expr => binary('lt', l, r);
export const le = (l: Expr, r: Expr): Expr => binary('le', l, r);
export const gt = (l: Expr, r: Expr): Expr => binary('gt', l, r);
export const ge = (l: Expr, r: Expr): Expr => binary('ge', l, r);
export const add = (l: Expr, r: Expr): Expr => binary('add', l, r);
export const sub = (l: Expr, r: Expr): Expr => binary('sub', l, r);
export const mul = (l: Expr, r: Expr): Expr => binary('mul', l, r);
export const union = (l: Expr, r: Expr): Expr => binary('union', l, r);
export const diff = (l: Expr, r: Expr): Expr => binary('diff', l, r);

export function cond(test: Expr, then: Expr, otherwise: Expr): Expr {
  return { kind: 'cond', test, then, else: otherwise };
}

export function member(element: Expr, bagExpr: Expr): Expr {
  return { kind: 'in', element, bag: bagExpr };
}

export function count(bagExpr: Expr): Expr {
  return { kind: 'count', bag: bagExpr };
}

// ─── Comprehensions ─────────────────────────────────────────────

export function gen(name: string, source: Expr): Qualifier {
  return { kind: 'gen', name, source };
}

export function where(condition: Expr): Qualifier {
  return { kind: 'guard', cond: condition };
}

function quant(q: Quantifier, head: Expr, quals: Qualifier[]): Expr {
  return { kind: 'quant', quant: q, head, quals };
}

export const comp = (head: Expr, ...quals: Qualifier[]): Expr => quant('comp', head, quals);
export const exists = (head: Expr, ...quals: Qualifier[]): Expr => quant('exists', head, quals);
export const all = (head: Expr, ...quals: Qualifier[]): Expr => quant('all', head, quals);
export const unique = (head: Expr, ...quals: Qualifier[]): Expr => quant('unique', head, quals);

/** True iff the bag has no element. */
export function isEmpty(bagExpr: Expr, binder = '_e'): Expr {
  return not(exists(ref(binder), gen(binder, bagExpr)));
}

// ─── Effects ────────────────────────────────────────────────────

export function insert(target: string, value: Expr): Effect {
  return { kind: 'insert', target, value };
}

export function remove(target: string, value: Expr): Effect {
  return { kind: 'remove', target, value };
}

export function when(condition: Expr, then: Effect[], otherwise: Effect[] = []): Effect {
  return { kind: 'when', cond: condition, then, else: otherwise };
}

export function letIn(name: string, value: Expr, body: Effect[]): Effect {
  return { kind: 'let', name, value, body };
}
