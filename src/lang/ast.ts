/**
 * Expression & effect syntax trees.
 *
 * These are the already-parsed structures a front end hands to the engine.
 * Operation parameters and comprehension variables are both `var` nodes;
 * state bags are `state` nodes.
 */

import type { Type, Value } from '../model/types.js';

export type BinaryOp =
  | 'and'
  | 'or'
  | 'implies'
  | 'eq'
  | 'ne'
  | 'lt'
  | 'le'
  | 'gt'
  | 'ge'
  | 'add'
  | 'sub'
  | 'mul'
  | 'union'
  | 'diff';

export type UnaryOp = 'not' | 'neg';

/** `comp` builds a bag; the other three are the quantifiers. */
export type Quantifier = 'comp' | 'exists' | 'all' | 'unique';

export type Qualifier =
  | { kind: 'gen'; name: string; source: Expr }
  | { kind: 'guard'; cond: Expr };

export type Expr =
  | { kind: 'lit'; value: Value }
  | { kind: 'var'; name: string }
  | { kind: 'state'; name: string }
  | { kind: 'field'; target: Expr; field: string }
  | { kind: 'val'; target: Expr }
  | { kind: 'record'; type: string; fields: Readonly<Record<string, Expr>> }
  | { kind: 'unary'; op: UnaryOp; operand: Expr }
  | { kind: 'binary'; op: BinaryOp; left: Expr; right: Expr }
  | { kind: 'cond'; test: Expr; then: Expr; else: Expr }
  | { kind: 'bag'; elements: readonly Expr[]; elementType?: Type }
  | { kind: 'in'; element: Expr; bag: Expr }
  | { kind: 'count'; bag: Expr }
  | { kind: 'quant'; quant: Quantifier; head: Expr; quals: readonly Qualifier[] };

export type Effect =
  | { kind: 'insert'; target: string; value: Expr }
  | { kind: 'remove'; target: string; value: Expr }
  | { kind: 'when'; cond: Expr; then: readonly Effect[]; else: readonly Effect[] }
  | { kind: 'let'; name: string; value: Expr; body: readonly Effect[] };

export const BOOLEAN_OPS: ReadonlySet<BinaryOp> = new Set(['and', 'or', 'implies']);
export const COMPARISON_OPS: ReadonlySet<BinaryOp> = new Set(['eq', 'ne', 'lt', 'le', 'gt', 'ge']);
export const ARITHMETIC_OPS: ReadonlySet<BinaryOp> = new Set(['add', 'sub', 'mul']);
export const BAG_OPS: ReadonlySet<BinaryOp> = new Set(['union', 'diff']);
