import type { Effect, Expr } from '../lang/ast.js';
import type { RecordType, Type, Value } from './types.js';

export interface ParamDecl {
  name: string;
  type: Type;
}

export interface InvariantDecl {
  name: string;
  formula: Expr;
  description?: string;
}

export interface OperationDecl {
  name: string;
  params: ParamDecl[];
  /** Precondition; may read parameters and state. */
  assume: Expr;
  effects: Effect[];
}

export type OrderDirection = 'asc' | 'desc';

export interface QueryDecl {
  name: string;
  params: ParamDecl[];
  /** A `comp` comprehension over state. */
  body: Expr;
  /** Evaluated per binding of the body's qualifiers. */
  orderBy?: { key: Expr; direction?: OrderDirection };
}

export interface Schema {
  name: string;
  types: Record<string, RecordType>;
  state: Record<string, Type>;
  invariants: InvariantDecl[];
  queries: QueryDecl[];
  operations: OperationDecl[];
  /** Initial bag contents; bags not listed start empty. */
  seed?: Record<string, Value[]>;
}
