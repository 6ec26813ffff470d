/**
 * Negation normal form for the prover.
 *
 * Formulas keep quantifiers explicit: a `forall`/`exists` node carries the
 * comprehension qualifiers it ranges over and always starts with a
 * generator (leading guards are pulled out into the connective).
 */

import { eq, le, lt, and as andExpr, not as notExpr, or as orExpr } from '../lang/builders.js';
import { substitute, substituteQuals } from '../lang/transform.js';
import type { Expr, Qualifier } from '../lang/ast.js';
import type { Substitution } from '../lang/transform.js';

export type Formula =
  | { kind: 'const'; value: boolean }
  | { kind: 'atom'; expr: Expr; positive: boolean }
  | { kind: 'and'; parts: Formula[] }
  | { kind: 'or'; parts: Formula[] }
  | { kind: 'forall'; quals: Qualifier[]; body: Formula }
  | { kind: 'exists'; quals: Qualifier[]; body: Formula };

export const TRUE_F: Formula = { kind: 'const', value: true };
export const FALSE_F: Formula = { kind: 'const', value: false };

// ─── Smart constructors ─────────────────────────────────────────

export function atom(expr: Expr, positive = true): Formula {
  return { kind: 'atom', expr, positive };
}

export function conj(parts: Formula[]): Formula {
  const out: Formula[] = [];
  for (const p of parts) {
    if (p.kind === 'const') {
      if (!p.value) return FALSE_F;
      continue;
    }
    if (p.kind === 'and') out.push(...p.parts);
    else out.push(p);
  }
  if (out.length === 0) return TRUE_F;
  return out.length === 1 ? out[0] : { kind: 'and', parts: out };
}

export function disj(parts: Formula[]): Formula {
  const out: Formula[] = [];
  for (const p of parts) {
    if (p.kind === 'const') {
      if (p.value) return TRUE_F;
      continue;
    }
    if (p.kind === 'or') out.push(...p.parts);
    else out.push(p);
  }
  if (out.length === 0) return FALSE_F;
  return out.length === 1 ? out[0] : { kind: 'or', parts: out };
}

/** `forall quals. body`; guards act as antecedents. */
export function forall(quals: readonly Qualifier[], body: Formula): Formula {
  if (quals.length === 0) return body;
  const [first, ...rest] = quals;
  if (first.kind === 'guard') return disj([toNnf(first.cond, false), forall(rest, body)]);
  if (body.kind === 'const' && body.value) return TRUE_F;
  return { kind: 'forall', quals: [...quals], body };
}

/** `exists quals. body`; guards act as conjuncts. */
export function exists(quals: readonly Qualifier[], body: Formula): Formula {
  if (quals.length === 0) return body;
  const [first, ...rest] = quals;
  if (first.kind === 'guard') return conj([toNnf(first.cond, true), exists(rest, body)]);
  if (body.kind === 'const' && !body.value) return FALSE_F;
  return { kind: 'exists', quals: [...quals], body };
}

// ─── Conversion ─────────────────────────────────────────────────

/**
 * Convert a boolean expression to NNF. With `positive` false the result is
 * the NNF of its negation; comparisons are inverted rather than negated.
 */
export function toNnf(e: Expr, positive = true): Formula {
  switch (e.kind) {
    case 'lit':
      if (e.value.kind === 'bool') return { kind: 'const', value: e.value.value === positive };
      return atom(e, positive);
    case 'unary':
      if (e.op === 'not') return toNnf(e.operand, !positive);
      return atom(e, positive);
    case 'cond':
      return toNnf(orExpr(andExpr(e.test, e.then), andExpr(notExpr(e.test), e.else)), positive);
    case 'binary':
      switch (e.op) {
        case 'and':
          return positive
            ? conj([toNnf(e.left, true), toNnf(e.right, true)])
            : disj([toNnf(e.left, false), toNnf(e.right, false)]);
        case 'or':
          return positive
            ? disj([toNnf(e.left, true), toNnf(e.right, true)])
            : conj([toNnf(e.left, false), toNnf(e.right, false)]);
        case 'implies':
          return positive
            ? disj([toNnf(e.left, false), toNnf(e.right, true)])
            : conj([toNnf(e.left, true), toNnf(e.right, false)]);
        case 'ne':
          return atom(eq(e.left, e.right), !positive);
        case 'lt':
          return positive ? atom(e) : atom(le(e.right, e.left));
        case 'le':
          return positive ? atom(e) : atom(lt(e.right, e.left));
        case 'gt':
          return toNnf(lt(e.right, e.left), positive);
        case 'ge':
          return toNnf(le(e.right, e.left), positive);
        default:
          return atom(e, positive);
      }
    case 'quant':
      switch (e.quant) {
        case 'all':
          return positive ? forall(e.quals, toNnf(e.head, true)) : exists(e.quals, toNnf(e.head, false));
        case 'exists':
          return positive ? exists(e.quals, TRUE_F) : forall(e.quals, FALSE_F);
        default:
          return atom(e, positive);
      }
    default:
      return atom(e, positive);
  }
}

export function negate(f: Formula): Formula {
  switch (f.kind) {
    case 'const':
      return { kind: 'const', value: !f.value };
    case 'atom':
      return toNnf(f.expr, !f.positive);
    case 'and':
      return disj(f.parts.map(negate));
    case 'or':
      return conj(f.parts.map(negate));
    case 'forall':
      return exists(f.quals, negate(f.body));
    case 'exists':
      return forall(f.quals, negate(f.body));
  }
}

export function substituteFormula(f: Formula, sub: Substitution): Formula {
  if (sub.size === 0) return f;
  switch (f.kind) {
    case 'const':
      return f;
    case 'atom':
      return { ...f, expr: substitute(f.expr, sub) };
    case 'and':
      return conj(f.parts.map((p) => substituteFormula(p, sub)));
    case 'or':
      return disj(f.parts.map((p) => substituteFormula(p, sub)));
    case 'forall':
    case 'exists': {
      const [quals, inner] = substituteQuals(f.quals, sub);
      const body = substituteFormula(f.body, inner);
      return f.kind === 'forall' ? forall(quals, body) : exists(quals, body);
    }
  }
}
