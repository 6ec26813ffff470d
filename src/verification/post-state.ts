/**
 * Post-state expansion.
 *
 * After the written state bags of an invariant are replaced by their
 * post-state expressions, this pass eliminates bag algebra from the formula
 * so the prover only meets atoms over old-state bags:
 *
 * - unions and bag literals are expanded exactly (quantifiers split into one
 *   copy per part, membership into a disjunction, `count` into a sum);
 * - differences are approximated by polarity. Under `pos` the result
 *   implies the input; under `neg` the input implies the result.
 *
 * Anything outside that raises UnsupportedFragmentError.
 */

import { UnsupportedFragmentError } from '../core/errors.js';
import {
  FALSE_EXPR,
  TRUE_EXPR,
  add,
  and,
  bag,
  cond,
  count,
  eq,
  gen,
  implies,
  int,
  member,
  ne,
  not,
  or,
  ref,
  union,
  where,
} from '../lang/builders.js';
import { freshen, substitute, substituteQuals } from '../lang/transform.js';
import { printExpr } from '../lang/printer.js';
import type { Expr, Qualifier } from '../lang/ast.js';

export type Polarity = 'pos' | 'neg' | 'both';

type QuantExpr = Extract<Expr, { kind: 'quant' }>;

function flip(p: Polarity): Polarity {
  if (p === 'pos') return 'neg';
  if (p === 'neg') return 'pos';
  return 'both';
}

function isBagAlgebra(e: Expr): boolean {
  return e.kind === 'binary' && (e.op === 'union' || e.op === 'diff');
}

function isCompoundSource(e: Expr): boolean {
  return isBagAlgebra(e) || e.kind === 'bag' || (e.kind === 'quant' && e.quant === 'comp');
}

function hasBagAlgebra(e: Expr): boolean {
  let found = false;
  const walk = (x: Expr): void => {
    if (found) return;
    if (isBagAlgebra(x)) {
      found = true;
      return;
    }
    if (x.kind === 'quant') {
      for (const q of x.quals) walk(q.kind === 'gen' ? q.source : q.cond);
      walk(x.head);
    }
  };
  walk(e);
  return found;
}

function unsupported(what: string, e: Expr): never {
  throw new UnsupportedFragmentError(`${what}: ${printExpr(e)}`);
}

function quant(base: QuantExpr, quals: readonly Qualifier[], head: Expr = base.head): QuantExpr {
  return { kind: 'quant', quant: base.quant, head, quals };
}

/** Rewrite `e` (a formula or term) so that no union or difference remains. */
export function expandPostState(e: Expr, polarity: Polarity = 'pos'): Expr {
  return rw(e, polarity);
}

function rw(e: Expr, p: Polarity): Expr {
  switch (e.kind) {
    case 'lit':
    case 'var':
    case 'state':
      return e;
    case 'field':
    case 'val':
      return { ...e, target: rw(e.target, 'both') };
    case 'record': {
      const fields: Record<string, Expr> = {};
      for (const [name, f] of Object.entries(e.fields)) fields[name] = rw(f, 'both');
      return { ...e, fields };
    }
    case 'unary':
      return { ...e, operand: rw(e.operand, e.op === 'not' ? flip(p) : 'both') };
    case 'binary':
      switch (e.op) {
        case 'and':
        case 'or':
          return { ...e, left: rw(e.left, p), right: rw(e.right, p) };
        case 'implies':
          return { ...e, left: rw(e.left, flip(p)), right: rw(e.right, p) };
        case 'eq':
        case 'ne':
          if (isBagAlgebra(e.left) || isBagAlgebra(e.right)) unsupported('bag equality over updated state', e);
          if (hasComprehensionOverAlgebra(e.left) || hasComprehensionOverAlgebra(e.right)) {
            unsupported('bag equality over updated state', e);
          }
          return { ...e, left: rw(e.left, 'both'), right: rw(e.right, 'both') };
        default:
          return { ...e, left: rw(e.left, 'both'), right: rw(e.right, 'both') };
      }
    case 'cond':
      return { ...e, test: rw(e.test, 'both'), then: rw(e.then, p), else: rw(e.else, p) };
    case 'bag':
      return { ...e, elements: e.elements.map((el) => rw(el, 'both')) };
    case 'in':
      return membership(e.element, e.bag, p);
    case 'count':
      return cardinality(e.bag);
    case 'quant':
      return quantifier(e, p);
  }
}

function hasComprehensionOverAlgebra(e: Expr): boolean {
  return e.kind === 'quant' && e.quant === 'comp' && hasBagAlgebra(e);
}

// ─── Membership ─────────────────────────────────────────────────

function membership(t: Expr, b: Expr, p: Polarity): Expr {
  if (b.kind === 'binary' && b.op === 'union') {
    return rw(or(member(t, b.left), member(t, b.right)), p);
  }
  if (b.kind === 'binary' && b.op === 'diff') {
    if (p === 'pos') return rw(and(member(t, b.left), not(member(t, b.right))), p);
    if (p === 'neg') return rw(member(t, b.left), p);
    return unsupported('membership in a difference under mixed polarity', member(t, b));
  }
  if (b.kind === 'bag') {
    if (b.elements.length === 0) return FALSE_EXPR;
    return rw(or(...b.elements.map((el) => eq(t, el))), p);
  }
  if (b.kind === 'quant' && b.quant === 'comp') {
    const c = freshen(b);
    if (c.kind !== 'quant') return unsupported('comprehension', b);
    return rw(quant({ ...c, quant: 'exists' }, [...c.quals, where(eq(c.head, t))]), p);
  }
  return member(rw(t, 'both'), rw(b, 'both'));
}

// ─── Cardinality ────────────────────────────────────────────────

function cardinality(b: Expr): Expr {
  if (b.kind === 'binary' && b.op === 'union') return add(cardinality(b.left), cardinality(b.right));
  if (b.kind === 'binary' && b.op === 'diff') return unsupported('count over a removal', count(b));
  if (b.kind === 'bag') return int(b.elements.length);
  if (b.kind === 'quant' && b.quant === 'comp') {
    const expanded = quantifier(b, 'both');
    if (expanded.kind === 'quant') return count(expanded);
    return cardinality(expanded);
  }
  return count(rw(b, 'both'));
}

// ─── Quantifiers ────────────────────────────────────────────────

function withoutGenerators(q: QuantExpr): Expr {
  const guards = q.quals.flatMap((x) => (x.kind === 'guard' ? [x.cond] : []));
  switch (q.quant) {
    case 'exists':
      return and(...guards);
    case 'all':
      return guards.length === 0 ? q.head : implies(and(...guards), q.head);
    case 'unique':
      return TRUE_EXPR;
    case 'comp':
      return guards.length === 0 ? bag(q.head) : cond(and(...guards), bag(q.head), { kind: 'bag', elements: [] });
  }
}

function quantifier(q: QuantExpr, p: Polarity): Expr {
  const index = q.quals.findIndex((x) => x.kind === 'gen' && isCompoundSource(x.source));
  if (index < 0) return settle(q, p);

  const generator = q.quals[index];
  if (generator.kind !== 'gen') return settle(q, p);
  const before = q.quals.slice(0, index);
  const after = q.quals.slice(index + 1);
  const source = generator.source;
  const over = (src: Expr, extra: Qualifier[] = []): QuantExpr =>
    quant(q, [...before, gen(generator.name, src), ...extra, ...after]);
  const copy = (src: Expr): QuantExpr => {
    const c = freshen(over(src));
    return c.kind === 'quant' ? c : unsupported('quantifier copy', c);
  };

  if (source.kind === 'binary' && source.op === 'union') {
    switch (q.quant) {
      case 'exists':
        return rw(or(over(source.left), copy(source.right)), p);
      case 'all':
        return rw(and(over(source.left), copy(source.right)), p);
      case 'comp':
        return rw(union(over(source.left), copy(source.right)), p);
      case 'unique': {
        const left = over(source.left);
        const right = copy(source.right);
        const probe = copy(source.right);
        const disjoint = quant(
          { ...left, quant: 'all' },
          left.quals,
          quant({ ...probe, quant: 'all' }, probe.quals, ne(left.head, probe.head)),
        );
        return rw(and(left, right, disjoint), p);
      }
    }
  }

  if (source.kind === 'bag') {
    const elements = source.elements;
    if (elements.length === 0) {
      if (q.quant === 'exists') return FALSE_EXPR;
      if (q.quant === 'comp') return { kind: 'bag', elements: [] };
      return TRUE_EXPR;
    }
    if (elements.length === 1) {
      const [quals, inner] = substituteQuals(after, new Map([[generator.name, elements[0]]]));
      return rw(quant(q, [...before, ...quals], substitute(q.head, inner)), p);
    }
    const split = union(bag(...elements.slice(0, -1)), bag(elements[elements.length - 1]));
    return rw(over(split), p);
  }

  if (source.kind === 'binary' && source.op === 'diff') {
    const universal = (q.quant === 'all' && p === 'pos') || (q.quant === 'exists' && p === 'neg');
    const existential = (q.quant === 'exists' && p === 'pos') || (q.quant === 'all' && p === 'neg');
    if (q.quant === 'unique') {
      if (p === 'pos') return rw(over(source.left), p);
      return unsupported('unique over a removal', q);
    }
    if (universal) return rw(over(source.left), p);
    if (existential) {
      return rw(over(source.left, [where(not(member(ref(generator.name), source.right)))]), p);
    }
    return unsupported('quantifier over a removal', q);
  }

  if (source.kind === 'quant' && source.quant === 'comp') {
    const inner = freshen(source);
    if (inner.kind !== 'quant') return unsupported('comprehension', source);
    const [quals, sub] = substituteQuals(after, new Map([[generator.name, inner.head]]));
    return rw(quant(q, [...before, ...inner.quals, ...quals], substitute(q.head, sub)), p);
  }

  return unsupported('generator source', source);
}

/** Rewrite the parts of a quantifier whose generators are all plain bags. */
function settle(q: QuantExpr, p: Polarity): Expr {
  if (q.quals.every((x) => x.kind === 'guard')) {
    const reduced = withoutGenerators(q);
    return rw(reduced, p);
  }
  const guardPolarity: Polarity = q.quant === 'exists' ? p : q.quant === 'all' ? flip(p) : 'both';
  const headPolarity: Polarity = q.quant === 'all' ? p : 'both';
  const quals = q.quals.map((x): Qualifier =>
    x.kind === 'gen' ? { ...x, source: rw(x.source, 'both') } : { ...x, cond: rw(x.cond, guardPolarity) },
  );
  return quant(q, quals, q.quant === 'exists' ? q.head : rw(q.head, headPolarity));
}
