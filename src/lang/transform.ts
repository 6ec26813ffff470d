/**
 * Syntactic utilities: free variables, state footprints, capture-avoiding
 * substitution and alpha-canonical keys.
 */

import { valueKey } from '../model/values.js';
import type { Effect, Expr, Qualifier } from './ast.js';

let freshCounter = 0;

/** A variable name that cannot clash with anything a schema declares. */
export function freshName(base: string): string {
  const root = base.split('#')[0];
  freshCounter += 1;
  return `${root}#${freshCounter}`;
}

// ─── Free variables ─────────────────────────────────────────────

export function freeVars(e: Expr, bound: ReadonlySet<string> = new Set(), out = new Set<string>()): Set<string> {
  switch (e.kind) {
    case 'lit':
    case 'state':
      break;
    case 'var':
      if (!bound.has(e.name)) out.add(e.name);
      break;
    case 'field':
    case 'val':
      freeVars(e.target, bound, out);
      break;
    case 'record':
      for (const f of Object.values(e.fields)) freeVars(f, bound, out);
      break;
    case 'unary':
      freeVars(e.operand, bound, out);
      break;
    case 'binary':
      freeVars(e.left, bound, out);
      freeVars(e.right, bound, out);
      break;
    case 'cond':
      freeVars(e.test, bound, out);
      freeVars(e.then, bound, out);
      freeVars(e.else, bound, out);
      break;
    case 'bag':
      for (const el of e.elements) freeVars(el, bound, out);
      break;
    case 'in':
      freeVars(e.element, bound, out);
      freeVars(e.bag, bound, out);
      break;
    case 'count':
      freeVars(e.bag, bound, out);
      break;
    case 'quant': {
      const inner = new Set(bound);
      for (const q of e.quals) {
        if (q.kind === 'gen') {
          freeVars(q.source, inner, out);
          inner.add(q.name);
        } else {
          freeVars(q.cond, inner, out);
        }
      }
      freeVars(e.head, inner, out);
      break;
    }
  }
  return out;
}

// ─── State footprint ────────────────────────────────────────────

/** Names of the state bags an expression reads. */
export function stateReads(e: Expr, out = new Set<string>()): Set<string> {
  visit(e, (node) => {
    if (node.kind === 'state') out.add(node.name);
  });
  return out;
}

/** Names of the state bags an effect list may write. */
export function effectWrites(effects: readonly Effect[], out = new Set<string>()): Set<string> {
  for (const effect of effects) {
    switch (effect.kind) {
      case 'insert':
      case 'remove':
        out.add(effect.target);
        break;
      case 'when':
        effectWrites(effect.then, out);
        effectWrites(effect.else, out);
        break;
      case 'let':
        effectWrites(effect.body, out);
        break;
    }
  }
  return out;
}

export function visit(e: Expr, fn: (node: Expr) => void): void {
  fn(e);
  switch (e.kind) {
    case 'field':
    case 'val':
      visit(e.target, fn);
      break;
    case 'record':
      for (const f of Object.values(e.fields)) visit(f, fn);
      break;
    case 'unary':
      visit(e.operand, fn);
      break;
    case 'binary':
      visit(e.left, fn);
      visit(e.right, fn);
      break;
    case 'cond':
      visit(e.test, fn);
      visit(e.then, fn);
      visit(e.else, fn);
      break;
    case 'bag':
      for (const el of e.elements) visit(el, fn);
      break;
    case 'in':
      visit(e.element, fn);
      visit(e.bag, fn);
      break;
    case 'count':
      visit(e.bag, fn);
      break;
    case 'quant':
      for (const q of e.quals) visit(q.kind === 'gen' ? q.source : q.cond, fn);
      visit(e.head, fn);
      break;
    default:
      break;
  }
}

// ─── Substitution ───────────────────────────────────────────────

export type Substitution = ReadonlyMap<string, Expr>;

/**
 * Replace free variables. Binders are renamed whenever they would capture a
 * free variable of a replacement.
 */
export function substitute(e: Expr, sub: Substitution): Expr {
  if (sub.size === 0) return e;
  switch (e.kind) {
    case 'lit':
    case 'state':
      return e;
    case 'var':
      return sub.get(e.name) ?? e;
    case 'field':
      return { ...e, target: substitute(e.target, sub) };
    case 'val':
      return { ...e, target: substitute(e.target, sub) };
    case 'record': {
      const fields: Record<string, Expr> = {};
      for (const [k, f] of Object.entries(e.fields)) fields[k] = substitute(f, sub);
      return { ...e, fields };
    }
    case 'unary':
      return { ...e, operand: substitute(e.operand, sub) };
    case 'binary':
      return { ...e, left: substitute(e.left, sub), right: substitute(e.right, sub) };
    case 'cond':
      return { ...e, test: substitute(e.test, sub), then: substitute(e.then, sub), else: substitute(e.else, sub) };
    case 'bag':
      return { ...e, elements: e.elements.map((el) => substitute(el, sub)) };
    case 'in':
      return { ...e, element: substitute(e.element, sub), bag: substitute(e.bag, sub) };
    case 'count':
      return { ...e, bag: substitute(e.bag, sub) };
    case 'quant': {
      const [quals, inner] = substituteQuals(e.quals, sub);
      return { ...e, quals, head: substitute(e.head, inner) };
    }
  }
}

function capturedNames(sub: Substitution): Set<string> {
  const names = new Set<string>();
  for (const replacement of sub.values()) freeVars(replacement, new Set(), names);
  return names;
}

export function substituteQuals(
  quals: readonly Qualifier[],
  sub: Substitution,
): [Qualifier[], Map<string, Expr>] {
  const current = new Map(sub);
  const out: Qualifier[] = [];
  for (const q of quals) {
    if (q.kind === 'guard') {
      out.push({ kind: 'guard', cond: substitute(q.cond, current) });
      continue;
    }
    const source = substitute(q.source, current);
    current.delete(q.name);
    if (current.size > 0 && capturedNames(current).has(q.name)) {
      const renamed = freshName(q.name);
      current.set(q.name, { kind: 'var', name: renamed });
      out.push({ kind: 'gen', name: renamed, source });
    } else {
      out.push({ kind: 'gen', name: q.name, source });
    }
  }
  return [out, current];
}

/** Rename every binder to a fresh name. */
export function freshen(e: Expr): Expr {
  switch (e.kind) {
    case 'lit':
    case 'state':
    case 'var':
      return e;
    case 'field':
      return { ...e, target: freshen(e.target) };
    case 'val':
      return { ...e, target: freshen(e.target) };
    case 'record': {
      const fields: Record<string, Expr> = {};
      for (const [k, f] of Object.entries(e.fields)) fields[k] = freshen(f);
      return { ...e, fields };
    }
    case 'unary':
      return { ...e, operand: freshen(e.operand) };
    case 'binary':
      return { ...e, left: freshen(e.left), right: freshen(e.right) };
    case 'cond':
      return { ...e, test: freshen(e.test), then: freshen(e.then), else: freshen(e.else) };
    case 'bag':
      return { ...e, elements: e.elements.map(freshen) };
    case 'in':
      return { ...e, element: freshen(e.element), bag: freshen(e.bag) };
    case 'count':
      return { ...e, bag: freshen(e.bag) };
    case 'quant': {
      const renames = new Map<string, Expr>();
      const quals: Qualifier[] = [];
      for (const q of e.quals) {
        if (q.kind === 'guard') {
          quals.push({ kind: 'guard', cond: freshen(substitute(q.cond, renames)) });
        } else {
          const source = freshen(substitute(q.source, renames));
          const name = freshName(q.name);
          renames.set(q.name, { kind: 'var', name });
          quals.push({ kind: 'gen', name, source });
        }
      }
      return { ...e, quals, head: freshen(substitute(e.head, renames)) };
    }
  }
}

// ─── Canonical keys ─────────────────────────────────────────────

/**
 * Key that is equal for alpha-equivalent expressions. Bound variables are
 * numbered by binding depth.
 */
export function canonicalKey(e: Expr): string {
  return keyOf(e, new Map(), 0);
}

function keyOf(e: Expr, env: ReadonlyMap<string, string>, depth: number): string {
  const k = (x: Expr): string => keyOf(x, env, depth);
  switch (e.kind) {
    case 'lit':
      return valueKey(e.value);
    case 'var':
      return env.get(e.name) ?? `v:${e.name}`;
    case 'state':
      return `st:${e.name}`;
    case 'field':
      return `${k(e.target)}.${e.field}`;
    case 'val':
      return `${k(e.target)}.val`;
    case 'record': {
      const parts = Object.keys(e.fields)
        .sort()
        .map((name) => `${name}=${k(e.fields[name])}`);
      return `${e.type}{${parts.join(',')}}`;
    }
    case 'unary':
      return `${e.op}(${k(e.operand)})`;
    case 'binary':
      return `${e.op}(${k(e.left)},${k(e.right)})`;
    case 'cond':
      return `if(${k(e.test)},${k(e.then)},${k(e.else)})`;
    case 'bag':
      return `[${e.elements.map(k).join(',')}]`;
    case 'in':
      return `in(${k(e.element)},${k(e.bag)})`;
    case 'count':
      return `len(${k(e.bag)})`;
    case 'quant': {
      const inner = new Map(env);
      let d = depth;
      const parts: string[] = [];
      for (const q of e.quals) {
        if (q.kind === 'gen') {
          parts.push(`<-${keyOf(q.source, inner, d)}`);
          inner.set(q.name, `$${d}`);
          d += 1;
        } else {
          parts.push(`?${keyOf(q.cond, inner, d)}`);
        }
      }
      return `${e.quant}[${keyOf(e.head, inner, d)}|${parts.join(';')}]`;
    }
  }
}

/** Replace state references by bag expressions (post-state rewriting). */
export function substituteState(e: Expr, states: ReadonlyMap<string, Expr>): Expr {
  if (states.size === 0) return e;
  const s = (x: Expr): Expr => substituteState(x, states);
  switch (e.kind) {
    case 'lit':
    case 'var':
      return e;
    case 'state':
      return states.get(e.name) ?? e;
    case 'field':
      return { ...e, target: s(e.target) };
    case 'val':
      return { ...e, target: s(e.target) };
    case 'record': {
      const fields: Record<string, Expr> = {};
      for (const [k, f] of Object.entries(e.fields)) fields[k] = s(f);
      return { ...e, fields };
    }
    case 'unary':
      return { ...e, operand: s(e.operand) };
    case 'binary':
      return { ...e, left: s(e.left), right: s(e.right) };
    case 'cond':
      return { ...e, test: s(e.test), then: s(e.then), else: s(e.else) };
    case 'bag':
      return { ...e, elements: e.elements.map(s) };
    case 'in':
      return { ...e, element: s(e.element), bag: s(e.bag) };
    case 'count':
      return { ...e, bag: s(e.bag) };
    case 'quant':
      return {
        ...e,
        quals: e.quals.map((q) =>
          q.kind === 'gen' ? { ...q, source: s(q.source) } : { ...q, cond: s(q.cond) },
        ),
        head: s(e.head),
      };
  }
}
