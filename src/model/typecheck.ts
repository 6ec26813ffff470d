/**
 * Static type inference for schema declarations.
 *
 * Every invariant, precondition, effect and query is checked once at load
 * time so the evaluator only meets ill-typed values through bad input data.
 */

import { SchemaError } from '../core/errors.js';
import { printExpr } from '../lang/printer.js';
import type { Effect, Expr, Qualifier } from '../lang/ast.js';
import { BOOL, INT, bagOf, formatType, typeEquals } from './types.js';
import type { Type, Value } from './types.js';
import type { ParamDecl, Schema } from './schema.js';

export type TypeEnv = ReadonlyMap<string, Type>;

function literalType(v: Value, where: string): Type {
  switch (v.kind) {
    case 'int':
    case 'bool':
    case 'string':
      return { kind: v.kind };
    case 'record':
    case 'handle':
      return { kind: v.kind, name: v.type };
    case 'bag':
      throw new SchemaError('bag literals must be written as bag expressions', where);
  }
}

function expect(actual: Type, expected: Type, e: Expr, where: string): void {
  if (!typeEquals(actual, expected)) {
    throw new SchemaError(
      `expected ${formatType(expected)} but "${printExpr(e)}" has type ${formatType(actual)}`,
      where,
    );
  }
}

function elementType(t: Type, e: Expr, where: string): Type {
  if (t.kind !== 'bag') {
    throw new SchemaError(`"${printExpr(e)}" is not a bag (${formatType(t)})`, where);
  }
  return t.of;
}

/** Extend `env` with the variables bound by `quals`, checking each qualifier. */
export function qualifierScope(quals: readonly Qualifier[], env: TypeEnv, schema: Schema, where: string): Map<string, Type> {
  const scope = new Map(env);
  for (const q of quals) {
    if (q.kind === 'gen') {
      const source = inferType(q.source, scope, schema, where);
      scope.set(q.name, elementType(source, q.source, where));
    } else {
      expect(inferType(q.cond, scope, schema, where), BOOL, q.cond, where);
    }
  }
  return scope;
}

export function inferType(e: Expr, env: TypeEnv, schema: Schema, where: string): Type {
  const infer = (x: Expr): Type => inferType(x, env, schema, where);

  switch (e.kind) {
    case 'lit':
      return literalType(e.value, where);
    case 'var': {
      const t = env.get(e.name);
      if (!t) throw new SchemaError(`unbound variable "${e.name}"`, where);
      return t;
    }
    case 'state': {
      const t = schema.state[e.name];
      if (!t) throw new SchemaError(`unknown state "${e.name}"`, where);
      return t;
    }
    case 'field': {
      const target = infer(e.target);
      if (target.kind !== 'record') {
        const hint = target.kind === 'handle' ? ' (open the handle with .val first)' : '';
        throw new SchemaError(`cannot project "${e.field}" from ${formatType(target)}${hint}`, where);
      }
      const decl = schema.types[target.name];
      const fieldType = decl?.fields[e.field];
      if (!fieldType) throw new SchemaError(`${target.name} declares no field "${e.field}"`, where);
      return fieldType;
    }
    case 'val': {
      const target = infer(e.target);
      if (target.kind !== 'handle') {
        throw new SchemaError(`".val" needs a handle, got ${formatType(target)}`, where);
      }
      return { kind: 'record', name: target.name };
    }
    case 'record': {
      const decl = schema.types[e.type];
      if (!decl || decl.flavor !== 'record') throw new SchemaError(`unknown record type "${e.type}"`, where);
      for (const [name, fieldType] of Object.entries(decl.fields)) {
        const f = e.fields[name];
        if (!f) throw new SchemaError(`missing field "${name}" in ${e.type} literal`, where);
        expect(infer(f), fieldType, f, where);
      }
      for (const name of Object.keys(e.fields)) {
        if (!(name in decl.fields)) throw new SchemaError(`${e.type} declares no field "${name}"`, where);
      }
      return { kind: 'record', name: e.type };
    }
    case 'unary':
      if (e.op === 'not') {
        expect(infer(e.operand), BOOL, e.operand, where);
        return BOOL;
      }
      expect(infer(e.operand), INT, e.operand, where);
      return INT;
    case 'binary': {
      const left = infer(e.left);
      const right = infer(e.right);
      switch (e.op) {
        case 'and':
        case 'or':
        case 'implies':
          expect(left, BOOL, e.left, where);
          expect(right, BOOL, e.right, where);
          return BOOL;
        case 'eq':
        case 'ne':
          expect(right, left, e.right, where);
          return BOOL;
        case 'lt':
        case 'le':
        case 'gt':
        case 'ge':
          if (left.kind !== 'int' && left.kind !== 'string') {
            throw new SchemaError(`cannot order values of type ${formatType(left)}`, where);
          }
          expect(right, left, e.right, where);
          return BOOL;
        case 'add':
        case 'sub':
        case 'mul':
          expect(left, INT, e.left, where);
          expect(right, INT, e.right, where);
          return INT;
        case 'union':
        case 'diff':
          elementType(left, e.left, where);
          expect(right, left, e.right, where);
          return left;
      }
    }
    case 'cond': {
      expect(infer(e.test), BOOL, e.test, where);
      const then = infer(e.then);
      expect(infer(e.else), then, e.else, where);
      return then;
    }
    case 'bag': {
      if (e.elements.length === 0) {
        if (!e.elementType) throw new SchemaError('empty bag literal needs an element type', where);
        return bagOf(e.elementType);
      }
      const first = infer(e.elements[0]);
      for (const el of e.elements.slice(1)) expect(infer(el), first, el, where);
      if (e.elementType) expect(first, e.elementType, e.elements[0], where);
      return bagOf(first);
    }
    case 'in': {
      const of = elementType(infer(e.bag), e.bag, where);
      expect(infer(e.element), of, e.element, where);
      return BOOL;
    }
    case 'count':
      elementType(infer(e.bag), e.bag, where);
      return INT;
    case 'quant': {
      const scope = qualifierScope(e.quals, env, schema, where);
      const head = inferType(e.head, scope, schema, where);
      if (e.quant === 'comp') return bagOf(head);
      if (e.quant === 'all') expect(head, BOOL, e.head, where);
      return BOOL;
    }
  }
}

function checkDeclaredType(t: Type, schema: Schema, where: string): void {
  if (t.kind === 'bag') return checkDeclaredType(t.of, schema, where);
  if (t.kind === 'record' || t.kind === 'handle') {
    const decl = schema.types[t.name];
    if (!decl) throw new SchemaError(`unknown type "${t.name}"`, where);
    if (decl.flavor !== t.kind) {
      throw new SchemaError(`"${t.name}" is a ${decl.flavor} type, referenced as ${t.kind}`, where);
    }
  }
}

function paramEnv(params: readonly ParamDecl[], schema: Schema, where: string): Map<string, Type> {
  const env = new Map<string, Type>();
  for (const p of params) {
    if (env.has(p.name)) throw new SchemaError(`duplicate parameter "${p.name}"`, where);
    checkDeclaredType(p.type, schema, where);
    env.set(p.name, p.type);
  }
  return env;
}

function checkEffects(effects: readonly Effect[], env: Map<string, Type>, schema: Schema, where: string): void {
  for (const effect of effects) {
    switch (effect.kind) {
      case 'insert':
      case 'remove': {
        const target = schema.state[effect.target];
        if (!target) throw new SchemaError(`unknown state "${effect.target}"`, where);
        expect(inferType(effect.value, env, schema, where), elementType(target, effect.value, where), effect.value, where);
        break;
      }
      case 'when':
        expect(inferType(effect.cond, env, schema, where), BOOL, effect.cond, where);
        checkEffects(effect.then, env, schema, where);
        checkEffects(effect.else, env, schema, where);
        break;
      case 'let': {
        const inner = new Map(env);
        inner.set(effect.name, inferType(effect.value, env, schema, where));
        checkEffects(effect.body, inner, schema, where);
        break;
      }
    }
  }
}

function checkUniqueNames(kind: string, names: string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw new SchemaError(`duplicate ${kind} name`, name);
    seen.add(name);
  }
}

/** Validate a whole schema; throws SchemaError on the first problem found. */
export function typecheckSchema(schema: Schema): void {
  for (const [name, decl] of Object.entries(schema.types)) {
    if (decl.name !== name) throw new SchemaError(`declared under key "${name}"`, `type ${decl.name}`);
    for (const t of Object.values(decl.fields)) checkDeclaredType(t, schema, `type ${name}`);
  }
  for (const [name, t] of Object.entries(schema.state)) {
    if (t.kind !== 'bag') throw new SchemaError('state variables must be bags', `state ${name}`);
    checkDeclaredType(t, schema, `state ${name}`);
  }

  checkUniqueNames('invariant', schema.invariants.map((i) => i.name));
  checkUniqueNames('operation', schema.operations.map((o) => o.name));
  checkUniqueNames('query', schema.queries.map((q) => q.name));

  for (const inv of schema.invariants) {
    const where = `invariant ${inv.name}`;
    expect(inferType(inv.formula, new Map(), schema, where), BOOL, inv.formula, where);
  }

  for (const op of schema.operations) {
    const where = `operation ${op.name}`;
    const env = paramEnv(op.params, schema, where);
    expect(inferType(op.assume, env, schema, where), BOOL, op.assume, where);
    checkEffects(op.effects, env, schema, where);
  }

  for (const q of schema.queries) {
    const where = `query ${q.name}`;
    const env = paramEnv(q.params, schema, where);
    if (q.body.kind !== 'quant' || q.body.quant !== 'comp') {
      throw new SchemaError('query body must be a comprehension', where);
    }
    inferType(q.body, env, schema, where);
    if (q.orderBy) {
      const scope = qualifierScope(q.body.quals, env, schema, where);
      const keyType = inferType(q.orderBy.key, scope, schema, where);
      if (keyType.kind !== 'int' && keyType.kind !== 'string' && keyType.kind !== 'bool') {
        throw new SchemaError(`cannot order by ${formatType(keyType)}`, where);
      }
    }
  }
}
