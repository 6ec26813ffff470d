import { HandleConflictError, ParameterError, TypeMismatchError } from '../core/errors.js';
import type { HandleRegistry } from './handles.js';
import { conform } from './values.js';
import type { ParamDecl, Schema } from './schema.js';
import type { Value } from './types.js';

export type Arguments = readonly Value[] | Readonly<Record<string, Value>>;

function isPositional(args: Arguments): args is readonly Value[] {
  return Array.isArray(args);
}

/**
 * Bind call arguments (positional or by name) to declared parameters.
 * Arity, unknown names and type mismatches raise ParameterError before any
 * evaluation happens. With `handles`, an argument handle whose id is already
 * bound to a different record is a ParameterError too.
 */
export function bindParams(
  target: string,
  decls: readonly ParamDecl[],
  args: Arguments,
  schema: Schema,
  handles?: HandleRegistry,
): Map<string, Value> {
  const bound = new Map<string, Value>();

  if (isPositional(args)) {
    if (args.length !== decls.length) {
      throw new ParameterError(`${target} expects ${decls.length} argument(s), got ${args.length}`, target);
    }
    decls.forEach((decl, i) => bound.set(decl.name, args[i]));
  } else {
    const named = args;
    for (const name of Object.keys(named)) {
      if (!decls.some((d) => d.name === name)) {
        throw new ParameterError(`${target} has no parameter "${name}"`, target);
      }
    }
    for (const decl of decls) {
      const v = named[decl.name];
      if (v === undefined) throw new ParameterError(`${target} is missing argument "${decl.name}"`, target);
      bound.set(decl.name, v);
    }
  }

  for (const decl of decls) {
    const v = bound.get(decl.name);
    if (v === undefined) continue;
    try {
      conform(v, decl.type, schema, `${target}(${decl.name})`);
    } catch (err) {
      if (err instanceof TypeMismatchError) throw new ParameterError(err.message, target);
      throw err;
    }
  }

  if (handles) {
    const scope = handles.fork();
    for (const [name, v] of bound) {
      try {
        scope.register(v, `${target}(${name})`);
      } catch (err) {
        if (err instanceof HandleConflictError) throw new ParameterError(err.message, target);
        throw err;
      }
    }
  }
  return bound;
}
