import { nanoid } from 'nanoid';
import { Bag } from './bag.js';
import { TypeMismatchError } from '../core/errors.js';
import { formatType } from './types.js';
import type {
  BagValue,
  BoolValue,
  HandleValue,
  IntValue,
  RecordType,
  RecordValue,
  StringValue,
  Type,
  Value,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════

export function intValue(value: number | bigint): IntValue {
  return { kind: 'int', value: BigInt(value) };
}

export function boolValue(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function recordValue(type: string, fields: Record<string, Value>): RecordValue {
  return { kind: 'record', type, fields: { ...fields } };
}

/** Create a handle; a fresh identity is minted unless one is supplied. */
export function handleValue(type: string, fields: Record<string, Value>, id?: string): HandleValue {
  return {
    kind: 'handle',
    type,
    id: id ?? `${type.toLowerCase()}_${nanoid(10)}`,
    val: recordValue(type, fields),
  };
}

export function bagValue(values: Iterable<Value> | Bag = []): BagValue {
  return { kind: 'bag', bag: values instanceof Bag ? values : Bag.from(values) };
}

export const TRUE: BoolValue = { kind: 'bool', value: true };
export const FALSE: BoolValue = { kind: 'bool', value: false };

// ═══════════════════════════════════════════════════════════════
// IDENTITY & EQUALITY
// ═══════════════════════════════════════════════════════════════

/**
 * Canonical key: two values share a key iff they are equal. Handles key on
 * identity only; bags key on their sorted element keys.
 */
export function valueKey(v: Value): string {
  switch (v.kind) {
    case 'int':
      return `i:${v.value}`;
    case 'bool':
      return v.value ? 'b:1' : 'b:0';
    case 'string':
      return `s:${JSON.stringify(v.value)}`;
    case 'handle':
      return `h:${v.id}`;
    case 'record': {
      const parts = Object.keys(v.fields)
        .sort()
        .map((f) => `${f}=${valueKey(v.fields[f])}`);
      return `r:${v.type}{${parts.join(',')}}`;
    }
    case 'bag': {
      const keys: string[] = [];
      for (const item of v.bag) keys.push(valueKey(item));
      return `g[${keys.sort().join(',')}]`;
    }
  }
}

export function valueEquals(a: Value, b: Value): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'handle' && b.kind === 'handle') return a.id === b.id;
  if (a.kind === 'bag' && b.kind === 'bag') return a.bag.equals(b.bag);
  return valueKey(a) === valueKey(b);
}

/** Total order on ints and strings; other kinds are not ordered. */
export function compareValues(a: Value, b: Value): number {
  if (a.kind === 'int' && b.kind === 'int') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.kind === 'bool' && b.kind === 'bool') {
    return Number(a.value) - Number(b.value);
  }
  throw new TypeMismatchError(`Cannot order ${a.kind} against ${b.kind}`, a.kind, b.kind);
}

// ═══════════════════════════════════════════════════════════════
// TYPE CONFORMANCE
// ═══════════════════════════════════════════════════════════════

export interface TypeTable {
  readonly types: Readonly<Record<string, RecordType>>;
}

function describe(v: Value): string {
  if (v.kind === 'record' || v.kind === 'handle') return v.type;
  return v.kind;
}

function mismatch(expected: Type, v: Value, path: string): TypeMismatchError {
  const want = formatType(expected);
  return new TypeMismatchError(`${path}: expected ${want}, got ${describe(v)}`, want, describe(v));
}

/** Check that `value` structurally matches `type`; throws TypeMismatchError. */
export function conform(value: Value, type: Type, table: TypeTable, path = 'value'): void {
  switch (type.kind) {
    case 'int':
    case 'bool':
    case 'string':
      if (value.kind !== type.kind) throw mismatch(type, value, path);
      return;
    case 'bag':
      if (value.kind !== 'bag') throw mismatch(type, value, path);
      {
        let i = 0;
        for (const item of value.bag) conform(item, type.of, table, `${path}[${i++}]`);
      }
      return;
    case 'record':
    case 'handle': {
      const decl = table.types[type.name];
      if (!decl) throw mismatch(type, value, path);
      if (value.kind !== type.kind || value.type !== type.name) throw mismatch(type, value, path);
      const fields = value.kind === 'handle' ? value.val.fields : value.fields;
      for (const name of Object.keys(fields)) {
        if (!(name in decl.fields)) {
          throw new TypeMismatchError(`${path}: ${type.name} declares no field "${name}"`, type.name, name);
        }
      }
      for (const [name, fieldType] of Object.entries(decl.fields)) {
        const fieldValue = fields[name];
        if (fieldValue === undefined) {
          throw new TypeMismatchError(`${path}: missing field "${name}" of ${type.name}`, formatType(fieldType), 'missing');
        }
        conform(fieldValue, fieldType, table, `${path}.${name}`);
      }
      return;
    }
  }
}

/** Project a record field; handles must be opened with `.val` first. */
export function getField(value: Value, field: string): Value {
  if (value.kind !== 'record') {
    throw new TypeMismatchError(`Cannot read field "${field}" of ${describe(value)}`, 'record', describe(value));
  }
  const result = value.fields[field];
  if (result === undefined) {
    throw new TypeMismatchError(`${value.type} declares no field "${field}"`, value.type, field);
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════

export function formatValue(v: Value): string {
  switch (v.kind) {
    case 'int':
      return v.value.toString();
    case 'bool':
      return String(v.value);
    case 'string':
      return JSON.stringify(v.value);
    case 'record': {
      const parts = Object.entries(v.fields).map(([k, f]) => `${k}: ${formatValue(f)}`);
      return `{${parts.join(', ')}}`;
    }
    case 'handle':
      return `${v.type}#${v.id}${formatValue(v.val)}`;
    case 'bag':
      return `{{${v.bag.toArray().map(formatValue).join(', ')}}}`;
  }
}
