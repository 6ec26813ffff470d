/**
 * Value & Type Model
 *
 * Scalars, records, identity-bearing handles and bags. Every value is
 * immutable; bags are persistent (updates return new bags).
 */

import type { Bag } from './bag.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type ScalarType =
  | { kind: 'int' }
  | { kind: 'bool' }
  | { kind: 'string' };

export type Type =
  | ScalarType
  | { kind: 'record'; name: string }
  | { kind: 'handle'; name: string }
  | { kind: 'bag'; of: Type };

export type RecordFlavor = 'record' | 'handle';

export interface RecordType {
  name: string;
  flavor: RecordFlavor;
  fields: Record<string, Type>;
}

// ═══════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════

export interface IntValue {
  kind: 'int';
  value: bigint;
}

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

export type ScalarValue = IntValue | BoolValue | StringValue;

export interface RecordValue {
  kind: 'record';
  type: string;
  fields: Readonly<Record<string, Value>>;
}

/** A record with identity: two handles are equal iff their identities are. */
export interface HandleValue {
  kind: 'handle';
  type: string;
  id: string;
  val: RecordValue;
}

export interface BagValue {
  kind: 'bag';
  bag: Bag;
}

export type Value = ScalarValue | RecordValue | HandleValue | BagValue;

// ═══════════════════════════════════════════════════════════════
// TYPE HELPERS
// ═══════════════════════════════════════════════════════════════

export const INT: Type = { kind: 'int' };
export const BOOL: Type = { kind: 'bool' };
export const STRING: Type = { kind: 'string' };

export function bagOf(of: Type): Type {
  return { kind: 'bag', of };
}

export function recordRef(name: string): Type {
  return { kind: 'record', name };
}

export function handleRef(name: string): Type {
  return { kind: 'handle', name };
}

export function typeEquals(a: Type, b: Type): boolean {
  if (a.kind !== b.kind) return false;
  switch (a.kind) {
    case 'record':
    case 'handle':
      return b.kind === a.kind && a.name === b.name;
    case 'bag':
      return b.kind === 'bag' && typeEquals(a.of, b.of);
    default:
      return true;
  }
}

export function formatType(type: Type): string {
  switch (type.kind) {
    case 'int':
      return 'Int';
    case 'bool':
      return 'Bool';
    case 'string':
      return 'String';
    case 'record':
    case 'handle':
      return type.name;
    case 'bag':
      return `Bag<${formatType(type.of)}>`;
  }
}
