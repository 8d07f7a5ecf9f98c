/**
 * Coercion between value kinds.
 *
 * Flexible coercion always produces a result, falling back to fixed defaults.
 * Strict coercion only unwraps a value whose kind matches the target.
 */

import type { JsonKind, ReadonlyJsonValue } from './types';
import { serialize } from './emit';
import { TypeMismatchError } from './errors';

export interface CoercionTypes {
  boolean: boolean;
  number: number;
  /** A number truncated toward zero */
  integer: number;
  string: string;
}

export type CoercionTarget = keyof CoercionTypes;

type Coercers = { [K in CoercionTarget]: (value: ReadonlyJsonValue) => CoercionTypes[K] };

// ============================================================
// Flexible
// ============================================================

function toBoolean(value: ReadonlyJsonValue): boolean {
  const v = value.view();
  switch (v.kind) {
    case 'boolean':
      return v.value;
    case 'number':
      return v.value !== 0;
    case 'string':
      return v.value !== '' && v.value !== 'false' && v.value !== '0';
    case 'null':
      return false;
    case 'array':
    case 'object':
      return true;
  }
}

function toNumber(value: ReadonlyJsonValue): number {
  const v = value.view();
  switch (v.kind) {
    case 'boolean':
      return v.value ? 1 : 0;
    case 'number':
      return v.value;
    case 'string':
      return parseDecimal(v.value);
    case 'null':
    case 'array':
    case 'object':
      return 0;
  }
}

/**
 * Leading decimal number of s, ignoring leading whitespace and anything after the
 * number. Unparsable text yields 0 rather than an error.
 */
export function parseDecimal(s: string): number {
  const n = parseFloat(s);
  return Number.isNaN(n) ? 0 : n;
}

function truncate(n: number): number {
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

function toText(value: ReadonlyJsonValue): string {
  const v = value.view();
  return v.kind === 'string' ? v.value : serialize(value);
}

const flexible: Coercers = {
  boolean: toBoolean,
  number: toNumber,
  integer: value => truncate(toNumber(value)),
  string: toText,
};

// ============================================================
// Strict
// ============================================================

const strictKinds: { [K in CoercionTarget]: JsonKind } = {
  boolean: 'boolean',
  number: 'number',
  integer: 'number',
  string: 'string',
};

function mismatch(target: CoercionTarget, value: ReadonlyJsonValue): TypeMismatchError {
  return new TypeMismatchError(strictKinds[target], value.type);
}

const strict: Coercers = {
  boolean: value => {
    const v = value.view();
    if (v.kind !== 'boolean') throw mismatch('boolean', value);
    return v.value;
  },
  number: value => {
    const v = value.view();
    if (v.kind !== 'number') throw mismatch('number', value);
    return v.value;
  },
  integer: value => {
    const v = value.view();
    if (v.kind !== 'number') throw mismatch('integer', value);
    return truncate(v.value);
  },
  string: value => {
    const v = value.view();
    if (v.kind !== 'string') throw mismatch('string', value);
    return v.value;
  },
};

export function coerce<T extends CoercionTarget>(value: ReadonlyJsonValue, target: T): CoercionTypes[T] {
  const convert = flexible[target];
  return convert(value);
}

export function coerceStrict<T extends CoercionTarget>(value: ReadonlyJsonValue, target: T): CoercionTypes[T] {
  const convert = strict[target];
  return convert(value);
}
