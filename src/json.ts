/**
 * Native value bridge
 *
 * Converts between plain JS values (as produced by JSON.parse or written as
 * literals) and JsonValue trees.
 */

import { JsonValue, ReadonlyJsonValue } from './types';
import { parse } from './parse';
import { ParseOptions } from './options';

/**
 * Convert a plain JS value to a JsonValue.
 *
 * null and undefined become null, arrays become arrays, other objects contribute
 * their own enumerable string keys. A JsonValue is copied.
 */
export function fromNative(native: unknown): JsonValue {
  if (native === null || native === undefined) {
    return JsonValue.null();
  }

  if (native instanceof JsonValue) {
    return native.clone();
  }

  if (typeof native === 'boolean') {
    return JsonValue.bool(native);
  }

  if (typeof native === 'number') {
    return JsonValue.number(native);
  }

  if (typeof native === 'string') {
    return JsonValue.string(native);
  }

  if (Array.isArray(native)) {
    const value = JsonValue.array();
    const items = value.asArray();
    for (const item of native) {
      items.push(fromNative(item));
    }
    return value;
  }

  if (typeof native === 'object') {
    const value = JsonValue.object();
    const entries = value.asObject();
    const fields: [string, unknown][] = Object.entries(native);
    for (const [key, field] of fields) {
      entries.set(key, fromNative(field));
    }
    return value;
  }

  throw new TypeError(`Unsupported native value type: ${typeof native}`);
}

/**
 * Convert a JsonValue to a plain JS value.
 */
export function toNative(value: ReadonlyJsonValue): unknown {
  return value.toJSON();
}

/**
 * Parse JSON text straight to a plain JS value.
 */
export function parseToNative(input: string, options: ParseOptions = {}): unknown {
  return toNative(parse(input, options));
}
