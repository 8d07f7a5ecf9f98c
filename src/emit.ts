/**
 * Compact JSON emitter
 *
 * Rules:
 * - null / true / false as literals
 * - integral number → plain integer digits, no point, no exponent
 * - other number → 15 significant digits, %g layout, trailing zeros dropped
 * - non-finite number → null
 * - string → quoted; \b \t \n \f \r short escapes, other controls as \u00xx
 * - array / object → comma-joined, no whitespace, object keys in map order
 */

import type { ReadonlyJsonValue } from './types';

const SIGNIFICANT_DIGITS = 15;

const SHORT_ESCAPES = new Map<number, string>([
  [0x08, '\\b'],
  [0x09, '\\t'],
  [0x0a, '\\n'],
  [0x0c, '\\f'],
  [0x0d, '\\r'],
]);

export function serialize(value: ReadonlyJsonValue): string {
  const v = value.view();
  switch (v.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return v.value ? 'true' : 'false';
    case 'number':
      return formatNumber(v.value);
    case 'string':
      return quoteString(v.value);
    case 'array':
      return '[' + v.items.map(item => serialize(item)).join(',') + ']';
    case 'object': {
      const parts: string[] = [];
      for (const [key, child] of v.entries) {
        parts.push(quoteString(key) + ':' + serialize(child));
      }
      return '{' + parts.join(',') + '}';
    }
  }
}

// ============================================================
// Numbers
// ============================================================

export function formatNumber(n: number): string {
  if (!Number.isFinite(n)) {
    return 'null';
  }
  if (Number.isInteger(n)) {
    // BigInt keeps large integers out of exponent notation; -0 becomes "0"
    return BigInt(n).toString();
  }
  return formatSignificant(n, SIGNIFICANT_DIGITS);
}

/**
 * C-style %.{precision}g: exponent form when the decimal exponent after rounding
 * is below -4 or at least precision, fixed form otherwise.
 */
function formatSignificant(n: number, precision: number): string {
  const exponential = n.toExponential(precision - 1);
  const eIdx = exponential.indexOf('e');
  const exp = parseInt(exponential.slice(eIdx + 1), 10);

  if (exp < -4 || exp >= precision) {
    return trimFraction(exponential.slice(0, eIdx)) + exponential.slice(eIdx);
  }
  return trimFraction(n.toFixed(precision - 1 - exp));
}

function trimFraction(s: string): string {
  if (!s.includes('.')) {
    return s;
  }
  const trimmed = s.replace(/0+$/, '');
  return trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed;
}

// ============================================================
// Strings
// ============================================================

export function quoteString(s: string): string {
  let result = '"';
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i);
    if (code < 0x20) {
      result += SHORT_ESCAPES.get(code) ?? '\\u' + code.toString(16).padStart(4, '0');
      continue;
    }
    if (code === 0x22 || code === 0x5c) {
      result += '\\';
    }
    result += s[i];
  }
  return result + '"';
}
