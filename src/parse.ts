/**
 * JSON Parser
 *
 * Single-pass recursive descent over the input string. Values are built while
 * scanning; there is no separate token stream.
 *
 * Deliberate deviations from RFC 8259:
 * - an exponent may carry a fraction ("1e2.5"); it is scanned and then ignored by
 *   the float conversion, so "1e2.5" is 100
 * - \u escapes at or above 0x80 decode to "?" (no surrogate-pair handling)
 */

import { JsonValue } from './types';
import { ParseError } from './errors';
import { makeLogger } from './logger';
import { ParseOptions, normalizeParseOptions } from './options';

/** Characters of input shown on each side of an error offset */
const CONTEXT_RADIUS = 20;

/** Decoded form of a \u escape outside ASCII */
export const UNICODE_PLACEHOLDER = '?';

export type ParseResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: ParseError };

/**
 * Parse JSON text. Throws ParseError on the first syntax violation.
 */
export function parse(input: string, options: ParseOptions = {}): JsonValue {
  const opts = normalizeParseOptions(options);
  const logger = makeLogger(opts);
  const parser = new JsonParser(input, opts.maxDepth);

  try {
    const value = parser.parseDocument(opts.allowTrailingContent);
    logger.debug('parse complete', { length: input.length, kind: value.type });
    return value;
  } catch (err) {
    if (err instanceof ParseError) {
      logger.error('parse failed', { reason: err.reason, offset: err.offset });
    }
    throw err;
  }
}

/**
 * Parse JSON text, returning the ParseError instead of throwing it.
 */
export function tryParse(input: string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, value: parse(input, options) };
  } catch (err) {
    if (err instanceof ParseError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

class JsonParser {
  private readonly input: string;
  private readonly maxDepth: number;
  private pos: number = 0;
  private depth: number = 0;

  constructor(input: string, maxDepth: number) {
    this.input = input;
    this.maxDepth = maxDepth;
  }

  parseDocument(allowTrailingContent: boolean): JsonValue {
    const value = this.parseValue();

    if (!allowTrailingContent) {
      this.skipWhitespace();
      if (this.pos < this.input.length) {
        throw this.error('unexpected trailing characters');
      }
    }

    return value;
  }

  private parseValue(): JsonValue {
    this.skipWhitespace();
    const c = this.peek();

    if (c === undefined) {
      throw this.error('unexpected end of input');
    }

    if (c === '"') {
      return JsonValue.string(this.parseString());
    }

    if (c === '-' || isDigit(c)) {
      return JsonValue.number(this.parseNumber());
    }

    if (c === 't' && this.tryLiteral('true')) {
      return JsonValue.bool(true);
    }
    if (c === 'f' && this.tryLiteral('false')) {
      return JsonValue.bool(false);
    }
    if (c === 'n' && this.tryLiteral('null')) {
      return JsonValue.null();
    }

    if (c === '[') {
      return this.parseArray();
    }
    if (c === '{') {
      return this.parseObject();
    }

    throw this.error(`unexpected character '${c}'`);
  }

  // ============================================================
  // Scalars
  // ============================================================

  private parseNumber(): number {
    const start = this.pos;

    if (this.peek() === '-') this.pos++;
    this.expectDigits();

    if (this.peek() === '.') {
      this.pos++;
      this.expectDigits();
    }

    if (this.peek() === 'e' || this.peek() === 'E') {
      this.pos++;
      if (this.peek() === '+' || this.peek() === '-') this.pos++;
      this.expectDigits();

      if (this.peek() === '.') {
        this.pos++;
        this.expectDigits();
      }
    }

    const n = parseFloat(this.input.slice(start, this.pos));
    if (!Number.isFinite(n)) {
      throw this.errorAt('number out of range', start);
    }
    return n;
  }

  private expectDigits(): void {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) {
      this.pos++;
    }
    if (this.pos === start) {
      throw this.expected('digit');
    }
  }

  /**
   * Scan a quoted string. The cursor must be on the opening quote.
   */
  private parseString(): string {
    this.pos++;
    let result = '';

    while (this.pos < this.input.length) {
      const c = this.input[this.pos++];
      if (c === '"') {
        return result;
      }
      if (c !== '\\') {
        result += c;
        continue;
      }

      const esc = this.peek();
      if (esc === undefined) {
        throw this.error('unterminated escape sequence');
      }
      this.pos++;

      switch (esc) {
        case '"': result += '"'; break;
        case '\\': result += '\\'; break;
        case '/': result += '/'; break;
        case 'b': result += '\b'; break;
        case 'f': result += '\f'; break;
        case 'n': result += '\n'; break;
        case 'r': result += '\r'; break;
        case 't': result += '\t'; break;
        case 'u': result += this.parseUnicodeEscape(); break;
        default:
          throw this.errorAt(`unknown escape character '${esc}'`, this.pos - 1);
      }
    }

    throw this.error('unterminated string');
  }

  private parseUnicodeEscape(): string {
    const hex = this.input.slice(this.pos, this.pos + 4);
    if (hex.length < 4) {
      throw this.error('truncated unicode escape');
    }
    if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
      throw this.error(`invalid unicode escape '\\u${hex}'`);
    }
    this.pos += 4;

    const code = parseInt(hex, 16);
    return code < 0x80 ? String.fromCharCode(code) : UNICODE_PLACEHOLDER;
  }

  // ============================================================
  // Containers
  // ============================================================

  private parseArray(): JsonValue {
    this.enter();
    this.pos++;

    const value = JsonValue.array();
    const items = value.asArray();

    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos++;
      this.leave();
      return value;
    }

    while (true) {
      items.push(this.parseValue());
      this.skipWhitespace();

      const c = this.peek();
      if (c === ',') {
        this.pos++;
        continue;
      }
      if (c === ']') {
        this.pos++;
        break;
      }
      throw this.expected("',' or ']'");
    }

    this.leave();
    return value;
  }

  private parseObject(): JsonValue {
    this.enter();
    this.pos++;

    const value = JsonValue.object();
    const entries = value.asObject();

    this.skipWhitespace();
    if (this.peek() === '}') {
      this.pos++;
      this.leave();
      return value;
    }

    while (true) {
      this.skipWhitespace();
      if (this.peek() !== '"') {
        throw this.expected('string key');
      }
      const key = this.parseString();

      this.skipWhitespace();
      if (this.peek() !== ':') {
        throw this.expected("':'");
      }
      this.pos++;

      // Last write wins for duplicate keys
      entries.set(key, this.parseValue());
      this.skipWhitespace();

      const c = this.peek();
      if (c === ',') {
        this.pos++;
        continue;
      }
      if (c === '}') {
        this.pos++;
        break;
      }
      throw this.expected("',' or '}'");
    }

    this.leave();
    return value;
  }

  private enter(): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      throw this.error(`maximum nesting depth of ${this.maxDepth} exceeded`);
    }
  }

  private leave(): void {
    this.depth--;
  }

  // ============================================================
  // Cursor helpers
  // ============================================================

  private peek(): string | undefined {
    return this.pos < this.input.length ? this.input[this.pos] : undefined;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (c !== ' ' && c !== '\t' && c !== '\n' && c !== '\r') {
        break;
      }
      this.pos++;
    }
  }

  private tryLiteral(s: string): boolean {
    if (this.input.startsWith(s, this.pos)) {
      this.pos += s.length;
      return true;
    }
    return false;
  }

  private expected(what: string): ParseError {
    if (this.pos >= this.input.length) {
      return this.error(`unexpected end of input, expected ${what}`);
    }
    return this.error(`expected ${what}`);
  }

  private error(reason: string): ParseError {
    return this.errorAt(reason, this.pos);
  }

  private errorAt(reason: string, offset: number): ParseError {
    const from = Math.max(0, offset - CONTEXT_RADIUS);
    const context = this.input.slice(from, from + 2 * CONTEXT_RADIUS).replace(/[\r\n]/g, '');
    return new ParseError(reason, offset, context);
  }
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}
