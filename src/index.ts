/**
 * jsontree
 *
 * An in-memory JSON value tree: parse text, mutate the tree through vivifying
 * accessors, read it through flexible or strict coercion, and serialize it back to
 * compact JSON.
 *
 * @example
 * ```typescript
 * import { JsonValue, j, parse, serialize } from 'jsontree';
 *
 * const config = JsonValue.null();
 * config.at('server').at('port').set(8080);
 * config.at('server').at('hosts').at(2).set('c.example');
 * serialize(config);
 * // => '{"server":{"port":8080,"hosts":[null,null,"c.example"]}}'
 *
 * const doc = parse('{"retries":"3","verbose":"false"}');
 * doc.lookup('retries').get('number');    // 3
 * doc.lookup('verbose').get('boolean');   // false
 * doc.lookup('retries').strictGet('number'); // throws TypeMismatchError
 *
 * const list = j.array(1, 'two', j.object(j.entry('three', 3)));
 * ```
 */

// Core types
export {
  JsonValue,
  ReadonlyJsonValue,
  JsonKind,
  JsonScalar,
  JsonInit,
  JsonView,
  ObjectEntry,
  PathSegment,
  NULL,
  entry,
  j,
} from './types';

// Coercion
export {
  CoercionTarget,
  CoercionTypes,
  parseDecimal,
} from './coerce';

// Parser
export {
  parse,
  tryParse,
  ParseResult,
  UNICODE_PLACEHOLDER,
} from './parse';

// Serializer
export {
  serialize,
  formatNumber,
  quoteString,
} from './emit';

// Native bridge
export {
  fromNative,
  toNative,
  parseToNative,
} from './json';

// Errors
export {
  JsonError,
  JsonErrorCode,
  ParseError,
  TypeMismatchError,
  NotAnObjectError,
  NotAnArrayError,
  KeyNotFoundError,
  IndexOutOfRangeError,
} from './errors';

// Options and logging
export {
  ParseOptions,
  NormalizedParseOptions,
  defaultParseOptions,
  normalizeParseOptions,
} from './options';

export {
  Logger,
  LogLevel,
  LogContext,
  LogHandler,
  LoggerOptions,
  consoleLogHandler,
  makeLogger,
} from './logger';
