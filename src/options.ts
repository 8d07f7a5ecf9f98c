/**
 * Parser configuration
 */

import { LogHandler, LogLevel, logLevelNumber } from './logger';

export interface ParseOptions {
  /**
   * Maximum nesting depth of arrays and objects. The root container is depth 1.
   * @defaultValue Infinity
   */
  maxDepth?: number;

  /**
   * Accept non-whitespace text after the root value and ignore it.
   * @defaultValue false
   */
  allowTrailingContent?: boolean;

  /** @defaultValue LogLevel.silent */
  logLevel?: LogLevel;

  /** @defaultValue console output */
  logHandler?: LogHandler;
}

type Modify<T, R> = Omit<T, keyof R> & R;

/** ParseOptions with every default filled in */
export type NormalizedParseOptions = Modify<
  ParseOptions,
  {
    maxDepth: number;
    allowTrailingContent: boolean;
    logLevel: LogLevel;
  }
>;

export function defaultParseOptions(): NormalizedParseOptions {
  return {
    maxDepth: Infinity,
    allowTrailingContent: false,
    logLevel: LogLevel.silent,
  };
}

export function normalizeParseOptions(options: ParseOptions = {}): NormalizedParseOptions {
  const defaults = defaultParseOptions();
  const normalized: NormalizedParseOptions = {
    ...options,
    maxDepth: options.maxDepth ?? defaults.maxDepth,
    allowTrailingContent: options.allowTrailingContent ?? defaults.allowTrailingContent,
    logLevel: options.logLevel ?? defaults.logLevel,
  };

  const depth = normalized.maxDepth;
  if (depth !== Infinity && !(Number.isInteger(depth) && depth > 0)) {
    throw new RangeError(`maxDepth must be a positive integer or Infinity, got ${depth}`);
  }
  logLevelNumber(normalized.logLevel);

  return normalized;
}
