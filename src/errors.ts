/**
 * Error taxonomy
 *
 * Every failure raised by the library is a JsonError subclass with a stable code.
 */

import type { JsonKind } from './types';

export type JsonErrorCode =
  | 'parse_error'
  | 'type_mismatch'
  | 'not_an_object'
  | 'not_an_array'
  | 'key_not_found'
  | 'index_out_of_range';

/** Base class for all library errors */
export class JsonError extends Error {
  constructor(
    public readonly code: JsonErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'JsonError';
  }
}

/** Malformed JSON text */
export class ParseError extends JsonError {
  constructor(
    public readonly reason: string,
    public readonly offset: number,
    public readonly context: string
  ) {
    super('parse_error', `json: ${reason} at offset ${offset}, near: ${context}`);
    this.name = 'ParseError';
  }
}

/** strictGet against a value of a different kind */
export class TypeMismatchError extends JsonError {
  constructor(
    public readonly expected: JsonKind,
    public readonly actual: JsonKind
  ) {
    super('type_mismatch', `json: expected ${expected}, got ${actual}`);
    this.name = 'TypeMismatchError';
  }
}

export class NotAnObjectError extends JsonError {
  constructor(public readonly actual: JsonKind) {
    super('not_an_object', `json: cannot access ${actual} as object`);
    this.name = 'NotAnObjectError';
  }
}

export class NotAnArrayError extends JsonError {
  constructor(public readonly actual: JsonKind) {
    super('not_an_array', `json: cannot access ${actual} as array`);
    this.name = 'NotAnArrayError';
  }
}

export class KeyNotFoundError extends JsonError {
  constructor(public readonly key: string) {
    super('key_not_found', `json: key not found: ${key}`);
    this.name = 'KeyNotFoundError';
  }
}

export class IndexOutOfRangeError extends JsonError {
  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super('index_out_of_range', `json: index ${index} out of range for length ${length}`);
    this.name = 'IndexOutOfRangeError';
  }
}
