/**
 * jsontree Core Types
 *
 * JsonValue is the single mutable value type: one of six kinds, with copy and move
 * semantics, vivifying accessors for building trees and strict accessors for reading
 * them.
 */

import { dequal } from 'dequal';
import { coerce, coerceStrict, CoercionTarget, CoercionTypes } from './coerce';
import { serialize } from './emit';
import { IndexOutOfRangeError, KeyNotFoundError, NotAnArrayError, NotAnObjectError } from './errors';

export type JsonKind = 'null' | 'string' | 'number' | 'boolean' | 'array' | 'object';

/** Native values with a direct JsonValue counterpart */
export type JsonScalar = null | boolean | number | string;

/** Anything a literal conversion accepts. A JsonValue is copied. */
export type JsonInit = JsonScalar | JsonValue;

export type ObjectEntry = [key: string, value: JsonInit];

/** Object key or array index */
export type PathSegment = string | number;

/**
 * Read-only view of a value's active kind and payload, for exhaustive matching.
 */
export type JsonView =
  | { readonly kind: 'null' }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'array'; readonly items: readonly ReadonlyJsonValue[] }
  | { readonly kind: 'object'; readonly entries: ReadonlyMap<string, ReadonlyJsonValue> };

type Payload =
  | { kind: 'null' }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'array'; items: JsonValue[] }
  | { kind: 'object'; entries: Map<string, JsonValue> };

/**
 * The non-mutating half of JsonValue. Nothing reachable through it changes the tree.
 */
export interface ReadonlyJsonValue {
  readonly type: JsonKind;
  view(): JsonView;

  isNull(): boolean;
  isBoolean(): boolean;
  isNumber(): boolean;
  isString(): boolean;
  isArray(): boolean;
  isObject(): boolean;

  size(): number;
  has(key: string): boolean;
  asArray(): readonly ReadonlyJsonValue[];
  asObject(): ReadonlyMap<string, ReadonlyJsonValue>;

  lookup(segment: PathSegment): ReadonlyJsonValue;
  lookupPath(path: readonly PathSegment[]): ReadonlyJsonValue;

  get<T extends CoercionTarget>(target: T): CoercionTypes[T];
  strictGet<T extends CoercionTarget>(target: T): CoercionTypes[T];
  asBool(): boolean;
  asNumber(): number;
  asString(): string;

  clone(): JsonValue;
  equals(other: ReadonlyJsonValue): boolean;
  serialize(): string;
  toJSON(): unknown;
}

/**
 * JsonValue - mutable JSON value tree node
 */
export class JsonValue implements ReadonlyJsonValue {
  private payload: Payload;

  private constructor(payload: Payload) {
    this.payload = payload;
  }

  // ============================================================
  // Construction
  // ============================================================

  static null(): JsonValue {
    return new JsonValue({ kind: 'null' });
  }

  static bool(v: boolean): JsonValue {
    return new JsonValue({ kind: 'boolean', value: v });
  }

  static number(v: number): JsonValue {
    return new JsonValue({ kind: 'number', value: v });
  }

  static string(v: string): JsonValue {
    return new JsonValue({ kind: 'string', value: v });
  }

  /**
   * Literal conversion. An existing JsonValue is deep-copied.
   */
  static from(v: JsonInit): JsonValue {
    if (v instanceof JsonValue) {
      return v.clone();
    }
    return new JsonValue(scalarPayload(v));
  }

  static array(...items: JsonInit[]): JsonValue {
    return new JsonValue({ kind: 'array', items: items.map(item => JsonValue.from(item)) });
  }

  /**
   * Build an object from key/value pairs. A repeated key keeps its last value.
   */
  static object(...entries: ObjectEntry[]): JsonValue {
    const map = new Map<string, JsonValue>();
    for (const [key, value] of entries) {
      map.set(key, JsonValue.from(value));
    }
    return new JsonValue({ kind: 'object', entries: map });
  }

  // ============================================================
  // Kind
  // ============================================================

  get type(): JsonKind {
    return this.payload.kind;
  }

  view(): JsonView {
    return this.payload;
  }

  isNull(): boolean {
    return this.payload.kind === 'null';
  }

  isBoolean(): boolean {
    return this.payload.kind === 'boolean';
  }

  isNumber(): boolean {
    return this.payload.kind === 'number';
  }

  isString(): boolean {
    return this.payload.kind === 'string';
  }

  isArray(): boolean {
    return this.payload.kind === 'array';
  }

  isObject(): boolean {
    return this.payload.kind === 'object';
  }

  /**
   * Element count of an array; 0 for every other kind, objects included.
   */
  size(): number {
    return this.payload.kind === 'array' ? this.payload.items.length : 0;
  }

  has(key: string): boolean {
    return this.payload.kind === 'object' && this.payload.entries.has(key);
  }

  /** The live element list. Throws NotAnArrayError for any other kind. */
  asArray(): JsonValue[] {
    if (this.payload.kind !== 'array') {
      throw new NotAnArrayError(this.payload.kind);
    }
    return this.payload.items;
  }

  /** The live entry map. Throws NotAnObjectError for any other kind. */
  asObject(): Map<string, JsonValue> {
    if (this.payload.kind !== 'object') {
      throw new NotAnObjectError(this.payload.kind);
    }
    return this.payload.entries;
  }

  // ============================================================
  // Assignment, copy and move
  // ============================================================

  /**
   * Replace this value's content in place. Returns this for chaining.
   */
  set(v: JsonInit): this {
    if (v instanceof JsonValue) {
      if (v !== this) {
        this.payload = clonePayload(v.payload);
      }
      return this;
    }
    this.payload = scalarPayload(v);
    return this;
  }

  clone(): JsonValue {
    return new JsonValue(clonePayload(this.payload));
  }

  /**
   * Move the payload into a new value without copying; this value becomes null.
   */
  take(): JsonValue {
    const moved = new JsonValue(this.payload);
    this.payload = { kind: 'null' };
    return moved;
  }

  /** Structural equality. Object key order is ignored. */
  equals(other: ReadonlyJsonValue): boolean {
    return dequal(this.payload, other.view());
  }

  // ============================================================
  // Vivifying access
  // ============================================================

  /**
   * Get-or-create the child at a key or index.
   *
   * A string key turns a non-object into an empty object and inserts a missing key
   * as null. A numeric index turns a non-array into an empty array and pads it with
   * nulls up to the index. Prior content of the wrong kind is discarded.
   */
  at(segment: PathSegment): JsonValue {
    if (typeof segment === 'string') {
      return this.atKey(segment);
    }
    return this.atIndex(segment);
  }

  atPath(path: readonly PathSegment[]): JsonValue {
    let current: JsonValue = this;
    for (const segment of path) {
      current = current.at(segment);
    }
    return current;
  }

  /** Append a copy of v, turning a non-array into an empty array first. */
  push(v: JsonInit): this {
    const child = JsonValue.from(v);
    let payload = this.payload;
    if (payload.kind !== 'array') {
      payload = { kind: 'array', items: [] };
      this.payload = payload;
    }
    payload.items.push(child);
    return this;
  }

  /** Delete a key. False when absent or when this is not an object. */
  remove(key: string): boolean {
    return this.payload.kind === 'object' && this.payload.entries.delete(key);
  }

  private atKey(key: string): JsonValue {
    let payload = this.payload;
    if (payload.kind !== 'object') {
      payload = { kind: 'object', entries: new Map() };
      this.payload = payload;
    }

    let child = payload.entries.get(key);
    if (child === undefined) {
      child = JsonValue.null();
      payload.entries.set(key, child);
    }
    return child;
  }

  private atIndex(index: number): JsonValue {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new RangeError(`invalid array index: ${index}`);
    }

    let payload = this.payload;
    if (payload.kind !== 'array') {
      payload = { kind: 'array', items: [] };
      this.payload = payload;
    }

    const items = payload.items;
    while (items.length <= index) {
      items.push(JsonValue.null());
    }
    return items[index];
  }

  // ============================================================
  // Strict access
  // ============================================================

  /**
   * Read the child at a key or index without mutating anything.
   */
  lookup(segment: PathSegment): JsonValue {
    const payload = this.payload;

    if (typeof segment === 'string') {
      if (payload.kind !== 'object') {
        throw new NotAnObjectError(payload.kind);
      }
      const child = payload.entries.get(segment);
      if (child === undefined) {
        throw new KeyNotFoundError(segment);
      }
      return child;
    }

    if (payload.kind !== 'array') {
      throw new NotAnArrayError(payload.kind);
    }
    if (!Number.isInteger(segment) || segment < 0 || segment >= payload.items.length) {
      throw new IndexOutOfRangeError(segment, payload.items.length);
    }
    return payload.items[segment];
  }

  lookupPath(path: readonly PathSegment[]): JsonValue {
    let current: JsonValue = this;
    for (const segment of path) {
      current = current.lookup(segment);
    }
    return current;
  }

  // ============================================================
  // Coercion
  // ============================================================

  /** Flexible conversion; never throws. */
  get<T extends CoercionTarget>(target: T): CoercionTypes[T] {
    return coerce(this, target);
  }

  /** Exact-kind extraction; throws TypeMismatchError otherwise. */
  strictGet<T extends CoercionTarget>(target: T): CoercionTypes[T] {
    return coerceStrict(this, target);
  }

  asBool(): boolean {
    return coerceStrict(this, 'boolean');
  }

  asNumber(): number {
    return coerceStrict(this, 'number');
  }

  asString(): string {
    return coerceStrict(this, 'string');
  }

  // ============================================================
  // Output
  // ============================================================

  /** Compact JSON text */
  serialize(): string {
    return serialize(this);
  }

  toString(): string {
    return serialize(this);
  }

  /**
   * Plain JS value, so JSON.stringify(value) works.
   */
  toJSON(): unknown {
    return nativeOf(this.payload);
  }
}

function scalarPayload(v: JsonScalar): Payload {
  if (v === null) {
    return { kind: 'null' };
  }
  if (typeof v === 'boolean') {
    return { kind: 'boolean', value: v };
  }
  if (typeof v === 'number') {
    return { kind: 'number', value: v };
  }
  return { kind: 'string', value: v };
}

function clonePayload(p: Payload): Payload {
  switch (p.kind) {
    case 'array':
      return { kind: 'array', items: p.items.map(item => item.clone()) };
    case 'object': {
      const entries = new Map<string, JsonValue>();
      for (const [key, value] of p.entries) {
        entries.set(key, value.clone());
      }
      return { kind: 'object', entries };
    }
    default:
      return { ...p };
  }
}

function nativeOf(p: Payload): unknown {
  switch (p.kind) {
    case 'null':
      return null;
    case 'string':
    case 'number':
    case 'boolean':
      return p.value;
    case 'array':
      return p.items.map(item => item.toJSON());
    case 'object':
      // fromEntries defines own properties, so a "__proto__" key stays a key
      return Object.fromEntries(Array.from(p.entries, ([key, value]) => [key, value.toJSON()]));
  }
}

/**
 * Create an entry for object construction
 */
export function entry(key: string, value: JsonInit): ObjectEntry {
  return [key, value];
}

/**
 * Read-only null, shared process-wide.
 */
export const NULL: ReadonlyJsonValue = Object.freeze(JsonValue.null());

/**
 * Shorthand constructors
 */
export const j = {
  null: JsonValue.null,
  bool: JsonValue.bool,
  number: JsonValue.number,
  string: JsonValue.string,
  from: JsonValue.from,
  array: JsonValue.array,
  object: JsonValue.object,
  entry,
};
