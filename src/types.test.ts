/**
 * JsonValue tests
 */

import {
  JsonValue, j, NULL,
  parse,
  JsonError, NotAnObjectError, NotAnArrayError, KeyNotFoundError, IndexOutOfRangeError,
} from './index';

// ============================================================
// Construction
// ============================================================

describe('construction', () => {
  test('null', () => {
    const v = JsonValue.null();
    expect(v.type).toBe('null');
    expect(v.isNull()).toBe(true);
    expect(v.size()).toBe(0);
  });

  test('literals', () => {
    expect(j.bool(true).type).toBe('boolean');
    expect(j.number(3.1415).asNumber()).toBe(3.1415);
    expect(j.string('hello world').asString()).toBe('hello world');
    expect(j.from(null).isNull()).toBe(true);
    expect(j.from(false).isBoolean()).toBe(true);
    expect(j.from(2023).isNumber()).toBe(true);
    expect(j.from('x').isString()).toBe(true);
  });

  test('array builder keeps order', () => {
    const arr = j.array(1, 2, 3, 'four');
    expect(arr.isArray()).toBe(true);
    expect(arr.size()).toBe(4);
    expect(arr.lookup(3).asString()).toBe('four');
    expect(arr.serialize()).toBe('[1,2,3,"four"]');
  });

  test('object builder', () => {
    const obj = j.object(
      ['a', 1],
      ['b', true],
      j.entry('c', j.array('x', 'y', 'z')),
    );
    expect(obj.isObject()).toBe(true);
    expect(obj.asObject().size).toBe(3);
    expect(obj.lookup('c').lookup(1).asString()).toBe('y');
    expect(obj.toJSON()).toEqual({ a: 1, b: true, c: ['x', 'y', 'z'] });
  });

  test('object builder keeps the last of a repeated key', () => {
    const obj = j.object(['a', 1], ['a', 2]);
    expect(obj.asObject().size).toBe(1);
    expect(obj.lookup('a').asNumber()).toBe(2);
  });

  test('builders copy the values they are given', () => {
    const child = j.array(1);
    const parent = j.array(child, child);
    child.push(2);
    expect(parent.lookup(0).size()).toBe(1);
    expect(parent.lookup(0)).not.toBe(parent.lookup(1));
  });
});

// ============================================================
// Copy, move, assignment
// ============================================================

describe('copy and move', () => {
  test('clone is deep', () => {
    const original = j.object(['key', 'value'], ['list', j.array(1, 2)]);
    const copy = original.clone();
    copy.at('key').set('changed');
    copy.at('list').push(3);

    expect(original.lookup('key').asString()).toBe('value');
    expect(original.lookup('list').size()).toBe(2);
    expect(copy.lookup('list').size()).toBe(3);
  });

  test('take moves the payload and leaves null behind', () => {
    const original = j.object(['key', 'value']);
    const child = original.lookup('key');
    const moved = original.take();

    expect(original.isNull()).toBe(true);
    expect(moved.serialize()).toBe('{"key":"value"}');
    expect(moved.lookup('key')).toBe(child);
  });

  test('set replaces content and kind', () => {
    const v = j.number(1);
    expect(v.set('text').type).toBe('string');
    expect(v.set(null).isNull()).toBe(true);
  });

  test('set copies another value', () => {
    const source = j.array(1);
    const target = JsonValue.null();
    target.set(source);
    source.push(2);
    expect(target.serialize()).toBe('[1]');
  });

  test('set accepts its own child', () => {
    const v = j.object(['a', j.array(1, 2)]);
    v.set(v.lookup('a'));
    expect(v.serialize()).toBe('[1,2]');
  });

  test('set to itself is a no-op', () => {
    const v = j.array(1);
    v.set(v);
    expect(v.serialize()).toBe('[1]');
  });
});

describe('equals', () => {
  test('ignores object key order', () => {
    const parsed = parse('{"a":1,"b":[true,null]}');
    const built = j.object(['b', j.array(true, null)], ['a', 1]);
    expect(parsed.equals(built)).toBe(true);
  });

  test('distinguishes kinds', () => {
    expect(j.number(1).equals(j.string('1'))).toBe(false);
    expect(j.array().equals(j.object())).toBe(false);
  });

  test('distinguishes extra keys', () => {
    expect(j.object(['a', 1]).equals(j.object(['a', 1], ['b', 2]))).toBe(false);
  });
});

// ============================================================
// Vivifying access
// ============================================================

describe('at', () => {
  test('builds nested objects from null', () => {
    const v = JsonValue.null();
    v.at('a').at('b').set(1);
    expect(v.serialize()).toBe('{"a":{"b":1}}');
  });

  test('grows arrays with null padding', () => {
    const v = j.array();
    v.at(5).set(42);
    expect(v.size()).toBe(6);
    for (let i = 0; i < 5; i++) {
      expect(v.lookup(i).isNull()).toBe(true);
    }
    expect(v.lookup(5).asNumber()).toBe(42);
    expect(v.serialize()).toBe('[null,null,null,null,null,42]');
  });

  test('discards a scalar in the way', () => {
    const v = j.number(3);
    v.at('x').set(true);
    expect(v.serialize()).toBe('{"x":true}');
  });

  test('index access resets an object to an array', () => {
    const v = j.object(['a', 1]);
    v.at(0);
    expect(v.serialize()).toBe('[null]');
  });

  test('returns the existing child', () => {
    const v = j.object(['a', 1]);
    expect(v.at('a')).toBe(v.at('a'));
    expect(v.at('a').asNumber()).toBe(1);
  });

  test('within bounds does not grow', () => {
    const v = j.array(1, 2, 3);
    v.at(1).set('two');
    expect(v.serialize()).toBe('[1,"two",3]');
  });

  test('rejects a negative or fractional index without mutating', () => {
    const v = j.number(3);
    expect(() => v.at(-1)).toThrow(RangeError);
    expect(() => v.at(1.5)).toThrow(RangeError);
    expect(v.asNumber()).toBe(3);
  });

  test('atPath mixes keys and indexes', () => {
    const v = JsonValue.null();
    v.atPath(['a', 0, 'b']).set('x');
    expect(v.serialize()).toBe('{"a":[{"b":"x"}]}');
  });

  test('builds a document field by field', () => {
    const v = JsonValue.null();
    v.at('name').set('Ada');
    v.at('age').set(36);
    v.at('languages').set(j.array('en', 'fr'));
    v.at('array').at(2).set(42);

    expect(v.toJSON()).toEqual({
      name: 'Ada',
      age: 36,
      languages: ['en', 'fr'],
      array: [null, null, 42],
    });
  });
});

describe('push and remove', () => {
  test('push vivifies an array', () => {
    const v = JsonValue.null();
    v.push(1).push('a');
    expect(v.serialize()).toBe('[1,"a"]');
  });

  test('push copies', () => {
    const v = j.array(1);
    v.push(v);
    expect(v.serialize()).toBe('[1,[1]]');
  });

  test('remove', () => {
    const v = j.object(['a', 1], ['b', 2]);
    expect(v.remove('a')).toBe(true);
    expect(v.has('a')).toBe(false);
    expect(v.remove('zz')).toBe(false);
    expect(j.array().remove('a')).toBe(false);
    expect(v.serialize()).toBe('{"b":2}');
  });
});

// ============================================================
// Strict access
// ============================================================

describe('lookup', () => {
  test('key on a non-object', () => {
    expect(() => j.number(1).lookup('a')).toThrow(NotAnObjectError);
    expect(() => JsonValue.null().lookup('missing')).toThrow(NotAnObjectError);
  });

  test('missing key', () => {
    let caught: unknown;
    try {
      j.object().lookup('missing');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(KeyNotFoundError);
    expect(caught).toBeInstanceOf(JsonError);
    expect(caught).toMatchObject({ code: 'key_not_found', key: 'missing' });
  });

  test('index on a non-array', () => {
    expect(() => j.object().lookup(0)).toThrow(NotAnArrayError);
  });

  test('index out of range', () => {
    expect(() => j.array(1, 2).lookup(5)).toThrow(IndexOutOfRangeError);
    expect(() => j.array(1, 2).lookup(5)).toThrow('json: index 5 out of range for length 2');
    expect(() => j.array(1, 2).lookup(-1)).toThrow(IndexOutOfRangeError);
  });

  test('never mutates', () => {
    const v = j.object();
    expect(() => v.lookup('x')).toThrow(KeyNotFoundError);
    expect(v.has('x')).toBe(false);
    expect(v.serialize()).toBe('{}');
  });

  test('lookupPath', () => {
    const v = parse('{"a":[{"b":"x"}]}');
    expect(v.lookupPath(['a', 0, 'b']).asString()).toBe('x');
    expect(() => v.lookupPath(['a', 1])).toThrow(IndexOutOfRangeError);
  });
});

// ============================================================
// Views and helpers
// ============================================================

describe('views', () => {
  test('asArray is live', () => {
    const v = j.array(1);
    v.asArray().push(JsonValue.number(2));
    expect(v.size()).toBe(2);
  });

  test('asObject is live', () => {
    const v = j.object();
    v.asObject().set('k', JsonValue.bool(true));
    expect(v.serialize()).toBe('{"k":true}');
  });

  test('views fail on the wrong kind', () => {
    expect(() => j.object().asArray()).toThrow(NotAnArrayError);
    expect(() => j.array().asObject()).toThrow(NotAnObjectError);
  });

  test('size is zero for non-arrays', () => {
    expect(j.object(['a', 1]).size()).toBe(0);
    expect(j.string('abc').size()).toBe(0);
  });

  test('view exposes the payload', () => {
    expect(j.number(7).view()).toEqual({ kind: 'number', value: 7 });
  });
});

describe('NULL', () => {
  test('is a frozen null', () => {
    expect(NULL.isNull()).toBe(true);
    expect(NULL.serialize()).toBe('null');
    expect(Object.isFrozen(NULL)).toBe(true);
  });
});

describe('output', () => {
  test('JSON.stringify uses toJSON', () => {
    expect(JSON.stringify(j.object(['a', j.array(1, null)]))).toBe('{"a":[1,null]}');
  });

  test('toString serializes', () => {
    expect(`${j.array(1, 'x')}`).toBe('[1,"x"]');
  });
});
