import { describe, expect, it } from 'vitest';
import {
  childPath,
  createNumber,
  createObject,
  createString,
  DeepToonEncodeError,
  fromJson,
  toJson,
  valueEquals,
} from '../src/index.js';

describe('fromJson / toJson', () => {
  it('converts plain values both ways', () => {
    const json = { a: [1, 'x', null, false], b: { c: {} } };
    expect(fromJson(json)).toEqual({
      kind: 'object',
      entries: [
        [
          'a',
          {
            kind: 'array',
            items: [
              { kind: 'number', value: 1 },
              { kind: 'string', value: 'x' },
              { kind: 'null' },
              { kind: 'boolean', value: false },
            ],
          },
        ],
        ['b', { kind: 'object', entries: [['c', { kind: 'object', entries: [] }]] }],
      ],
    });
    expect(toJson(fromJson(json))).toEqual(json);
  });

  it('rejects non-finite numbers with their path', () => {
    expect(() => fromJson({ list: [{ price: Infinity }] })).toThrow(DeepToonEncodeError);
    try {
      fromJson({ list: [{ price: -Infinity }] });
    } catch (err) {
      expect(err instanceof DeepToonEncodeError && err.path).toBe('$.list[0].price');
    }
  });
});

describe('createObject', () => {
  it('rejects repeated keys', () => {
    expect(() =>
      createObject([
        ['a', createNumber(1)],
        ['a', createNumber(2)],
      ])
    ).toThrow('Duplicate key: "a"');
  });
});

describe('valueEquals', () => {
  it('compares key order', () => {
    const ab = createObject([
      ['a', createNumber(1)],
      ['b', createNumber(2)],
    ]);
    const ba = createObject([
      ['b', createNumber(2)],
      ['a', createNumber(1)],
    ]);
    expect(valueEquals(ab, ab)).toBe(true);
    expect(valueEquals(ab, ba)).toBe(false);
  });

  it('tells negative zero from zero and strings from numbers', () => {
    expect(valueEquals(createNumber(0), createNumber(-0))).toBe(false);
    expect(valueEquals(createNumber(NaN), createNumber(NaN))).toBe(true);
    expect(valueEquals(createString('1'), createNumber(1))).toBe(false);
  });
});

describe('childPath', () => {
  it('uses dot notation for identifiers and brackets otherwise', () => {
    expect(childPath('$', 'user')).toBe('$.user');
    expect(childPath('$', 'first name')).toBe('$["first name"]');
    expect(childPath('$.items', 2)).toBe('$.items[2]');
  });
});
