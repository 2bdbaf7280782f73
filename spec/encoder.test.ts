import { describe, expect, it } from 'vitest';
import {
  createNumber,
  createObject,
  createString,
  DeepToonEncodeError,
  encode,
  encodeValue,
  fromJson,
  tabularFields,
  type JsonValue,
  type ObjectValue,
  type Value,
} from '../src/index.js';

function encodeError(run: () => unknown): DeepToonEncodeError {
  try {
    run();
  } catch (err) {
    if (err instanceof DeepToonEncodeError) return err;
    throw err;
  }
  throw new Error('expected encoding to fail');
}

function lines(...rows: string[]): string {
  return rows.join('\n');
}

describe('encode', () => {
  it('folds uniform flat objects into a table', () => {
    const data = {
      items: [
        { id: 1, name: 'Alice', age: 25, active: true },
        { id: 2, name: 'Bob', age: 30, active: false },
        { id: 3, name: 'Charlie', age: 35, active: true },
      ],
    };
    expect(encode(data)).toBe(
      lines('items[3]{id,name,age,active}:', '  1,Alice,25,true', '  2,Bob,30,false', '  3,Charlie,35,true')
    );
  });

  it('indents nested objects two spaces per level', () => {
    const data = { user: { name: 'Ada', address: { city: 'London', zip: 'N1' } }, active: true };
    expect(encode(data)).toBe(
      lines('user:', '  name: Ada', '  address:', '    city: London', '    zip: N1', 'active: true')
    );
  });

  it('writes deep nesting without closing delimiters', () => {
    const data = { location: { coordinates: { precision: { meters: 4.5 } } } };
    expect(encode(data)).toBe(lines('location:', '  coordinates:', '    precision:', '      meters: 4.5'));
  });

  it('falls back to a list when one element has a nested value', () => {
    const data = {
      people: [
        { name: 'A', address: null },
        { name: 'B', address: { street: null, city: 'LA' } },
      ],
    };
    expect(encode(data)).toBe(
      lines(
        'people[2]:',
        '  -',
        '    name: A',
        '    address: null',
        '  -',
        '    name: B',
        '    address:',
        '      street: null',
        '      city: LA'
      )
    );
  });

  it('falls back to a list when key order differs', () => {
    const data = { rows: [{ a: 1, b: 2 }, { b: 3, a: 4 }] };
    expect(encode(data)).toBe(lines('rows[2]:', '  -', '    a: 1', '    b: 2', '  -', '    b: 3', '    a: 4'));
  });

  it('writes mixed primitives as list items', () => {
    expect(encode([1, 'text', true, null, 3.14])).toBe(
      lines('[5]:', '  - 1', '  - text', '  - true', '  - null', '  - 3.14')
    );
  });

  it('keeps a table inside a list item', () => {
    const data = { groups: [{ name: 'g', members: [{ id: 1 }, { id: 2 }] }] };
    expect(encode(data)).toBe(
      lines('groups[1]:', '  -', '    name: g', '    members[2]{id}:', '      1', '      2')
    );
  });

  it('writes nested arrays with a list marker before the header', () => {
    expect(encode({ m: [[1, 2], []] })).toBe(lines('m[2]:', '  -[2]:', '    - 1', '    - 2', '  -[0]:'));
  });

  it('writes empty containers', () => {
    expect(encode({ a: {}, b: [], c: [{}] })).toBe(lines('a:', 'b[0]:', 'c[1]:', '  -'));
    expect(encode({})).toBe('');
    expect(encode([])).toBe('[0]:');
  });

  it('writes a root scalar on a single line', () => {
    expect(encode('hello')).toBe('hello');
    expect(encode(5)).toBe('5');
    expect(encode('5')).toBe('"5"');
    expect(encode(null)).toBe('null');
  });

  it('quotes strings that would read back as something else', () => {
    const data = {
      a: '',
      b: '42',
      c: 'true',
      d: 'x, y',
      e: 'he said "hi"',
      f: ' pad',
      g: 'multi\nline',
    };
    expect(encode(data)).toBe(
      lines('a: ""', 'b: "42"', 'c: "true"', 'd: "x, y"', 'e: "he said \\"hi\\""', 'f: " pad"', 'g: "multi\\nline"')
    );
  });

  it('quotes keys that are not identifiers and keeps entry order', () => {
    const value = createObject([
      ['b', createNumber(1)],
      ['2', createNumber(2)],
      ['first name', createString('Ada')],
    ]);
    expect(encodeValue(value)).toBe(lines('b: 1', '"2": 2', '"first name": Ada'));
  });

  it('declares a non-comma delimiter in table headers', () => {
    expect(encode({ rows: [{ a: 'x,y', b: 'p|q' }] }, { delimiter: '|' })).toBe(
      lines('rows[1|]{a|b}:', '  x,y|"p|q"')
    );
    expect(encode({ rows: [{ a: 1, b: 2 }] }, { delimiter: '\t' })).toBe(lines('rows[1\t]{a\tb}:', '  1\t2'));
  });

  it('leaves list headers unmarked under a custom delimiter', () => {
    expect(encode({ xs: ['a|b', 'c'] }, { delimiter: '|' })).toBe(lines('xs[2]:', '  - "a|b"', '  - c'));
  });
});

describe('encode errors', () => {
  it('rejects non-finite numbers with the path of the value', () => {
    expect(encodeError(() => encode({ x: NaN })).path).toBe('$.x');
    expect(encodeError(() => encode({ a: [1, Infinity] })).path).toBe('$.a[1]');
  });

  it('reports the path of a bad table cell', () => {
    const items = [1, 2, NaN].map((price, i) => createObject([['id', createNumber(i)], ['price', createNumber(price)]]));
    const value: Value = createObject([['items', { kind: 'array', items }]]);
    const err = encodeError(() => encodeValue(value));
    expect(err.path).toBe('$.items[2].price');
    expect(err.toString()).toBe('Non-finite number NaN has no literal form (at $.items[2].price)');
  });

  it('rejects duplicate keys in a hand-built value', () => {
    const dup: ObjectValue = {
      kind: 'object',
      entries: [
        ['a', createNumber(1)],
        ['a', createNumber(2)],
      ],
    };
    expect(encodeError(() => encodeValue(dup)).message).toBe('Duplicate key: "a"');
  });

  it('rejects an invalid delimiter', () => {
    expect(encodeError(() => encode({ a: 1 }, { delimiter: ':' })).message).toBe('Invalid delimiter ":"');
  });

  it('encodes deep input when no depth limit is given', () => {
    let json: JsonValue = [];
    for (let i = 0; i < 300; i++) json = [json];
    const text = encode(json);
    expect(text.split('\n')).toHaveLength(301);
    expect(text.split('\n')[300]).toBe(' '.repeat(600) + '-[0]:');
  });

  it('enforces a depth limit when one is given', () => {
    const err = encodeError(() => encodeValue(fromJson({ a: { b: { c: 1 } } }), { maxDepth: 1 }));
    expect(err.message).toBe('Maximum nesting depth exceeded (1)');
    expect(err.path).toBe('$.a.b');
  });
});

describe('tabularFields', () => {
  const table = (json: Parameters<typeof fromJson>[0]) => {
    const value = fromJson(json);
    return value.kind === 'array' ? tabularFields(value) : undefined;
  };

  it('returns the shared field list', () => {
    expect(table([{ a: 1, b: 'x' }, { a: 2, b: null }])).toEqual(['a', 'b']);
  });

  it('returns null for arrays that cannot be folded', () => {
    expect(table([])).toBeNull();
    expect(table([{}, {}])).toBeNull();
    expect(table([{ a: 1 }, 2])).toBeNull();
    expect(table([{ a: 1 }, { a: 1, b: 2 }])).toBeNull();
    expect(table([{ a: 1, b: 2 }, { b: 2, a: 1 }])).toBeNull();
    expect(table([{ a: [] }])).toBeNull();
  });
});
