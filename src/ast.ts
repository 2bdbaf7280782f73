/**
 * Deep-TOON value model: a tagged union over the JSON data model, plus the
 * bridge to and from plain JS values.
 * Objects keep an explicit ordered entry list so key order survives keys that
 * a plain object would reorder (integer-like keys).
 */

import { DeepToonEncodeError } from './errors.js';

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export type ObjectEntry = readonly [key: string, value: Value];

export interface NullValue {
  readonly kind: 'null';
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface ArrayValue {
  readonly kind: 'array';
  readonly items: readonly Value[];
}

export interface ObjectValue {
  readonly kind: 'object';
  readonly entries: readonly ObjectEntry[];
}

export type ScalarValue = NullValue | BooleanValue | NumberValue | StringValue;

export type Value = ScalarValue | ArrayValue | ObjectValue;

/** Plain JS form of a value, as produced by JSON.parse */
export type JsonValue = JsonObject | JsonValue[] | string | number | boolean | null;

export interface JsonObject {
  [key: string]: JsonValue;
}

const NULL: NullValue = { kind: 'null' };

export function createNull(): NullValue {
  return NULL;
}

export function createBoolean(value: boolean): BooleanValue {
  return { kind: 'boolean', value };
}

export function createNumber(value: number): NumberValue {
  return { kind: 'number', value };
}

export function createString(value: string): StringValue {
  return { kind: 'string', value };
}

export function createArray(items: readonly Value[]): ArrayValue {
  return { kind: 'array', items };
}

/**
 * Build an object from ordered entries. Throws on a repeated key instead of
 * letting the later entry win.
 */
export function createObject(entries: readonly ObjectEntry[]): ObjectValue {
  const seen = new Set<string>();
  for (const [key] of entries) {
    if (seen.has(key)) {
      throw new DeepToonEncodeError(`Duplicate key: ${JSON.stringify(key)}`, { path: '$' });
    }
    seen.add(key);
  }
  return { kind: 'object', entries };
}

export function isScalar(v: Value): v is ScalarValue {
  return v.kind !== 'array' && v.kind !== 'object';
}

/** Path of a child member, e.g. `$.user.name` or `$.items[2]` */
export function childPath(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return /^[A-Za-z_$][\w$]*$/.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

function isPlainObject(v: object): boolean {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function convert(input: unknown, path: string): Value {
  switch (typeof input) {
    case 'boolean':
      return createBoolean(input);
    case 'number':
      if (!Number.isFinite(input)) {
        throw new DeepToonEncodeError(`Non-finite number ${String(input)} has no literal form`, { path });
      }
      return createNumber(input);
    case 'string':
      return createString(input);
    case 'object': {
      if (input === null) return NULL;
      if (Array.isArray(input)) {
        const items: unknown[] = input;
        return createArray(items.map((item, i) => convert(item, childPath(path, i))));
      }
      if (!isPlainObject(input)) {
        throw new DeepToonEncodeError(`Unsupported object ${Object.prototype.toString.call(input)}`, { path });
      }
      const entries: ObjectEntry[] = Object.entries(input).map(
        ([key, v]): ObjectEntry => [key, convert(v, childPath(path, key))]
      );
      return { kind: 'object', entries };
    }
    default:
      throw new DeepToonEncodeError(`Unsupported value of type ${typeof input}`, { path });
  }
}

/**
 * Convert a plain JSON value to the tagged form. Validates at runtime, since
 * callers often hand over data typed loosely.
 */
export function fromJson(json: JsonValue): Value {
  return convert(json, '$');
}

/** Convert back to plain JS. `__proto__` comes back as an ordinary own key. */
export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map(toJson);
    case 'object': {
      const out: JsonObject = {};
      for (const [key, v] of value.entries) {
        Object.defineProperty(out, key, {
          value: toJson(v),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/** Deep equality, key order included. `-0` and `0` are distinct. */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'boolean':
      return b.kind === 'boolean' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'number':
      return b.kind === 'number' && Object.is(a.value, b.value);
    case 'array':
      return (
        b.kind === 'array' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && valueEquals(item, other);
        })
      );
    case 'object':
      return (
        b.kind === 'object' &&
        a.entries.length === b.entries.length &&
        a.entries.every(([key, v], i) => {
          const other = b.entries[i];
          return other !== undefined && other[0] === key && valueEquals(v, other[1]);
        })
      );
  }
}
