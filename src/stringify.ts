/**
 * Value to JSON text. The baseline the compact form is measured against:
 * separator-tight by default, with key order taken from the entry list.
 */

import type { Value } from './ast.js';
import { childPath } from './ast.js';
import { DeepToonEncodeError } from './errors.js';

export interface StringifyOptions {
  /** Indent string for pretty-print (default: none, single line) */
  indent?: string;
  /** Newline (default "\n") */
  newline?: string;
}

function writeNumber(n: number, path: string): string {
  if (!Number.isFinite(n)) {
    throw new DeepToonEncodeError(`Non-finite number ${String(n)} has no JSON form`, { path });
  }
  return Object.is(n, -0) ? '-0' : String(n);
}

function stringifyValue(value: Value, indent: string, newline: string, level: number, path: string): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return writeNumber(value.value, path);
    case 'string':
      return JSON.stringify(value.value);
    case 'array': {
      if (value.items.length === 0) return '[]';
      const inner = value.items.map((v, i) => stringifyValue(v, indent, newline, level + 1, childPath(path, i)));
      if (!indent) return `[${inner.join(',')}]`;
      const pad = indent.repeat(level + 1);
      return `[${newline}${pad}${inner.join(`,${newline}${pad}`)}${newline}${indent.repeat(level)}]`;
    }
    case 'object': {
      if (value.entries.length === 0) return '{}';
      const sep = indent ? ': ' : ':';
      const pairs = value.entries.map(
        ([k, v]) => JSON.stringify(k) + sep + stringifyValue(v, indent, newline, level + 1, childPath(path, k))
      );
      if (!indent) return `{${pairs.join(',')}}`;
      const pad = indent.repeat(level + 1);
      return `{${newline}${pad}${pairs.join(`,${newline}${pad}`)}${newline}${indent.repeat(level)}}`;
    }
  }
}

/**
 * Serialize a value to JSON text.
 */
export function stringify(value: Value, options: StringifyOptions = {}): string {
  const indent = options.indent ?? '';
  const newline = options.newline ?? '\n';
  return stringifyValue(value, indent, newline, 0, '$');
}
