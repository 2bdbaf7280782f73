/**
 * Literal grammar: the one text form of each scalar, shared by encoder and
 * decoder. Decides which strings may stay bare and which need quotes.
 */

import type { ScalarValue, SourcePosition } from './ast.js';
import { createBoolean, createNull, createNumber, createString } from './ast.js';
import { DeepToonDecodeError } from './errors.js';

export const DEFAULT_DELIMITER = ',';

/** JSON number grammar; bare tokens matching it decode as numbers. */
const NUMBER_PATTERN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/** Anything a reader could take for a number, leading zeros included. */
const NUMERIC_LIKE = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i;

const BARE_KEY = /^[A-Za-z_][A-Za-z0-9_.]*$/;

const CONTROL_CHAR = /[\u0000-\u001f]/;

const RESERVED_DELIMITERS = new Set(['"', '\\', ':', '[', ']', '{', '}', '-', '+', '.', '_', '#']);

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

const UNESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
};

/**
 * Tab, or printable ASCII punctuation that cannot collide with headers,
 * numbers or bare keys.
 */
export function isValidDelimiter(delimiter: string): boolean {
  if (delimiter === '\t') return true;
  if (delimiter.length !== 1) return false;
  const code = delimiter.charCodeAt(0);
  if (code <= 0x20 || code >= 0x7f) return false;
  if (/[A-Za-z0-9]/.test(delimiter)) return false;
  return !RESERVED_DELIMITERS.has(delimiter);
}

/** Shortest round-tripping decimal; exponent only at or above 1e21 or below 1e-6. */
export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '-0';
  return String(n);
}

export function isBareString(s: string, delimiter: string): boolean {
  if (s.length === 0) return false;
  if (s !== s.trim()) return false;
  if (s.includes(delimiter) || s.includes(':') || s.includes('"')) return false;
  if (CONTROL_CHAR.test(s)) return false;
  if (s === 'null' || s === 'true' || s === 'false') return false;
  return !NUMERIC_LIKE.test(s);
}

export function quote(s: string): string {
  const escaped = s.replace(/[\\"\u0000-\u001f]/g, (c) => {
    return ESCAPES[c] ?? `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`;
  });
  return `"${escaped}"`;
}

export function renderString(s: string, delimiter: string): string {
  return isBareString(s, delimiter) ? s : quote(s);
}

/** Keys and header fields: identifier-like keys stay bare, the rest are quoted. */
export function renderKey(key: string): string {
  return BARE_KEY.test(key) ? key : quote(key);
}

export function renderScalar(value: ScalarValue, delimiter: string): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return formatNumber(value.value);
    case 'string':
      return renderString(value.value, delimiter);
  }
}

/** Position of `index` characters past `at` on the same line */
export function shift(at: SourcePosition, index: number): SourcePosition {
  return { line: at.line, column: at.column + index, offset: at.offset + index };
}

function literalError(message: string, position: SourcePosition): DeepToonDecodeError {
  return new DeepToonDecodeError('LiteralError', message, { position });
}

/**
 * Read a quoted string whose opening quote is at `text[start]`.
 * `at` is the position of `text[0]`. Returns the unescaped value and the
 * index just past the closing quote.
 */
export function readQuoted(
  text: string,
  start: number,
  at: SourcePosition
): { value: string; end: number } {
  const buf: string[] = [];
  let i = start + 1;
  for (;;) {
    const c = text[i];
    if (c === undefined) throw literalError('Unterminated quoted string', shift(at, start));
    if (c === '"') return { value: buf.join(''), end: i + 1 };
    if (c === '\\') {
      const next = text[i + 1];
      if (next === undefined) throw literalError('Unterminated quoted string', shift(at, start));
      if (next === 'u') {
        const hex = text.slice(i + 2, i + 6);
        if (!/^[\da-fA-F]{4}$/.test(hex)) throw literalError('Invalid \\u escape', shift(at, i));
        buf.push(String.fromCharCode(parseInt(hex, 16)));
        i += 6;
        continue;
      }
      const unescaped = UNESCAPES[next];
      if (unescaped === undefined) {
        throw literalError(`Invalid escape sequence \\${next}`, shift(at, i));
      }
      buf.push(unescaped);
      i += 2;
      continue;
    }
    buf.push(c);
    i++;
  }
}

/** Classify one trimmed token: keyword, then number, then string. */
export function parseLiteral(token: string, at: SourcePosition): ScalarValue {
  if (token.length === 0) throw literalError('Empty value', at);
  if (token.startsWith('"')) {
    const { value, end } = readQuoted(token, 0, at);
    if (end !== token.length) {
      throw literalError('Unexpected characters after closing quote', shift(at, end));
    }
    return createString(value);
  }
  if (token === 'null') return createNull();
  if (token === 'true') return createBoolean(true);
  if (token === 'false') return createBoolean(false);
  if (NUMBER_PATTERN.test(token)) {
    const n = Number(token);
    if (!Number.isFinite(n)) throw literalError('Number out of range', at);
    return createNumber(n);
  }
  return createString(token);
}

/** Parse a key or header field: quoted, or bare and non-empty. */
export function parseKey(token: string, at: SourcePosition): string {
  if (token.startsWith('"')) {
    const { value, end } = readQuoted(token, 0, at);
    if (end !== token.length) {
      throw literalError('Unexpected characters after closing quote', shift(at, end));
    }
    return value;
  }
  if (token.length === 0) throw new DeepToonDecodeError('SyntaxError', 'Empty key', { position: at });
  return token;
}

export interface Cell {
  /** Trimmed cell text */
  text: string;
  /** Index of the trimmed text within the split line */
  start: number;
}

/**
 * Split on `delimiter` outside quoted strings. Quotes are validated (and an
 * unterminated one reported) but left in place for `parseLiteral`.
 */
export function splitCells(text: string, delimiter: string, at: SourcePosition): Cell[] {
  const cells: Cell[] = [];
  let cellStart = 0;
  const push = (end: number): void => {
    const raw = text.slice(cellStart, end);
    const lead = raw.length - raw.trimStart().length;
    cells.push({ text: raw.trim(), start: cellStart + lead });
  };
  let i = 0;
  while (i < text.length) {
    const c = text[i];
    if (c === '"') {
      i = readQuoted(text, i, at).end;
      continue;
    }
    if (c === delimiter) {
      push(i);
      cellStart = i + 1;
    }
    i++;
  }
  push(text.length);
  return cells;
}
