/**
 * Deep-TOON text decoding. Recursive descent over indentation-tagged lines;
 * every declared count is checked and any inconsistency throws, so a caller
 * never sees a partial value.
 */

import type { ArrayValue, ObjectEntry, ObjectValue, SourcePosition, Value } from './ast.js';
import { createArray } from './ast.js';
import { DeepToonDecodeError, type DecodeErrorKind } from './errors.js';
import { tokenize, type Line } from './lexer.js';
import { DEFAULT_DELIMITER, isValidDelimiter, parseKey, parseLiteral, readQuoted, shift, splitCells } from './literal.js';

export interface DecodeOptions {
  /** Max nesting depth (default 256) */
  maxDepth?: number;
  /** Max input length in characters (default 10_000_000) */
  maxInputLength?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

export type DecodeResult<T = Value> =
  | { ok: true; value: T }
  | { ok: false; error: DeepToonDecodeError };

export interface ArrayHeader {
  length: number;
  delimiter: string;
  /** Field names of a table, or null for a list */
  fields: string[] | null;
}

/**
 * Parse `[N]:`, `[N]{a,b}:` or `[N|]{a|b}:`. `text` starts at the opening
 * bracket; `at` is its position.
 */
export function parseHeader(text: string, at: SourcePosition): ArrayHeader {
  function syntax(message: string, index: number): never {
    throw new DeepToonDecodeError('SyntaxError', message, { position: shift(at, index) });
  }
  if (text[0] !== '[') syntax('Expected "["', 0);

  const digits = /^\d+/.exec(text.slice(1))?.[0];
  if (digits === undefined) syntax('Expected array length', 1);
  const length = Number(digits);
  let i = 1 + digits.length;

  let delimiter = DEFAULT_DELIMITER;
  if (text[i] !== ']') {
    const marker = text[i] ?? '';
    if (!isValidDelimiter(marker)) syntax(`Invalid delimiter ${JSON.stringify(marker)}`, i);
    delimiter = marker;
    i++;
  }
  if (text[i] !== ']') syntax('Expected "]"', i);
  i++;

  let fields: string[] | null = null;
  if (text[i] === '{') {
    let close = i + 1;
    while (close < text.length && text[close] !== '}') {
      close = text[close] === '"' ? readQuoted(text, close, at).end : close + 1;
    }
    if (close >= text.length) syntax('Unterminated field list', i);
    const fieldsAt = shift(at, i + 1);
    fields = [];
    const seen = new Set<string>();
    for (const cell of splitCells(text.slice(i + 1, close), delimiter, fieldsAt)) {
      const name = parseKey(cell.text, shift(fieldsAt, cell.start));
      if (seen.has(name)) {
        throw new DeepToonDecodeError('DuplicateKey', `Duplicate field: ${JSON.stringify(name)}`, {
          position: shift(fieldsAt, cell.start),
        });
      }
      seen.add(name);
      fields.push(name);
    }
    i = close + 1;
  }

  if (text[i] !== ':') syntax('Expected ":" after array header', i);
  if (text.slice(i + 1).trim().length > 0) syntax('Unexpected content after array header', i + 1);
  if (fields === null && delimiter !== DEFAULT_DELIMITER) {
    syntax('Delimiter marker is only allowed on table headers', 1);
  }
  return { length, delimiter, fields };
}

function isArrayHeader(content: string): boolean {
  return content.startsWith('[') && content.endsWith(':');
}

/** Key lines have an unquoted colon; bare scalars never do. */
function isKeyLine(content: string, at: SourcePosition): boolean {
  if (content.startsWith('"')) {
    return readQuoted(content, 0, at).end < content.length;
  }
  return content.includes(':');
}

class Parser {
  private index = 0;

  constructor(
    private readonly lines: Line[],
    private readonly maxDepth: number
  ) {}

  private get current(): Line | undefined {
    return this.lines[this.index];
  }

  private fail(kind: DecodeErrorKind, message: string, position?: SourcePosition): never {
    throw new DeepToonDecodeError(kind, message, {
      position: position ?? this.current?.start ?? this.endPosition(),
    });
  }

  private endPosition(): SourcePosition {
    const last = this.lines[this.lines.length - 1];
    if (!last) return { line: 1, column: 1, offset: 0 };
    return shift(last.start, last.content.length);
  }

  private checkDepth(depth: number): void {
    if (depth > this.maxDepth) {
      this.fail('DepthLimitError', `Maximum nesting depth exceeded (${this.maxDepth})`);
    }
  }

  /** Root: empty object, array, single scalar, or object at depth 0. */
  parseDocument(): Value {
    const first = this.current;
    if (!first) return { kind: 'object', entries: [] };
    if (first.depth !== 0) this.fail('IndentationError', 'Document must start at column 1');

    if (isArrayHeader(first.content)) {
      this.index++;
      const value = this.parseArray(parseHeader(first.content, first.start), 1);
      const rest = this.current;
      if (rest) this.fail('SyntaxError', 'Unexpected content after root array', rest.start);
      return value;
    }

    if (!isKeyLine(first.content, first.start)) {
      this.index++;
      const rest = this.current;
      if (rest) this.fail('SyntaxError', 'Unexpected content after root value', rest.start);
      return parseLiteral(first.content, first.start);
    }

    return this.parseObject(0);
  }

  /** Key lines at `depth` until a shallower line or end of input. */
  private parseObject(depth: number): ObjectValue {
    this.checkDepth(depth);
    const entries: ObjectEntry[] = [];
    const seen = new Set<string>();

    for (let line = this.current; line && line.depth >= depth; line = this.current) {
      if (line.depth > depth) this.fail('IndentationError', 'Unexpected indentation');
      const { key, rest, restIndex } = this.splitKey(line);
      if (seen.has(key)) {
        this.fail('DuplicateKey', `Duplicate key: ${JSON.stringify(key)}`);
      }
      seen.add(key);
      this.index++;

      let value: Value;
      if (rest.startsWith('[')) {
        value = this.parseArray(parseHeader(rest, shift(line.start, restIndex)), depth + 1);
      } else {
        const token = rest.slice(1).trim();
        if (token.length === 0) {
          value = this.parseObject(depth + 1);
        } else {
          const tokenIndex = restIndex + rest.indexOf(token, 1);
          value = parseLiteral(token, shift(line.start, tokenIndex));
        }
      }
      entries.push([key, value]);
    }

    return { kind: 'object', entries };
  }

  /** Split `key: ...` or `key[...]...` into the key and the text from ":" or "[". */
  private splitKey(line: Line): { key: string; rest: string; restIndex: number } {
    const content = line.content;
    let keyEnd: number;
    if (content.startsWith('"')) {
      keyEnd = readQuoted(content, 0, line.start).end;
    } else {
      const colon = content.indexOf(':');
      const bracket = content.indexOf('[');
      keyEnd = bracket !== -1 && (colon === -1 || bracket < colon) ? bracket : colon;
      if (keyEnd === -1) this.fail('SyntaxError', 'Expected "key: value"');
    }
    const rest = content.slice(keyEnd);
    if (!rest.startsWith(':') && !rest.startsWith('[')) {
      this.fail('SyntaxError', 'Expected ":" after key', shift(line.start, keyEnd));
    }
    const key = parseKey(content.slice(0, keyEnd).trimEnd(), line.start);
    return { key, rest, restIndex: keyEnd };
  }

  /** Body of an array whose header has already been consumed; rows or items sit at `depth`. */
  private parseArray(header: ArrayHeader, depth: number): ArrayValue {
    this.checkDepth(depth);
    const items: Value[] = [];

    for (let i = 0; i < header.length; i++) {
      const line = this.current;
      if (!line || line.depth < depth) {
        const what = header.fields ? 'rows' : 'items';
        this.fail('StructuralCountError', `Expected ${header.length} ${what}, found ${i}`);
      }
      if (line.depth > depth) this.fail('IndentationError', 'Unexpected indentation');
      items.push(header.fields ? this.parseRow(line, header.fields, header.delimiter) : this.parseItem(line, depth));
    }

    const extra = this.current;
    if (extra && extra.depth === depth) {
      const what = header.fields ? 'rows' : 'items';
      this.fail('StructuralCountError', `Expected ${header.length} ${what}, found more`);
    }
    if (extra && extra.depth > depth) this.fail('IndentationError', 'Unexpected indentation');
    return createArray(items);
  }

  private parseRow(line: Line, fields: string[], delimiter: string): ObjectValue {
    const cells = splitCells(line.content, delimiter, line.start);
    if (cells.length !== fields.length) {
      this.fail('StructuralCountError', `Expected ${fields.length} cells, found ${cells.length}`);
    }
    this.index++;
    const entries = cells.map((cell, i): ObjectEntry => [
      fields[i]!,
      parseLiteral(cell.text, shift(line.start, cell.start)),
    ]);
    return { kind: 'object', entries };
  }

  /** `- literal`, `-` (object on the following lines) or `-[...]:` */
  private parseItem(line: Line, depth: number): Value {
    const content = line.content;
    if (content === '-') {
      this.index++;
      return this.parseObject(depth + 1);
    }
    if (content.startsWith('-[')) {
      this.index++;
      return this.parseArray(parseHeader(content.slice(1), shift(line.start, 1)), depth + 1);
    }
    if (content.startsWith('- ')) {
      this.index++;
      const token = content.slice(2).trim();
      return parseLiteral(token, shift(line.start, content.indexOf(token, 2)));
    }
    this.fail('SyntaxError', 'Expected list item starting with "-"');
  }
}

/**
 * Decode Deep-TOON text to a value. Throws DeepToonDecodeError on malformed
 * input.
 */
export function decodeValue(text: string, options: DecodeOptions = {}): Value {
  const lines = tokenize(text, { maxInputLength: options.maxInputLength });
  return new Parser(lines, options.maxDepth ?? DEFAULT_MAX_DEPTH).parseDocument();
}

/** Like decodeValue, but decode errors come back as a result instead of being thrown. */
export function safeDecodeValue(text: string, options: DecodeOptions = {}): DecodeResult {
  try {
    return { ok: true, value: decodeValue(text, options) };
  } catch (err) {
    if (err instanceof DeepToonDecodeError) return { ok: false, error: err };
    throw err;
  }
}
