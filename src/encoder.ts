/**
 * Deep-TOON text encoding. One top-down pass; each array is folded into a
 * table when its elements are uniform flat objects, and written as a list
 * otherwise.
 */

import type { ArrayValue, ObjectEntry, ScalarValue, Value } from './ast.js';
import { childPath, isScalar } from './ast.js';
import { DeepToonEncodeError } from './errors.js';
import { INDENT_WIDTH } from './lexer.js';
import { DEFAULT_DELIMITER, isValidDelimiter, renderKey, renderScalar } from './literal.js';

export interface EncodeOptions {
  /** Field separator in table headers and rows (default ",") */
  delimiter?: string;
  /** Max nesting depth (default: unlimited) */
  maxDepth?: number;
}

/**
 * Field names shared by every element, or null when the array cannot be
 * folded. Foldable: non-empty, all objects, one identical non-empty ordered
 * key list, scalar values only.
 */
export function tabularFields(array: ArrayValue): string[] | null {
  const first = array.items[0];
  if (first === undefined || first.kind !== 'object' || first.entries.length === 0) return null;
  const fields = first.entries.map(([key]) => key);
  for (const item of array.items) {
    if (item.kind !== 'object' || item.entries.length !== fields.length) return null;
    for (let i = 0; i < fields.length; i++) {
      const entry = item.entries[i];
      if (entry === undefined || entry[0] !== fields[i] || !isScalar(entry[1])) return null;
    }
  }
  return fields;
}

class Encoder {
  private readonly lines: string[] = [];

  constructor(
    private readonly delimiter: string,
    private readonly maxDepth: number | undefined
  ) {}

  run(value: Value): string {
    switch (value.kind) {
      case 'object':
        this.writeEntries(value.entries, 0, '$');
        break;
      case 'array':
        this.writeArray('', value, 1, '$');
        break;
      default:
        this.lines.push(this.scalar(value, '$'));
    }
    return this.lines.join('\n');
  }

  private fail(message: string, path: string): never {
    throw new DeepToonEncodeError(message, { path });
  }

  private scalar(value: ScalarValue, path: string): string {
    if (value.kind === 'number' && !Number.isFinite(value.value)) {
      this.fail(`Non-finite number ${String(value.value)} has no literal form`, path);
    }
    return renderScalar(value, this.delimiter);
  }

  private checkDepth(depth: number, path: string): void {
    if (this.maxDepth !== undefined && depth > this.maxDepth) {
      this.fail(`Maximum nesting depth exceeded (${this.maxDepth})`, path);
    }
  }

  private pad(depth: number): string {
    return ' '.repeat(depth * INDENT_WIDTH);
  }

  private writeEntries(entries: readonly ObjectEntry[], depth: number, path: string): void {
    this.checkDepth(depth, path);
    const seen = new Set<string>();
    for (const [key, value] of entries) {
      const at = childPath(path, key);
      if (seen.has(key)) this.fail(`Duplicate key: ${JSON.stringify(key)}`, path);
      seen.add(key);

      const prefix = this.pad(depth) + renderKey(key);
      switch (value.kind) {
        case 'object':
          this.lines.push(`${prefix}:`);
          this.writeEntries(value.entries, depth + 1, at);
          break;
        case 'array':
          this.writeArray(prefix, value, depth + 1, at);
          break;
        default:
          this.lines.push(`${prefix}: ${this.scalar(value, at)}`);
      }
    }
  }

  /**
   * Emit `prefix` + header, then the body at `depth`. The prefix carries the
   * indentation and key (or list marker) of the header line.
   */
  private writeArray(prefix: string, array: ArrayValue, depth: number, path: string): void {
    this.checkDepth(depth, path);
    const n = array.items.length;
    const fields = tabularFields(array);

    if (fields !== null) {
      const marker = this.delimiter === DEFAULT_DELIMITER ? '' : this.delimiter;
      const names = fields.map((f) => renderKey(f)).join(this.delimiter);
      this.lines.push(`${prefix}[${n}${marker}]{${names}}:`);
      array.items.forEach((item, i) => {
        if (item.kind !== 'object') return;
        const at = childPath(path, i);
        const cells = item.entries.map(([key, v]) =>
          isScalar(v) ? this.scalar(v, childPath(at, key)) : this.fail('Nested value in table row', at)
        );
        this.lines.push(this.pad(depth) + cells.join(this.delimiter));
      });
      return;
    }

    this.lines.push(`${prefix}[${n}]:`);
    const pad = this.pad(depth);
    array.items.forEach((item, i) => {
      const at = childPath(path, i);
      switch (item.kind) {
        case 'object':
          this.lines.push(`${pad}-`);
          this.writeEntries(item.entries, depth + 1, at);
          break;
        case 'array':
          this.writeArray(`${pad}-`, item, depth + 1, at);
          break;
        default:
          this.lines.push(`${pad}- ${this.scalar(item, at)}`);
      }
    });
  }
}

/**
 * Encode a value to Deep-TOON text. Lines are joined with "\n", without a
 * trailing newline.
 */
export function encodeValue(value: Value, options: EncodeOptions = {}): string {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  if (!isValidDelimiter(delimiter)) {
    throw new DeepToonEncodeError(`Invalid delimiter ${JSON.stringify(delimiter)}`, { path: '$' });
  }
  return new Encoder(delimiter, options.maxDepth).run(value);
}
