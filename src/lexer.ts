/**
 * Deep-TOON line lexer. Splits text into lines tagged with indentation depth
 * and source position; structure is carried by indentation alone.
 */

import type { SourcePosition } from './ast.js';
import { DeepToonDecodeError } from './errors.js';

/** Spaces per nesting level */
export const INDENT_WIDTH = 2;

export interface Line {
  /** Nesting depth (indentation / INDENT_WIDTH) */
  depth: number;
  /** Text after the indentation, trailing whitespace removed */
  content: string;
  /** Position of the first content character */
  start: SourcePosition;
}

export interface LexerOptions {
  /** Max input length in characters (default 10_000_000) */
  maxInputLength?: number;
}

export const DEFAULT_MAX_INPUT_LENGTH = 10_000_000;

function pos(line: number, column: number, offset: number): SourcePosition {
  return { line, column, offset };
}

export function tokenize(input: string, options: LexerOptions = {}): Line[] {
  const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (input.length > maxLen) {
    throw new DeepToonDecodeError(
      'SyntaxError',
      `Input exceeds maximum length (${input.length} > ${maxLen})`,
      { position: pos(1, 1, 0) }
    );
  }

  const text = input.replace(/\r\n?/g, '\n');
  const lines: Line[] = [];
  let offset = 0;
  let lineNo = 0;

  for (const raw of text.split('\n')) {
    lineNo++;
    const lineOffset = offset;
    offset += raw.length + 1;

    const content = raw.trimEnd();
    if (content.trim().length === 0) continue;

    let indent = 0;
    while (content[indent] === ' ') indent++;
    if (content[indent] === '\t') {
      throw new DeepToonDecodeError('IndentationError', 'Tab character in indentation', {
        position: pos(lineNo, indent + 1, lineOffset + indent),
      });
    }
    if (indent % INDENT_WIDTH !== 0) {
      throw new DeepToonDecodeError(
        'IndentationError',
        `Indentation of ${indent} spaces is not a multiple of ${INDENT_WIDTH}`,
        { position: pos(lineNo, 1, lineOffset) }
      );
    }

    lines.push({
      depth: indent / INDENT_WIDTH,
      content: content.slice(indent),
      start: pos(lineNo, indent + 1, lineOffset + indent),
    });
  }

  return lines;
}
