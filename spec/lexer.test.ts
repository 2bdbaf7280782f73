import { describe, expect, it } from 'vitest';
import { DeepToonDecodeError } from '../src/errors.js';
import { tokenize, type LexerOptions } from '../src/lexer.js';

function lexError(text: string, options: LexerOptions = {}): DeepToonDecodeError {
  try {
    tokenize(text, options);
  } catch (err) {
    if (err instanceof DeepToonDecodeError) return err;
    throw err;
  }
  throw new Error('expected tokenize to fail');
}

describe('tokenize', () => {
  it('records depth, content and position, skipping blank lines', () => {
    const lines = tokenize('a: 1\r\n\r\n  b: 2\n');
    expect(lines).toEqual([
      { depth: 0, content: 'a: 1', start: { line: 1, column: 1, offset: 0 } },
      { depth: 1, content: 'b: 2', start: { line: 3, column: 3, offset: 8 } },
    ]);
  });

  it('drops trailing whitespace', () => {
    expect(tokenize('a: 1   ')[0]?.content).toBe('a: 1');
  });

  it('treats a lone carriage return as a line break', () => {
    expect(tokenize('a: 1\rb: 2').map((l) => l.content)).toEqual(['a: 1', 'b: 2']);
  });

  it('returns no lines for whitespace-only input', () => {
    expect(tokenize('  \n\n')).toEqual([]);
  });

  it('rejects indentation that is not a multiple of two spaces', () => {
    const err = lexError('a:\n   b: 1');
    expect(err.kind).toBe('IndentationError');
    expect(err.position?.line).toBe(2);
  });

  it('rejects tabs in indentation', () => {
    expect(lexError('\ta: 1').kind).toBe('IndentationError');
  });

  it('enforces the input length limit', () => {
    const err = lexError('abc', { maxInputLength: 2 });
    expect(err.kind).toBe('SyntaxError');
    expect(err.message).toBe('Input exceeds maximum length (3 > 2)');
  });
});
