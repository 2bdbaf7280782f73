/**
 * Input helpers shared by the CLI commands.
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { JsonValue } from '../ast.js';
import { DeepToonError } from '../errors.js';

/** Read a file, or stdin when no file (or "-") is given. */
export async function readInput(file?: string): Promise<string> {
  if (file && file !== '-') return readFile(file, 'utf8');
  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) text += String(chunk);
  return text;
}

export function parseJsonInput(text: string, source: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Accepts a literal character, or "tab" / "\t" for a tab. */
export function parseDelimiter(value: string): string {
  if (value === 'tab' || value === '\\t') return '\t';
  return value;
}

export function parseThreshold(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Threshold must be a number.');
  return n;
}

export function parseIndent(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Indent must be a non-negative integer.');
  return n;
}

/** Print the failure to stderr and exit with status 1. */
export function exitWithError(error: unknown): never {
  if (error instanceof DeepToonError) {
    console.error(chalk.red(`${error.name}: ${error.toString()}`));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  process.exit(1);
}
