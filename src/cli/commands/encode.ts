/**
 * Encode Command
 *
 * JSON in, Deep-TOON out. With --smart, falls back to JSON when the savings
 * are below the threshold.
 */

import { Command } from 'commander';
import { fromJson } from '../../ast.js';
import { encodeValue } from '../../encoder.js';
import { DEFAULT_DELIMITER } from '../../literal.js';
import { DEFAULT_THRESHOLD, smartEncodeValue } from '../../smart.js';
import { exitWithError, parseDelimiter, parseJsonInput, parseThreshold, readInput } from '../io.js';

export interface EncodeCommandOptions {
  delimiter: string;
  smart?: boolean;
  threshold: number;
}

export function runEncode(input: string, source: string, options: EncodeCommandOptions): string {
  const value = fromJson(parseJsonInput(input, source));
  if (options.smart) {
    return smartEncodeValue(value, { delimiter: options.delimiter, threshold: options.threshold });
  }
  return encodeValue(value, { delimiter: options.delimiter });
}

export const encodeCommand = new Command('encode')
  .description('Encode JSON to Deep-TOON')
  .argument('[file]', 'JSON file to read (default: stdin)')
  .option('-d, --delimiter <char>', 'Table delimiter ("tab" for a tab)', parseDelimiter, DEFAULT_DELIMITER)
  .option('--smart', 'Emit JSON instead when the savings are below the threshold')
  .option('-t, --threshold <ratio>', 'Minimum savings ratio for --smart', parseThreshold, DEFAULT_THRESHOLD)
  .action(async (file: string | undefined, options: EncodeCommandOptions) => {
    try {
      const input = await readInput(file);
      console.log(runEncode(input, file ?? 'stdin', options));
    } catch (error) {
      exitWithError(error);
    }
  });
