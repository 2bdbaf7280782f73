/**
 * Decode Command
 *
 * Deep-TOON in, JSON out, keys in their encoded order.
 */

import { Command } from 'commander';
import { decodeValue } from '../../decoder.js';
import { stringify } from '../../stringify.js';
import { exitWithError, parseIndent, readInput } from '../io.js';

export interface DecodeCommandOptions {
  indent: number;
}

export function runDecode(input: string, options: DecodeCommandOptions): string {
  return stringify(decodeValue(input), { indent: ' '.repeat(options.indent) });
}

export const decodeCommand = new Command('decode')
  .description('Decode Deep-TOON to JSON')
  .argument('[file]', 'Deep-TOON file to read (default: stdin)')
  .option('-i, --indent <n>', 'Spaces of JSON indentation, 0 for a single line', parseIndent, 2)
  .action(async (file: string | undefined, options: DecodeCommandOptions) => {
    try {
      const input = await readInput(file);
      console.log(runDecode(input, options));
    } catch (error) {
      exitWithError(error);
    }
  });
