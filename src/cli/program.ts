import { Command } from 'commander';
import { decodeCommand } from './commands/decode.js';
import { encodeCommand } from './commands/encode.js';
import { statsCommand } from './commands/stats.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('deep-toon')
    .description('Deep-TOON - compact JSON for LLM prompts')
    .version('0.2.0');

  program.addCommand(encodeCommand);
  program.addCommand(decodeCommand);
  program.addCommand(statsCommand);

  return program;
}
