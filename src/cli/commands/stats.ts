/**
 * Stats Command
 *
 * Compare baseline JSON with the compact form for one document.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { fromJson } from '../../ast.js';
import { DEFAULT_DELIMITER } from '../../literal.js';
import { DEFAULT_THRESHOLD, measureValue, type EncodingReport } from '../../smart.js';
import { exitWithError, parseDelimiter, parseJsonInput, parseThreshold, readInput } from '../io.js';

export interface StatsCommandOptions {
  delimiter: string;
  threshold: number;
  json?: boolean;
}

/** The report without the two texts, for printing. */
export function summarize(report: EncodingReport) {
  return {
    baselineCost: report.baselineCost,
    compactCost: report.compactCost,
    savingsPercent: Math.round(report.savings * 1000) / 10,
    threshold: report.threshold,
    chosen: report.chosen,
    roundTrip: report.roundTrip,
  };
}

export function runStats(input: string, source: string, options: StatsCommandOptions): EncodingReport {
  const value = fromJson(parseJsonInput(input, source));
  return measureValue(value, { delimiter: options.delimiter, threshold: options.threshold });
}

export const statsCommand = new Command('stats')
  .description('Show size savings of Deep-TOON over JSON (cost = characters)')
  .argument('[file]', 'JSON file to read (default: stdin)')
  .option('-d, --delimiter <char>', 'Table delimiter ("tab" for a tab)', parseDelimiter, DEFAULT_DELIMITER)
  .option('-t, --threshold <ratio>', 'Savings ratio needed to choose Deep-TOON', parseThreshold, DEFAULT_THRESHOLD)
  .option('--json', 'Print the report as JSON')
  .action(async (file: string | undefined, options: StatsCommandOptions) => {
    try {
      const input = await readInput(file);
      const summary = summarize(runStats(input, file ?? 'stdin', options));

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan('Deep-TOON Statistics'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log(chalk.dim('JSON:'), chalk.white(summary.baselineCost.toString()));
      console.log(chalk.dim('Deep-TOON:'), chalk.white(summary.compactCost.toString()));
      console.log(chalk.dim('Savings:'), chalk.white(`${summary.savingsPercent}%`));
      console.log(chalk.dim('Chosen:'), chalk.white(summary.chosen));
      console.log(
        chalk.dim('Round trip:'),
        summary.roundTrip ? chalk.green('ok') : chalk.red('FAILED')
      );
      console.log();
    } catch (error) {
      exitWithError(error);
    }
  });
