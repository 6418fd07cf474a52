/**
 * Summarize Command
 *
 * Per-state education, insurance and homicide-rate table.
 *
 * Usage:
 *   state-indicators summarize --microdata <file> --health <file> [options]
 *
 * Options:
 *   --output <file>       Write CSV here instead of printing
 *   --decimals <n>        Decimal places (default: 4)
 *   --delimiter <char>    County table delimiter (default: ,)
 *   --encoding <name>     County table encoding: latin1|utf8 (default: latin1)
 *   --fips-as-number      Treat county FIPS cells as numbers (restores zero padding)
 *
 * Exit code 1 when the join fell back to a left join.
 */

import { Option, type Command } from 'commander';
import { runHealthJoin } from '../../pipeline/run-pipeline.js';
import { SUMMARY_COLUMNS } from '../../output/summary-table.js';
import type { TextEncoding } from '../../ingestion/county-health/reader.js';
import {
  EXIT_CODES,
  emitRows,
  parseIntegerOption,
  requireInputPath,
  type CommandContext,
  type ContextFactory,
  type ExitCode,
} from '../lib/context.js';

/**
 * Summarize options from CLI
 */
interface SummarizeOptions {
  readonly microdata?: string;
  readonly health?: string;
  readonly output?: string;
  readonly decimals?: number;
  readonly delimiter?: string;
  readonly encoding?: TextEncoding;
  readonly fipsAsNumber?: boolean;
}

/**
 * Register the summarize command
 */
export function registerSummarizeCommand(program: Command, createContext: ContextFactory): void {
  program
    .command('summarize')
    .description('Join microdata state means with county homicide rates')
    .option('--microdata <file>', 'Fixed-width microdata file (.gz accepted)')
    .option('--health <file>', 'Delimited county health table')
    .option('-o, --output <file>', 'Write CSV to file instead of printing')
    .option('--decimals <n>', 'Decimal places for rounded values', parseIntegerOption)
    .option('--delimiter <char>', 'County table delimiter')
    .addOption(
      new Option('--encoding <name>', 'County table text encoding').choices(['latin1', 'utf8'])
    )
    .option('--fips-as-number', 'Treat county FIPS cells as numbers')
    .action(async (options: SummarizeOptions) => {
      const context = createContext({
        microdata: options.microdata,
        health: options.health,
        output: options.output,
        decimals: options.decimals,
        delimiter: options.delimiter,
        encoding: options.encoding,
        fipsAsNumber: options.fipsAsNumber,
      });
      process.exitCode = await executeSummarize(context);
    });
}

/**
 * Execute the summarize command
 */
export async function executeSummarize(context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  const microdata = requireInputPath(config.inputs.microdata, 'microdata');
  const health = requireInputPath(config.inputs.health, 'health');

  const result = await runHealthJoin({
    strategy: 'health-join',
    microdata,
    health: { path: health },
    healthOptions: {
      columns: config.health.columns,
      delimiter: config.health.delimiter,
      encoding: config.health.encoding,
      fipsAsNumber: config.health.fipsAsNumber,
    },
    decimals: config.decimals,
    logger,
  });

  await emitRows(context, result.rows, SUMMARY_COLUMNS);
  logger.debug('Diagnostics', result.diagnostics);

  return result.diagnostics.join.degraded ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}
