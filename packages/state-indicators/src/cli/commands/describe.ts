/**
 * Describe Command
 *
 * Microdata-only summary: education mean, insured rate and person count per
 * state.
 *
 * Usage:
 *   state-indicators describe --microdata <file> [--output <file>] [--decimals <n>]
 */

import type { Command } from 'commander';
import { runDescribe } from '../../pipeline/run-pipeline.js';
import { DESCRIPTIVE_COLUMNS } from '../../output/summary-table.js';
import {
  EXIT_CODES,
  emitRows,
  parseIntegerOption,
  requireInputPath,
  type CommandContext,
  type ContextFactory,
  type ExitCode,
} from '../lib/context.js';

interface DescribeOptions {
  readonly microdata?: string;
  readonly output?: string;
  readonly decimals?: number;
}

export function registerDescribeCommand(program: Command, createContext: ContextFactory): void {
  program
    .command('describe')
    .description('Per-state education and insurance summary from microdata alone')
    .option('--microdata <file>', 'Fixed-width microdata file (.gz accepted)')
    .option('-o, --output <file>', 'Write CSV to file instead of printing')
    .option('--decimals <n>', 'Decimal places for rounded values', parseIntegerOption)
    .action(async (options: DescribeOptions) => {
      const context = createContext({
        microdata: options.microdata,
        output: options.output,
        decimals: options.decimals,
      });
      process.exitCode = await executeDescribe(context);
    });
}

export async function executeDescribe(context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  const microdata = requireInputPath(config.inputs.microdata, 'microdata');

  const result = await runDescribe({
    strategy: 'describe',
    microdata,
    decimals: config.decimals,
    logger,
  });

  await emitRows(context, result.rows, DESCRIPTIVE_COLUMNS);
  logger.debug('Diagnostics', result.diagnostics);

  return EXIT_CODES.SUCCESS;
}
