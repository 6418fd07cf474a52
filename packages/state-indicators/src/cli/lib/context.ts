/**
 * CLI Command Context
 *
 * Exit codes, the per-invocation context handed to every command, and the
 * shared table emitter (stdout or atomic CSV file).
 *
 * @module cli/lib/context
 */

import { InvalidArgumentError } from 'commander';
import { ConfigError, StateIndicatorsError } from '../../core/errors.js';
import type { Logger } from '../../core/utils/logger.js';
import { atomicWriteFile } from '../../output/atomic-write.js';
import { formatCsv, formatOutput, type TableColumn } from '../../output/tabular.js';
import type { CLIConfig, LoadConfigOptions } from './config.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_SOURCE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown error to the process exit code
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof StateIndicatorsError) return EXIT_CODES.DATA_SOURCE_ERROR;
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Context
// ============================================================================

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: Logger;
  /** Destination for table output when no output file is configured */
  readonly write: (text: string) => void;
}

/**
 * Input path from flags or configuration
 *
 * @throws ConfigError when neither supplies it
 */
export function requireInputPath(value: string | null, flag: string): string {
  if (value === null) {
    throw new ConfigError(`Missing input: pass --${flag} <file> or set it in the config file`);
  }
  return value;
}

/**
 * Write rows as CSV to the configured output file, or print them
 */
export async function emitRows<Row>(
  context: CommandContext,
  rows: readonly Row[],
  columns: readonly TableColumn<Row>[]
): Promise<void> {
  const { config, logger } = context;

  if (config.output !== null) {
    await atomicWriteFile(config.output, formatCsv(rows, columns));
    logger.info('Table written', { path: config.output, rows: rows.length });
    return;
  }

  context.write(`${formatOutput(rows, config.json ? 'json' : 'table', columns)}\n`);
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Commander argument parser for integer options
 */
export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

/**
 * Builds the context for one command invocation from that command's flags
 */
export type ContextFactory = (overrides: NonNullable<LoadConfigOptions['overrides']>) => CommandContext;
