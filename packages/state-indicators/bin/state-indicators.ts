#!/usr/bin/env tsx
/**
 * State Indicators CLI Entry Point
 *
 * @module state-indicators-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { loadConfig } from '../src/cli/lib/config.js';
import {
  EXIT_CODES,
  exitCodeForError,
  type CommandContext,
  type ContextFactory,
} from '../src/cli/lib/context.js';
import { ConfigError } from '../src/core/errors.js';
import { createLogger } from '../src/core/utils/logger.js';

// ============================================================================
// CLI Setup
// ============================================================================

type GlobalOptions = {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
};

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  const createContext: ContextFactory = (overrides): CommandContext => {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig({
      configPath: globals.config,
      overrides: { ...overrides, verbose: globals.verbose, json: globals.json },
    });
    const logger = createLogger({
      module: 'cli',
      level: config.verbose ? 'debug' : 'warn',
      json: config.json,
      stderrOnly: true,
    });
    if (config.configPath) {
      logger.debug('Loaded config file', { path: config.configPath });
    }
    return { config, logger, write: (text) => process.stdout.write(text) };
  };

  program
    .name('state-indicators')
    .description('State-level education, insurance and homicide-rate summaries')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .state-indicatorsrc)');

  registerCommands(program, createContext);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const prefix = error instanceof ConfigError ? 'Configuration error' : 'Error';
    console.error(`${prefix}: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = exitCodeForError(error);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
