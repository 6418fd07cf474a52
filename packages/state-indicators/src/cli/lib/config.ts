/**
 * State Indicators CLI Configuration Management
 *
 * Loads configuration from .state-indicatorsrc (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (STATE_INDICATORS_*)
 * 3. Config file (.state-indicatorsrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import {
  DEFAULT_HEALTH_COLUMNS,
  HealthColumnMapSchema,
  type HealthColumnMap,
  type TextEncoding,
} from '../../ingestion/county-health/reader.js';
import { DEFAULT_DECIMALS } from '../../output/summary-table.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * County health table settings
 */
export interface HealthTableConfig {
  readonly columns: HealthColumnMap;
  readonly delimiter: string;
  readonly encoding: TextEncoding;
  readonly fipsAsNumber: boolean;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  readonly inputs: {
    readonly microdata: string | null;
    readonly health: string | null;
  };

  /** Output CSV path; null prints to stdout */
  readonly output: string | null;

  readonly health: HealthTableConfig;

  /** Decimal places for rounded float columns */
  readonly decimals: number;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Log as JSON lines */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    inputs: z
      .object({
        microdata: z.string().min(1).optional(),
        health: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    output: z.string().min(1).optional(),
    health: z
      .object({
        columns: HealthColumnMapSchema.partial().optional(),
        delimiter: z.string().length(1).optional(),
        encoding: z.enum(['latin1', 'utf8']).optional(),
        fips_as_number: z.boolean().optional(),
      })
      .strict()
      .optional(),
    decimals: z.number().int().min(0).max(10).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  inputs: {
    microdata: null,
    health: null,
  },
  output: null,
  health: {
    columns: DEFAULT_HEALTH_COLUMNS,
    delimiter: ',',
    encoding: 'latin1',
    fipsAsNumber: false,
  },
  decimals: DEFAULT_DECIMALS,
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.state-indicatorsrc',
  '.state-indicatorsrc.yaml',
  '.state-indicatorsrc.yml',
  '.state-indicatorsrc.json',
];

/**
 * Find config file in the start directory or any parent
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError on unreadable, unparseable or invalid content
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot parse config file ${filePath}: ${reason}`);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Get environment variable with prefix
 */
function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`STATE_INDICATORS_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvEncoding(env: Env): TextEncoding | undefined {
  const value = getEnvVar(env, 'ENCODING');
  if (value === undefined) return undefined;
  if (value === 'latin1' || value === 'utf8') return value;
  throw new ConfigError(`Invalid STATE_INDICATORS_ENCODING: ${value}. Must be latin1 or utf8`);
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to search upward from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    microdata?: string;
    health?: string;
    output?: string;
    decimals?: number;
    delimiter?: string;
    encoding?: TextEncoding;
    fipsAsNumber?: boolean;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when an explicit config file is missing or any layer is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    inputs: {
      microdata:
        overrides.microdata ??
        getEnvVar(env, 'MICRODATA') ??
        fileConfig.inputs?.microdata ??
        DEFAULT_CONFIG.inputs.microdata,
      health:
        overrides.health ??
        getEnvVar(env, 'HEALTH') ??
        fileConfig.inputs?.health ??
        DEFAULT_CONFIG.inputs.health,
    },

    output:
      overrides.output ?? getEnvVar(env, 'OUTPUT') ?? fileConfig.output ?? DEFAULT_CONFIG.output,

    health: {
      columns: { ...DEFAULT_CONFIG.health.columns, ...fileConfig.health?.columns },
      delimiter:
        overrides.delimiter ??
        getEnvVar(env, 'DELIMITER') ??
        fileConfig.health?.delimiter ??
        DEFAULT_CONFIG.health.delimiter,
      encoding:
        overrides.encoding ??
        getEnvEncoding(env) ??
        fileConfig.health?.encoding ??
        DEFAULT_CONFIG.health.encoding,
      fipsAsNumber:
        overrides.fipsAsNumber ??
        getEnvBool(env, 'FIPS_AS_NUMBER') ??
        fileConfig.health?.fips_as_number ??
        DEFAULT_CONFIG.health.fipsAsNumber,
    },

    decimals:
      overrides.decimals ??
      getEnvNumber(env, 'DECIMALS') ??
      fileConfig.decimals ??
      DEFAULT_CONFIG.decimals,

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate merged configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  const issues: string[] = [];

  if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 10) {
    issues.push(`decimals must be an integer between 0 and 10 (got ${config.decimals})`);
  }
  if (config.health.delimiter.length !== 1) {
    issues.push(`delimiter must be a single character (got "${config.health.delimiter}")`);
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }
}
