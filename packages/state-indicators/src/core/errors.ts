/**
 * State Indicators Error Types
 *
 * Only conditions that stop a run are modeled as errors. Bad fields, bad
 * keys and empty joins are recovered inside the pipeline and surface as
 * diagnostics instead.
 */

/**
 * Error codes for programmatic handling
 */
export type StateIndicatorsErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MISSING_COLUMN'
  | 'CONFIG_INVALID';

/**
 * Base class for fatal pipeline errors
 */
export class StateIndicatorsError extends Error {
  constructor(
    message: string,
    public readonly code: StateIndicatorsErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StateIndicatorsError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Input file missing, unreadable, or failing to decompress.
 *
 * These are batch preconditions. Nothing retries them.
 */
export class SourceUnavailableError extends StateIndicatorsError {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot read source ${path}: ${reason}`, 'SOURCE_UNAVAILABLE', { cause });
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Delimited table lacks one or more required columns
 */
export class MissingColumnError extends StateIndicatorsError {
  constructor(
    public readonly missing: readonly { field: string; header: string }[],
    public readonly availableHeaders: readonly string[]
  ) {
    const list = missing.map((m) => `${m.field} ("${m.header}")`).join(', ');
    super(
      `Required column(s) not found: ${list}. Available headers: ${availableHeaders.join(', ')}`,
      'MISSING_COLUMN'
    );
    this.name = 'MissingColumnError';
  }
}

/**
 * Configuration file or flag values failed validation
 */
export class ConfigError extends StateIndicatorsError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}
