/**
 * Structured logging utility for State Indicators
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: JSON lines in production, one readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel | 'silent';
  readonly service: string;
  readonly pretty: boolean;
  /** Send every level to stderr, leaving stdout for command output */
  readonly stderrOnly?: boolean;
}

const LEVELS: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  private emit(level: LogLevel, line: string): void {
    if (this.config.stderrOnly) {
      console.error(line);
      return;
    }
    console[level](line);
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    this.emit('debug', this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    this.emit('info', this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    this.emit('warn', this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    this.emit('error', this.formatMessage('error', message, metadata));
  }

  /**
   * Logger for a sub-module, sharing level and format
   */
  child(module: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${module}` });
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

// Default logger instance
export const logger = new Logger({
  level: getLogLevel(),
  service: 'state-indicators',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a logger with module context
 */
export function createLogger(
  context: LogMetadata & { level?: LogLevel; json?: boolean; stderrOnly?: boolean }
): Logger {
  return new Logger({
    level: context.level ?? getLogLevel(),
    service: `state-indicators:${String(context.module ?? 'unknown')}`,
    pretty: context.json === undefined ? process.env.NODE_ENV !== 'production' : !context.json,
    stderrOnly: context.stderrOnly,
  });
}

/**
 * Logger that drops everything (tests, library callers without output)
 */
export const silentLogger = new Logger({
  level: 'silent',
  service: 'state-indicators',
  pretty: true,
});
