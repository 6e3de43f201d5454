/**
 * Structured logging.
 *
 * The library logs through a single replaceable `Logger`. By default that is
 * a console logger whose level and format come from `getConfig()`.
 *
 * @example
 * ```ts
 * import { createTestLogger, setLogger } from 'scrubline';
 *
 * const logger = createTestLogger();
 * setLogger(logger);
 * stream(table).filter(predicate).count();
 * logger.getLogsByLevel('warn');
 * ```
 */

import { getConfig } from './config';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

/**
 * JSON-compatible values allowed in a log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to a log entry.
 */
export interface LogContext {
  /** Operator or component emitting the entry */
  operator?: string;
  /** Rows read or processed */
  rows?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** File involved in the operation */
  path?: string;
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Receives every entry at or above `minLevel` */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  format?: LogFormat;
}

/**
 * Logger that keeps its entries for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger that hands entries to a custom output function.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!isLevelEnabled(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  ${entry.error.name}: ${entry.error.message}`;
  }

  return output;
}

/**
 * Create a logger writing to stderr, so log lines never mix with data
 * written to stdout.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'pretty';
  return createLogger({
    ...config,
    output: (entry) => {
      console.error(formatLogEntry(entry, format));
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter((entry) => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a logger that adds `context` to every entry.
 * Context given at log time wins over the bound context.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug(message: string, local?: LogContext): void {
      logger.debug(message, merge(local));
    },
    info(message: string, local?: LogContext): void {
      logger.info(message, merge(local));
    },
    warn(message: string, local?: LogContext): void {
      logger.warn(message, merge(local));
    },
    error(message: string, error?: Error, local?: LogContext): void {
      logger.error(message, error, merge(local));
    },
  };
}

// =============================================================================
// Library Logger
// =============================================================================

let installedLogger: Logger | null = null;

/**
 * Replace the logger used by the library. Pass `null` to go back to the
 * console logger built from the current configuration.
 */
export function setLogger(logger: Logger | null): void {
  installedLogger = logger;
}

/**
 * Logger used by the library. Without an installed logger this is a console
 * logger reflecting the configuration at the time of the call.
 */
export function getLogger(): Logger {
  if (installedLogger) return installedLogger;
  const { logLevel, logFormat } = getConfig();
  return createConsoleLogger({ minLevel: logLevel, format: logFormat });
}
