/**
 * Structured logging for Chunkwise
 *
 * Loggers are plain objects injected into the engine, so tests can capture
 * entries and production code can route them anywhere.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@chunkwise/core';
 *
 * const logger = createConsoleLogger({ format: 'json', minLevel: 'info' });
 * const queryLogger = withContext(logger, { queryId: 'q-1' });
 *
 * queryLogger.info('Query executed', { route: 'chunked', partitions: 12, durationMs: 41 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible values allowed in log context.
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
  /** Operation being performed (execute, plan, merge, ...) */
  operation?: string;
  /** Execution route chosen for the query */
  route?: string;
  /** Partition sequence position */
  chunkIndex?: number;
  /** Number of partitions in the plan */
  partitions?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Number of source elements read */
  rowsProcessed?: number;
  /** Number of bytes considered */
  bytesProcessed?: number;
  /** Error code for error logs */
  errorCode?: string;
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
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for emitted entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one structured line per entry, 'pretty' for humans */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps every entry for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Levels
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Logger Factories
// =============================================================================

/**
 * Create a logger that hands each entry at or above `minLevel` to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? ((): void => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }
    output(entry);
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
  };
}

/**
 * Render an entry the way the console logger prints it.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: { name: entry.error.name, message: entry.error.message },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }
  return line;
}

/**
 * Create a logger that writes to the console.
 *
 * Warnings and errors go to stderr, everything else to stdout.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (LogLevels.isAtLeast(entry.level, 'warn')) {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

/**
 * Logger that discards everything.
 */
export function createNoopLogger(): Logger {
  return createLogger({ minLevel: 'error', output: () => {} });
}

/**
 * Create a logger that captures entries in memory.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * await engine.execute(expr, source);
 * expect(logger.getLogsByLevel('info')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: Omit<LoggerConfig, 'output'> = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({ ...config, output: (entry) => logs.push(entry) });

  return {
    ...logger,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter(entry => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Loggers
// =============================================================================

/**
 * Wrap a logger so every entry carries `context`, merged under the local one.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug: (message, local) => logger.debug(message, merge(local)),
    info: (message, local) => logger.info(message, merge(local)),
    warn: (message, local) => logger.warn(message, merge(local)),
    error: (message, error, local) => logger.error(message, error, merge(local)),
  };
}
