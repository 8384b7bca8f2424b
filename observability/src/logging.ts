/**
 * Structured Logging
 *
 * Logger implementations for the generator:
 * - Console output (json or pretty)
 * - Injectable test loggers that capture entries for assertions
 * - Child loggers carrying fixed context
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@lsmgen/observability';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const genLogger = withContext(logger, { service: 'manifest-generator' });
 * genLogger.info('generated', { entriesBuffered: 4 });
 * ```
 */

import {
  isLevelEnabled,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogFormat,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from '@lsmgen/core';

type Sink = (level: LogLevel, message: string, context?: LogContext, error?: Error) => void;

/** Adapt a single sink function to the Logger interface */
function toLogger(sink: Sink): Logger {
  return {
    debug: (message, context) => sink('debug', message, context),
    info: (message, context) => sink('info', message, context),
    warn: (message, context) => sink('warn', message, context),
    error: (message, error, context) => sink('error', message, context, error),
  };
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger that hands entries at or above `minLevel` to `output`
 *
 * @example
 * ```typescript
 * const entries: LogEntry[] = [];
 * const logger = createLogger({ minLevel: 'info', output: (e) => entries.push(e) });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const { minLevel = 'debug', output } = config;

  return toLogger((level, message, context, error) => {
    if (!output || !isLevelEnabled(level, minLevel)) return;
    output({
      level,
      message,
      timestamp: Date.now(),
      ...(context !== undefined && { context }),
      ...(error !== undefined && { error }),
    });
  });
}

/**
 * Render an entry as one JSON line or one human-readable line
 */
export function formatLogEntry(entry: LogEntry, format: LogFormat = 'json'): string {
  const { level, message, timestamp, context, error } = entry;

  if (format === 'json') {
    return JSON.stringify({
      level,
      message,
      timestamp,
      ...(context && { context }),
      ...(error && { error: { name: error.name, message: error.message, stack: error.stack } }),
    });
  }

  const parts = [`[${new Date(timestamp).toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}`];
  if (context) {
    parts[0] += ` ${JSON.stringify(context)}`;
  }
  if (error) {
    parts.push(`Error: ${error.message}`);
    if (error.stack) parts.push(error.stack);
  }
  return parts.join('\n  ');
}

/**
 * Create a logger that prints formatted entries with console.log
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const { format = 'json', minLevel } = config;
  return createLogger({
    minLevel,
    output: (entry) => console.log(formatLogEntry(entry, format)),
  });
}

/**
 * Create a logger that discards everything
 */
export function createNoopLogger(): Logger {
  return toLogger(() => {});
}

/**
 * Create a logger that keeps its entries for assertions
 *
 * @example
 * ```typescript
 * const testLogger = createTestLogger();
 * const gen = ManifestTestDataGenerator.builder().logger(testLogger).build();
 * gen.next();
 * expect(testLogger.getLogsByLevel('debug')).not.toHaveLength(0);
 * ```
 */
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
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter(entry => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger whose fixed context sits under per-call context
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  return toLogger((level, message, local, error) => {
    const merged = local === undefined ? context : { ...context, ...local };
    if (level === 'error') {
      logger.error(message, error, merged);
    } else {
      logger[level](message, merged);
    }
  });
}
