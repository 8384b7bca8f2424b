/**
 * @lsmgen/observability
 *
 * Logger implementations for the manifest fixture generator. The core
 * package only exports the Logger types.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, createTestLogger } from '@lsmgen/observability';
 *
 * const logger = createConsoleLogger({ format: 'json' });
 * logger.info('manifest generated', { entriesBuffered: 3 });
 * ```
 */

// Re-export logging types from core
export type {
  Logger,
  LogLevel,
  LogFormat,
  LogEntry,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
  LogContext,
  LogContextValue,
} from '@lsmgen/core';

export {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
} from './logging.js';
