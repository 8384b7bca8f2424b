// @lsmgen/core
// Shared data model, errors and logging types for the manifest fixture generator

// =============================================================================
// Data Model
// =============================================================================

export {
  partitionKeyId,
  samePartition,
  ValueKinds,
  type FieldValue,
  type FieldType,
  type PartitionField,
  type PartitionType,
  type PartitionKey,
  type ValueKind,
  type KeyValue,
  type DataFileMeta,
  type DataFile,
  type RawFileSupplier,
  type ManifestEntry,
  type FieldStats,
  type ManifestFileMeta,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

export {
  LEVEL_CAPACITY,
  NEW_FILE_LEVEL,
  DEFAULT_NUM_BUCKETS,
  DEFAULT_MEM_TABLE_CAPACITY,
  DEFAULT_SIZE_PER_ENTRY,
  MANIFEST_FILE_PREFIX,
} from './constants.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  LsmGenError,
  ValidationError,
  ContractViolationError,
  ConfigurationError,
  hasErrorCode,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging Types (implementations in @lsmgen/observability)
// =============================================================================

export {
  LOG_LEVELS,
  LOG_FORMATS,
  isLogLevel,
  isLogFormat,
  isLevelEnabled,
} from './logging-types.js';

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
} from './logging-types.js';
