/**
 * Typed exception classes for the manifest fixture generator
 *
 * Error hierarchy:
 * - LsmGenError: Base error class for all generator errors
 *   - ValidationError: Caller misuse (empty batches, malformed arguments)
 *   - ContractViolationError: A collaborator broke its contract
 *     (raw file supplier returned mis-tagged or empty results)
 *   - ConfigurationError: Invalid generator configuration
 *
 * None of these are retryable: the generator is synchronous and
 * deterministic given its inputs, so every failure is a programming error.
 *
 * @example
 * ```typescript
 * import { ValidationError, ContractViolationError, ErrorCode } from '@lsmgen/core';
 *
 * try {
 *   summarize([]);
 * } catch (error) {
 *   if (error instanceof ValidationError && error.code === ErrorCode.EMPTY_INPUT) {
 *     logger.warn(error.message, { code: error.code });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Precondition violations
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  EMPTY_INPUT = 'EMPTY_INPUT',
  OUT_OF_RANGE = 'OUT_OF_RANGE',

  // Collaborator contract violations
  CONTRACT_VIOLATION = 'CONTRACT_VIOLATION',
  UNKNOWN_PARTITION = 'UNKNOWN_PARTITION',
  EMPTY_MERGE_RESULT = 'EMPTY_MERGE_RESULT',
  RECORD_COUNT_MISMATCH = 'RECORD_COUNT_MISMATCH',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all generator errors
 *
 * Carries a `code` for programmatic identification, optional structured
 * `details` and an optional `suggestion` for the test author.
 */
export class LsmGenError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (expected/actual values, bucket, level, ...)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'LsmGenError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, LsmGenError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when a caller violates a precondition
 *
 * @example
 * ```typescript
 * throw ValidationError.emptyInput('summarize');
 * throw ValidationError.outOfRange('numBuckets', 0, { min: 1 });
 * ```
 */
export class ValidationError extends LsmGenError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  /**
   * Create an "empty input" error for operations that need at least one element
   */
  static emptyInput(operation: string): ValidationError {
    return new ValidationError(
      'Manifest entries are empty. Invalid test data.',
      ErrorCode.EMPTY_INPUT,
      { operation },
      'Collect at least one manifest entry before building a manifest file meta'
    );
  }

  /**
   * Create an out-of-range error for a numeric argument
   */
  static outOfRange(
    field: string,
    value: number,
    bounds: { min?: number; max?: number }
  ): ValidationError {
    const range = `[${bounds.min ?? '-inf'}, ${bounds.max ?? 'inf'}]`;
    return new ValidationError(
      `Value ${value} for "${field}" is outside ${range}`,
      ErrorCode.OUT_OF_RANGE,
      { field, value, ...bounds }
    );
  }
}

// =============================================================================
// Contract Violations
// =============================================================================

/**
 * Error thrown when a collaborator returns data that breaks its contract
 *
 * The generator fails fast instead of recording inconsistent level state.
 *
 * @example
 * ```typescript
 * throw ContractViolationError.mismatch('level', 0, file.level, { operation: 'produceNewFile' });
 * throw ContractViolationError.emptyMerge(1, 'p=1', 0);
 * ```
 */
export class ContractViolationError extends LsmGenError {
  constructor(
    message: string,
    code: string = ErrorCode.CONTRACT_VIOLATION,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ContractViolationError';
    captureStackTrace(this, ContractViolationError);
  }

  /**
   * Create an error for a file attribute that differs from the requested one
   */
  static mismatch(
    attribute: string,
    expected: unknown,
    actual: unknown,
    details?: Record<string, unknown>
  ): ContractViolationError {
    return new ContractViolationError(
      `Raw file supplier returned a file with ${attribute} ${JSON.stringify(actual)}, expected ${JSON.stringify(expected)}`,
      ErrorCode.CONTRACT_VIOLATION,
      { attribute, expected, actual, ...details }
    );
  }

  /**
   * Create an error for a merge that produced no files
   */
  static emptyMerge(level: number, partition: string, bucket: number): ContractViolationError {
    return new ContractViolationError(
      `Raw file supplier returned no files when merging into level ${level}`,
      ErrorCode.EMPTY_MERGE_RESULT,
      { operation: 'mergeRecords', level, partition, bucket },
      'mergeRecords must return at least one file holding all merged records'
    );
  }

  /**
   * Create an error for a merge whose files do not hold every input record
   */
  static recordCountMismatch(
    expected: number,
    actual: number,
    details?: Record<string, unknown>
  ): ContractViolationError {
    return new ContractViolationError(
      `Merged files hold ${actual} records, expected ${expected}`,
      ErrorCode.RECORD_COUNT_MISMATCH,
      { operation: 'mergeRecords', expected, actual, ...details }
    );
  }

  /**
   * Create an error for a lookup of a (bucket, partition) that was never recorded
   */
  static unknownPartition(bucket: number, partition: string): ContractViolationError {
    return new ContractViolationError(
      `No levels recorded for partition ${partition} in bucket ${bucket}`,
      ErrorCode.UNKNOWN_PARTITION,
      { bucket, partition }
    );
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when the generator configuration is invalid
 */
export class ConfigurationError extends LsmGenError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, ErrorCode.INVALID_CONFIG, details, suggestion);
    this.name = 'ConfigurationError';
    captureStackTrace(this, ConfigurationError);
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Check if an error is an LsmGenError with a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return error instanceof LsmGenError && error.code === code;
}
