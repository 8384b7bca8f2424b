/**
 * @lsmgen/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import {
  ConfigurationError,
  LOG_FORMATS,
  LOG_LEVELS,
  isLogFormat,
  isLogLevel,
} from '@lsmgen/core';
import type {
  LsmGenConfig,
  ValidationResult,
  ConfigValidationError,
  ConfigValidationWarning,
} from './types.js';

/** Above this many buckets per-bucket state preallocation becomes noticeable */
const LARGE_BUCKET_COUNT = 1024;

/**
 * Validate a complete LsmGenConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: LsmGenConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateGeneratorSettings(config.generator, errors, warnings);
  validateSummaryConfig(config.summary, errors, warnings);
  validateObservabilityConfig(config.observability, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate a configuration and throw a ConfigurationError listing every
 * problem when it is invalid.
 */
export function assertValidConfig(config: LsmGenConfig): LsmGenConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    const paths = result.errors.map(e => e.path).join(', ');
    throw new ConfigurationError(
      `Invalid configuration: ${paths}`,
      { errors: result.errors },
      result.errors[0].suggestion
    );
  }
  return config;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function validateGeneratorSettings(
  generator: LsmGenConfig['generator'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isPositiveInteger(generator.numBuckets)) {
    errors.push({
      path: 'generator.numBuckets',
      message: 'Number of buckets must be a positive integer',
      value: generator.numBuckets,
      suggestion: 'Use at least 1 bucket',
    });
  } else if (generator.numBuckets > LARGE_BUCKET_COUNT) {
    warnings.push({
      path: 'generator.numBuckets',
      message: `More than ${LARGE_BUCKET_COUNT} buckets preallocates a large level table`,
      value: generator.numBuckets,
      recommendation: 'Fixtures rarely need more than a handful of buckets',
    });
  }

  if (!isPositiveInteger(generator.memTableCapacity)) {
    errors.push({
      path: 'generator.memTableCapacity',
      message: 'Mem table capacity must be a positive integer',
      value: generator.memTableCapacity,
      suggestion: 'Use at least 1 record per level-0 file',
    });
  }

  if (generator.seed !== null && !Number.isSafeInteger(generator.seed)) {
    errors.push({
      path: 'generator.seed',
      message: 'Seed must be a safe integer or null',
      value: generator.seed,
    });
  }
}

function validateSummaryConfig(
  summary: LsmGenConfig['summary'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!Number.isFinite(summary.sizePerEntry) || summary.sizePerEntry < 0) {
    errors.push({
      path: 'summary.sizePerEntry',
      message: 'Size per entry must be a non-negative number',
      value: summary.sizePerEntry,
    });
  } else if (summary.sizePerEntry === 0) {
    warnings.push({
      path: 'summary.sizePerEntry',
      message: 'Every manifest file will report a size of 0',
      value: summary.sizePerEntry,
    });
  }

  if (summary.fileNamePrefix.length === 0) {
    warnings.push({
      path: 'summary.fileNamePrefix',
      message: 'Manifest file names will be bare identifiers',
      value: summary.fileNamePrefix,
      recommendation: 'Use a prefix such as "manifest-"',
    });
  }
}

function validateObservabilityConfig(
  observability: LsmGenConfig['observability'],
  errors: ConfigValidationError[]
): void {
  if (!isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
      value: observability.logLevel,
    });
  }

  if (!isLogFormat(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${LOG_FORMATS.join(', ')}`,
      value: observability.logFormat,
    });
  }
}
