/**
 * @lsmgen/config - Configuration Types
 *
 * Naming conventions:
 * - num* / *Capacity: counts
 * - *PerEntry: synthetic per-entry scale factors
 *
 * @packageDocumentation
 */

import type { LogFormat, LogLevel } from '@lsmgen/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Generator Configuration
// =============================================================================

/**
 * Manifest entry generator settings.
 */
export interface GeneratorSettings {
  /** Number of buckets per partition; fixes the bucket id range [0, numBuckets) */
  numBuckets: number;

  /**
   * Records the raw file supplier buffers before flushing a level-0 file.
   * Forwarded to the supplier, not interpreted by the generator.
   */
  memTableCapacity: number;

  /** Seed of the default raw file supplier; null picks one from the clock */
  seed: number | null;
}

// =============================================================================
// Summary Configuration
// =============================================================================

/**
 * Manifest file summary settings.
 */
export interface SummaryConfig {
  /** Synthetic size of one entry in a manifest file size estimate */
  sizePerEntry: number;

  /** Prefix of synthesized manifest file names */
  fileNamePrefix: string;
}

// =============================================================================
// Observability Configuration
// =============================================================================

/**
 * Logging settings.
 */
export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Log output format */
  logFormat: LogFormat;
}

// =============================================================================
// Complete Configuration
// =============================================================================

/**
 * Complete configuration of a manifest fixture generator.
 */
export interface LsmGenConfig {
  generator: GeneratorSettings;
  summary: SummaryConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Configuration validation error details.
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'generator.numBuckets') */
  path: string;

  message: string;

  value: unknown;

  suggestion?: string;
}

/**
 * Configuration validation warning details.
 */
export interface ConfigValidationWarning {
  path: string;

  message: string;

  value: unknown;

  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'LSMGEN') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
