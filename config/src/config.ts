/**
 * @lsmgen/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { isLogFormat, isLogLevel } from '@lsmgen/core';
import type { LsmGenConfig, DeepPartial, EnvConfigOptions } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Copy `base` with every defined value of `override` applied.
 * Undefined values do not override.
 */
function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  const result: T = { ...base };
  if (!override) {
    return result;
  }

  for (const key of Object.keys(override) as Array<keyof T>) {
    const value: T[keyof T] | undefined = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function freezeConfig(config: LsmGenConfig): LsmGenConfig {
  return Object.freeze({
    generator: Object.freeze(config.generator),
    summary: Object.freeze(config.summary),
    observability: Object.freeze(config.observability),
  });
}

/**
 * Create a complete LsmGenConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen LsmGenConfig with all values filled in
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   generator: { numBuckets: 4, seed: 42 },
 *   observability: { logLevel: 'debug' },
 * });
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<LsmGenConfig>,
  base: LsmGenConfig = DEFAULT_CONFIG
): LsmGenConfig {
  return freezeConfig({
    generator: mergeSection(base.generator, overrides?.generator),
    summary: mergeSection(base.summary, overrides?.summary),
    observability: mergeSection(base.observability, overrides?.observability),
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<LsmGenConfig> | undefined>
): DeepPartial<LsmGenConfig> {
  const result: DeepPartial<LsmGenConfig> = {};

  for (const config of configs) {
    if (!config) continue;
    if (config.generator) {
      result.generator = { ...result.generator, ...config.generator };
    }
    if (config.summary) {
      result.summary = { ...result.summary, ...config.summary };
    }
    if (config.observability) {
      result.observability = { ...result.observability, ...config.observability };
    }
  }

  return result;
}

// =============================================================================
// Environment Variables
// =============================================================================

function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: LSMGEN_<SECTION>_<FIELD>
 * - LSMGEN_GENERATOR_NUM_BUCKETS=4
 * - LSMGEN_GENERATOR_MEM_TABLE_CAPACITY=5
 * - LSMGEN_GENERATOR_SEED=42
 * - LSMGEN_SUMMARY_SIZE_PER_ENTRY=100
 * - LSMGEN_SUMMARY_FILE_NAME_PREFIX=manifest-
 * - LSMGEN_OBSERVABILITY_LOG_LEVEL=debug
 * - LSMGEN_OBSERVABILITY_LOG_FORMAT=pretty
 *
 * Unparseable numbers and unknown log levels or formats are ignored.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_GENERATOR_SEED: '7' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): LsmGenConfig {
  const prefix = options.prefix ?? 'LSMGEN';
  const env = options.env ?? process.env;

  const numBuckets = parseNumber(getEnvVar(env, prefix, 'GENERATOR', 'NUM', 'BUCKETS'));
  const memTableCapacity = parseNumber(getEnvVar(env, prefix, 'GENERATOR', 'MEM', 'TABLE', 'CAPACITY'));
  const seed = parseNumber(getEnvVar(env, prefix, 'GENERATOR', 'SEED'));

  const sizePerEntry = parseNumber(getEnvVar(env, prefix, 'SUMMARY', 'SIZE', 'PER', 'ENTRY'));
  const fileNamePrefix = getEnvVar(env, prefix, 'SUMMARY', 'FILE', 'NAME', 'PREFIX');

  const rawLogLevel = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL');
  const rawLogFormat = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT');
  const logLevel = isLogLevel(rawLogLevel) ? rawLogLevel : undefined;
  const logFormat = isLogFormat(rawLogFormat) ? rawLogFormat : undefined;

  return createConfig({
    generator: { numBuckets, memTableCapacity, seed },
    summary: { sizePerEntry, fileNamePrefix },
    observability: { logLevel, logFormat },
  });
}
