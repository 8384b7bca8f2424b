/**
 * @lsmgen/config - Configuration for the manifest fixture generator
 *
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with clear error messages
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@lsmgen/config';
 *
 * const config = createConfig({ generator: { numBuckets: 4 } });
 * const envConfig = getConfigFromEnv();
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @lsmgen/config
 */

export type {
  DeepPartial,
  GeneratorSettings,
  SummaryConfig,
  ObservabilityConfig,
  LsmGenConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

export { validateConfig, assertValidConfig } from './validation.js';
