/**
 * @lsmgen/config - Default Configuration Values
 *
 * Values are sourced from @lsmgen/core constants.
 *
 * @packageDocumentation
 */

import {
  DEFAULT_NUM_BUCKETS,
  DEFAULT_MEM_TABLE_CAPACITY,
  DEFAULT_SIZE_PER_ENTRY,
  MANIFEST_FILE_PREFIX,
} from '@lsmgen/core';

import type { LsmGenConfig } from './types.js';

const DEFAULT_GENERATOR_SETTINGS = {
  numBuckets: DEFAULT_NUM_BUCKETS,
  memTableCapacity: DEFAULT_MEM_TABLE_CAPACITY,
  seed: null,
} as const;

const DEFAULT_SUMMARY_CONFIG = {
  sizePerEntry: DEFAULT_SIZE_PER_ENTRY,
  fileNamePrefix: MANIFEST_FILE_PREFIX,
} as const;

const DEFAULT_OBSERVABILITY_CONFIG = {
  logLevel: 'info' as const,
  logFormat: 'json' as const,
} as const;

/**
 * Default generator configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@lsmgen/config';
 *
 * console.log(DEFAULT_CONFIG.generator.numBuckets); // 3
 *
 * const config = createConfig({ generator: { numBuckets: 8 } });
 * ```
 */
export const DEFAULT_CONFIG: LsmGenConfig = Object.freeze({
  generator: Object.freeze({ ...DEFAULT_GENERATOR_SETTINGS }),
  summary: Object.freeze({ ...DEFAULT_SUMMARY_CONFIG }),
  observability: Object.freeze({ ...DEFAULT_OBSERVABILITY_CONFIG }),
});
