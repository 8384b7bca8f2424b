/**
 * Common Constants
 *
 * Centralized constants shared by the generator, its configuration and the
 * test utilities.
 *
 * @module constants
 */

// =============================================================================
// LEVEL LAYOUT
// =============================================================================

/** Maximum number of files a level holds once a generation step completes */
export const LEVEL_CAPACITY = 3;

/** Level at which the raw file supplier produces new files */
export const NEW_FILE_LEVEL = 0;

// =============================================================================
// GENERATOR DEFAULTS
// =============================================================================

/** Default number of buckets per partition */
export const DEFAULT_NUM_BUCKETS = 3;

/** Default number of records buffered before a level-0 file is flushed */
export const DEFAULT_MEM_TABLE_CAPACITY = 3;

// =============================================================================
// SUMMARY DEFAULTS
// =============================================================================

/** Synthetic bytes per manifest entry in a manifest file size estimate */
export const DEFAULT_SIZE_PER_ENTRY = 100;

/** Prefix of synthesized manifest file names */
export const MANIFEST_FILE_PREFIX = 'manifest-';
