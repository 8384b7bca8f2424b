/**
 * @lsmgen/manifest
 * Synthetic manifest entries for LSM manifest bookkeeping tests
 *
 * This package provides:
 * - ManifestTestDataGenerator: ADD/DELETE entry stream following leveled compaction
 * - Level state tracking and merge cascades per (bucket, partition)
 * - Manifest file summaries with partition field statistics
 * - Net-effect merging of entry batches
 */

// =============================================================================
// Generator
// =============================================================================

export {
  ManifestTestDataGenerator,
  ManifestTestDataGeneratorBuilder,
  type ManifestTestDataGeneratorOptions,
} from './generator.js';

export { EntryStack } from './entry-stack.js';

export {
  LevelStateTracker,
  type Level,
  type PartitionLevelView,
} from './level-state.js';

export {
  MergeCascade,
  type MergeCascadeOptions,
  type CascadeResult,
} from './merge-cascade.js';

// =============================================================================
// Entries & Summaries
// =============================================================================

export {
  createManifestEntry,
  entryIdentifier,
  entryIdentifierKey,
  mergeManifestEntries,
  type EntryIdentifier,
} from './manifest-entry.js';

export { FieldStatsCollector } from './field-stats.js';

export { summarize, type SummaryOptions } from './summary.js';
