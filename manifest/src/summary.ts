/**
 * @lsmgen/manifest - Summary Aggregator
 *
 * Folds a batch of manifest entries into one manifest file meta.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_SIZE_PER_ENTRY,
  MANIFEST_FILE_PREFIX,
  ValidationError,
  type ManifestEntry,
  type ManifestFileMeta,
  type PartitionType,
} from '@lsmgen/core';
import { PARTITION_TYPE } from '@lsmgen/test-utils';
import { FieldStatsCollector } from './field-stats.js';

export interface SummaryOptions {
  /** Schema of the entries' partition keys (default: dt STRING, hr INT) */
  partitionType?: PartitionType;
  /** Synthetic bytes per entry (default: 100) */
  sizePerEntry?: number;
  /** Prefix of the generated file name (default: 'manifest-') */
  fileNamePrefix?: string;
  /** Source of the unique part of the file name (default: randomUUID) */
  idGenerator?: () => string;
}

/**
 * Summarize a non-empty batch of manifest entries
 *
 * @throws ValidationError with code EMPTY_INPUT when `entries` is empty
 *
 * @example
 * ```typescript
 * const meta = summarize(entries);
 * meta.numAddedFiles;   // ADD entries
 * meta.numDeletedFiles; // DELETE entries
 * meta.fileSize;        // entries.length * 100
 * ```
 */
export function summarize(
  entries: readonly ManifestEntry[],
  options: SummaryOptions = {}
): ManifestFileMeta {
  const {
    partitionType = PARTITION_TYPE,
    sizePerEntry = DEFAULT_SIZE_PER_ENTRY,
    fileNamePrefix = MANIFEST_FILE_PREFIX,
    idGenerator = randomUUID,
  } = options;

  if (entries.length === 0) {
    throw ValidationError.emptyInput('summarize');
  }
  if (!Number.isFinite(sizePerEntry) || sizePerEntry < 0) {
    throw ValidationError.outOfRange('sizePerEntry', sizePerEntry, { min: 0 });
  }

  const collector = new FieldStatsCollector(partitionType);
  let numAddedFiles = 0;
  let numDeletedFiles = 0;

  for (const entry of entries) {
    collector.collect(entry.partition);
    if (entry.kind === 'ADD') {
      numAddedFiles++;
    } else {
      numDeletedFiles++;
    }
  }

  return Object.freeze({
    fileName: `${fileNamePrefix}${idGenerator()}`,
    fileSize: entries.length * sizePerEntry,
    numAddedFiles,
    numDeletedFiles,
    partitionStats: Object.freeze(collector.extract()),
  });
}
