/**
 * @lsmgen/manifest - Merge Cascade
 *
 * Resolves level overflow for one (bucket, partition): an overflowing level
 * and the level below it are merged into the level below, which may in turn
 * overflow. Every removed file yields a DELETE entry and every merged file
 * an ADD entry.
 */

import {
  ContractViolationError,
  LEVEL_CAPACITY,
  partitionKeyId,
  samePartition,
  type DataFile,
  type KeyValue,
  type Logger,
  type ManifestEntry,
  type PartitionKey,
  type RawFileSupplier,
} from '@lsmgen/core';
import type { EntryStack } from './entry-stack.js';
import type { LevelStateTracker } from './level-state.js';
import { createManifestEntry } from './manifest-entry.js';

export interface MergeCascadeOptions {
  tracker: LevelStateTracker;
  supplier: RawFileSupplier;
  /** Copied into every emitted entry */
  totalBuckets: number;
  logger: Logger;
}

/**
 * Outcome of one cascade
 */
export interface CascadeResult {
  /** Number of merges performed; 0 when no level overflowed */
  merges: number;
  /** Deepest level written by a merge; 0 when nothing was merged */
  deepestLevel: number;
  recordsMerged: number;
}

export class MergeCascade {
  private readonly tracker: LevelStateTracker;
  private readonly supplier: RawFileSupplier;
  private readonly totalBuckets: number;
  private readonly logger: Logger;

  constructor(options: MergeCascadeOptions) {
    this.tracker = options.tracker;
    this.supplier = options.supplier;
    this.totalBuckets = options.totalBuckets;
    this.logger = options.logger;
  }

  /**
   * Merge downward from level 0 while a level holds more than LEVEL_CAPACITY
   * files, pushing entries onto `buffer` in emission order: deletes of the
   * overflowing level, deletes of the next level, adds of the merged files.
   *
   * Each merge result is checked before any level changes, so a supplier
   * contract violation leaves level state and buffer as they were.
   */
  run(bucket: number, partition: PartitionKey, buffer: EntryStack<ManifestEntry>): CascadeResult {
    const levels = this.tracker.levelsFor(bucket, partition);
    const result: CascadeResult = { merges: 0, deepestLevel: 0, recordsMerged: 0 };

    let currentLevel = 0;
    while (levels[currentLevel].length > LEVEL_CAPACITY) {
      const targetLevel = currentLevel + 1;
      const source = levels[currentLevel];
      const target = this.tracker.ensureLevel(levels, targetLevel);
      const removed = [...source, ...target];

      const records: KeyValue[] = [];
      for (const file of removed) {
        for (const record of file.content) {
          records.push(record);
        }
      }

      const merged = this.supplier.mergeRecords(records, targetLevel, partition, bucket);
      this.checkMergeResult(merged, records.length, targetLevel, partition, bucket);

      for (const file of removed) {
        buffer.push(createManifestEntry('DELETE', file, this.totalBuckets));
      }
      source.length = 0;
      target.length = 0;

      for (const file of merged) {
        target.push(file);
        buffer.push(createManifestEntry('ADD', file, this.totalBuckets));
      }

      this.logger.debug('merged level', {
        operation: 'mergeRecords',
        bucket,
        partition: partitionKeyId(partition),
        level: targetLevel,
        filesDeleted: removed.length,
        filesAdded: merged.length,
        recordsMerged: records.length,
      });

      result.merges++;
      result.deepestLevel = targetLevel;
      result.recordsMerged += records.length;
      currentLevel = targetLevel;
    }

    return result;
  }

  private checkMergeResult(
    merged: readonly DataFile[],
    expectedRecords: number,
    targetLevel: number,
    partition: PartitionKey,
    bucket: number
  ): void {
    const id = partitionKeyId(partition);
    if (merged.length === 0) {
      throw ContractViolationError.emptyMerge(targetLevel, id, bucket);
    }

    let actualRecords = 0;
    for (const file of merged) {
      const details = { operation: 'mergeRecords', fileName: file.meta.fileName };
      if (file.level !== targetLevel) {
        throw ContractViolationError.mismatch('level', targetLevel, file.level, details);
      }
      if (file.bucket !== bucket) {
        throw ContractViolationError.mismatch('bucket', bucket, file.bucket, details);
      }
      if (!samePartition(file.partition, partition)) {
        throw ContractViolationError.mismatch('partition', partition, file.partition, details);
      }
      actualRecords += file.content.length;
    }

    if (actualRecords !== expectedRecords) {
      throw ContractViolationError.recordCountMismatch(expectedRecords, actualRecords, {
        level: targetLevel,
        partition: id,
        bucket,
      });
    }
  }
}
