/**
 * @lsmgen/manifest - Level State Tracker
 *
 * Live data files per bucket and partition, one ordered list per level.
 * Partitions appear on their first recorded file; levels are created on
 * demand and never removed.
 */

import {
  ContractViolationError,
  partitionKeyId,
  type DataFile,
  type PartitionKey,
} from '@lsmgen/core';

/** Files of one (bucket, partition) at one level, in insertion order */
export type Level = DataFile[];

interface PartitionLevels {
  partition: PartitionKey;
  levels: Level[];
}

/**
 * Read-only view of one (bucket, partition) level set
 */
export interface PartitionLevelView {
  readonly bucket: number;
  readonly partition: PartitionKey;
  readonly levels: readonly (readonly DataFile[])[];
}

// =============================================================================
// Tracker
// =============================================================================

export class LevelStateTracker {
  readonly numBuckets: number;
  private readonly buckets: Array<Map<string, PartitionLevels>>;

  constructor(numBuckets: number) {
    this.numBuckets = numBuckets;
    this.buckets = Array.from({ length: numBuckets }, () => new Map<string, PartitionLevels>());
  }

  /**
   * Insert a file at its own level of its (bucket, partition)
   */
  recordNewFile(file: DataFile): void {
    if (file.level < 0 || !Number.isInteger(file.level)) {
      throw ContractViolationError.mismatch('level', 'a non-negative integer', file.level, {
        fileName: file.meta.fileName,
      });
    }

    const tables = this.bucketTable(file.bucket);
    const id = partitionKeyId(file.partition);
    let entry = tables.get(id);
    if (!entry) {
      entry = { partition: file.partition, levels: [[]] };
      tables.set(id, entry);
    }

    this.ensureLevel(entry.levels, file.level).push(file);
  }

  /**
   * Mutable level list of a (bucket, partition) that already holds a file
   */
  levelsFor(bucket: number, partition: PartitionKey): Level[] {
    const id = partitionKeyId(partition);
    const entry = this.bucketTable(bucket).get(id);
    if (!entry) {
      throw ContractViolationError.unknownPartition(bucket, id);
    }
    return entry.levels;
  }

  /**
   * Return levels[index], appending empty levels up to it first
   */
  ensureLevel(levels: Level[], index: number): Level {
    while (levels.length <= index) {
      levels.push([]);
    }
    return levels[index];
  }

  /**
   * Partition level sets of one bucket, in first-seen order
   */
  partitions(bucket: number): PartitionLevelView[] {
    return [...this.bucketTable(bucket).values()].map(({ partition, levels }) => ({
      bucket,
      partition,
      levels,
    }));
  }

  /**
   * Every file currently held at any level of any (bucket, partition)
   */
  liveFiles(): DataFile[] {
    const files: DataFile[] = [];
    for (const tables of this.buckets) {
      for (const { levels } of tables.values()) {
        for (const level of levels) {
          files.push(...level);
        }
      }
    }
    return files;
  }

  private bucketTable(bucket: number): Map<string, PartitionLevels> {
    if (!Number.isInteger(bucket) || bucket < 0 || bucket >= this.numBuckets) {
      throw ContractViolationError.mismatch('bucket', `[0, ${this.numBuckets})`, bucket);
    }
    return this.buckets[bucket];
  }
}
