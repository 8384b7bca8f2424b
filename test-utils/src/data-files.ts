/**
 * @lsmgen/test-utils - Data File Generators
 *
 * Raw file suppliers for the manifest generator:
 * - DataFileTestDataGenerator: random records flushed through per-partition
 *   mem tables, merged into evenly sized files per level
 * - ScriptedFileSupplier: fixed files and fixed merge results for
 *   reproducible entry sequences
 */

import {
  DEFAULT_MEM_TABLE_CAPACITY,
  DEFAULT_NUM_BUCKETS,
  ErrorCode,
  LsmGenError,
  NEW_FILE_LEVEL,
  partitionKeyId,
  type DataFile,
  type KeyValue,
  type PartitionKey,
  type RawFileSupplier,
} from '@lsmgen/core';
import { KeyValueGenerator } from './key-values.js';
import { SeededRandom } from './random.js';

/** Synthetic bytes per record in generated file sizes */
export const BYTES_PER_RECORD = 64;

// =============================================================================
// Data File Construction
// =============================================================================

export interface CreateDataFileOptions {
  fileName: string;
  records: readonly KeyValue[];
  level: number;
  partition: PartitionKey;
  bucket: number;
}

interface RecordBounds {
  minKey: number;
  maxKey: number;
  minSequenceNumber: number;
  maxSequenceNumber: number;
}

/** Key and sequence number range of `records`; all zero when empty */
function recordBounds(records: readonly KeyValue[]): RecordBounds {
  if (records.length === 0) {
    return { minKey: 0, maxKey: 0, minSequenceNumber: 0, maxSequenceNumber: 0 };
  }

  const [first] = records;
  const bounds: RecordBounds = {
    minKey: first.key,
    maxKey: first.key,
    minSequenceNumber: first.sequenceNumber,
    maxSequenceNumber: first.sequenceNumber,
  };
  for (const { key, sequenceNumber } of records) {
    if (key < bounds.minKey) bounds.minKey = key;
    if (key > bounds.maxKey) bounds.maxKey = key;
    if (sequenceNumber < bounds.minSequenceNumber) bounds.minSequenceNumber = sequenceNumber;
    if (sequenceNumber > bounds.maxSequenceNumber) bounds.maxSequenceNumber = sequenceNumber;
  }
  return bounds;
}

/**
 * Build a frozen data file whose metadata is computed from its records
 */
export function createDataFile(options: CreateDataFileOptions): DataFile {
  const { fileName, records, level, partition, bucket } = options;

  return Object.freeze({
    partition: Object.freeze([...partition]),
    bucket,
    level,
    content: Object.freeze([...records]),
    meta: Object.freeze({
      fileName,
      fileSize: records.length * BYTES_PER_RECORD,
      rowCount: records.length,
      ...recordBounds(records),
      level,
    }),
  });
}

/**
 * Sort records by key, then by sequence number
 */
export function sortRecords(records: readonly KeyValue[]): KeyValue[] {
  return [...records].sort((a, b) => a.key - b.key || a.sequenceNumber - b.sequenceNumber);
}

// =============================================================================
// Random Supplier
// =============================================================================

export interface DataFileGeneratorOptions {
  numBuckets?: number;
  memTableCapacity?: number;
  seed?: number;
  /** Overrides the record generator built from the seed */
  keyValues?: KeyValueGenerator;
}

interface MemTable {
  partition: PartitionKey;
  records: KeyValue[];
}

/**
 * Random raw file supplier
 *
 * Records are routed to bucket `key % numBuckets` of their (dt, hr)
 * partition. A level-0 file is flushed as soon as one mem table holds
 * `memTableCapacity` records. Merged files hold up to
 * `memTableCapacity ^ (level + 1)` records each and keep every record.
 *
 * @example
 * ```typescript
 * const supplier = new DataFileTestDataGenerator({ numBuckets: 3, memTableCapacity: 3, seed: 42 });
 * const file = supplier.produceNewFile(); // level 0, 3 records
 * ```
 */
export class DataFileTestDataGenerator implements RawFileSupplier {
  readonly numBuckets: number;
  readonly memTableCapacity: number;
  private readonly random: SeededRandom;
  private readonly keyValues: KeyValueGenerator;
  private readonly memTables: Array<Map<string, MemTable>>;
  private fileCounter = 0;

  constructor(options: DataFileGeneratorOptions = {}) {
    this.numBuckets = options.numBuckets ?? DEFAULT_NUM_BUCKETS;
    this.memTableCapacity = options.memTableCapacity ?? DEFAULT_MEM_TABLE_CAPACITY;
    this.random = new SeededRandom(options.seed);
    this.keyValues = options.keyValues ?? new KeyValueGenerator({ random: this.random });
    this.memTables = Array.from({ length: this.numBuckets }, () => new Map<string, MemTable>());
  }

  produceNewFile(): DataFile {
    for (;;) {
      const kv = this.keyValues.next();
      const partition = this.keyValues.partitionOf(kv);
      const bucket = kv.key % this.numBuckets;

      const tables = this.memTables[bucket];
      const id = partitionKeyId(partition);
      let table = tables.get(id);
      if (!table) {
        table = { partition, records: [] };
        tables.set(id, table);
      }

      table.records.push(kv);
      if (table.records.length >= this.memTableCapacity) {
        const records = table.records;
        table.records = [];
        const [file] = this.mergeRecords(records, NEW_FILE_LEVEL, partition, bucket);
        return file;
      }
    }
  }

  mergeRecords(
    records: readonly KeyValue[],
    targetLevel: number,
    partition: PartitionKey,
    bucket: number
  ): DataFile[] {
    const sorted = sortRecords(records);
    const capacity = this.memTableCapacity ** (targetLevel + 1);

    const files: DataFile[] = [];
    for (let i = 0; i < sorted.length; i += capacity) {
      files.push(createDataFile({
        fileName: this.nextFileName(),
        records: sorted.slice(i, i + capacity),
        level: targetLevel,
        partition,
        bucket,
      }));
    }
    return files;
  }

  private nextFileName(): string {
    return `data-${this.random.uuid()}-${this.fileCounter++}`;
  }
}

// =============================================================================
// Scripted Supplier
// =============================================================================

export type MergeScript = (
  records: readonly KeyValue[],
  targetLevel: number,
  partition: PartitionKey,
  bucket: number
) => DataFile[];

export interface ScriptedFileSupplierOptions {
  /** Files returned by produceNewFile(), in order */
  files: readonly DataFile[];
  /** Merge behaviour; defaults to one file holding every record */
  merge?: MergeScript;
}

/**
 * Deterministic raw file supplier for tests
 *
 * Records every mergeRecords() call so tests can inspect merge inputs.
 */
export class ScriptedFileSupplier implements RawFileSupplier {
  readonly mergeCalls: Array<{
    records: readonly KeyValue[];
    targetLevel: number;
    partition: PartitionKey;
    bucket: number;
  }> = [];
  private readonly files: readonly DataFile[];
  private readonly merge: MergeScript;
  private position = 0;
  private mergeCounter = 0;

  constructor(options: ScriptedFileSupplierOptions) {
    this.files = options.files;
    this.merge = options.merge ?? ((records, targetLevel, partition, bucket) => [
      createDataFile({
        fileName: `merged-${this.mergeCounter++}`,
        records: sortRecords(records),
        level: targetLevel,
        partition,
        bucket,
      }),
    ]);
  }

  /** Files not yet handed out */
  get remaining(): number {
    return this.files.length - this.position;
  }

  produceNewFile(): DataFile {
    if (this.position >= this.files.length) {
      throw new LsmGenError(
        `Scripted supplier ran out of files after ${this.files.length}`,
        ErrorCode.INTERNAL_ERROR,
        { operation: 'produceNewFile', scripted: this.files.length }
      );
    }
    return this.files[this.position++];
  }

  mergeRecords(
    records: readonly KeyValue[],
    targetLevel: number,
    partition: PartitionKey,
    bucket: number
  ): DataFile[] {
    this.mergeCalls.push({ records, targetLevel, partition, bucket });
    return this.merge(records, targetLevel, partition, bucket);
  }
}

// =============================================================================
// Fixture Helpers
// =============================================================================

let recordSequence = 0;

/**
 * Build ADD records for the given keys with fresh sequence numbers
 */
export function generateRecords(keys: readonly number[]): KeyValue[] {
  return keys.map(key => Object.freeze({
    key,
    sequenceNumber: recordSequence++,
    kind: 'ADD' as const,
    value: Object.freeze({ orderId: key }),
  }));
}

export interface LevelZeroFileOptions {
  partition?: PartitionKey;
  bucket?: number;
  level?: number;
  /** Keys of the file's records; defaults to three consecutive keys */
  keys?: readonly number[];
}

let levelZeroCounter = 0;

/**
 * Build a data file for scripted suppliers; level 0 unless told otherwise
 *
 * @example
 * ```typescript
 * const supplier = new ScriptedFileSupplier({
 *   files: [generateDataFile({ keys: [1, 2] }), generateDataFile({ bucket: 1 })],
 * });
 * ```
 */
export function generateDataFile(options: LevelZeroFileOptions = {}): DataFile {
  const id = levelZeroCounter++;
  const keys = options.keys ?? [id * 3, id * 3 + 1, id * 3 + 2];
  return createDataFile({
    fileName: `file-${id}`,
    records: generateRecords(keys),
    level: options.level ?? NEW_FILE_LEVEL,
    partition: options.partition ?? ['2026-01-01', 8],
    bucket: options.bucket ?? 0,
  });
}

/**
 * Reset the counters behind generateRecords() and generateDataFile()
 */
export function resetFixtureCounters(): void {
  recordSequence = 0;
  levelZeroCounter = 0;
}
