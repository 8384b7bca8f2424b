// Data model shared by the generator, its raw file supplier and the tests

// =============================================================================
// Partitions and Records
// =============================================================================

/** Scalar value of a record or partition field */
export type FieldValue = string | number | null;

/** Supported partition field types */
export type FieldType = 'string' | 'int';

/**
 * Named, typed field of a partition schema
 */
export interface PartitionField {
  name: string;
  type: FieldType;
}

/** Ordered partition schema */
export type PartitionType = readonly PartitionField[];

/**
 * Concrete partition value: one entry per PartitionType field, in order.
 * Compared by value through partitionKeyId().
 */
export type PartitionKey = readonly FieldValue[];

/**
 * Canonical string id for a partition key, used as a map key.
 */
export function partitionKeyId(partition: PartitionKey): string {
  return JSON.stringify(partition);
}

/**
 * Whether two partition keys hold the same values.
 */
export function samePartition(a: PartitionKey, b: PartitionKey): boolean {
  return partitionKeyId(a) === partitionKeyId(b);
}

/**
 * Kind of a manifest entry or record: a file (or row) being added or removed
 */
export type ValueKind = 'ADD' | 'DELETE';

export const ValueKinds = {
  ADD: 'ADD',
  DELETE: 'DELETE',
} as const satisfies Record<ValueKind, ValueKind>;

/**
 * One logical record stored in a data file
 */
export interface KeyValue {
  readonly key: number;
  readonly sequenceNumber: number;
  readonly kind: ValueKind;
  readonly value: Readonly<Record<string, FieldValue>>;
}

// =============================================================================
// Data Files
// =============================================================================

/**
 * Metadata handle of a data file.
 *
 * The generator forwards it into manifest entries without inspecting it.
 */
export interface DataFileMeta {
  readonly fileName: string;
  /** Synthetic size in bytes */
  readonly fileSize: number;
  readonly rowCount: number;
  readonly minKey: number;
  readonly maxKey: number;
  readonly minSequenceNumber: number;
  readonly maxSequenceNumber: number;
  readonly level: number;
}

/**
 * Immutable storage segment owned by one (bucket, partition) at one level
 */
export interface DataFile {
  readonly partition: PartitionKey;
  readonly bucket: number;
  readonly level: number;
  readonly content: readonly KeyValue[];
  readonly meta: DataFileMeta;
}

/**
 * Source of data files consumed by the manifest generator.
 *
 * produceNewFile() returns a level-0 file with a bucket in [0, numBuckets).
 * mergeRecords() returns a non-empty list of files tagged with the requested
 * level, partition and bucket that together hold every given record.
 */
export interface RawFileSupplier {
  produceNewFile(): DataFile;
  mergeRecords(
    records: readonly KeyValue[],
    targetLevel: number,
    partition: PartitionKey,
    bucket: number
  ): DataFile[];
}

// =============================================================================
// Manifest Entries
// =============================================================================

/**
 * Record of one data file being added to or removed from a (partition, bucket)
 */
export interface ManifestEntry {
  readonly kind: ValueKind;
  readonly partition: PartitionKey;
  readonly bucket: number;
  /** Configured bucket count, not derived from state */
  readonly totalBuckets: number;
  readonly file: DataFileMeta;
}

/**
 * Min/max/null-count statistics of one field
 */
export interface FieldStats {
  readonly min: FieldValue;
  readonly max: FieldValue;
  readonly nullCount: number;
}

/**
 * Summary of a batch of manifest entries
 */
export interface ManifestFileMeta {
  readonly fileName: string;
  /** Synthetic size estimate, linear in the entry count */
  readonly fileSize: number;
  readonly numAddedFiles: number;
  readonly numDeletedFiles: number;
  /** One FieldStats per partition field, in PartitionType order */
  readonly partitionStats: readonly FieldStats[];
}
