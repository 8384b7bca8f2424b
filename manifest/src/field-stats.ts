/**
 * @lsmgen/manifest - Field Statistics
 *
 * Min/max/null-count statistics over rows of a partition schema.
 */

import {
  ValidationError,
  type FieldStats,
  type FieldType,
  type FieldValue,
  type PartitionType,
} from '@lsmgen/core';

interface FieldAccumulator {
  min: FieldValue;
  max: FieldValue;
  nullCount: number;
}

const JS_TYPES: Record<FieldType, 'string' | 'number'> = {
  string: 'string',
  int: 'number',
};

/** Numeric order for int fields, code unit order for string fields */
function compareValues(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Accumulates per-field statistics over rows shaped by a partition type
 *
 * @example
 * ```typescript
 * const collector = new FieldStatsCollector(PARTITION_TYPE);
 * collector.collect(['2026-01-01', 8]);
 * collector.collect(['2026-01-02', null]);
 * collector.extract();
 * // [{ min: '2026-01-01', max: '2026-01-02', nullCount: 0 },
 * //  { min: 8, max: 8, nullCount: 1 }]
 * ```
 */
export class FieldStatsCollector {
  private readonly accumulators: FieldAccumulator[];

  constructor(private readonly partitionType: PartitionType) {
    this.accumulators = partitionType.map(() => ({ min: null, max: null, nullCount: 0 }));
  }

  collect(row: readonly FieldValue[]): void {
    if (row.length !== this.partitionType.length) {
      throw new ValidationError(
        `Row has ${row.length} fields, partition type has ${this.partitionType.length}`,
        undefined,
        { operation: 'collect', expected: this.partitionType.length, actual: row.length }
      );
    }

    row.forEach((value, i) => {
      const field = this.partitionType[i];
      if (value !== null && typeof value !== JS_TYPES[field.type]) {
        throw new ValidationError(
          `Field '${field.name}' expects ${field.type}, got ${typeof value}`,
          undefined,
          { operation: 'collect', field: field.name, expected: field.type, actual: String(value) }
        );
      }
    });

    row.forEach((value, i) => {
      const acc = this.accumulators[i];
      if (value === null) {
        acc.nullCount++;
        return;
      }
      if (acc.min === null || compareValues(value, acc.min) < 0) {
        acc.min = value;
      }
      if (acc.max === null || compareValues(value, acc.max) > 0) {
        acc.max = value;
      }
    });
  }

  /**
   * Snapshot of the statistics, one per field in partition type order
   */
  extract(): FieldStats[] {
    return this.accumulators.map(({ min, max, nullCount }) => Object.freeze({ min, max, nullCount }));
  }
}
