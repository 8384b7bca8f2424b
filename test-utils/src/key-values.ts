/**
 * @lsmgen/test-utils - Key/Value Record Generator
 *
 * Produces records of an orders-like table partitioned by (dt, hr).
 */

import type { KeyValue, PartitionKey, PartitionType, ValueKind } from '@lsmgen/core';
import { SeededRandom } from './random.js';

/**
 * Partition schema of generated records
 */
export const PARTITION_TYPE: PartitionType = [
  { name: 'dt', type: 'string' },
  { name: 'hr', type: 'int' },
];

const DEFAULT_DATES = ['2026-01-01', '2026-01-02'] as const;
const DEFAULT_HOURS = [8, 9] as const;

export interface KeyValueGeneratorOptions {
  random: SeededRandom;
  /** Keys are drawn from [0, numKeys) */
  numKeys?: number;
  dates?: readonly string[];
  hours?: readonly number[];
  /** Probability that the hr partition field is null */
  nullHourRate?: number;
  /** Probability that a record is a DELETE */
  deleteRate?: number;
}

/**
 * Random record generator with strictly increasing sequence numbers
 *
 * @example
 * ```typescript
 * const gen = new KeyValueGenerator({ random: createRandom(42) });
 * const kv = gen.next();
 * gen.partitionOf(kv); // e.g. ['2026-01-02', 8]
 * ```
 */
export class KeyValueGenerator {
  private readonly random: SeededRandom;
  private readonly numKeys: number;
  private readonly dates: readonly string[];
  private readonly hours: readonly number[];
  private readonly nullHourRate: number;
  private readonly deleteRate: number;
  private sequenceNumber = 0;

  constructor(options: KeyValueGeneratorOptions) {
    this.random = options.random;
    this.numKeys = options.numKeys ?? 1000;
    this.dates = options.dates ?? DEFAULT_DATES;
    this.hours = options.hours ?? DEFAULT_HOURS;
    this.nullHourRate = options.nullHourRate ?? 0.1;
    this.deleteRate = options.deleteRate ?? 0.1;
  }

  next(): KeyValue {
    const key = this.random.int(0, this.numKeys - 1);
    const kind: ValueKind = this.random.bool(this.deleteRate) ? 'DELETE' : 'ADD';
    const dt = this.random.pick(this.dates);
    const hr = this.random.bool(this.nullHourRate) ? null : this.random.pick(this.hours);

    return Object.freeze({
      key,
      sequenceNumber: this.sequenceNumber++,
      kind,
      value: Object.freeze({
        dt,
        hr,
        orderId: key,
        itemId: this.random.int(0, 9999),
        comment: this.random.string(8),
      }),
    });
  }

  /**
   * Partition key of a generated record, in PARTITION_TYPE order
   */
  partitionOf(kv: KeyValue): PartitionKey {
    return [kv.value.dt ?? null, kv.value.hr ?? null];
  }
}
