/**
 * @lsmgen/manifest - Property-Based Tests with fast-check
 *
 * Properties of entry streams from the random raw file supplier:
 *
 * 1. No level holds more than three files after a generation step
 * 2. Merges neither create nor lose records
 * 3. Live files equal the files added and not yet deleted
 * 4. Identical seeds give identical streams
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { LEVEL_CAPACITY, type ManifestEntry } from '@lsmgen/core';
import { ManifestTestDataGenerator } from '../generator.js';
import { mergeManifestEntries } from '../manifest-entry.js';

const seedArb = fc.integer({ min: 0, max: 1_000_000 });
const stepsArb = fc.integer({ min: 1, max: 40 });
const bucketsArb = fc.integer({ min: 1, max: 4 });

function build(seed: number, numBuckets: number): ManifestTestDataGenerator {
  return ManifestTestDataGenerator.builder().numBuckets(numBuckets).seed(seed).build();
}

/** Entries of one step in the order they were pushed */
function emissionOrder(step: readonly ManifestEntry[]): ManifestEntry[] {
  return [...step].reverse();
}

function rowCount(entries: readonly ManifestEntry[]): number {
  return entries.reduce((sum, e) => sum + e.file.rowCount, 0);
}

describe('Property: Generator Invariants', () => {
  it('should keep every level within capacity after each step', () => {
    fc.assert(
      fc.property(seedArb, stepsArb, bucketsArb, (seed, steps, numBuckets) => {
        const generator = build(seed, numBuckets);

        for (let i = 0; i < steps; i++) {
          generator.nextStep();
          for (let bucket = 0; bucket < numBuckets; bucket++) {
            for (const view of generator.partitions(bucket)) {
              for (const level of view.levels) {
                expect(level.length).toBeLessThanOrEqual(LEVEL_CAPACITY);
              }
            }
          }
        }
      }),
      { numRuns: 25 }
    );
  });

  it('should conserve records across every step', () => {
    fc.assert(
      fc.property(seedArb, stepsArb, bucketsArb, (seed, steps, numBuckets) => {
        const generator = build(seed, numBuckets);

        for (let i = 0; i < steps; i++) {
          const [newFile, ...cascade] = emissionOrder(generator.nextStep());
          const deleted = cascade.filter(e => e.kind === 'DELETE');
          const added = cascade.filter(e => e.kind === 'ADD');

          expect(newFile.kind).toBe('ADD');
          expect(newFile.file.level).toBe(0);
          expect(rowCount(deleted)).toBe(rowCount(added));
        }
      }),
      { numRuns: 25 }
    );
  });

  it('should keep live files equal to added minus deleted files', () => {
    fc.assert(
      fc.property(seedArb, stepsArb, bucketsArb, (seed, steps, numBuckets) => {
        const generator = build(seed, numBuckets);
        const emitted: ManifestEntry[] = [];

        for (let i = 0; i < steps; i++) {
          emitted.push(...emissionOrder(generator.nextStep()));
        }

        const net = mergeManifestEntries(emitted);
        expect(net.every(e => e.kind === 'ADD')).toBe(true);

        const fromEntries = net.map(e => e.file.fileName).sort();
        const live = generator.liveFiles().map(f => f.meta.fileName).sort();
        expect(fromEntries).toEqual(live);
      }),
      { numRuns: 25 }
    );
  });

  it('should return every pushed entry exactly once', () => {
    fc.assert(
      fc.property(seedArb, fc.integer({ min: 1, max: 100 }), (seed, count) => {
        const generator = build(seed, 3);
        const entries = generator.take(count);

        expect(entries).toHaveLength(count);
        const keys = entries.map(e => `${e.kind} ${e.file.fileName}`);
        expect(new Set(keys).size).toBe(count);
      }),
      { numRuns: 25 }
    );
  });

  it('should be deterministic for a fixed seed', () => {
    fc.assert(
      fc.property(seedArb, bucketsArb, (seed, numBuckets) => {
        const a = build(seed, numBuckets).take(60);
        const b = build(seed, numBuckets).take(60);
        expect(a).toEqual(b);
      }),
      { numRuns: 10 }
    );
  });
});
