/**
 * @lsmgen/manifest - Generator Tests
 *
 * Entry order, cascades and supplier contract checks, driven by a scripted
 * raw file supplier.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConfigurationError,
  ContractViolationError,
  ErrorCode,
  LsmGenError,
  ValidationError,
  hasErrorCode,
  type DataFile,
  type ManifestEntry,
} from '@lsmgen/core';
import { createConfig } from '@lsmgen/config';
import { createTestLogger } from '@lsmgen/observability';
import {
  ScriptedFileSupplier,
  createDataFile,
  generateDataFile,
  resetFixtureCounters,
  sortRecords,
  type MergeScript,
} from '@lsmgen/test-utils';
import { ManifestTestDataGenerator } from '../generator.js';

beforeEach(() => {
  resetFixtureCounters();
});

// =============================================================================
// Helpers
// =============================================================================

function describeEntry(entry: ManifestEntry): string {
  return `${entry.kind} ${entry.file.fileName}`;
}

function scripted(files: DataFile[], merge?: MergeScript) {
  const supplier = new ScriptedFileSupplier({ files, merge });
  const generator = ManifestTestDataGenerator.builder().supplier(supplier).build();
  return { generator, supplier };
}

function levelZeroFiles(count: number): DataFile[] {
  return Array.from({ length: count }, () => generateDataFile());
}

function captureError(fn: () => unknown): LsmGenError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LsmGenError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an LsmGenError');
}

/** Level 1 merges split records into four files; deeper merges into one */
function splittingMerge(): MergeScript {
  let counter = 0;
  return (records, targetLevel, partition, bucket) => {
    const sorted = sortRecords(records);
    const parts = targetLevel === 1 ? 4 : 1;
    const size = Math.ceil(sorted.length / parts);
    return Array.from({ length: parts }, (_, i) =>
      createDataFile({
        fileName: `l${targetLevel}-${counter++}`,
        records: sorted.slice(i * size, (i + 1) * size),
        level: targetLevel,
        partition,
        bucket,
      })
    );
  };
}

// =============================================================================
// Entry Order
// =============================================================================

describe('ManifestTestDataGenerator', () => {
  describe('next', () => {
    it('should announce each new file with an ADD entry', () => {
      const { generator } = scripted(levelZeroFiles(3));

      const entries = generator.take(3);

      expect(entries.map(describeEntry)).toEqual(['ADD file-0', 'ADD file-1', 'ADD file-2']);
      expect(entries.every(e => e.bucket === 0 && e.totalBuckets === 3)).toBe(true);
      expect(entries[0].partition).toEqual(['2026-01-01', 8]);
    });

    it('should return a merge step newest first', () => {
      const { generator, supplier } = scripted(levelZeroFiles(4));

      generator.take(3);
      const step = generator.take(6);

      expect(step.map(describeEntry)).toEqual([
        'ADD merged-0',
        'DELETE file-3',
        'DELETE file-2',
        'DELETE file-1',
        'DELETE file-0',
        'ADD file-3',
      ]);
      expect(step[0].file.level).toBe(1);
      expect(supplier.mergeCalls).toHaveLength(1);
      expect(supplier.mergeCalls[0].targetLevel).toBe(1);
      expect(supplier.mergeCalls[0].records.map(r => r.key)).toEqual([
        0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
      ]);
    });

    it('should hand out buffered entries before producing a new file', () => {
      const { generator, supplier } = scripted(levelZeroFiles(5));

      generator.take(4);
      expect(generator.bufferedEntries).toBe(5);
      expect(supplier.remaining).toBe(1);

      generator.take(5);
      expect(generator.bufferedEntries).toBe(0);
      expect(supplier.remaining).toBe(1);

      expect(describeEntry(generator.next())).toBe('ADD file-4');
      expect(supplier.remaining).toBe(0);
    });

    it('should merge the next level into the merge result', () => {
      const { generator } = scripted(levelZeroFiles(8));

      generator.take(9);
      generator.take(3);
      const step = generator.nextStep();

      expect(step.map(describeEntry)).toEqual([
        'ADD merged-1',
        'DELETE merged-0',
        'DELETE file-7',
        'DELETE file-6',
        'DELETE file-5',
        'DELETE file-4',
        'ADD file-7',
      ]);
      expect(generator.liveFiles().map(f => f.meta.fileName)).toEqual(['merged-1']);
      expect(generator.liveFiles()[0].content).toHaveLength(24);
    });

    it('should cascade through several levels in one step', () => {
      const { generator } = scripted(levelZeroFiles(4), splittingMerge());

      generator.take(3);
      const step = generator.nextStep();

      expect(step.map(describeEntry)).toEqual([
        'ADD l2-4',
        'DELETE l1-3',
        'DELETE l1-2',
        'DELETE l1-1',
        'DELETE l1-0',
        'ADD l1-3',
        'ADD l1-2',
        'ADD l1-1',
        'ADD l1-0',
        'DELETE file-3',
        'DELETE file-2',
        'DELETE file-1',
        'DELETE file-0',
        'ADD file-3',
      ]);

      const [view] = generator.partitions(0);
      expect(view.levels.map(l => l.length)).toEqual([0, 0, 1]);
      expect(generator.liveFiles().map(f => f.meta.fileName)).toEqual(['l2-4']);
    });

    it('should track buckets and partitions independently', () => {
      const files = [
        generateDataFile({ bucket: 0 }),
        generateDataFile({ bucket: 1 }),
        generateDataFile({ bucket: 0, partition: ['2026-01-02', null] }),
        generateDataFile({ bucket: 0 }),
        generateDataFile({ bucket: 1 }),
        generateDataFile({ bucket: 0, partition: ['2026-01-02', null] }),
        generateDataFile({ bucket: 0 }),
      ];
      const { generator, supplier } = scripted(files);

      const entries = generator.take(7);

      expect(entries.every(e => e.kind === 'ADD')).toBe(true);
      expect(supplier.mergeCalls).toHaveLength(0);
      expect(generator.partitions(0)).toHaveLength(2);
      expect(generator.partitions(1)).toHaveLength(1);
      expect(generator.partitions(2)).toHaveLength(0);
    });
  });

  describe('large files', () => {
    it('should merge level-0 files of 200,000 records each', () => {
      const recordsPerFile = 200_000;
      const files = Array.from({ length: 4 }, (_, i) =>
        generateDataFile({
          keys: Array.from({ length: recordsPerFile }, (_, k) => i * recordsPerFile + k),
        })
      );
      const { generator, supplier } = scripted(files);

      const entries = generator.take(4);

      expect(describeEntry(entries[3])).toBe('ADD merged-0');
      expect(entries[3].file).toMatchObject({
        level: 1,
        rowCount: 4 * recordsPerFile,
        minKey: 0,
        maxKey: 4 * recordsPerFile - 1,
      });
      expect(supplier.mergeCalls[0].records).toHaveLength(4 * recordsPerFile);
    }, 30_000);
  });

  describe('take', () => {
    it('should return nothing for zero', () => {
      const { generator, supplier } = scripted(levelZeroFiles(1));
      expect(generator.take(0)).toEqual([]);
      expect(supplier.remaining).toBe(1);
    });

    it('should reject a negative count', () => {
      const { generator } = scripted([]);
      expect(() => generator.take(-1)).toThrow(ValidationError);
    });
  });

  describe('nextStep', () => {
    it('should return the rest of a partially consumed step', () => {
      const { generator } = scripted(levelZeroFiles(4));

      generator.take(3);
      generator.take(2);

      expect(generator.nextStep().map(describeEntry)).toEqual([
        'DELETE file-2',
        'DELETE file-1',
        'DELETE file-0',
        'ADD file-3',
      ]);
      expect(generator.bufferedEntries).toBe(0);
    });
  });

  // ===========================================================================
  // Supplier Contract
  // ===========================================================================

  describe('supplier contract', () => {
    it('should reject a new file above level 0', () => {
      const { generator } = scripted([generateDataFile({ level: 1 })]);

      const error = captureError(() => generator.next());

      expect(error).toBeInstanceOf(ContractViolationError);
      expect(error.code).toBe(ErrorCode.CONTRACT_VIOLATION);
      expect(error.details).toEqual({
        attribute: 'level',
        expected: 0,
        actual: 1,
        operation: 'produceNewFile',
        fileName: 'file-0',
      });
      expect(generator.liveFiles()).toEqual([]);
    });

    it('should reject a new file with a bucket out of range', () => {
      const { generator } = scripted([generateDataFile({ bucket: 3 })]);

      const error = captureError(() => generator.next());

      expect(error.code).toBe(ErrorCode.CONTRACT_VIOLATION);
      expect(error.message).toBe(
        'Raw file supplier returned a file with bucket 3, expected "[0, 3)"'
      );
    });

    it('should reject an empty merge result and keep level state', () => {
      const { generator } = scripted(levelZeroFiles(4), () => []);
      generator.take(3);

      const error = captureError(() => generator.next());

      expect(error.code).toBe(ErrorCode.EMPTY_MERGE_RESULT);
      expect(error.details).toEqual({
        operation: 'mergeRecords',
        level: 1,
        partition: '["2026-01-01",8]',
        bucket: 0,
      });
      expect(generator.liveFiles().map(f => f.meta.fileName)).toEqual([
        'file-0',
        'file-1',
        'file-2',
        'file-3',
      ]);
    });

    it('should reject merged files at the wrong level', () => {
      const merge: MergeScript = (records, targetLevel, partition, bucket) => [
        createDataFile({ fileName: 'bad', records, level: targetLevel + 1, partition, bucket }),
      ];
      const { generator } = scripted(levelZeroFiles(4), merge);
      generator.take(3);

      const error = captureError(() => generator.next());

      expect(error.code).toBe(ErrorCode.CONTRACT_VIOLATION);
      expect(error.details).toEqual({
        attribute: 'level',
        expected: 1,
        actual: 2,
        operation: 'mergeRecords',
        fileName: 'bad',
      });
    });

    it('should reject merged files in another bucket', () => {
      const merge: MergeScript = (records, targetLevel, partition) => [
        createDataFile({ fileName: 'bad', records, level: targetLevel, partition, bucket: 2 }),
      ];
      const { generator } = scripted(levelZeroFiles(4), merge);
      generator.take(3);

      const error = captureError(() => generator.next());

      expect(error.details?.attribute).toBe('bucket');
      expect(error.details?.actual).toBe(2);
    });

    it('should reject merged files in another partition', () => {
      const merge: MergeScript = (records, targetLevel, _partition, bucket) => [
        createDataFile({
          fileName: 'bad',
          records,
          level: targetLevel,
          partition: ['2026-01-01', 9],
          bucket,
        }),
      ];
      const { generator } = scripted(levelZeroFiles(4), merge);
      generator.take(3);

      const error = captureError(() => generator.next());

      expect(error.details?.attribute).toBe('partition');
      expect(error.details?.expected).toEqual(['2026-01-01', 8]);
      expect(error.details?.actual).toEqual(['2026-01-01', 9]);
    });

    it('should reject merged files that lose records', () => {
      const merge: MergeScript = (records, targetLevel, partition, bucket) => [
        createDataFile({
          fileName: 'lossy',
          records: records.slice(0, 3),
          level: targetLevel,
          partition,
          bucket,
        }),
      ];
      const { generator } = scripted(levelZeroFiles(4), merge);
      generator.take(3);

      const error = captureError(() => generator.next());

      expect(error.code).toBe(ErrorCode.RECORD_COUNT_MISMATCH);
      expect(error.message).toBe('Merged files hold 3 records, expected 12');
    });
  });

  // ===========================================================================
  // Summaries
  // ===========================================================================

  describe('createManifestFileMeta', () => {
    it('should use the configured summary settings', () => {
      const { generator: base } = scripted(levelZeroFiles(4));
      const entries = base.take(9);

      const generator = ManifestTestDataGenerator.builder()
        .config(createConfig({ summary: { sizePerEntry: 10, fileNamePrefix: 'm-' } }))
        .supplier(new ScriptedFileSupplier({ files: [] }))
        .idGenerator(() => 'fixed')
        .build();

      expect(generator.createManifestFileMeta(entries)).toEqual({
        fileName: 'm-fixed',
        fileSize: 90,
        numAddedFiles: 5,
        numDeletedFiles: 4,
        partitionStats: [
          { min: '2026-01-01', max: '2026-01-01', nullCount: 0 },
          { min: 8, max: 8, nullCount: 0 },
        ],
      });
    });

    it('should summarize partitions of a custom partition type', () => {
      const files = levelZeroFiles(2).map(file =>
        createDataFile({
          fileName: file.meta.fileName,
          records: file.content,
          level: 0,
          partition: ['eu'],
          bucket: 0,
        })
      );
      const generator = ManifestTestDataGenerator.builder()
        .supplier(new ScriptedFileSupplier({ files }))
        .partitionType([{ name: 'region', type: 'string' }])
        .idGenerator(() => 'fixed')
        .build();

      expect(generator.createManifestFileMeta(generator.take(2))).toEqual({
        fileName: 'manifest-fixed',
        fileSize: 200,
        numAddedFiles: 2,
        numDeletedFiles: 0,
        partitionStats: [{ min: 'eu', max: 'eu', nullCount: 0 }],
      });
    });

    it('should reject partitions that do not fit the default partition type', () => {
      const file = generateDataFile({ partition: ['eu'] });
      const { generator } = scripted([file]);

      const error = captureError(() => generator.createManifestFileMeta(generator.take(1)));

      expect(error).toBeInstanceOf(ValidationError);
      expect(hasErrorCode(error, ErrorCode.VALIDATION_ERROR)).toBe(true);
    });

    it('should fail for an empty batch', () => {
      const { generator } = scripted([]);
      const error = captureError(() => generator.createManifestFileMeta([]));
      expect(error.code).toBe(ErrorCode.EMPTY_INPUT);
    });
  });

  // ===========================================================================
  // Construction
  // ===========================================================================

  describe('builder', () => {
    it('should default to three buckets', () => {
      const generator = ManifestTestDataGenerator.builder().seed(1).build();
      expect(generator.numBuckets).toBe(3);
      expect(generator.config.generator.memTableCapacity).toBe(3);
    });

    it('should apply settings over the base config', () => {
      const generator = ManifestTestDataGenerator.builder()
        .config(createConfig({ generator: { numBuckets: 8, seed: 5 } }))
        .numBuckets(2)
        .memTableCapacity(5)
        .build();

      expect(generator.config.generator).toEqual({ numBuckets: 2, memTableCapacity: 5, seed: 5 });
    });

    it('should forward settings to the default supplier', () => {
      const generator = ManifestTestDataGenerator.builder()
        .numBuckets(2)
        .memTableCapacity(5)
        .seed(11)
        .build();

      for (const entry of generator.take(10)) {
        expect(entry.totalBuckets).toBe(2);
        expect(entry.bucket).toBeLessThan(2);
      }
      const first = generator.liveFiles().find(f => f.level === 0);
      expect(first?.content).toHaveLength(5);
    });

    it('should reject an invalid configuration', () => {
      expect(() => ManifestTestDataGenerator.builder().numBuckets(0).build()).toThrow(
        ConfigurationError
      );
    });
  });

  // ===========================================================================
  // Logging
  // ===========================================================================

  describe('logging', () => {
    it('should log each merge and generation step at debug level', () => {
      const logger = createTestLogger();
      const generator = ManifestTestDataGenerator.builder()
        .supplier(new ScriptedFileSupplier({ files: levelZeroFiles(4) }))
        .logger(logger)
        .build();

      generator.take(9);

      const logs = logger.getLogsByLevel('debug');
      expect(logs.map(l => l.message)).toEqual([
        'generation step',
        'generation step',
        'generation step',
        'merged level',
        'generation step',
      ]);
      expect(logs[3].context).toEqual({
        service: 'manifest-generator',
        operation: 'mergeRecords',
        bucket: 0,
        partition: '["2026-01-01",8]',
        level: 1,
        filesDeleted: 4,
        filesAdded: 1,
        recordsMerged: 12,
      });
      expect(logs[4].context).toEqual({
        service: 'manifest-generator',
        operation: 'next',
        bucket: 0,
        partition: '["2026-01-01",8]',
        level: 1,
        merges: 1,
        recordsMerged: 12,
        entriesBuffered: 6,
      });
    });

    it('should stay quiet above debug level', () => {
      const logger = createTestLogger({ minLevel: 'info' });
      const generator = ManifestTestDataGenerator.builder()
        .supplier(new ScriptedFileSupplier({ files: levelZeroFiles(4) }))
        .logger(logger)
        .build();

      generator.take(9);

      expect(logger.getLogs()).toEqual([]);
    });
  });
});
