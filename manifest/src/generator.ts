/**
 * @lsmgen/manifest - Manifest Test Data Generator
 *
 * Produces an endless stream of manifest entries that stays consistent with
 * leveled compaction: every new level-0 file is announced with an ADD, and
 * every merge triggered by level overflow with DELETEs for the replaced
 * files and ADDs for their replacements.
 *
 * Entries of one generation step are handed out newest first.
 */

import {
  ContractViolationError,
  ErrorCode,
  LsmGenError,
  NEW_FILE_LEVEL,
  ValidationError,
  partitionKeyId,
  type DataFile,
  type Logger,
  type ManifestEntry,
  type ManifestFileMeta,
  type PartitionType,
  type RawFileSupplier,
} from '@lsmgen/core';
import {
  DEFAULT_CONFIG,
  assertValidConfig,
  createConfig,
  type DeepPartial,
  type GeneratorSettings,
  type LsmGenConfig,
} from '@lsmgen/config';
import { createConsoleLogger, withContext } from '@lsmgen/observability';
import { DataFileTestDataGenerator } from '@lsmgen/test-utils';
import { EntryStack } from './entry-stack.js';
import { LevelStateTracker, type PartitionLevelView } from './level-state.js';
import { MergeCascade } from './merge-cascade.js';
import { createManifestEntry } from './manifest-entry.js';
import { summarize } from './summary.js';

export interface ManifestTestDataGeneratorOptions {
  /** Complete configuration; defaults to DEFAULT_CONFIG */
  config?: LsmGenConfig;
  /** Raw file source; defaults to a DataFileTestDataGenerator built from the config */
  supplier?: RawFileSupplier;
  /** Schema of the supplier's partition keys; defaults to (dt STRING, hr INT) */
  partitionType?: PartitionType;
  /** Defaults to a console logger at the configured level and format */
  logger?: Logger;
  /** Unique part of manifest file names; defaults to randomUUID */
  idGenerator?: () => string;
}

// =============================================================================
// Generator
// =============================================================================

/**
 * @example
 * ```typescript
 * const gen = ManifestTestDataGenerator.builder().numBuckets(3).seed(42).build();
 * const entries = gen.take(20);
 * const meta = gen.createManifestFileMeta(entries);
 * ```
 */
export class ManifestTestDataGenerator {
  readonly config: LsmGenConfig;
  private readonly supplier: RawFileSupplier;
  private readonly logger: Logger;
  private readonly partitionType?: PartitionType;
  private readonly idGenerator?: () => string;
  private readonly tracker: LevelStateTracker;
  private readonly cascade: MergeCascade;
  private readonly buffer = new EntryStack<ManifestEntry>();

  static builder(): ManifestTestDataGeneratorBuilder {
    return new ManifestTestDataGeneratorBuilder();
  }

  constructor(options: ManifestTestDataGeneratorOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    assertValidConfig(config);
    this.config = config;

    const { numBuckets, memTableCapacity, seed } = config.generator;
    this.supplier = options.supplier ?? new DataFileTestDataGenerator({
      numBuckets,
      memTableCapacity,
      seed: seed ?? undefined,
    });
    this.logger = withContext(
      options.logger ?? createConsoleLogger({
        minLevel: config.observability.logLevel,
        format: config.observability.logFormat,
      }),
      { service: 'manifest-generator' }
    );
    this.partitionType = options.partitionType;
    this.idGenerator = options.idGenerator;

    this.tracker = new LevelStateTracker(numBuckets);
    this.cascade = new MergeCascade({
      tracker: this.tracker,
      supplier: this.supplier,
      totalBuckets: numBuckets,
      logger: this.logger,
    });
  }

  get numBuckets(): number {
    return this.config.generator.numBuckets;
  }

  /** Entries generated but not yet returned */
  get bufferedEntries(): number {
    return this.buffer.size;
  }

  /**
   * Return the next manifest entry, running a generation step when the
   * buffer is empty
   */
  next(): ManifestEntry {
    if (this.buffer.isEmpty()) {
      this.generate();
    }
    const entry = this.buffer.pop();
    if (entry === undefined) {
      throw new LsmGenError('Generation step produced no entries', ErrorCode.INTERNAL_ERROR, {
        operation: 'next',
      });
    }
    return entry;
  }

  /**
   * Return the next `count` entries in next() order
   */
  take(count: number): ManifestEntry[] {
    if (!Number.isInteger(count) || count < 0) {
      throw ValidationError.outOfRange('count', count, { min: 0 });
    }
    return Array.from({ length: count }, () => this.next());
  }

  /**
   * Return every entry of the current generation step in next() order,
   * running a new step first when nothing is buffered
   */
  nextStep(): ManifestEntry[] {
    if (this.buffer.isEmpty()) {
      this.generate();
    }
    return this.buffer.drain();
  }

  /**
   * Summarize `entries` with the configured partition type, size and file
   * name prefix
   */
  createManifestFileMeta(entries: readonly ManifestEntry[]): ManifestFileMeta {
    return summarize(entries, {
      partitionType: this.partitionType,
      sizePerEntry: this.config.summary.sizePerEntry,
      fileNamePrefix: this.config.summary.fileNamePrefix,
      idGenerator: this.idGenerator,
    });
  }

  /** Files currently live at any level */
  liveFiles(): DataFile[] {
    return this.tracker.liveFiles();
  }

  /** Level sets of one bucket */
  partitions(bucket: number): PartitionLevelView[] {
    return this.tracker.partitions(bucket);
  }

  private generate(): void {
    const file = this.supplier.produceNewFile();
    this.checkNewFile(file);

    this.tracker.recordNewFile(file);
    this.buffer.push(createManifestEntry('ADD', file, this.numBuckets));
    const result = this.cascade.run(file.bucket, file.partition, this.buffer);

    this.logger.debug('generation step', {
      operation: 'next',
      bucket: file.bucket,
      partition: partitionKeyId(file.partition),
      level: result.deepestLevel,
      merges: result.merges,
      recordsMerged: result.recordsMerged,
      entriesBuffered: this.buffer.size,
    });
  }

  private checkNewFile(file: DataFile): void {
    const details = { operation: 'produceNewFile', fileName: file.meta.fileName };
    if (file.level !== NEW_FILE_LEVEL) {
      throw ContractViolationError.mismatch('level', NEW_FILE_LEVEL, file.level, details);
    }
    if (!Number.isInteger(file.bucket) || file.bucket < 0 || file.bucket >= this.numBuckets) {
      throw ContractViolationError.mismatch(
        'bucket',
        `[0, ${this.numBuckets})`,
        file.bucket,
        details
      );
    }
  }
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Fluent construction of a ManifestTestDataGenerator.
 *
 * Individual settings override the matching fields of `config()`.
 */
export class ManifestTestDataGeneratorBuilder {
  private baseConfig: LsmGenConfig = DEFAULT_CONFIG;
  private readonly generatorOverrides: DeepPartial<GeneratorSettings> = {};
  private rawSupplier?: RawFileSupplier;
  private partitionSchema?: PartitionType;
  private customLogger?: Logger;
  private ids?: () => string;

  config(config: LsmGenConfig): this {
    this.baseConfig = config;
    return this;
  }

  numBuckets(numBuckets: number): this {
    this.generatorOverrides.numBuckets = numBuckets;
    return this;
  }

  memTableCapacity(capacity: number): this {
    this.generatorOverrides.memTableCapacity = capacity;
    return this;
  }

  seed(seed: number | null): this {
    this.generatorOverrides.seed = seed;
    return this;
  }

  supplier(supplier: RawFileSupplier): this {
    this.rawSupplier = supplier;
    return this;
  }

  /** Partition schema of the supplier's files, used by createManifestFileMeta */
  partitionType(partitionType: PartitionType): this {
    this.partitionSchema = partitionType;
    return this;
  }

  logger(logger: Logger): this {
    this.customLogger = logger;
    return this;
  }

  idGenerator(idGenerator: () => string): this {
    this.ids = idGenerator;
    return this;
  }

  /**
   * @throws ConfigurationError when the resulting configuration is invalid
   */
  build(): ManifestTestDataGenerator {
    return new ManifestTestDataGenerator({
      config: createConfig({ generator: this.generatorOverrides }, this.baseConfig),
      supplier: this.rawSupplier,
      partitionType: this.partitionSchema,
      logger: this.customLogger,
      idGenerator: this.ids,
    });
  }
}
