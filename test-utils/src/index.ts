/**
 * @lsmgen/test-utils
 *
 * Shared test utilities and data generators for the manifest fixture
 * generator.
 *
 * Provides:
 * - A seedable PRNG
 * - Key/value record generators partitioned by (dt, hr)
 * - Raw file suppliers (random and scripted)
 * - Data file fixture helpers
 */

export { SeededRandom, createRandom } from './random.js';

export {
  PARTITION_TYPE,
  KeyValueGenerator,
  type KeyValueGeneratorOptions,
} from './key-values.js';

export {
  BYTES_PER_RECORD,
  createDataFile,
  sortRecords,
  DataFileTestDataGenerator,
  ScriptedFileSupplier,
  generateRecords,
  generateDataFile,
  resetFixtureCounters,
  type CreateDataFileOptions,
  type DataFileGeneratorOptions,
  type MergeScript,
  type ScriptedFileSupplierOptions,
  type LevelZeroFileOptions,
} from './data-files.js';
