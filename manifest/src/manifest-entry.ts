/**
 * @lsmgen/manifest - Manifest Entries
 *
 * Construction, identity and net-effect merging of manifest entries.
 */

import {
  ValidationError,
  type DataFile,
  type ManifestEntry,
  type PartitionKey,
  type ValueKind,
} from '@lsmgen/core';

/**
 * Build a frozen entry announcing `file` as added or deleted
 */
export function createManifestEntry(
  kind: ValueKind,
  file: DataFile,
  totalBuckets: number
): ManifestEntry {
  return Object.freeze({
    kind,
    partition: file.partition,
    bucket: file.bucket,
    totalBuckets,
    file: file.meta,
  });
}

/**
 * Fields that tie an ADD entry to the DELETE that later removes the same file
 */
export interface EntryIdentifier {
  readonly partition: PartitionKey;
  readonly bucket: number;
  readonly level: number;
  readonly fileName: string;
}

export function entryIdentifier(entry: ManifestEntry): EntryIdentifier {
  return {
    partition: entry.partition,
    bucket: entry.bucket,
    level: entry.file.level,
    fileName: entry.file.fileName,
  };
}

/**
 * Canonical string form of an entry identifier, usable as a map key
 */
export function entryIdentifierKey(entry: ManifestEntry): string {
  const id = entryIdentifier(entry);
  return JSON.stringify([id.partition, id.bucket, id.level, id.fileName]);
}

/**
 * Apply entries in order and return their net effect.
 *
 * A DELETE cancels an earlier ADD of the same file. A DELETE with no
 * matching ADD is kept, since the file may have been added by an earlier
 * batch. Adding a file that is already live fails.
 *
 * @example
 * ```typescript
 * const live = mergeManifestEntries(entries).filter(e => e.kind === 'ADD');
 * ```
 */
export function mergeManifestEntries(entries: Iterable<ManifestEntry>): ManifestEntry[] {
  const merged = new Map<string, ManifestEntry>();

  for (const entry of entries) {
    const key = entryIdentifierKey(entry);
    if (entry.kind === 'ADD') {
      if (merged.has(key)) {
        throw new ValidationError(
          `Trying to add file ${entry.file.fileName} which is already added`,
          undefined,
          { operation: 'mergeManifestEntries', ...entryIdentifier(entry) }
        );
      }
      merged.set(key, entry);
    } else if (merged.get(key)?.kind === 'ADD') {
      merged.delete(key);
    } else {
      merged.set(key, entry);
    }
  }

  return [...merged.values()];
}
