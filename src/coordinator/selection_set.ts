/**
 * @fileoverview Cross-source set of user-picked records
 *
 * Keyed by `<origin>::<key>` so the same citation key in two sources counts
 * as two selections. The UI toggles; searchers read `markFor` to pre-mark
 * incoming records. Both are synchronous, so a searcher never sees a toggle
 * half-applied.
 */

import { writeFile } from 'node:fs/promises';
import type { BibliographyCodec, EntryMap } from '../bibtex/types.js';
import { WriteBackError } from '../core/errors.js';
import type { BibRecord, RecordMark } from '../records/bib_record.js';
import { logInfo } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface WriteDestination {
  /** File the merged bibliography is written to */
  path: string;
  /** Records already in the destination; selected records are merged over them */
  base: readonly BibRecord[];
}

export interface WriteReport {
  path: string;
  written: number;
}

export class SelectionSet {
  private readonly entries = new Map<string, BibRecord>();

  get size(): number {
    return this.entries.size;
  }

  /** Add the record if absent, remove it if present. Returns the new membership. */
  toggle(record: BibRecord): boolean {
    const key = record.uniqueKey;
    if (this.entries.has(key)) {
      this.entries.delete(key);
      record.mark = 'none';
      return false;
    }
    this.entries.set(key, record);
    record.mark = 'selected';
    return true;
  }

  has(record: BibRecord): boolean {
    return this.entries.has(record.uniqueKey);
  }

  markFor(record: BibRecord): RecordMark {
    return this.has(record) ? 'selected' : 'none';
  }

  records(): BibRecord[] {
    return Array.from(this.entries.values());
  }

  /** Citation keys of the selected records, in selection order. */
  keys(): string[] {
    return this.records().map((record) => record.key);
  }

  /**
   * Write `base` plus every selected record to the destination, keyed by
   * citation key with later records winning. Nothing is written when any
   * merged record has no resolved entry.
   */
  async write(destination: WriteDestination, codec: BibliographyCodec): Promise<WriteReport> {
    const merged = new Map<string, BibRecord>();
    for (const record of destination.base) merged.set(record.key, record);
    for (const record of this.entries.values()) merged.set(record.key, record);

    const entries: EntryMap = new Map();
    for (const [key, record] of merged) {
      const entry = record.entry;
      if (!entry) {
        throw new WriteBackError(
          destination.path,
          'unresolved_record',
          `entry for ${record.uniqueKey} is ${record.resolution}`,
        );
      }
      entries.set(key, entry);
    }

    try {
      await codec.writeFile(destination.path, entries);
    } catch (error: unknown) {
      throw new WriteBackError(destination.path, 'io', getErrorMessage(error));
    }
    logInfo(`Wrote ${entries.size} entries to '${destination.path}'`);
    return { path: destination.path, written: entries.size };
  }

  /** Write the selected citation keys, comma-separated, truncating the file. */
  async writeKeys(filePath: string): Promise<void> {
    try {
      await writeFile(filePath, this.keys().join(','), 'utf8');
    } catch (error: unknown) {
      throw new WriteBackError(filePath, 'io', getErrorMessage(error));
    }
    logInfo(`Wrote selected keys to '${filePath}'`);
  }
}
