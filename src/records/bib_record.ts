/**
 * @fileoverview Bibliographic record model
 *
 * A `BibRecord` is what every source yields: display fields, a key that is
 * unique within its source, a transient selection mark, and the CSL entry
 * that gets written back on commit. Remote records start without an entry and
 * resolve it lazily through a resolver supplied by their source.
 */

import type { CslEntry, CslName } from '../bibtex/types.js';
import { logError } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export const UNKNOWN_FIELD = 'Unknown';

export type RecordMark = 'selected' | 'none';

/**
 * Lifecycle of the entry behind a record. Local records are born `ready`;
 * remote ones go `unresolved -> fetching -> ready | failed`.
 */
export type EntryResolution = 'ready' | 'unresolved' | 'fetching' | 'failed';

export type EntryResolver = () => Promise<CslEntry>;

export interface BibRecordInit {
  /** Identity of the owning source (expanded glob or endpoint URL) */
  origin: string;
  /** File the record was parsed from, for local sources */
  file?: string;
  key: string;
  authors?: readonly string[];
  title?: string;
  year?: string;
  venue?: string;
  url?: string;
  /** Entry written back on commit; omit when a resolver supplies it later */
  entry?: CslEntry;
  resolver?: EntryResolver;
}

export class BibRecord {
  readonly origin: string;
  readonly file?: string;
  readonly key: string;
  readonly year?: string;
  readonly venue?: string;
  readonly url?: string;

  mark: RecordMark = 'none';

  private readonly rawAuthors: readonly string[];
  private readonly rawTitle?: string;
  private readonly resolver?: EntryResolver;
  private resolvedEntry?: CslEntry;
  private state: EntryResolution;
  private inFlight: Promise<CslEntry | undefined> | null = null;

  constructor(init: BibRecordInit) {
    this.origin = init.origin;
    this.file = init.file;
    this.key = init.key;
    this.rawAuthors = (init.authors ?? []).filter((name) => name.trim().length > 0);
    this.rawTitle = init.title;
    this.year = init.year;
    this.venue = init.venue;
    this.url = init.url;
    this.resolver = init.resolver;
    this.resolvedEntry = init.entry;
    this.state = init.entry ? 'ready' : 'unresolved';
  }

  /** Never empty: a record without authors reports a single "Unknown". */
  get authors(): readonly string[] {
    return this.rawAuthors.length > 0 ? this.rawAuthors : [UNKNOWN_FIELD];
  }

  get title(): string {
    return this.rawTitle && this.rawTitle.length > 0 ? this.rawTitle : UNKNOWN_FIELD;
  }

  get abbreviatedAuthors(): string {
    const [first, ...rest] = this.authors;
    return rest.length === 0 ? first : `${first} et al`;
  }

  get uniqueKey(): string {
    return `${this.origin}::${this.key}`;
  }

  /** Where the record came from, as shown next to its key. */
  get location(): string {
    return this.file ?? this.origin;
  }

  get resolution(): EntryResolution {
    return this.state;
  }

  /** Whether the full entry is fetched on demand rather than known up front. */
  get lazy(): boolean {
    return this.resolver !== undefined;
  }

  get entry(): CslEntry | undefined {
    return this.resolvedEntry;
  }

  /**
   * Fetch the entry if the record has a resolver and has not resolved yet.
   * Concurrent callers share one fetch; a failed fetch may be retried.
   * `onChange` fires on every resolution state change.
   */
  resolve(onChange?: () => void): Promise<CslEntry | undefined> {
    if (this.state === 'ready' || !this.resolver) {
      return Promise.resolve(this.resolvedEntry);
    }
    if (this.state === 'fetching' && this.inFlight) return this.inFlight;

    const resolver = this.resolver;
    this.state = 'fetching';
    onChange?.();
    this.inFlight = (async () => {
      try {
        this.resolvedEntry = await resolver();
        this.state = 'ready';
        return this.resolvedEntry;
      } catch (error: unknown) {
        this.state = 'failed';
        logError('Failed to resolve bibliography entry', {
          record: this.uniqueKey,
          error: getErrorMessage(error),
        });
        return undefined;
      } finally {
        this.inFlight = null;
        onChange?.();
      }
    })();
    return this.inFlight;
  }

  static fromEntry(origin: string, file: string | undefined, key: string, entry: CslEntry): BibRecord {
    return new BibRecord({
      origin,
      file,
      key,
      authors: (entry.author ?? []).map(formatName),
      title: entry.title,
      year: yearOf(entry),
      venue: venueOf(entry),
      url: urlOf(entry),
      entry,
    });
  }
}

export function formatName(name: CslName): string {
  if (name.literal) return name.literal;
  return [name.given, name.family].filter((part): part is string => Boolean(part)).join(' ');
}

function yearOf(entry: CslEntry): string | undefined {
  const first = entry.issued?.['date-parts']?.[0]?.[0];
  if (first !== undefined) return String(first);
  return entry.issued?.literal ?? entry.issued?.raw;
}

function venueOf(entry: CslEntry): string | undefined {
  if (entry['container-title']) return entry['container-title'];
  if (entry.publisher) return `Publisher: ${entry.publisher}`;
  return undefined;
}

function urlOf(entry: CslEntry): string | undefined {
  if (entry.URL) return entry.URL;
  if (entry.DOI) return `https://doi.org/${entry.DOI}`;
  return undefined;
}

export function displayYear(record: BibRecord): string {
  return record.year ?? UNKNOWN_FIELD;
}

export function displayVenue(record: BibRecord): string {
  return record.venue ?? UNKNOWN_FIELD;
}
