/**
 * @fileoverview Source capability interface
 *
 * Every bibliography provider, local or remote, is driven through the same
 * two calls: a one-time `load` and a per-keystroke `search`. The coordinator
 * never needs to know which variant it holds.
 */

import type { BibRecord } from '../records/bib_record.js';

export type SourceKind = 'local' | 'remote';

/** `ro` sources are only searched; the single `rw` source is also written back. */
export type SourceAccess = 'ro' | 'rw';

/** Terminal outcome of a load. */
export type LoadOutcome = 'ready' | 'no_file';

export interface Source {
  /** Expanded glob pattern or endpoint URL; identifies the source */
  readonly origin: string;
  readonly kind: SourceKind;
  /**
   * One-time acquisition. Safe to call more than once: later calls return the
   * first call's outcome without reloading.
   */
  load(): Promise<LoadOutcome>;
  /**
   * Lazy, restartable match stream. Blank input, and for local sources input
   * made only of short tokens, yields nothing.
   */
  search(text: string, generation: number): AsyncIterable<BibRecord>;
}

/** A source backed by files, whose loaded records can be written back. */
export interface LocalSource extends Source {
  readonly kind: 'local';
  /** Files the glob matched; empty until loaded */
  readonly files: readonly string[];
  /** Every record parsed at load time, in file order */
  records(): readonly BibRecord[];
}

export interface RemoteSource extends Source {
  readonly kind: 'remote';
}

export function isLocalSource(source: Source): source is LocalSource {
  return source.kind === 'local';
}
