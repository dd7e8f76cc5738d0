/**
 * @fileoverview bibsearch - federated bibliography lookup
 *
 * Searches several bibliography sources at once (local BibTeX globs and a
 * DBLP-style web API) behind one live-updating query, and writes the picked
 * entries back to a BibTeX file.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { CitationJsCodec, SearchCoordinator, createLocalSource } from 'bibsearch';
 *
 * const codec = new CitationJsCodec();
 * const coordinator = new SearchCoordinator({
 *   codec,
 *   sources: [{ source: createLocalSource({ pattern: 'refs/*.bib', codec }), access: 'rw' }],
 * });
 * coordinator.start();
 * coordinator.search('graph search');
 * ```
 *
 * @packageDocumentation
 */

export * from './coordinator/index.js';
export * from './sources/index.js';
export * from './config/index.js';

export { BibRecord, displayVenue, displayYear, formatName, UNKNOWN_FIELD, type BibRecordInit, type EntryResolution, type EntryResolver, type RecordMark } from './records/bib_record.js';
export { MIN_TOKEN_LENGTH, isTrivialQuery, matchesQuery, matchesTokens, significantTokens, type Matchable } from './records/query.js';
export { CitationJsCodec, entryKey } from './bibtex/codec.js';
export type { BibliographyCodec, CslDate, CslEntry, CslName, EntryMap } from './bibtex/types.js';

export {
  BibsearchError,
  BibtexParseError,
  ConfigError,
  RemoteSearchError,
  StatusTransitionError,
  WriteBackError,
  isBibsearchError,
  type ErrorJSON,
  type RemoteFailureReason,
  type WriteBackFailure,
} from './core/errors.js';
export { configureLogger, resetLogger, logDebug, logError, logInfo, logWarning, type LogLevel, type LoggerOptions } from './telemetry/logger.js';

export { TerminalApp, type ExitReason, type TerminalAppOptions } from './ui/terminal_app.js';
export { BIBSEARCH_VERSION, runCli } from './cli/run.js';
