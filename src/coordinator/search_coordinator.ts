/**
 * @fileoverview Federated search coordinator
 *
 * Runs two long-lived async workers per source:
 *
 * - the loader moves the status through `loading` to `ready` or `no_file`
 *   and then opens the source's one-shot "loaded" latch;
 * - the searcher waits on that latch, exits for `no_file`, and otherwise
 *   serves search requests forever, streaming matches into the shared sink.
 *
 * Every keystroke mints a new generation, resets the sink to it and posts the
 * text to every source. In-flight searches are never interrupted; whatever
 * they produce for an older generation is refused by the sink.
 *
 * @packageDocumentation
 */

import type { BibliographyCodec } from '../bibtex/types.js';
import type { BibRecord } from '../records/bib_record.js';
import { isLocalSource, type LoadOutcome, type Source, type SourceAccess } from '../sources/types.js';
import { logDebug, logError } from '../telemetry/logger.js';
import { Latch } from '../utils/async.js';
import { getErrorMessage, WriteBackError } from '../utils/errors.js';
import { PendingSearch } from './pending_search.js';
import { RedrawSignal } from './redraw_signal.js';
import { ResultSink } from './result_sink.js';
import { SelectionSet } from './selection_set.js';
import { StatusCell, type SourceStatus } from './status_cell.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SourceRegistration {
  source: Source;
  /** Default: `ro` */
  access?: SourceAccess;
  /** Default: true */
  enabled?: boolean;
}

export interface CoordinatorOptions {
  sources: SourceRegistration[];
  codec: BibliographyCodec;
  /** Where the selected keys are written on commit, if anywhere */
  keysOutput?: string;
  redraw?: RedrawSignal;
  sink?: ResultSink;
  selection?: SelectionSet;
}

export interface CommitFailure {
  target: string;
  error: string;
}

export interface CommitReport {
  written: string[];
  failures: CommitFailure[];
}

/**
 * Runtime state the coordinator keeps for one source. `enabled` is a display
 * filter only; disabled sources keep loading and searching.
 */
export class SourceSlot {
  readonly status: StatusCell;
  readonly loaded = new Latch();
  readonly pending = new PendingSearch();
  enabled: boolean;

  constructor(
    readonly source: Source,
    readonly access: SourceAccess,
    readonly label: string,
    enabled: boolean,
  ) {
    this.status = new StatusCell(source.origin);
    this.enabled = enabled;
  }
}

// ============================================================================
// COORDINATOR
// ============================================================================

export class SearchCoordinator {
  readonly sink: ResultSink;
  readonly selection: SelectionSet;
  readonly redraw: RedrawSignal;

  private readonly slots: SourceSlot[];
  private readonly codec: BibliographyCodec;
  private readonly keysOutput?: string;
  private readonly workers: Promise<void>[] = [];
  private readonly resolving = new Set<Promise<void>>();
  private generation = 0;
  private started = false;

  constructor(options: CoordinatorOptions) {
    const writable = options.sources.filter((registration) => registration.access === 'rw');
    if (writable.length > 1) {
      throw new Error(`At most one read-write source is allowed, got ${writable.length}`);
    }
    this.slots = options.sources.map(
      (registration, index) =>
        new SourceSlot(registration.source, registration.access ?? 'ro', String(index + 1), registration.enabled ?? true),
    );
    this.codec = options.codec;
    this.keysOutput = options.keysOutput;
    this.redraw = options.redraw ?? new RedrawSignal();
    this.sink = options.sink ?? new ResultSink();
    this.selection = options.selection ?? new SelectionSet();
  }

  get sources(): readonly SourceSlot[] {
    return this.slots;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /** Start every loader and searcher. Later calls do nothing. */
  start(): void {
    if (this.started) return;
    this.started = true;
    for (const slot of this.slots) {
      this.workers.push(this.guard(slot, 'loader', () => this.runLoader(slot)));
      this.workers.push(this.guard(slot, 'searcher', () => this.runSearcher(slot)));
    }
  }

  /** Resolves once every source has finished loading. */
  async whenLoaded(): Promise<void> {
    await Promise.all(this.slots.map((slot) => slot.loaded.wait()));
  }

  /**
   * Dispatch new search text to every source and return its generation.
   */
  search(text: string): number {
    this.generation += 1;
    const generation = this.generation;
    this.sink.reset(generation);
    for (const slot of this.slots) {
      slot.pending.post({ text, generation });
    }
    this.redraw.request();
    return generation;
  }

  /**
   * Toggle a record's selection. Selecting a record whose entry is not yet
   * resolved starts resolving it in the background.
   */
  toggle(record: BibRecord): boolean {
    const selected = this.selection.toggle(record);
    if (selected && record.resolution !== 'ready') {
      const task: Promise<void> = record
        .resolve(() => this.redraw.request())
        .then(() => {
          this.resolving.delete(task);
        });
      this.resolving.add(task);
    }
    this.redraw.request();
    return selected;
  }

  // ==========================================================================
  // DISPLAY FILTERS
  // ==========================================================================

  setEnabled(index: number, enabled: boolean): boolean {
    const slot = this.slots[index];
    if (!slot) return false;
    slot.enabled = enabled;
    this.redraw.request();
    return true;
  }

  toggleEnabled(index: number): boolean {
    const slot = this.slots[index];
    if (!slot) return false;
    return this.setEnabled(index, !slot.enabled);
  }

  setAllEnabled(enabled: boolean): void {
    for (const slot of this.slots) slot.enabled = enabled;
    this.redraw.request();
  }

  isOriginEnabled(origin: string): boolean {
    return this.slots.some((slot) => slot.enabled && slot.source.origin === origin);
  }

  /** Current-generation results whose source is enabled. */
  visibleResults(): BibRecord[] {
    return this.sink.visible((record) => this.isOriginEnabled(record.origin));
  }

  statusOf(index: number): SourceStatus | undefined {
    return this.slots[index]?.status.get();
  }

  // ==========================================================================
  // COMMIT & SHUTDOWN
  // ==========================================================================

  /**
   * Write the read-write source merged with the selection, then the selected
   * keys. Each writer failure is logged and reported; none is thrown.
   */
  async commit(): Promise<CommitReport> {
    const report: CommitReport = { written: [], failures: [] };
    await Promise.all(this.selection.records().map((record) => record.resolve()));

    for (const slot of this.slots) {
      if (slot.access !== 'rw') continue;
      try {
        const path = await this.outputPathOf(slot);
        const base = isLocalSource(slot.source) ? slot.source.records() : [];
        const result = await this.selection.write({ path, base }, this.codec);
        report.written.push(result.path);
      } catch (error: unknown) {
        logError('Write-back failed', { source: slot.source.origin, error: getErrorMessage(error) });
        report.failures.push({ target: slot.source.origin, error: getErrorMessage(error) });
      }
    }

    if (this.keysOutput) {
      try {
        await this.selection.writeKeys(this.keysOutput);
        report.written.push(this.keysOutput);
      } catch (error: unknown) {
        logError('Writing selected keys failed', { path: this.keysOutput, error: getErrorMessage(error) });
        report.failures.push({ target: this.keysOutput, error: getErrorMessage(error) });
      }
    }
    return report;
  }

  /** Stop accepting requests and wait for every worker to return. */
  async stop(): Promise<void> {
    this.close();
    await Promise.all(this.workers);
    await Promise.all(this.resolving);
  }

  /** Release idle searchers without waiting for busy ones. */
  close(): void {
    for (const slot of this.slots) slot.pending.close();
  }

  // ==========================================================================
  // WORKERS
  // ==========================================================================

  private async runLoader(slot: SourceSlot): Promise<void> {
    slot.status.set('loading');
    this.redraw.request();

    let outcome: LoadOutcome;
    try {
      outcome = await slot.source.load();
    } catch (error: unknown) {
      logError('Loading failed', { source: slot.source.origin, error: getErrorMessage(error) });
      outcome = 'no_file';
    }

    slot.status.set(outcome);
    this.redraw.request();
    slot.loaded.release();
  }

  private async runSearcher(slot: SourceSlot): Promise<void> {
    await slot.loaded.wait();
    if (slot.status.get() === 'no_file') {
      logDebug('Searcher idle: source has no file', { source: slot.source.origin });
      return;
    }

    for (;;) {
      const request = await slot.pending.take();
      if (!request) return;

      slot.status.set('searching');
      this.redraw.request();

      try {
        for await (const record of slot.source.search(request.text, request.generation)) {
          if (request.generation !== this.generation) break;
          record.mark = this.selection.markFor(record);
          if (this.sink.add(record, request.generation)) {
            this.redraw.request();
          }
        }
      } catch (error: unknown) {
        logError('Search failed', {
          source: slot.source.origin,
          generation: request.generation,
          error: getErrorMessage(error),
        });
      }

      slot.status.set('ready');
      this.redraw.request();
      slot.pending.settle(request.generation);
    }
  }

  private async guard(slot: SourceSlot, role: 'loader' | 'searcher', run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error: unknown) {
      logError(`Source ${role} stopped unexpectedly`, { source: slot.source.origin, error: getErrorMessage(error) });
    }
  }

  private async outputPathOf(slot: SourceSlot): Promise<string> {
    await slot.loaded.wait();
    if (!isLocalSource(slot.source)) {
      throw new WriteBackError(slot.source.origin, 'ambiguous_target', 'only file-backed sources can be written');
    }
    const files = slot.source.files;
    if (files.length > 1) {
      throw new WriteBackError(slot.source.origin, 'ambiguous_target', `glob matches ${files.length} files`);
    }
    return files[0] ?? slot.source.origin;
  }
}
