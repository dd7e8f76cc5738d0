import { StatusTransitionError } from '../core/errors.js';

export type SourceStatus = 'initialized' | 'loading' | 'ready' | 'no_file' | 'searching';

const TRANSITIONS: Record<SourceStatus, readonly SourceStatus[]> = {
  initialized: ['loading'],
  loading: ['ready', 'no_file'],
  ready: ['searching'],
  searching: ['ready'],
  no_file: [],
};

const MAX_HISTORY = 64;

const LABELS: Record<SourceStatus, string> = {
  initialized: 'initialized',
  loading: 'loading',
  ready: 'ready',
  no_file: 'no file',
  searching: 'searching',
};

export function canTransition(from: SourceStatus, to: SourceStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function statusLabel(status: SourceStatus): string {
  return LABELS[status];
}

/**
 * Status of one source. Each source owns its own cell, so updates to
 * different sources never contend; `set` validates and applies in one
 * synchronous step, so readers never observe a half-applied change.
 */
export class StatusCell {
  private current: SourceStatus = 'initialized';
  private readonly history: SourceStatus[] = ['initialized'];

  constructor(readonly owner: string) {}

  get(): SourceStatus {
    return this.current;
  }

  /** Recent statuses the cell has held, oldest first. */
  transitions(): readonly SourceStatus[] {
    return this.history;
  }

  set(next: SourceStatus): void {
    if (!canTransition(this.current, next)) {
      throw new StatusTransitionError(this.owner, this.current, next);
    }
    this.current = next;
    this.history.push(next);
    if (this.history.length > MAX_HISTORY) {
      this.history.shift();
    }
  }
}
