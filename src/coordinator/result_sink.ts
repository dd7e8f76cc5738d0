import type { BibRecord } from '../records/bib_record.js';

/**
 * Generation-gated collector for search results.
 *
 * `reset` starts a new generation and drops everything collected so far;
 * `add` only accepts records tagged with the current generation. Searches
 * still streaming for a superseded query keep running, but nothing they
 * produce is kept.
 */
export class ResultSink {
  private currentGeneration = 0;
  private items: BibRecord[] = [];
  private droppedCount = 0;

  get generation(): number {
    return this.currentGeneration;
  }

  get size(): number {
    return this.items.length;
  }

  /** Records rejected for carrying a stale generation since the last reset. */
  get dropped(): number {
    return this.droppedCount;
  }

  reset(generation: number): void {
    if (generation < this.currentGeneration) {
      throw new RangeError(`Generation ${generation} precedes current generation ${this.currentGeneration}`);
    }
    this.currentGeneration = generation;
    this.items = [];
    this.droppedCount = 0;
  }

  add(record: BibRecord, generation: number): boolean {
    if (generation !== this.currentGeneration) {
      this.droppedCount += 1;
      return false;
    }
    this.items.push(record);
    return true;
  }

  all(): readonly BibRecord[] {
    return this.items;
  }

  /** Accepted records whose owning source passes `isShown`, in arrival order. */
  visible(isShown: (record: BibRecord) => boolean): BibRecord[] {
    return this.items.filter(isShown);
  }
}
