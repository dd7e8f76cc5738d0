export interface SearchRequest {
  text: string;
  generation: number;
}

/**
 * Latest search request posted to one source's searcher.
 *
 * Posting overwrites any request the searcher has not picked up yet, so a
 * burst of keystrokes collapses to the newest text. The searcher clears the
 * request with `settle(generation)` after finishing; a request that arrived
 * mid-search carries a newer generation and survives the settle.
 */
export class PendingSearch {
  private latest: SearchRequest | null = null;
  private requested = false;
  private closed = false;
  private waiter: (() => void) | null = null;

  get isRequested(): boolean {
    return this.requested;
  }

  get current(): SearchRequest | null {
    return this.latest;
  }

  post(request: SearchRequest): void {
    if (this.closed) return;
    this.latest = { ...request };
    this.requested = true;
    this.wake();
  }

  /**
   * Wait for a request and return a snapshot of the newest one, or `null`
   * once closed.
   */
  async take(): Promise<SearchRequest | null> {
    for (;;) {
      if (this.closed) return null;
      const latest = this.latest;
      if (this.requested && latest) return { ...latest };
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  settle(generation: number): void {
    if (this.latest?.generation === generation) {
      this.requested = false;
    }
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
