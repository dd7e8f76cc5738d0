/**
 * @fileoverview Many-producer, one-consumer repaint wake-up
 *
 * Workers call `request()` whenever something visible changed; the render
 * loop awaits `next()` and repaints once per wake. Requests never block and
 * coalesce: any number of requests made before the consumer comes back turn
 * into a single pending wake, and a request made while the consumer is busy
 * painting is kept so the following `next()` returns at once.
 */

export class RedrawSignal {
  private dirty = false;
  private closed = false;
  private waiter: ((woken: boolean) => void) | null = null;

  get pending(): boolean {
    return this.dirty;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  request(): void {
    if (this.closed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(true);
      return;
    }
    this.dirty = true;
  }

  /**
   * Resolves `true` once a repaint is due, or `false` after `close()`.
   * Only one caller may wait at a time.
   */
  next(): Promise<boolean> {
    if (this.dirty) {
      this.dirty = false;
      return Promise.resolve(true);
    }
    if (this.closed) return Promise.resolve(false);
    if (this.waiter) {
      return Promise.reject(new Error('RedrawSignal already has a waiting consumer'));
    }
    return new Promise<boolean>((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.dirty = false;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(false);
  }
}
