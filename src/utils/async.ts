/**
 * @fileoverview Async Utilities
 *
 * Shared async helper functions used across the codebase.
 *
 * @packageDocumentation
 */

import { setImmediate as nextTurn } from 'node:timers/promises';

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Custom error code to attach to timeout errors */
  errorCode?: string;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly code?: string;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string, errorCode?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.code = errorCode;
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds (if <= 0 or undefined, returns promise as-is)
 * @param options - Optional configuration for error messages
 * @returns The result of the promise if it resolves before timeout
 * @throws TimeoutError if the promise does not resolve within timeoutMs
 *
 * @example
 * ```typescript
 * const response = await withTimeout(fetch(url), 10000, { context: `GET ${url}` });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  // If no valid timeout, return the promise directly
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError(timeoutMs, options?.context, options?.errorCode));
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * One-shot gate. `wait()` resolves once `release()` has been called; later
 * calls to `release()` are ignored.
 */
export class Latch {
  private released = false;
  private readonly promise: Promise<void>;
  private resolvePromise: () => void = () => {};

  constructor() {
    this.promise = new Promise<void>((resolve) => {
      this.resolvePromise = resolve;
    });
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.resolvePromise();
  }

  wait(): Promise<void> {
    return this.promise;
  }
}

/**
 * Give pending I/O callbacks and other workers a turn before continuing a
 * long synchronous scan.
 */
export async function yieldToEventLoop(): Promise<void> {
  await nextTurn();
}
