/**
 * Async Utility Functions
 *
 * Timeouts, sleeps, a FIFO mutex, cooperative cancellation and bounded
 * concurrency helpers shared by the reconciliation engine.
 *
 * @module
 */

import { CallTimeoutError } from "../core/errors.js";

// =============================================================================
// Timeout
// =============================================================================

/**
 * Wraps a promise with a timeout.
 * Rejects with a CallTimeoutError if the promise doesn't settle in time.
 *
 * @param promise - The promise to wrap
 * @param ms - Timeout in milliseconds
 * @param message - Custom timeout error message
 */
export async function timeout<T>(
  promise: Promise<T>,
  ms: number,
  message = "Operation timed out"
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new CallTimeoutError(message, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Mutex
// =============================================================================

/**
 * A simple async mutex for serializing access to a shared resource.
 * Uses a FIFO queue so waiters are served in order.
 */
export class Mutex {
  private _locked = false;
  private _waiters: Array<() => void> = [];

  /** Acquires the mutex, waiting if it's currently held. */
  async acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** Releases the mutex, waking the next waiter if any. */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._locked = false;
    }
  }

  /** Runs a function while holding the mutex, releasing on completion. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Cooperative cancellation flag. Work that has not started checks it and
 * stays unstarted; work in flight runs to completion.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;

  get cancelled(): boolean {
    return this._cancelled;
  }

  get reason(): string | undefined {
    return this._reason;
  }

  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
    }
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 * When a deadline is given, the token cancels itself once it elapses.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;
  private deadlineTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(deadlineMs?: number) {
    this.token = new CancellationToken();
    if (deadlineMs !== undefined && deadlineMs > 0) {
      this.deadlineTimer = setTimeout(() => this.cancel(`deadline of ${deadlineMs}ms elapsed`), deadlineMs);
      this.deadlineTimer.unref();
    }
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }

  /** Clears the deadline timer without cancelling the token. */
  dispose(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs promises in parallel with a concurrency limit.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 * @param concurrency - Maximum concurrent operations
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());

  await Promise.all(workers);
  return results;
}
