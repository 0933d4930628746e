// ---------------------------------------------------------------------------
// Concurrency control utilities wrapping p-limit.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import type { LimitFunction } from "p-limit";
import type { Awaitable } from "../core/types.js";

/**
 * A pool that caps the number of in-flight operations.
 *
 * With `maxConcurrency = 1` the pool is an exclusive queue: tasks run one
 * at a time in submission order.
 */
export class ConcurrencyPool {
  private readonly limiter: LimitFunction;

  constructor(maxConcurrency = 20) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError("maxConcurrency must be a positive integer");
    }
    this.limiter = pLimit(maxConcurrency);
  }

  /**
   * Run `fn` within the concurrency limit.
   *
   * Resolves once a slot is available and `fn` completes. A synchronous
   * throw inside `fn` becomes a rejection.
   */
  run<T>(fn: () => Awaitable<T>): Promise<T> {
    return this.limiter<[], T>(fn);
  }

  /** Tasks currently running. */
  get activeCount(): number {
    return this.limiter.activeCount;
  }

  /** Tasks waiting for a slot. */
  get pendingCount(): number {
    return this.limiter.pendingCount;
  }
}
