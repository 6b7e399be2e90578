/**
 * Concurrency control for batch submissions and single-connection stores.
 *
 * @module pipeline/concurrency
 */

/**
 * Statistics about the current state of the ConcurrencyLimiter.
 */
export interface ConcurrencyStats {
  /** Number of currently running operations */
  running: number;
  /** Number of operations waiting in queue */
  queued: number;
  /** Maximum concurrent operations allowed */
  limit: number;
}

/**
 * Semaphore with a FIFO queue of waiting callers.
 *
 * The batch runner uses it to bound in-flight submissions; the SQLite
 * connector uses a limit of 1 so transactions on its single connection
 * never interleave.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(4);
 * const outcome = await limiter.run(() => orchestrator.submit(raw));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;

  private running = 0;

  /** Pending acquire() calls waiting for a slot */
  private queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations (default: 4)
   * @throws RangeError if limit is not a positive integer
   */
  constructor(limit = 4) {
    if (!Number.isInteger(limit)) {
      throw new RangeError('Concurrency limit must be an integer');
    }
    if (limit < 1) {
      throw new RangeError('Concurrency limit must be at least 1');
    }
    this.limit = limit;
  }

  /**
   * Acquire a slot, waiting in FIFO order when none is free.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release a slot, handing it straight to the next waiter if there is one.
   *
   * @throws Error when called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    const next = this.queue.shift();
    if (next) {
      // Slot passes directly to the waiter; running count is unchanged
      next();
      return;
    }
    this.running--;
  }

  /**
   * Run `fn` inside a slot. The slot is released even if `fn` throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
    };
  }

  /**
   * Check whether acquire() would return without waiting.
   */
  isAvailable(): boolean {
    return this.running < this.limit;
  }
}
