/**
 * Tests for ConcurrencyLimiter
 */

import { describe, it, expect } from '@jest/globals';
import { ConcurrencyLimiter } from './concurrency.js';

describe('ConcurrencyLimiter', () => {
  describe('constructor', () => {
    it('creates limiter with default limit of 4', () => {
      expect(new ConcurrencyLimiter().getStats().limit).toBe(4);
    });

    it('throws error for limit less than 1', () => {
      expect(() => new ConcurrencyLimiter(0)).toThrow('Concurrency limit must be at least 1');
    });

    it('throws error for non-integer limit', () => {
      expect(() => new ConcurrencyLimiter(2.5)).toThrow('Concurrency limit must be an integer');
    });
  });

  describe('acquire and release', () => {
    it('allows up to limit concurrent operations', async () => {
      const limiter = new ConcurrencyLimiter(2);
      let running = 0;
      let maxRunning = 0;

      const tasks = Array.from({ length: 5 }, () =>
        limiter.run(async () => {
          running++;
          maxRunning = Math.max(maxRunning, running);
          await new Promise((r) => setTimeout(r, 20));
          running--;
        })
      );
      await Promise.all(tasks);

      expect(maxRunning).toBe(2);
      expect(limiter.getStats()).toEqual({ running: 0, queued: 0, limit: 2 });
    });

    it('hands slots to waiters in FIFO order', async () => {
      const limiter = new ConcurrencyLimiter(1);
      const order: number[] = [];

      await limiter.acquire();
      const waiters = [1, 2, 3].map((n) => limiter.acquire().then(() => order.push(n)));
      expect(limiter.getStats().queued).toBe(3);

      limiter.release();
      await waiters[0];
      limiter.release();
      await waiters[1];
      limiter.release();
      await waiters[2];
      limiter.release();

      expect(order).toEqual([1, 2, 3]);
      expect(limiter.isAvailable()).toBe(true);
    });

    it('releases the slot when the task throws', async () => {
      const limiter = new ConcurrencyLimiter(1);

      await expect(limiter.run(async () => Promise.reject(new Error('task failed')))).rejects.toThrow('task failed');

      expect(limiter.isAvailable()).toBe(true);
    });

    it('throws on release without acquire', () => {
      expect(() => new ConcurrencyLimiter(1).release()).toThrow('release() called without matching acquire()');
    });
  });
});
