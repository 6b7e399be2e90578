/**
 * In-Memory Store Connector
 *
 * Process-local store with the same unique-trace-id rule as the SQL
 * connectors. Used by tests and by `--store memory` runs.
 *
 * @module storage/memory
 */

import type { StorageFailure } from '../pipeline/errors.js';
import { sleep } from '../pipeline/retry.js';
import type { StorableRow, StoreConnector, StoreTransaction, StoredRecord } from './connector.js';

/**
 * Error raised by the in-memory store.
 */
export class MemoryStoreError extends Error {
  constructor(
    message: string,
    /** Whether the same call may succeed if retried */
    public readonly transient: boolean
  ) {
    super(message);
    this.name = 'MemoryStoreError';
  }
}

export type MemoryStoreOperation = 'begin' | 'write' | 'commit' | 'rollback';

export interface InMemoryStoreOptions {
  /** Delay before each write completes, in ms */
  writeDelayMs?: number;
}

/**
 * In-memory connector. Committed rows live until `close()`.
 *
 * @example
 * ```typescript
 * const store = new InMemoryStoreConnector();
 * store.failNext('write', new MemoryStoreError('connection lost', true));
 * ```
 */
export class InMemoryStoreConnector implements StoreConnector {
  readonly name = 'memory';

  private readonly rows = new Map<string, StoredRecord>();
  private readonly faults = new Map<MemoryStoreOperation, Error[]>();
  private nextId = 1;
  private openTransactions = 0;

  constructor(private readonly options: InMemoryStoreOptions = {}) {}

  /**
   * Make the next call of `operation` throw `error`. Calls queue up.
   */
  failNext(operation: MemoryStoreOperation, error: Error): void {
    const queue = this.faults.get(operation) ?? [];
    queue.push(error);
    this.faults.set(operation, queue);
  }

  /** Transactions begun but neither committed nor rolled back */
  getOpenTransactionCount(): number {
    return this.openTransactions;
  }

  /** Number of committed rows */
  size(): number {
    return this.rows.size;
  }

  async begin(): Promise<StoreTransaction> {
    this.throwInjectedFault('begin');
    this.openTransactions++;

    let pending: StoredRecord | undefined;
    let inFlight: Promise<unknown> = Promise.resolve();
    let finished = false;

    const finish = (): void => {
      if (!finished) {
        finished = true;
        this.openTransactions--;
      }
    };

    const assertOpen = (): void => {
      if (finished) {
        throw new MemoryStoreError('transaction already finished', false);
      }
    };

    return {
      write: async (row: StorableRow): Promise<string> => {
        assertOpen();
        const writing = (async (): Promise<string> => {
          if (this.options.writeDelayMs) {
            await sleep(this.options.writeDelayMs);
          }
          if (finished) {
            throw new MemoryStoreError('transaction abandoned', true);
          }
          this.throwInjectedFault('write');
          this.assertTraceIdFree(row.traceId);
          if (pending?.traceId === row.traceId) {
            throw new MemoryStoreError('UNIQUE constraint failed: processed_results.trace_id', false);
          }
          const storageId = String(this.nextId++);
          pending = { ...row, metadata: { ...row.metadata }, storageId };
          return storageId;
        })();
        inFlight = writing.catch(() => undefined);
        return writing;
      },

      commit: async (): Promise<void> => {
        assertOpen();
        this.throwInjectedFault('commit');
        if (pending) {
          // Another transaction may have committed the same trace id meanwhile
          this.assertTraceIdFree(pending.traceId);
          this.rows.set(pending.storageId, pending);
        }
        finish();
      },

      rollback: async (): Promise<void> => {
        if (finished) {
          return;
        }
        await inFlight;
        if (finished) {
          return;
        }
        pending = undefined;
        finish();
        this.throwInjectedFault('rollback');
      },

      abandon: (): void => {
        pending = undefined;
        finish();
      },
    };
  }

  async findById(storageId: string): Promise<StoredRecord | null> {
    return this.rows.get(storageId) ?? null;
  }

  async findBySource(source: string): Promise<StoredRecord[]> {
    return [...this.rows.values()].filter((row) => row.source === source);
  }

  classify(error: unknown): StorageFailure {
    return error instanceof MemoryStoreError && error.transient ? 'transient' : 'permanent';
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  private assertTraceIdFree(traceId: string): void {
    for (const row of this.rows.values()) {
      if (row.traceId === traceId) {
        throw new MemoryStoreError('UNIQUE constraint failed: processed_results.trace_id', false);
      }
    }
  }

  private throwInjectedFault(operation: MemoryStoreOperation): void {
    const error = this.faults.get(operation)?.shift();
    if (error) {
      throw error;
    }
  }
}
