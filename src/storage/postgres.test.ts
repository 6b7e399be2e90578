/**
 * Tests for the PostgreSQL store connector against an in-process fake pool
 */

import { describe, it, expect } from '@jest/globals';
import type { PgClientLike, PgPoolLike, PgQueryResultLike } from './postgres.js';
import { PostgresStoreConnector } from './postgres.js';
import type { StorableRow } from './connector.js';
import { DeadlineExceededError } from '../pipeline/deadline.js';
import { StorageError } from '../pipeline/errors.js';
import { StorageStage } from '../stages/store.js';
import { RecordingLogger } from '../../tests/helpers/recording-logger.js';
import { analyzedText } from '../../tests/helpers/records.js';
import { rejectionOf } from '../../tests/helpers/errors.js';

type Responder = (text: string, values?: unknown[]) => Promise<PgQueryResultLike>;

const defaultResponder: Responder = async (text) =>
  text.includes('INSERT INTO') ? { rows: [{ id: '7' }] } : { rows: [] };

class FakePgClient implements PgClientLike {
  readonly queries: string[] = [];
  readonly releases: Array<Error | boolean | undefined> = [];

  constructor(private readonly respond: Responder) {}

  async query(text: string, values?: unknown[]): Promise<PgQueryResultLike> {
    this.queries.push(text.trim().split(/\s+/)[0]);
    return this.respond(text, values);
  }

  release(error?: Error | boolean): void {
    this.releases.push(error);
  }
}

class FakePgPool implements PgPoolLike {
  readonly clients: FakePgClient[] = [];
  readonly poolQueries: string[] = [];
  ended = false;

  constructor(private readonly respond: Responder = defaultResponder) {}

  async connect(): Promise<PgClientLike> {
    const client = new FakePgClient(this.respond);
    this.clients.push(client);
    return client;
  }

  async query(text: string, values?: unknown[]): Promise<PgQueryResultLike> {
    this.poolQueries.push(text.trim().split(/\s+/)[0]);
    return this.respond(text, values);
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

const row: StorableRow = {
  traceId: 't-1',
  source: 'ticket',
  originalContent: 'slow reply',
  cleanedContent: 'slow reply',
  sentiment: 'neutral',
  sentimentScore: 0,
  confidence: 0.5,
  metadata: {},
  processedAt: '2024-05-01T10:00:00.000Z',
};

describe('PostgresStoreConnector', () => {
  it('should create the schema once and run BEGIN, INSERT, COMMIT on one client', async () => {
    const pool = new FakePgPool();
    const store = new PostgresStoreConnector(pool);

    const tx = await store.begin();
    const id = await tx.write(row);
    await tx.commit();
    await (await store.begin()).rollback();

    expect(id).toBe('7');
    expect(pool.poolQueries).toEqual(['CREATE']);
    expect(pool.clients[0].queries).toEqual(['BEGIN', 'INSERT', 'COMMIT']);
    expect(pool.clients[0].releases).toEqual([undefined]);
  });

  it('should roll back after a rejected write and classify it', async () => {
    const violation = pgError('duplicate key value violates unique constraint', '23505');
    const pool = new FakePgPool(async (text) => {
      if (text.includes('INSERT INTO')) {
        throw violation;
      }
      return { rows: [] };
    });
    const store = new PostgresStoreConnector(pool);

    const tx = await store.begin();
    await expect(tx.write(row)).rejects.toBe(violation);
    await tx.rollback();

    expect(store.classify(violation)).toBe('permanent');
    expect(pool.clients[0].queries).toEqual(['BEGIN', 'INSERT', 'ROLLBACK']);
    expect(pool.clients[0].releases).toEqual([undefined]);
  });

  it('should destroy the client when BEGIN fails', async () => {
    const lost = pgError('Connection terminated unexpectedly', 'ECONNRESET');
    const pool = new FakePgPool(async (text) => {
      if (text === 'BEGIN') {
        throw lost;
      }
      return { rows: [] };
    });
    const store = new PostgresStoreConnector(pool);

    await expect(store.begin()).rejects.toBe(lost);
    expect(pool.clients[0].releases).toEqual([lost]);
    expect(store.classify(lost)).toBe('transient');
  });

  it('should destroy the client and rethrow when ROLLBACK fails', async () => {
    const lost = pgError('Connection terminated', '08006');
    const pool = new FakePgPool(async (text) => {
      if (text === 'ROLLBACK') {
        throw lost;
      }
      return { rows: [] };
    });
    const store = new PostgresStoreConnector(pool);

    const tx = await store.begin();
    await expect(tx.rollback()).rejects.toBe(lost);
    expect(pool.clients[0].releases).toEqual([lost]);
  });

  it('should destroy the client on abandon instead of queueing ROLLBACK', async () => {
    const pool = new FakePgPool(async (text) =>
      text.includes('INSERT INTO') ? new Promise<PgQueryResultLike>(() => undefined) : { rows: [] }
    );
    const store = new PostgresStoreConnector(pool);
    const reason = new Error('Operation timed out after 50ms');

    const tx = await store.begin();
    void tx.write(row);
    tx.abandon(reason);
    await tx.rollback();

    expect(pool.clients[0].queries).toEqual(['BEGIN', 'INSERT']);
    expect(pool.clients[0].releases).toEqual([reason]);
  });

  it('should bound the storage stage when an INSERT hangs', async () => {
    const pool = new FakePgPool(async (text) =>
      text.includes('INSERT INTO') ? new Promise<PgQueryResultLike>(() => undefined) : { rows: [] }
    );
    const stage = new StorageStage(new PostgresStoreConnector(pool), { timeoutMs: 50 });
    const startMs = Date.now();

    const error = await rejectionOf(
      stage.process(analyzedText('slow reply'), { traceId: 't-hung', logger: new RecordingLogger() }),
      StorageError
    );

    expect(Date.now() - startMs).toBeLessThan(500);
    expect(error.reason).toBe('deadline exceeded');
    expect(error.retryable).toBe(true);
    expect(pool.clients[0].releases).toHaveLength(1);
    expect(pool.clients[0].releases[0]).toBeInstanceOf(DeadlineExceededError);
    expect(pool.clients[0].queries).not.toContain('ROLLBACK');
  });

  it('should retry schema creation after a failure', async () => {
    let attempts = 0;
    const pool = new FakePgPool(async (text) => {
      if (text.includes('CREATE TABLE')) {
        attempts++;
        if (attempts === 1) {
          throw pgError('connection refused', 'ECONNREFUSED');
        }
      }
      return { rows: [] };
    });
    const store = new PostgresStoreConnector(pool);

    await expect(store.findBySource('ticket')).rejects.toThrow('connection refused');
    await expect(store.findBySource('ticket')).resolves.toEqual([]);
    expect(attempts).toBe(2);
  });

  it('should parse rows read back', async () => {
    const pool = new FakePgPool(async (text) =>
      text.startsWith('SELECT')
        ? {
            rows: [
              {
                id: '7',
                trace_id: 't-1',
                source: 'ticket',
                original_content: 'slow reply',
                cleaned_content: 'slow reply',
                sentiment: 'neutral',
                sentiment_score: 0,
                confidence: 0.5,
                metadata: {},
                processed_at: new Date('2024-05-01T10:00:00.000Z'),
              },
            ],
          }
        : { rows: [] }
    );
    const store = new PostgresStoreConnector(pool);

    expect(await store.findById('7')).toEqual({ ...row, storageId: '7' });
  });

  it('should not query for ids that cannot exist', async () => {
    const pool = new FakePgPool();
    const store = new PostgresStoreConnector(pool);

    expect(await store.findById('seven')).toBeNull();
    expect(pool.poolQueries).toEqual([]);
  });

  it('should end the pool on close', async () => {
    const pool = new FakePgPool();
    await new PostgresStoreConnector(pool).close();
    expect(pool.ended).toBe(true);
  });
});
