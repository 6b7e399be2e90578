/**
 * SQLite Store Connector
 *
 * better-sqlite3 backend. The driver is synchronous and owns a single
 * connection, so transactions are serialized with a ConcurrencyLimiter(1):
 * `begin()` waits until the previous transaction has committed or rolled
 * back. Reads queue on the same limiter; on a shared connection they would
 * otherwise see rows an open transaction has not committed.
 *
 * @module storage/sqlite
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import type { StorageFailure } from '../pipeline/errors.js';
import { ConcurrencyLimiter } from '../pipeline/concurrency.js';
import { classifySqliteError } from './classify.js';
import { parseStoredRow, type StorableRow, type StoreConnector, type StoreTransaction, type StoredRecord } from './connector.js';
import { SQLITE_MEMORY_FILENAME } from './paths.js';
import { SQLITE_SCHEMA_SQL } from './schema.js';

export interface SqliteStoreOptions {
  /** Database file, or ':memory:' */
  filename: string;
  /** How long SQLite waits on a locked database before SQLITE_BUSY (default: 5000) */
  busyTimeoutMs?: number;
}

const INSERT_SQL = `
INSERT INTO processed_results (
  trace_id, source, original_content, cleaned_content,
  sentiment, sentiment_score, confidence, metadata, processed_at
) VALUES (
  @trace_id, @source, @original_content, @cleaned_content,
  @sentiment, @sentiment_score, @confidence, @metadata, @processed_at
)`;

const STORAGE_ID_PATTERN = /^[1-9]\d*$/;

/**
 * better-sqlite3 connector.
 *
 * @example
 * ```typescript
 * const store = new SqliteStoreConnector({ filename: '~/.textpipe/textpipe.db' });
 * const stage = new StorageStage(store);
 * // ...
 * await store.close();
 * ```
 */
export class SqliteStoreConnector implements StoreConnector {
  readonly name = 'sqlite';

  private readonly db: Database.Database;
  private readonly transactions = new ConcurrencyLimiter(1);

  constructor(options: SqliteStoreOptions) {
    if (options.filename !== SQLITE_MEMORY_FILENAME) {
      fs.mkdirSync(path.dirname(options.filename), { recursive: true });
    }

    this.db = new Database(options.filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
    this.db.exec(SQLITE_SCHEMA_SQL);
  }

  async begin(): Promise<StoreTransaction> {
    await this.transactions.acquire();
    try {
      this.db.exec('BEGIN IMMEDIATE');
    } catch (error) {
      this.transactions.release();
      throw error;
    }

    let finished = false;
    const finish = (): void => {
      if (!finished) {
        finished = true;
        this.transactions.release();
      }
    };

    return {
      write: async (row: StorableRow): Promise<string> => {
        if (finished) {
          throw new Error('transaction already finished');
        }
        const result = this.db.prepare(INSERT_SQL).run({
          trace_id: row.traceId,
          source: row.source,
          original_content: row.originalContent,
          cleaned_content: row.cleanedContent,
          sentiment: row.sentiment,
          sentiment_score: row.sentimentScore,
          confidence: row.confidence,
          metadata: JSON.stringify(row.metadata),
          processed_at: row.processedAt,
        });
        return String(result.lastInsertRowid);
      },

      commit: async (): Promise<void> => {
        if (finished) {
          throw new Error('transaction already finished');
        }
        // A failed COMMIT (e.g. SQLITE_BUSY) leaves the transaction open for rollback
        this.db.exec('COMMIT');
        finish();
      },

      rollback: async (): Promise<void> => {
        if (finished) {
          return;
        }
        try {
          if (this.db.inTransaction) {
            this.db.exec('ROLLBACK');
          }
        } finally {
          finish();
        }
      },

      abandon: (): void => {
        if (finished) {
          return;
        }
        // Statements run synchronously, so nothing is in flight
        try {
          if (this.db.inTransaction) {
            this.db.exec('ROLLBACK');
          }
        } finally {
          finish();
        }
      },
    };
  }

  async findById(storageId: string): Promise<StoredRecord | null> {
    if (!STORAGE_ID_PATTERN.test(storageId)) {
      return null;
    }
    return this.transactions.run(async () => {
      const row: unknown = this.db.prepare('SELECT * FROM processed_results WHERE id = ?').get(Number(storageId));
      return row === undefined ? null : parseStoredRow(row);
    });
  }

  async findBySource(source: string): Promise<StoredRecord[]> {
    return this.transactions.run(async () => {
      const rows: unknown[] = this.db
        .prepare('SELECT * FROM processed_results WHERE source = ? ORDER BY id')
        .all(source);
      return rows.map((row) => parseStoredRow(row));
    });
  }

  classify(error: unknown): StorageFailure {
    return classifySqliteError(error);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
