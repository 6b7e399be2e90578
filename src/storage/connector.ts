/**
 * Store Connector Contract
 *
 * The narrow interface the storage stage persists through. Durability and
 * isolation come from the store behind it; the connector only opens
 * transactions, reads rows back and classifies its own errors.
 *
 * @module storage/connector
 */

import { z } from 'zod';
import { SentimentSchema, type Sentiment } from '../schemas/records.js';
import { describeError, type StorageFailure } from '../pipeline/errors.js';

// ============================================================================
// Row Types
// ============================================================================

/** Table every connector writes to */
export const PROCESSED_RESULTS_TABLE = 'processed_results';

/**
 * One row as handed to StoreTransaction.write.
 */
export interface StorableRow {
  /** Unique per stored row; a second write with the same trace id is a constraint failure */
  traceId: string;
  source: string;
  originalContent: string;
  cleanedContent: string;
  sentiment: Sentiment;
  sentimentScore: number;
  confidence: number;
  metadata: Record<string, unknown>;
  processedAt: string;
}

/**
 * A row read back from the store.
 */
export interface StoredRecord extends StorableRow {
  storageId: string;
}

// ============================================================================
// Connector Interfaces
// ============================================================================

/**
 * One open transaction. Exactly one of commit/rollback ends it.
 */
export interface StoreTransaction {
  /**
   * Insert one row.
   *
   * @returns The storage id assigned by the store
   */
  write(row: StorableRow): Promise<string>;

  commit(): Promise<void>;

  /**
   * Discard everything written in this transaction. Waits for an in-flight
   * write to settle first. Safe to call after a failed commit.
   */
  rollback(): Promise<void>;

  /**
   * End the transaction now, without waiting for an in-flight write.
   * Nothing written in it may ever become visible. Used when a deadline
   * fires while a write is still pending.
   */
  abandon(reason: Error): void;
}

export interface StoreConnector {
  /** Short driver name for logs, e.g. 'sqlite' */
  readonly name: string;

  begin(): Promise<StoreTransaction>;

  findById(storageId: string): Promise<StoredRecord | null>;

  /** Rows for a source label, oldest first */
  findBySource(source: string): Promise<StoredRecord[]>;

  /**
   * Decide whether an error raised by this connector may succeed on retry.
   */
  classify(error: unknown): StorageFailure;

  close(): Promise<void>;
}

// ============================================================================
// Row Parsing
// ============================================================================

const MetadataObjectSchema = z.record(z.string(), z.unknown());

/**
 * Metadata column: a JSON string (SQLite TEXT) or an object (PostgreSQL JSONB).
 */
const MetadataColumnSchema = z.union([z.string(), MetadataObjectSchema]).transform((value, ctx) => {
  if (typeof value !== 'string') {
    return value;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `metadata is not valid JSON: ${describeError(error)}` });
    return z.NEVER;
  }
  const result = MetadataObjectSchema.safeParse(parsed);
  if (!result.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'metadata is not a JSON object' });
    return z.NEVER;
  }
  return result.data;
});

/**
 * Timestamp column: ISO text (SQLite) or a Date (PostgreSQL TIMESTAMPTZ).
 */
const TimestampColumnSchema = z.union([z.string(), z.date()]).transform((value) =>
  typeof value === 'string' ? value : value.toISOString()
);

/**
 * A `processed_results` row as returned by a driver, in snake_case.
 * Ids arrive as numbers (SQLite INTEGER) or strings (PostgreSQL BIGINT).
 */
export const ProcessedResultRowSchema = z
  .object({
    id: z.union([z.number().int(), z.string().min(1)]),
    trace_id: z.string(),
    source: z.string(),
    original_content: z.string(),
    cleaned_content: z.string(),
    sentiment: SentimentSchema,
    sentiment_score: z.coerce.number(),
    confidence: z.coerce.number(),
    metadata: MetadataColumnSchema,
    processed_at: TimestampColumnSchema,
  })
  .transform(
    (row): StoredRecord => ({
      storageId: String(row.id),
      traceId: row.trace_id,
      source: row.source,
      originalContent: row.original_content,
      cleanedContent: row.cleaned_content,
      sentiment: row.sentiment,
      sentimentScore: row.sentiment_score,
      confidence: row.confidence,
      metadata: row.metadata,
      processedAt: row.processed_at,
    })
  );

/**
 * Parse a driver row into a StoredRecord.
 *
 * @throws ZodError if the row does not have the table's shape
 */
export function parseStoredRow(row: unknown): StoredRecord {
  return ProcessedResultRowSchema.parse(row);
}
