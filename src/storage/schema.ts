/**
 * Table Definitions
 *
 * @module storage/schema
 */

/**
 * SQLite DDL. `metadata` holds a JSON string.
 */
export const SQLITE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS processed_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  trace_id TEXT NOT NULL UNIQUE,
  source TEXT NOT NULL,
  original_content TEXT NOT NULL,
  cleaned_content TEXT NOT NULL,
  sentiment TEXT NOT NULL CHECK (sentiment IN ('positive', 'neutral', 'negative')),
  sentiment_score REAL NOT NULL,
  confidence REAL NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  processed_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_processed_results_source ON processed_results(source);
`;

/**
 * PostgreSQL DDL.
 */
export const POSTGRES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS processed_results (
  id BIGSERIAL PRIMARY KEY,
  trace_id TEXT NOT NULL UNIQUE,
  source TEXT NOT NULL,
  original_content TEXT NOT NULL,
  cleaned_content TEXT NOT NULL,
  sentiment TEXT NOT NULL CHECK (sentiment IN ('positive', 'neutral', 'negative')),
  sentiment_score DOUBLE PRECISION NOT NULL,
  confidence DOUBLE PRECISION NOT NULL,
  metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
  processed_at TIMESTAMPTZ NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_processed_results_source ON processed_results(source);
`;
