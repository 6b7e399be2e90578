/**
 * Storage Layer
 *
 * Store connectors for the storage stage: SQLite, PostgreSQL and in-memory.
 *
 * @module storage
 */

// Connector contract
export {
  PROCESSED_RESULTS_TABLE,
  ProcessedResultRowSchema,
  parseStoredRow,
  type StorableRow,
  type StoredRecord,
  type StoreConnector,
  type StoreTransaction,
} from './connector.js';

// Error classification
export { classifySqliteError, classifyPostgresError, errorCode } from './classify.js';

// Connectors
export { SqliteStoreConnector, type SqliteStoreOptions } from './sqlite.js';
export {
  PostgresStoreConnector,
  createPostgresPool,
  type PgClientLike,
  type PgPoolLike,
  type PgQueryResultLike,
} from './postgres.js';
export {
  InMemoryStoreConnector,
  MemoryStoreError,
  type InMemoryStoreOptions,
  type MemoryStoreOperation,
} from './memory.js';

// Paths and schema
export {
  getDataDir,
  getDefaultDatabasePath,
  expandHomePath,
  resolveDatabasePath,
  DEFAULT_DB_FILENAME,
  SQLITE_MEMORY_FILENAME,
} from './paths.js';
export { SQLITE_SCHEMA_SQL, POSTGRES_SCHEMA_SQL } from './schema.js';
