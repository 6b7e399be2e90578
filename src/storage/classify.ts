/**
 * Driver Error Classification
 *
 * Maps driver error codes to transient or permanent failures.
 *
 * @module storage/classify
 */

import type { StorageFailure } from '../pipeline/errors.js';

/**
 * Read the string `code` property drivers attach to their errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Node socket errors raised while talking to a server */
const TRANSIENT_SOCKET_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE']);

// ============================================================================
// SQLite
// ============================================================================

const PERMANENT_SQLITE_CODES = new Set(['SQLITE_MISMATCH', 'SQLITE_TOOBIG']);
const TRANSIENT_SQLITE_PREFIXES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR'];

/**
 * Classify a better-sqlite3 error by its extended result code.
 *
 * @example
 * ```typescript
 * classifySqliteError(Object.assign(new Error('x'), { code: 'SQLITE_BUSY_SNAPSHOT' })); // 'transient'
 * ```
 */
export function classifySqliteError(error: unknown): StorageFailure {
  const code = errorCode(error);
  if (!code) {
    return 'permanent';
  }
  if (code.startsWith('SQLITE_CONSTRAINT') || PERMANENT_SQLITE_CODES.has(code)) {
    return 'permanent';
  }
  if (code === 'SQLITE_FULL' || TRANSIENT_SQLITE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
    return 'transient';
  }
  return 'permanent';
}

// ============================================================================
// PostgreSQL
// ============================================================================

/**
 * SQLSTATE codes worth retrying:
 * serialization_failure, deadlock_detected, admin/crash/cannot_connect_now
 * shutdowns, too_many_connections.
 */
const TRANSIENT_SQLSTATES = new Set(['40001', '40P01', '57P01', '57P02', '57P03', '53300']);

/**
 * Classify a pg error by SQLSTATE, or by Node socket code when the
 * connection itself failed.
 */
export function classifyPostgresError(error: unknown): StorageFailure {
  const code = errorCode(error);
  if (!code) {
    return 'permanent';
  }
  if (TRANSIENT_SOCKET_CODES.has(code)) {
    return 'transient';
  }
  // Class 22 data exception, class 23 integrity constraint violation
  if (code.startsWith('22') || code.startsWith('23')) {
    return 'permanent';
  }
  // Class 08 connection exception
  if (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code)) {
    return 'transient';
  }
  return 'permanent';
}
