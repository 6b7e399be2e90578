/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * ~/.textpipe/            # Default data directory
 * └── textpipe.db         # SQLite store (TEXTPIPE_DB_PATH overrides)
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** Default database file name inside the data directory */
export const DEFAULT_DB_FILENAME = 'textpipe.db';

/** SQLite's special filename for a private in-memory database */
export const SQLITE_MEMORY_FILENAME = ':memory:';

/**
 * Expand a leading `~` and resolve to an absolute path.
 *
 * @example
 * ```typescript
 * expandHomePath('~/data/store.db'); // '/Users/username/data/store.db'
 * expandHomePath('./store.db');      // '<cwd>/store.db'
 * ```
 */
export function expandHomePath(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return path.resolve(filePath);
}

/**
 * Gets the root data directory for the application: `~/.textpipe`.
 */
export function getDataDir(): string {
  return path.join(os.homedir(), '.textpipe');
}

/**
 * Default SQLite database path: `~/.textpipe/textpipe.db`.
 */
export function getDefaultDatabasePath(): string {
  return path.join(getDataDir(), DEFAULT_DB_FILENAME);
}

/**
 * Resolve a configured database path. `:memory:` is passed through.
 */
export function resolveDatabasePath(filePath: string): string {
  return filePath === SQLITE_MEMORY_FILENAME ? filePath : expandHomePath(filePath);
}
