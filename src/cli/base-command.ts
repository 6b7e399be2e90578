/**
 * Base Command
 *
 * Shared by every textpipe command: global flags, terminal output and the
 * mapping from pipeline errors to process exit codes.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { ConfigValidationError } from '../config/index.js';
import { isPipelineError } from '../pipeline/errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Flags accepted before any command name.
 */
export interface GlobalOptions {
  /** Debug lines on stdout and debug-level logs */
  verbose?: boolean;
  /** Results and errors only */
  quiet?: boolean;
  /** false when --no-color is passed */
  color?: boolean;
  /** Store driver override (TEXTPIPE_STORE) */
  store?: string;
  /** SQLite path override (TEXTPIPE_DB_PATH) */
  dbPath?: string;
  /** PostgreSQL connection string override (DATABASE_URL) */
  databaseUrl?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Process exit codes reported by textpipe.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Rejected input (cleaning, analysis) or an unexpected failure */
  ERROR: 1,
  /** Bad flags, environment or stage list */
  USAGE_ERROR: 2,
  /** No stored record with that id */
  NOT_FOUND: 3,
  /** Storage failed but may succeed if retried */
  STORAGE_TRANSIENT: 4,
  /** Storage failed and will fail again */
  STORAGE_PERMANENT: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error to the exit code the CLI reports for it.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigValidationError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (!isPipelineError(error)) {
    return EXIT_CODES.ERROR;
  }
  switch (error.kind) {
    case 'configuration':
      return EXIT_CODES.USAGE_ERROR;
    case 'storage':
      return error.retryable ? EXIT_CODES.STORAGE_TRANSIENT : EXIT_CODES.STORAGE_PERMANENT;
    case 'cleaning':
    case 'analysis':
    case 'unexpected':
      return EXIT_CODES.ERROR;
  }
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Output and exit-code helper handed to every command handler.
 *
 * Command output goes to stdout, errors to stderr; pipeline logs are
 * written separately by the pino logger.
 *
 * @example
 * ```typescript
 * const base = getBaseCommand(cmd.parent ?? cmd);
 * const record = await connector.findById(storageId);
 * if (!record) {
 *   base.error(`No record with storage id ${storageId}`);
 *   base.exitWith(EXIT_CODES.NOT_FOUND);
 *   return;
 * }
 * base.info(formatStoredRecord(record));
 * ```
 */
export class BaseCommand {
  readonly options: GlobalOptions;

  constructor(options: GlobalOptions) {
    this.options = options;

    // Piped output and --no-color both get plain text
    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  /**
   * Print only with --verbose.
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Print unless --quiet.
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error line; with --verbose the stack follows.
   */
  error(message: string, error?: unknown): void {
    console.error(chalk.red(`Error: ${message}`));

    if (error instanceof Error && this.options.verbose) {
      console.error(chalk.dim(error.stack ?? error.message));
    }
  }

  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a value as indented JSON, even with --quiet.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Flags and Exit Codes
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  /**
   * Set the code the process exits with once pending work has drained.
   */
  exitWith(code: ExitCode): void {
    process.exitCode = code;
  }

  /**
   * Report an error and set its exit code.
   */
  failWith(error: unknown): ExitCode {
    const code = exitCodeForError(error);
    this.error(error instanceof Error ? error.message : String(error), error);
    this.exitWith(code);
    return code;
  }
}

/**
 * Read the BaseCommand the program's preAction hook stored on `cmd`.
 * Handlers called outside a parsed program get a default one.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  return base instanceof BaseCommand ? base : new BaseCommand({});
}
