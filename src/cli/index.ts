#!/usr/bin/env node
/**
 * textpipe CLI
 *
 * Main entry point for the textpipe command.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   textpipe --help
 *   textpipe process "<p>Great service!</p>" --source review
 *   textpipe process --file reviews.txt --concurrency 8
 *   textpipe analyze "not bad at all"
 *   textpipe show 42
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('textpipe')
    .description('Clean, score and store text records')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--store <driver>', 'Store driver: memory, sqlite, postgres (TEXTPIPE_STORE)')
    .option('--db-path <path>', 'SQLite database file (TEXTPIPE_DB_PATH)')
    .option('--database-url <url>', 'PostgreSQL connection string (DATABASE_URL)');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();

    if (opts.verbose && opts.quiet) {
      thisCommand.error('Cannot use both --verbose and --quiet flags', {
        exitCode: EXIT_CODES.USAGE_ERROR,
        code: 'textpipe.conflictingFlags',
      });
    }

    // Subcommands read it back through getBaseCommand(cmd.parent)
    thisCommand.setOptionValue('_baseCommand', new BaseCommand(opts));
  });

  // Throw instead of exiting so main() decides the exit code.
  // Set before registering so subcommands inherit it.
  program.exitOverride();

  registerCommands(program);

  return program;
}

/**
 * Exit code for an error that escaped command handling.
 */
export function exitCodeForCliError(error: unknown): number {
  if (error instanceof CommanderError) {
    if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
      return EXIT_CODES.SUCCESS;
    }
    // commander reports usage problems with exit code 1
    return error.exitCode === 1 ? EXIT_CODES.USAGE_ERROR : error.exitCode;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // commander has already printed its own message
    if (!(error instanceof CommanderError)) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = exitCodeForCliError(error);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
