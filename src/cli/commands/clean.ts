/**
 * Clean Command
 *
 * Runs only the cleaning stage and prints the result. Nothing is stored.
 *
 * @module cli/commands/clean
 */

import { Command } from 'commander';
import * as crypto from 'node:crypto';
import { CleaningStage } from '../../stages/clean.js';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createCliLogger, resolveCliConfig } from '../runtime.js';
import { formatCleanedText } from '../formatters/result-summary.js';
import { cliRawText, joinWords, runCommand } from './shared.js';

export interface CleanOptions {
  json?: boolean;
}

/**
 * Register the clean command.
 */
export function registerCleanCommand(program: Command): void {
  program
    .command('clean <text...>')
    .description('Show what cleaning does to text, without storing it')
    .option('--json', 'Print the cleaned record as JSON')
    .action(async (words: string[], options: CleanOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await handleClean(words, options, base);
    });
}

/**
 * Handle the clean command.
 */
export async function handleClean(words: readonly string[], options: CleanOptions, base: BaseCommand): Promise<ExitCode> {
  return runCommand(base, async () => {
    const config = resolveCliConfig(base.options);
    const traceId = crypto.randomUUID();
    const logger = createCliLogger(base.options, config).child({ traceId });

    const cleaned = await new CleaningStage().process(cliRawText(joinWords(words), 'cli'), { traceId, logger });

    if (options.json) {
      base.json(cleaned);
    } else {
      base.info(formatCleanedText(cleaned));
    }
    return EXIT_CODES.SUCCESS;
  });
}
