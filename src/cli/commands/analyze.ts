/**
 * Analyze Command
 *
 * Cleans and scores text without storing it.
 *
 * @module cli/commands/analyze
 */

import { Command } from 'commander';
import * as crypto from 'node:crypto';
import { CleaningStage } from '../../stages/clean.js';
import { createSentimentStage } from '../../stages/sentiment.js';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createCliLogger, resolveCliConfig } from '../runtime.js';
import { formatAnalysis } from '../formatters/result-summary.js';
import { cliRawText, joinWords, runCommand } from './shared.js';

export interface AnalyzeOptions {
  /** Lexicon file overriding TEXTPIPE_LEXICON_PATH */
  lexicon?: string;
  json?: boolean;
}

/**
 * Register the analyze command.
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze <text...>')
    .description('Clean and score text, without storing it')
    .option('-l, --lexicon <path>', 'Lexicon JSON file ({ "positive": [...], "negative": [...] })')
    .option('--json', 'Print the analyzed record as JSON')
    .action(async (words: string[], options: AnalyzeOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await handleAnalyze(words, options, base);
    });
}

/**
 * Handle the analyze command.
 */
export async function handleAnalyze(
  words: readonly string[],
  options: AnalyzeOptions,
  base: BaseCommand
): Promise<ExitCode> {
  return runCommand(base, async () => {
    const config = resolveCliConfig(base.options);
    const traceId = crypto.randomUUID();
    const logger = createCliLogger(base.options, config).child({ traceId });

    const sentiment = await createSentimentStage({ lexiconPath: options.lexicon ?? config.lexiconPath });
    const cleaned = await new CleaningStage().process(cliRawText(joinWords(words), 'cli'), {
      traceId,
      logger: logger.child({ stage: 'cleaning' }),
    });
    const analyzed = await sentiment.process(cleaned, { traceId, logger: logger.child({ stage: sentiment.name }) });

    if (options.json) {
      base.json(analyzed);
    } else {
      base.info(formatAnalysis(analyzed));
    }
    return EXIT_CODES.SUCCESS;
  });
}
