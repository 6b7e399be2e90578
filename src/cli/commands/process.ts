/**
 * Process Command
 *
 * Runs text through the full pipeline (clean, analyze, store). One text is
 * submitted on its own; several (a file with one record per line) go through
 * the batch runner behind a spinner.
 *
 * @module cli/commands/process
 */

import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { TraceIdSchema } from '../../schemas/common.js';
import { processBatch, type BatchItem } from '../../pipeline/batch.js';
import { submitWithRetry, type RetriedOutcome } from '../../pipeline/retry.js';
import { getBaseCommand, exitCodeForError, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { createCliRuntime, type CliRuntime } from '../runtime.js';
import { BatchProgress } from '../formatters/progress.js';
import { formatBatchSummary, formatOutcomeLine, formatProcessedResult } from '../formatters/result-summary.js';
import { cliRawText, joinWords, runCommand } from './shared.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the process command.
 */
export interface ProcessOptions {
  /** Origin label stored with each record */
  source: string;
  /** File with one record per line */
  file?: string;
  /** Trace id for a single record, or prefix for a file's records */
  traceId?: string;
  /** Maximum in-flight records for a file */
  concurrency: string;
  /** Print JSON instead of text */
  json?: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Read the non-blank lines of a file.
 */
export async function readRecordLines(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

/**
 * Parse --concurrency, or null if it is not a positive integer.
 */
export function parseConcurrency(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed >= 1 ? parsed : null;
}

function outcomeJson(outcome: RetriedOutcome): Record<string, unknown> {
  if (outcome.status === 'completed') {
    return { status: outcome.status, traceId: outcome.traceId, attempts: outcome.attempts, result: outcome.result };
  }
  return {
    status: outcome.status,
    traceId: outcome.traceId,
    attempts: outcome.attempts,
    failedStage: outcome.failedStage,
    error: outcome.error.toJSON(),
  };
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the process command.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process [text...]')
    .description('Clean, analyze and store text')
    .option('-s, --source <label>', 'Origin label stored with each record', 'cli')
    .option('-f, --file <path>', 'Read records from a file, one per line')
    .option('-t, --trace-id <id>', 'Trace id (used as a prefix with --file)')
    .option('-c, --concurrency <n>', 'Records in flight at once with --file', '4')
    .option('--json', 'Print results as JSON')
    .action(async (words: string[], options: ProcessOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await handleProcess(words, options, base);
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the process command.
 *
 * @param runtimeFactory - Builds the runtime; tests pass one over an in-memory store
 */
export async function handleProcess(
  words: readonly string[],
  options: ProcessOptions,
  base: BaseCommand,
  runtimeFactory: (base: BaseCommand) => Promise<CliRuntime> = (b) => createCliRuntime(b.options)
): Promise<ExitCode> {
  if (words.length > 0 && options.file) {
    base.error('Pass text or --file, not both');
    base.exitWith(EXIT_CODES.USAGE_ERROR);
    return EXIT_CODES.USAGE_ERROR;
  }
  if (words.length === 0 && !options.file) {
    base.error('Nothing to process: pass text or --file');
    base.exitWith(EXIT_CODES.USAGE_ERROR);
    return EXIT_CODES.USAGE_ERROR;
  }
  if (options.traceId !== undefined && !TraceIdSchema.safeParse(options.traceId).success) {
    base.error(`Invalid trace id: "${options.traceId}"`);
    base.exitWith(EXIT_CODES.USAGE_ERROR);
    return EXIT_CODES.USAGE_ERROR;
  }
  const concurrency = parseConcurrency(options.concurrency);
  if (concurrency === null) {
    base.error(`--concurrency must be a positive integer, got "${options.concurrency}"`);
    base.exitWith(EXIT_CODES.USAGE_ERROR);
    return EXIT_CODES.USAGE_ERROR;
  }

  let runtime: CliRuntime | undefined;
  return runCommand(
    base,
    async () => {
      const lines = options.file ? await readRecordLines(options.file) : [joinWords(words)];
      const opened = await runtimeFactory(base);
      runtime = opened;

      if (!options.file) {
        return processSingle(lines[0], options, base, opened);
      }
      return processFile(lines, options, concurrency, base, opened);
    },
    async () => {
      await runtime?.close();
    }
  );
}

async function processSingle(
  content: string,
  options: ProcessOptions,
  base: BaseCommand,
  runtime: CliRuntime
): Promise<ExitCode> {
  base.debug(`Submitting one record from ${options.source}`);
  const outcome = await submitWithRetry(runtime.orchestrator, cliRawText(content, options.source), {
    traceId: options.traceId,
    maxRetries: runtime.config.retry.maxRetries,
    onRetry: (failed, attempt, delayMs) => {
      if (failed.status === 'failed') {
        base.debug(`Retry ${attempt} in ${Math.round(delayMs)}ms after: ${failed.error.message}`);
      }
    },
  });

  if (options.json) {
    base.json(outcomeJson(outcome));
  }

  if (outcome.status === 'failed') {
    if (!options.json) {
      base.error(`${outcome.failedStage}: ${outcome.error.message}`, outcome.error);
    }
    return exitCodeForError(outcome.error);
  }

  if (!options.json) {
    base.info(formatProcessedResult(outcome.result));
  }
  return EXIT_CODES.SUCCESS;
}

async function processFile(
  lines: readonly string[],
  options: ProcessOptions,
  concurrency: number,
  base: BaseCommand,
  runtime: CliRuntime
): Promise<ExitCode> {
  if (lines.length === 0) {
    base.warn(`No records in ${options.file ?? 'input'}`);
    return EXIT_CODES.SUCCESS;
  }

  const items: BatchItem[] = lines.map((line, index) => ({
    raw: cliRawText(line, options.source),
    traceId: options.traceId !== undefined ? `${options.traceId}-${index + 1}` : undefined,
  }));

  const progress = new BatchProgress(items.length, { disabled: base.isQuiet() || options.json === true });
  progress.start();
  const summary = await processBatch(runtime.orchestrator, items, {
    concurrency,
    retry: { maxRetries: runtime.config.retry.maxRetries },
    onItemSettled: (outcome) => progress.record(outcome),
  });
  progress.finish();

  if (options.json) {
    base.json({
      total: summary.total,
      completed: summary.completed,
      failed: summary.failed,
      durationMs: summary.durationMs,
      outcomes: summary.outcomes.map(outcomeJson),
    });
  } else {
    for (const outcome of summary.outcomes) {
      base.info(formatOutcomeLine(outcome));
    }
    base.blank();
    base.info(formatBatchSummary(summary));
  }

  const firstFailure = summary.outcomes.find((outcome) => outcome.status === 'failed');
  return firstFailure?.status === 'failed' ? exitCodeForError(firstFailure.error) : EXIT_CODES.SUCCESS;
}
