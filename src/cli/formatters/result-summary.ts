/**
 * Result Formatters
 *
 * Plain-text renderings of pipeline outcomes for the terminal.
 *
 * @module cli/formatters/result-summary
 */

import chalk from 'chalk';
import type { AnalyzedText, CleanedText, ProcessedResult, Sentiment } from '../../schemas/records.js';
import type { SubmissionOutcome } from '../../pipeline/orchestrator.js';
import type { BatchSummary } from '../../pipeline/batch.js';
import type { StoredRecord } from '../../storage/connector.js';
import { formatDuration } from './progress.js';

const SENTIMENT_COLORS: Record<Sentiment, (text: string) => string> = {
  positive: chalk.green,
  neutral: chalk.dim,
  negative: chalk.red,
};

/**
 * Render a score with an explicit sign and three decimals.
 *
 * @example
 * ```typescript
 * formatScore(1 / 3); // '+0.333'
 * formatScore(0);     // '0.000'
 * ```
 */
export function formatScore(score: number): string {
  const fixed = score.toFixed(3);
  return score > 0 ? `+${fixed}` : fixed;
}

function formatSentiment(sentiment: Sentiment): string {
  return SENTIMENT_COLORS[sentiment](sentiment);
}

/**
 * Format cleaning output.
 *
 * @example
 * ```
 * Cleaned:    Hi There
 * Operations: html_stripping, whitespace_collapse, trim
 * ```
 */
export function formatCleanedText(cleaned: CleanedText): string {
  const operations = cleaned.operations.length > 0 ? cleaned.operations.join(', ') : 'none';
  return [`Cleaned:    ${cleaned.content}`, `Operations: ${operations}`].join('\n');
}

/**
 * Format analysis output without storage details.
 */
export function formatAnalysis(
  analyzed: Pick<AnalyzedText, 'content' | 'sentiment' | 'sentimentScore' | 'confidence'>
): string {
  return [
    `Text:       ${analyzed.content}`,
    `Sentiment:  ${formatSentiment(analyzed.sentiment)}`,
    `Score:      ${formatScore(analyzed.sentimentScore)}`,
    `Confidence: ${analyzed.confidence.toFixed(2)}`,
  ].join('\n');
}

/**
 * Format a stored result.
 */
export function formatProcessedResult(result: ProcessedResult): string {
  return [
    `Storage ID: ${chalk.cyan(result.storageId)}`,
    `Trace ID:   ${result.traceId}`,
    `Source:     ${result.source}`,
    formatAnalysis(result),
  ].join('\n');
}

/**
 * Format a record read back from the store.
 */
export function formatStoredRecord(record: StoredRecord): string {
  return [
    `Storage ID: ${chalk.cyan(record.storageId)}`,
    `Trace ID:   ${record.traceId}`,
    `Source:     ${record.source}`,
    `Original:   ${record.originalContent}`,
    `Text:       ${record.cleanedContent}`,
    `Sentiment:  ${formatSentiment(record.sentiment)}`,
    `Score:      ${formatScore(record.sentimentScore)}`,
    `Confidence: ${record.confidence.toFixed(2)}`,
    `Stored at:  ${record.processedAt}`,
  ].join('\n');
}

/**
 * One-line status for a submission.
 *
 * @example
 * ```
 * [OK]   review  positive  id=7  (12ms)
 * [FAIL] review  cleaning: Cleaning failed: unterminated HTML tag at position 5
 * ```
 */
export function formatOutcomeLine(outcome: SubmissionOutcome): string {
  if (outcome.status === 'completed') {
    const { result } = outcome;
    return (
      `${chalk.green('[OK]')}   ${result.source}  ${formatSentiment(result.sentiment)}  ` +
      `id=${result.storageId}  ${chalk.dim(`(${formatDuration(outcome.timing.durationMs)})`)}`
    );
  }
  return `${chalk.red('[FAIL]')} ${outcome.failedStage}: ${outcome.error.message}`;
}

/**
 * Summary block for a batch.
 */
export function formatBatchSummary(summary: BatchSummary): string {
  const status = summary.failed === 0 ? chalk.green('SUCCESS') : chalk.yellow('PARTIAL');
  return [
    chalk.bold('=== Batch Complete ==='),
    `Status:    ${status}`,
    `Records:   ${summary.completed}/${summary.total} stored`,
    `Failed:    ${summary.failed}`,
    `Duration:  ${formatDuration(summary.durationMs)}`,
  ].join('\n');
}
