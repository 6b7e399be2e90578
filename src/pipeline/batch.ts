/**
 * Batch Runner
 *
 * Runs independent submissions concurrently, bounded by a ConcurrencyLimiter.
 * One failing item never affects another.
 *
 * @module pipeline/batch
 */

import type { RawText } from '../schemas/records.js';
import { ConcurrencyLimiter } from './concurrency.js';
import type { PipelineOrchestrator } from './orchestrator.js';
import { submitWithRetry, type RetriedOutcome, type RetryConfig } from './retry.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One batch input with an optional caller-chosen trace id.
 */
export interface BatchItem {
  raw: RawText;
  traceId?: string;
}

export interface BatchOptions {
  /** Maximum in-flight submissions (default: 4) */
  concurrency?: number;
  /** Retry policy per item; `{ maxRetries: 0 }` disables retries */
  retry?: Partial<RetryConfig>;
  /** Caller deadline shared by every item */
  signal?: AbortSignal;
  /** Called as each item settles, in completion order */
  onItemSettled?: (outcome: RetriedOutcome, index: number) => void;
}

export interface BatchSummary {
  total: number;
  completed: number;
  failed: number;
  /** Outcomes in input order */
  outcomes: RetriedOutcome[];
  durationMs: number;
}

export const DEFAULT_BATCH_CONCURRENCY = 4;

// ============================================================================
// Batch Execution
// ============================================================================

/**
 * Submit every item, at most `concurrency` at a time.
 *
 * @example
 * ```typescript
 * const summary = await processBatch(orchestrator, lines.map((content) => ({
 *   raw: createRawText({ content, source: 'import' }),
 * })));
 * console.log(`${summary.completed}/${summary.total} stored`);
 * ```
 */
export async function processBatch(
  orchestrator: PipelineOrchestrator,
  items: readonly (BatchItem | RawText)[],
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const startMs = Date.now();
  const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);

  const outcomes = await Promise.all(
    items.map((item, index) =>
      limiter.run(async () => {
        const batchItem: BatchItem = 'raw' in item ? item : { raw: item };
        const outcome = await submitWithRetry(orchestrator, batchItem.raw, {
          ...options.retry,
          traceId: batchItem.traceId,
          signal: options.signal,
        });
        options.onItemSettled?.(outcome, index);
        return outcome;
      })
    )
  );

  const completed = outcomes.filter((outcome) => outcome.status === 'completed').length;

  return {
    total: outcomes.length,
    completed,
    failed: outcomes.length - completed,
    outcomes,
    durationMs: Date.now() - startMs,
  };
}
