/**
 * Retry Policy
 *
 * Resubmits a record while the failure is retryable (transient storage
 * failure, unavailable lexicon resource), with exponential backoff and
 * jitter. Every attempt reuses the same trace id.
 *
 * @module pipeline/retry
 */

import * as crypto from 'node:crypto';
import type { RawText } from '../schemas/records.js';
import { isRetryableError } from './errors.js';
import type { PipelineOrchestrator, SubmissionOutcome, SubmitOptions } from './orchestrator.js';

// ============================================================================
// Configuration
// ============================================================================

export interface RetryConfig {
  /** Retries after the first attempt (default: 2) */
  maxRetries: number;
  /** Base delay for exponential backoff in ms (default: 200) */
  baseDelayMs: number;
  /** Maximum delay between retries in ms (default: 2000) */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

export interface RetryOptions extends SubmitOptions, Partial<RetryConfig> {
  /** Called before each retry with the failed outcome and the delay about to be slept */
  onRetry?: (outcome: SubmissionOutcome, attempt: number, delayMs: number) => void;
}

/**
 * Final outcome plus the number of attempts made.
 */
export type RetriedOutcome = SubmissionOutcome & { attempts: number };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Sleep helper for retry delays. Resolves early once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Calculate exponential backoff delay with jitter
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay in milliseconds
 * @returns Delay in milliseconds, at most 30% above the capped exponential
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * 0.3 * exponential;
  return exponential + jitter;
}

// ============================================================================
// Submit With Retry
// ============================================================================

/**
 * Submit a record, retrying while the failure is retryable.
 *
 * Cleaning errors, permanent storage errors and unexpected stage errors end
 * the loop at once. A caller signal that aborts, before an attempt or during
 * the backoff between attempts, also stops retrying.
 *
 * @example
 * ```typescript
 * const outcome = await submitWithRetry(orchestrator, raw, { maxRetries: 3 });
 * console.log(outcome.status, outcome.attempts);
 * ```
 */
export async function submitWithRetry(
  orchestrator: PipelineOrchestrator,
  raw: RawText,
  options: RetryOptions = {}
): Promise<RetriedOutcome> {
  const config: RetryConfig = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
  };
  const traceId = options.traceId ?? crypto.randomUUID();

  for (let attempt = 0; ; attempt++) {
    const outcome = await orchestrator.submit(raw, { traceId, signal: options.signal });

    const exhausted = attempt >= config.maxRetries || options.signal?.aborted === true;
    if (outcome.status === 'completed' || !isRetryableError(outcome.error) || exhausted) {
      return { ...outcome, attempts: attempt + 1 };
    }

    const delay = calculateDelay(attempt, config.baseDelayMs, config.maxDelayMs);
    options.onRetry?.(outcome, attempt + 1, delay);
    await sleep(delay, options.signal);
    if (options.signal?.aborted) {
      return { ...outcome, attempts: attempt + 1 };
    }
  }
}
