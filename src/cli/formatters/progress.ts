/**
 * Progress Formatters
 *
 * Batch spinner built on ora. Animates only on a TTY and prints nothing at
 * all when disabled (--quiet, --json).
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { RetriedOutcome } from '../../pipeline/retry.js';

export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Force the spinner off (e.g. --quiet or --json) */
  disabled?: boolean;
}

/**
 * Spinner that counts settled batch items.
 *
 * @example
 * ```typescript
 * const progress = new BatchProgress(lines.length);
 * progress.start();
 * await processBatch(orchestrator, items, { onItemSettled: (outcome) => progress.record(outcome) });
 * progress.finish();
 * ```
 */
export class BatchProgress {
  private readonly spinner: Ora;
  private startTime = 0;
  private settled = 0;
  private failed = 0;

  constructor(
    private readonly total: number,
    options: SpinnerOptions = {}
  ) {
    this.spinner = ora({
      text: this.label(),
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      isSilent: options.disabled === true,
      stream: process.stdout,
    });
  }

  start(): this {
    this.startTime = Date.now();
    this.spinner.start();
    return this;
  }

  /**
   * Count one settled item and refresh the text.
   */
  record(outcome: RetriedOutcome): this {
    this.settled++;
    if (outcome.status === 'failed') {
      this.failed++;
    }
    this.spinner.text = this.label();
    return this;
  }

  /**
   * Stop with a success or warning symbol depending on failures.
   */
  finish(): this {
    const duration = chalk.dim(` (${formatDuration(Date.now() - this.startTime)})`);
    if (this.failed === 0) {
      this.spinner.succeed(`Processed ${this.total} record(s)${duration}`);
    } else {
      this.spinner.warn(`Processed ${this.total} record(s), ${this.failed} failed${duration}`);
    }
    return this;
  }

  private label(): string {
    return `Processing ${this.settled}/${this.total}`;
  }
}

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(850);   // '850ms'
 * formatDuration(1500);  // '1.5s'
 * formatDuration(95000); // '1m 35s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
