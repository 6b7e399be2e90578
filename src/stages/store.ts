/**
 * Storage Stage
 *
 * Persists AnalyzedText through a StoreConnector in a single transaction
 * and returns the ProcessedResult. Any failure rolls the transaction back
 * and surfaces as a StorageError; the stage never retries on its own.
 *
 * `begin` and `write` are bounded by the stage timeout and the caller's
 * signal. When the deadline fires the transaction is abandoned at once,
 * without waiting for the pending write. Once `commit` has started it is
 * allowed to finish.
 *
 * @module stages/store
 */

import type { AnalyzedText, ProcessedResult } from '../schemas/records.js';
import { StorageError, describeError, type StorageFailure } from '../pipeline/errors.js';
import type { Logger, Stage, StageContext } from '../pipeline/types.js';
import { DeadlineExceededError, createDeadline, raceDeadline } from '../pipeline/deadline.js';
import type { StorableRow, StoreConnector, StoreTransaction } from '../storage/connector.js';

// ============================================================================
// Constants
// ============================================================================

export const STORAGE_STAGE_NAME = 'storage';

/** Default bound on begin + write, in ms */
export const DEFAULT_STORAGE_TIMEOUT_MS = 5000;

export interface StorageStageOptions {
  /** Stage name (default: 'storage') */
  name?: string;
  /** Bound on begin + write in ms (default: 5000) */
  timeoutMs?: number;
}

type StoragePhase = 'begin' | 'write' | 'commit';

const PHASE_REASONS: Record<StoragePhase, string> = {
  begin: 'could not open transaction',
  write: 'write rejected',
  commit: 'commit failed',
};

/**
 * Build the row for an analyzed record.
 */
export function toStorableRow(input: AnalyzedText, processedAt: string): StorableRow {
  return {
    traceId: input.traceId,
    source: input.source,
    originalContent: input.originalContent,
    cleanedContent: input.content,
    sentiment: input.sentiment,
    sentimentScore: input.sentimentScore,
    confidence: input.confidence,
    metadata: { ...input.metadata },
    processedAt,
  };
}

// ============================================================================
// Stage
// ============================================================================

/**
 * Transactional storage stage.
 *
 * @example
 * ```typescript
 * const stage = new StorageStage(new SqliteStoreConnector({ filename: ':memory:' }), { timeoutMs: 2000 });
 * ```
 */
export class StorageStage implements Stage<AnalyzedText, ProcessedResult> {
  readonly name: string;
  readonly inputKind = 'analyzed_text' as const;
  readonly outputKind = 'processed_result' as const;

  private readonly timeoutMs: number;

  constructor(
    private readonly connector: StoreConnector,
    options: StorageStageOptions = {}
  ) {
    this.name = options.name ?? STORAGE_STAGE_NAME;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
    if (!Number.isInteger(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new RangeError(`Storage timeout must be a positive integer, got ${this.timeoutMs}`);
    }
  }

  async process(input: AnalyzedText, context: StageContext): Promise<ProcessedResult> {
    const { logger } = context;
    const processedAt = new Date().toISOString();
    const row = toStorableRow(input, processedAt);

    const deadline = createDeadline(this.timeoutMs, context.signal);
    let transaction: StoreTransaction | undefined;
    let phase: StoragePhase = 'begin';
    let storageId: string;

    try {
      if (deadline.signal.aborted) {
        throw new DeadlineExceededError('Operation aborted before the transaction began');
      }

      const beginning = this.connector.begin();
      try {
        transaction = await raceDeadline(beginning, deadline.signal);
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          void this.rollbackLateTransaction(beginning, logger);
        }
        throw error;
      }

      phase = 'write';
      storageId = await raceDeadline(transaction.write(row), deadline.signal);
      if (storageId.length === 0) {
        throw new Error('store returned an empty storage id');
      }

      phase = 'commit';
      await transaction.commit();
    } catch (error) {
      throw await this.fail(error, phase, transaction, input, context);
    } finally {
      deadline.dispose();
    }

    logger.info('Record stored', { storageId, connector: this.connector.name });

    return Object.freeze({
      kind: 'processed_result',
      content: input.content,
      source: input.source,
      traceId: input.traceId,
      sentiment: input.sentiment,
      sentimentScore: input.sentimentScore,
      confidence: input.confidence,
      originalContent: input.originalContent,
      analyzedAt: input.analyzedAt,
      metadata: { ...input.metadata },
      storageId,
      storedAt: processedAt,
    });
  }

  /**
   * Roll back, classify and wrap a failure.
   */
  private async fail(
    error: unknown,
    phase: StoragePhase,
    transaction: StoreTransaction | undefined,
    input: AnalyzedText,
    context: StageContext
  ): Promise<StorageError> {
    const { logger, traceId } = context;
    const deadlineExceeded = error instanceof DeadlineExceededError;

    let rollbackError: unknown;
    if (transaction) {
      try {
        if (error instanceof DeadlineExceededError) {
          // The write may never settle; a rollback would queue behind it
          transaction.abandon(error);
        } else {
          await transaction.rollback();
        }
      } catch (rollbackFailure) {
        rollbackError = rollbackFailure;
        logger.error('Rollback failed', { phase, error: describeError(rollbackFailure) });
      }
    }

    let failure: StorageFailure;
    if (deadlineExceeded || rollbackError !== undefined) {
      failure = 'transient';
    } else {
      failure = this.connector.classify(error);
    }

    const storageError = new StorageError(deadlineExceeded ? 'deadline exceeded' : PHASE_REASONS[phase], {
      stage: this.name,
      traceId,
      cause: error,
      source: input.source,
      failure,
      rollbackError,
    });

    logger.warn('Storage failed', {
      phase,
      failure,
      connector: this.connector.name,
      error: describeError(error),
    });

    return storageError;
  }

  /**
   * Roll back a transaction whose begin() settled after the deadline.
   */
  private async rollbackLateTransaction(beginning: Promise<StoreTransaction>, logger: Logger): Promise<void> {
    try {
      const late = await beginning;
      await late.rollback();
      logger.debug('Rolled back transaction opened after the deadline');
    } catch (error) {
      logger.warn('Could not release transaction opened after the deadline', { error: describeError(error) });
    }
  }
}
