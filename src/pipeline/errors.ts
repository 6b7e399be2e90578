/**
 * Pipeline Error Taxonomy
 *
 * Closed set of error kinds raised by stages and by the orchestrator.
 * Every error carries the stage it came from, the trace id of the run and
 * whether retrying the same submission unchanged may succeed.
 *
 * @module pipeline/errors
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Discriminant for the error taxonomy.
 */
export type PipelineErrorKind = 'cleaning' | 'analysis' | 'storage' | 'configuration' | 'unexpected';

/**
 * Storage failure classification.
 * - transient: may succeed if retried unchanged (connection loss, timeout, conflict)
 * - permanent: will fail again given the same input (constraint violation, bad record)
 */
export type StorageFailure = 'transient' | 'permanent';

/**
 * Context shared by every pipeline error.
 */
export interface PipelineErrorContext {
  /** Stage name where the failure happened */
  stage: string;
  /** Trace id of the run, when known */
  traceId?: string;
  /** Underlying error */
  cause?: unknown;
}

/**
 * Structured, JSON-safe view of a pipeline error.
 */
export interface PipelineErrorJson {
  name: string;
  kind: PipelineErrorKind;
  message: string;
  stage: string;
  traceId?: string;
  retryable: boolean;
  cause?: string;
  [key: string]: unknown;
}

/**
 * Render an unknown thrown value as a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Base Class
// ============================================================================

/**
 * Base class for all pipeline errors. Not thrown directly.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly retryable: boolean;

  readonly stage: string;
  readonly traceId?: string;

  constructor(message: string, context: PipelineErrorContext) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.stage = context.stage;
    this.traceId = context.traceId;
  }

  /**
   * Structured representation for logs and CLI JSON output.
   */
  toJSON(): PipelineErrorJson {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      stage: this.stage,
      traceId: this.traceId,
      retryable: this.retryable,
      ...(this.cause !== undefined && { cause: describeError(this.cause) }),
    };
  }
}

// ============================================================================
// Concrete Errors
// ============================================================================

/**
 * Input could not be normalized into valid cleaned output.
 * Deterministic in the input, so never retryable.
 */
export class CleaningError extends PipelineError {
  readonly kind = 'cleaning' as const;
  readonly retryable = false;

  /** The text that failed to be cleaned */
  readonly originalText: string;

  constructor(message: string, context: PipelineErrorContext & { originalText: string }) {
    super(`Cleaning failed: ${message}`, context);
    this.originalText = context.originalText;
  }

  override toJSON(): PipelineErrorJson {
    return { ...super.toJSON(), originalText: this.originalText };
  }
}

/**
 * Sentiment lexicon or resource unavailable.
 * Retryable when the resource is transient (e.g. a file that could not be read),
 * fatal when the lexicon itself is invalid.
 */
export class AnalysisError extends PipelineError {
  readonly kind = 'analysis' as const;
  readonly retryable: boolean;

  constructor(message: string, context: PipelineErrorContext & { retryable: boolean }) {
    super(`Analysis failed: ${message}`, context);
    this.retryable = context.retryable;
  }
}

/**
 * Persisting a record failed and the transaction was rolled back.
 */
export class StorageError extends PipelineError {
  readonly kind = 'storage' as const;

  /** Source label of the record that could not be stored */
  readonly source: string;
  /** Whether the failure is worth retrying */
  readonly failure: StorageFailure;
  /** Short reason, e.g. "write rejected" or "deadline exceeded" */
  readonly reason: string;
  /** Set when the rollback itself also failed */
  readonly rollbackError?: unknown;

  constructor(
    reason: string,
    context: PipelineErrorContext & {
      source: string;
      failure: StorageFailure;
      rollbackError?: unknown;
    }
  ) {
    const detail = context.cause !== undefined ? `: ${describeError(context.cause)}` : '';
    super(`Storage failed (${context.failure}) for source "${context.source}": ${reason}${detail}`, context);
    this.source = context.source;
    this.failure = context.failure;
    this.reason = reason;
    this.rollbackError = context.rollbackError;
  }

  get retryable(): boolean {
    return this.failure === 'transient';
  }

  override toJSON(): PipelineErrorJson {
    return {
      ...super.toJSON(),
      source: this.source,
      failure: this.failure,
      reason: this.reason,
      ...(this.rollbackError !== undefined && { rollbackError: describeError(this.rollbackError) }),
    };
  }
}

/**
 * Stage list does not chain. Raised only when an orchestrator is constructed.
 */
export class PipelineConfigurationError extends PipelineError {
  readonly kind = 'configuration' as const;
  readonly retryable = false;

  constructor(message: string, context: Partial<PipelineErrorContext> = {}) {
    super(`Invalid pipeline configuration: ${message}`, { stage: 'orchestrator', ...context });
  }
}

/**
 * A stage threw something outside the taxonomy, or returned a record of the
 * wrong kind. Wraps the original value as `cause`.
 */
export class UnexpectedStageError extends PipelineError {
  readonly kind = 'unexpected' as const;
  readonly retryable = false;

  constructor(message: string, context: PipelineErrorContext) {
    super(`Stage "${context.stage}" failed unexpectedly: ${message}`, context);
  }
}

// ============================================================================
// Guards
// ============================================================================

/**
 * Check whether a value belongs to the pipeline error taxonomy.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Check whether retrying the same submission unchanged may succeed.
 *
 * @returns true for transient storage failures and retryable analysis failures
 */
export function isRetryableError(error: unknown): boolean {
  return isPipelineError(error) && error.retryable;
}
