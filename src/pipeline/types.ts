/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the stage pipeline: the contract every stage
 * implements, the context passed to a stage for one run, and the
 * logger abstraction stages write through.
 *
 * @module pipeline/types
 */

import type { PipelineRecord, RecordKind, RecordOfKind } from '../schemas/records.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Structured fields attached to a log line.
 */
export type LogFields = Record<string, unknown>;

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, fields?: LogFields): void;

  /** Log informational message */
  info(message: string, fields?: LogFields): void;

  /** Log warning message */
  warn(message: string, fields?: LogFields): void;

  /** Log error message */
  error(message: string, fields?: LogFields): void;

  /** Derive a logger that adds `bindings` to every line */
  child(bindings: LogFields): Logger;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Runtime context passed to a stage for a single submission.
 */
export interface StageContext {
  /** Correlation token for this run, attached to every log line and error */
  traceId: string;

  /** Logger already bound to the trace id and the stage name */
  logger: Logger;

  /**
   * Caller deadline. Stages doing I/O must stop and clean up when it aborts;
   * computational stages may ignore it.
   */
  signal?: AbortSignal;
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * Interface that all pipeline stages implement.
 *
 * A stage consumes one record kind and produces the next. `inputKind` and
 * `outputKind` let the orchestrator check, once at construction time, that
 * a stage list chains end to end.
 *
 * @typeParam TInput - Record consumed from the upstream stage
 * @typeParam TOutput - Record produced for the downstream stage
 *
 * @example
 * ```typescript
 * const upperCase: Stage<CleanedText, CleanedText> = {
 *   name: 'UpperCase',
 *   inputKind: 'cleaned_text',
 *   outputKind: 'cleaned_text',
 *   async process(input) {
 *     return Object.freeze({ ...input, content: input.content.toUpperCase() });
 *   },
 * };
 * ```
 */
export interface Stage<TInput extends PipelineRecord = PipelineRecord, TOutput extends PipelineRecord = PipelineRecord> {
  /** Human-readable stage name, used in logs and errors */
  readonly name: string;

  /** Record kind this stage accepts */
  readonly inputKind: TInput['kind'];

  /** Record kind this stage produces */
  readonly outputKind: TOutput['kind'];

  /**
   * Transform one record.
   *
   * @throws A PipelineError subclass when no valid output can be produced
   */
  process(input: TInput, context: StageContext): Promise<TOutput>;
}

/**
 * Stage with its record types erased, as held by the orchestrator.
 */
export type AnyStage = Stage<PipelineRecord, PipelineRecord>;

/**
 * Stage between two named record kinds.
 */
export type StageBetween<TIn extends RecordKind, TOut extends RecordKind> = Stage<RecordOfKind<TIn>, RecordOfKind<TOut>>;

// ============================================================================
// Stage Info
// ============================================================================

/**
 * Lightweight description of a registered stage.
 */
export interface StageInfo {
  /** Position in the pipeline (0-based) */
  position: number;
  name: string;
  inputKind: RecordKind;
  outputKind: RecordKind;
}

/**
 * Describe a stage at a position.
 */
export function describeStage(stage: AnyStage, position: number): StageInfo {
  return {
    position,
    name: stage.name,
    inputKind: stage.inputKind,
    outputKind: stage.outputKind,
  };
}
