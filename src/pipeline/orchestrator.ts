/**
 * Pipeline Orchestrator
 *
 * Sequences an injected list of stages for one raw-text submission at a time.
 *
 * Key features:
 * - Stage chain validated once, at construction
 * - Stop at the first failing stage, no partial records
 * - Non-taxonomy throws wrapped as UnexpectedStageError
 * - Per-stage timing and lifecycle callbacks
 * - Trace id bound onto every log line of a run
 *
 * @module pipeline/orchestrator
 */

import * as crypto from 'node:crypto';
import {
  isRecordOfKind,
  type PipelineRecord,
  type ProcessedResult,
  type RawText,
} from '../schemas/records.js';
import { createSilentLogger } from '../logging/logger.js';
import {
  PipelineConfigurationError,
  UnexpectedStageError,
  describeError,
  isPipelineError,
  type PipelineError,
} from './errors.js';
import { describeStage, type AnyStage, type Logger, type StageContext, type StageInfo } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing information for one submission
 */
export interface SubmissionTiming {
  /** ISO8601 timestamp when the submission started */
  startedAt: string;
  /** ISO8601 timestamp when it completed or failed */
  completedAt: string;
  /** Total duration in milliseconds */
  durationMs: number;
  /** Duration per stage name in milliseconds (failed stage included) */
  perStage: Record<string, number>;
}

interface OutcomeBase {
  traceId: string;
  /** Names of the stages that finished successfully, in order */
  stagesExecuted: string[];
  timing: SubmissionTiming;
}

/**
 * Result of one submission. Never a partial record.
 */
export type SubmissionOutcome =
  | (OutcomeBase & { status: 'completed'; result: ProcessedResult })
  | (OutcomeBase & { status: 'failed'; error: PipelineError; failedStage: string });

/**
 * Per-submission options
 */
export interface SubmitOptions {
  /** Correlation token for the run (default: random UUID) */
  traceId?: string;
  /** Caller deadline, passed to every stage */
  signal?: AbortSignal;
}

/**
 * Callbacks for stage lifecycle events
 */
export interface OrchestratorCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stage: StageInfo, traceId: string) => void;
  /** Called when a stage returns a record of its declared kind */
  onStageComplete?: (stage: StageInfo, output: PipelineRecord, durationMs: number) => void;
  /** Called when a stage fails */
  onStageError?: (stage: StageInfo, error: PipelineError) => void;
}

type StageStep = { ok: true; output: PipelineRecord } | { ok: false; error: PipelineError };

export interface OrchestratorOptions {
  /** Root logger; each run logs through a child bound to its trace id */
  logger?: Logger;
  callbacks?: OrchestratorCallbacks;
}

// ============================================================================
// Chain Validation
// ============================================================================

/**
 * Check that a stage list chains from raw_text to processed_result.
 *
 * @throws PipelineConfigurationError describing the first violation
 */
export function validateStageChain(stages: readonly AnyStage[]): void {
  if (stages.length === 0) {
    throw new PipelineConfigurationError('stage list is empty');
  }

  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new PipelineConfigurationError(`duplicate stage name "${stage.name}"`, { stage: stage.name });
    }
    seen.add(stage.name);
  }

  const first = stages[0];
  if (first.inputKind !== 'raw_text') {
    throw new PipelineConfigurationError(
      `first stage "${first.name}" consumes ${first.inputKind}, expected raw_text`,
      { stage: first.name }
    );
  }

  for (let i = 0; i < stages.length - 1; i++) {
    const upstream = stages[i];
    const downstream = stages[i + 1];
    if (upstream.outputKind !== downstream.inputKind) {
      throw new PipelineConfigurationError(
        `stage "${upstream.name}" produces ${upstream.outputKind} but ` +
          `stage "${downstream.name}" consumes ${downstream.inputKind}`,
        { stage: downstream.name }
      );
    }
  }

  const last = stages[stages.length - 1];
  if (last.outputKind !== 'processed_result') {
    throw new PipelineConfigurationError(
      `last stage "${last.name}" produces ${last.outputKind}, expected processed_result`,
      { stage: last.name }
    );
  }
}

// ============================================================================
// Pipeline Orchestrator Class
// ============================================================================

/**
 * Runs raw-text submissions through an ordered stage list.
 *
 * Holds no per-run state: a failed submission leaves the orchestrator
 * ready for the next one, and separate submissions may run concurrently.
 *
 * @example
 * ```typescript
 * const orchestrator = new PipelineOrchestrator(
 *   [new CleaningStage(), new SentimentStage(), new StorageStage(connector)],
 *   { logger }
 * );
 *
 * const outcome = await orchestrator.submit(createRawText({ content: '<p>Great!</p>', source: 'review' }));
 * if (outcome.status === 'completed') {
 *   console.log(outcome.result.storageId);
 * }
 * ```
 */
export class PipelineOrchestrator {
  private readonly stages: readonly AnyStage[];
  private readonly logger: Logger;
  private readonly callbacks: OrchestratorCallbacks;

  /**
   * @throws PipelineConfigurationError if the stages do not chain
   */
  constructor(stages: readonly AnyStage[], private readonly options: OrchestratorOptions = {}) {
    validateStageChain(stages);
    this.stages = Object.freeze([...stages]);
    this.logger = options.logger ?? createSilentLogger();
    this.callbacks = options.callbacks ?? {};
  }

  // ==========================================================================
  // Stage List
  // ==========================================================================

  /**
   * Get the stage list in pipeline order.
   */
  getStages(): readonly AnyStage[] {
    return this.stages;
  }

  /**
   * Describe the stage list, e.g. for a CLI listing.
   */
  describeStages(): StageInfo[] {
    return this.stages.map((stage, position) => describeStage(stage, position));
  }

  /**
   * New orchestrator with `stage` appended. This one is unchanged.
   *
   * @throws PipelineConfigurationError if the extended list does not chain
   */
  withStage(stage: AnyStage): PipelineOrchestrator {
    return new PipelineOrchestrator([...this.stages, stage], this.options);
  }

  /**
   * New orchestrator without the stage named `name`. This one is unchanged.
   *
   * @throws PipelineConfigurationError if no stage has that name or the rest does not chain
   */
  withoutStage(name: string): PipelineOrchestrator {
    const remaining = this.stages.filter((stage) => stage.name !== name);
    if (remaining.length === this.stages.length) {
      throw new PipelineConfigurationError(`no stage named "${name}"`);
    }
    return new PipelineOrchestrator(remaining, this.options);
  }

  // ==========================================================================
  // Submission
  // ==========================================================================

  /**
   * Run one record through every stage.
   *
   * Resolves with a failed outcome, rather than rejecting, when a stage fails.
   */
  async submit(raw: RawText, options: SubmitOptions = {}): Promise<SubmissionOutcome> {
    const traceId = options.traceId ?? crypto.randomUUID();
    const runLogger = this.logger.child({ traceId });

    const startedAt = new Date().toISOString();
    const startMs = Date.now();
    const perStage: Record<string, number> = {};
    const executed: string[] = [];

    const timing = (): SubmissionTiming => ({
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - startMs,
      perStage,
    });

    runLogger.info('Submission started', { source: raw.source, stages: this.stages.length });

    let current: PipelineRecord = raw;

    for (const [position, stage] of this.stages.entries()) {
      const info = describeStage(stage, position);
      const stageLogger = runLogger.child({ stage: stage.name });
      const stageStart = Date.now();

      this.callbacks.onStageStart?.(info, traceId);
      stageLogger.debug('Stage started', { position });

      const step = await this.runStage(stage, current, { traceId, logger: stageLogger, signal: options.signal });

      const durationMs = Date.now() - stageStart;
      perStage[stage.name] = durationMs;

      if (!step.ok) {
        const { error } = step;
        stageLogger.error('Stage failed', { durationMs, error: error.toJSON() });
        this.callbacks.onStageError?.(info, error);
        runLogger.warn('Submission failed', { failedStage: stage.name, kind: error.kind });
        return {
          status: 'failed',
          error,
          failedStage: stage.name,
          traceId,
          stagesExecuted: executed,
          timing: timing(),
        };
      }

      current = step.output;
      executed.push(stage.name);
      stageLogger.debug('Stage completed', { durationMs });
      this.callbacks.onStageComplete?.(info, current, durationMs);
    }

    if (!isRecordOfKind(current, 'processed_result')) {
      // Unreachable for a validated chain; keeps the result type honest
      const last = this.stages[this.stages.length - 1];
      const error = new UnexpectedStageError('pipeline did not produce a processed_result', {
        stage: last.name,
        traceId,
      });
      return { status: 'failed', error, failedStage: last.name, traceId, stagesExecuted: executed, timing: timing() };
    }

    runLogger.info('Submission completed', { storageId: current.storageId, sentiment: current.sentiment });
    return { status: 'completed', result: current, traceId, stagesExecuted: executed, timing: timing() };
  }

  /**
   * Run one record through every stage and return the stored result.
   *
   * @throws The failing stage's PipelineError, unchanged
   */
  async run(raw: RawText, options: SubmitOptions = {}): Promise<ProcessedResult> {
    const outcome = await this.submit(raw, options);
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    return outcome.result;
  }

  /**
   * Run a single stage, mapping every failure into the taxonomy.
   */
  private async runStage(stage: AnyStage, input: PipelineRecord, context: StageContext): Promise<StageStep> {
    const { traceId } = context;
    let output: unknown;
    try {
      output = await stage.process(input, context);
    } catch (error) {
      return {
        ok: false,
        error: isPipelineError(error)
          ? error
          : new UnexpectedStageError(describeError(error), { stage: stage.name, traceId, cause: error }),
      };
    }

    if (!isRecordOfKind(output, stage.outputKind)) {
      return {
        ok: false,
        error: new UnexpectedStageError(`returned a record that is not ${stage.outputKind}`, {
          stage: stage.name,
          traceId,
        }),
      };
    }
    return { ok: true, output };
  }
}
