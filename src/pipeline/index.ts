/**
 * Pipeline Infrastructure
 *
 * Stage contract, error taxonomy, orchestrator, retry and batch execution.
 *
 * @module pipeline
 */

// Type definitions
export {
  type LogFields,
  type Logger,
  type StageContext,
  type Stage,
  type AnyStage,
  type StageBetween,
  type StageInfo,
  describeStage,
} from './types.js';

// Error taxonomy
export {
  PipelineError,
  CleaningError,
  AnalysisError,
  StorageError,
  PipelineConfigurationError,
  UnexpectedStageError,
  isPipelineError,
  isRetryableError,
  describeError,
  type PipelineErrorKind,
  type PipelineErrorContext,
  type PipelineErrorJson,
  type StorageFailure,
} from './errors.js';

// Orchestration
export {
  PipelineOrchestrator,
  validateStageChain,
  type OrchestratorCallbacks,
  type OrchestratorOptions,
  type SubmissionOutcome,
  type SubmissionTiming,
  type SubmitOptions,
} from './orchestrator.js';

// Retry and batch
export {
  submitWithRetry,
  calculateDelay,
  sleep,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type RetryOptions,
  type RetriedOutcome,
} from './retry.js';
export {
  processBatch,
  DEFAULT_BATCH_CONCURRENCY,
  type BatchItem,
  type BatchOptions,
  type BatchSummary,
} from './batch.js';

// Deadlines and concurrency
export { DeadlineExceededError, createDeadline, raceDeadline, type Deadline } from './deadline.js';
export { ConcurrencyLimiter, type ConcurrencyStats } from './concurrency.js';
