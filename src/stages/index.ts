/**
 * Pipeline Stages Exports
 *
 * Central export point for the concrete stage implementations, in
 * pipeline order.
 *
 * @module stages
 */

// RawText -> CleanedText
export {
  CleaningStage,
  CleaningNotConvergedError,
  cleanText,
  CLEANING_STAGE_NAME,
  MAX_CLEANING_PASSES,
  type CleanTextResult,
} from './clean.js';
export * from './clean/index.js';

// CleanedText -> AnalyzedText
export {
  SentimentStage,
  createSentimentStage,
  SENTIMENT_STAGE_NAME,
  type SentimentStageOptions,
} from './sentiment.js';
export * from './sentiment/index.js';

// AnalyzedText -> ProcessedResult
export {
  StorageStage,
  toStorableRow,
  STORAGE_STAGE_NAME,
  DEFAULT_STORAGE_TIMEOUT_MS,
  type StorageStageOptions,
} from './store.js';
