/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the record schemas that flow through the pipeline.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  MetadataSchema,
  TraceIdSchema,
  type ISO8601Timestamp,
  type Metadata,
  type TraceId,
} from './common.js';

// ============================================================================
// Pipeline Records
// ============================================================================

export {
  Sentiment,
  SentimentSchema,
  RECORD_KINDS,
  RawTextSchema,
  CleaningOperationSchema,
  CleanedTextSchema,
  AnalyzedTextSchema,
  ProcessedResultSchema,
  isRecordOfKind,
  createRawText,
  type RecordKind,
  type RawText,
  type RawTextInput,
  type CleaningOperation,
  type CleanedText,
  type AnalyzedText,
  type ProcessedResult,
  type PipelineRecord,
  type RecordOfKind,
} from './records.js';
