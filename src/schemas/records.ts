/**
 * Pipeline Record Schemas
 *
 * The four record kinds that flow through the pipeline, one per hop:
 * RawText -> CleanedText -> AnalyzedText -> ProcessedResult.
 *
 * Every record carries a `kind` discriminant so stages can narrow an
 * incoming value without casts. Records are frozen once created.
 *
 * @module schemas/records
 */

import { z } from 'zod';
import { ISO8601TimestampSchema, MetadataSchema } from './common.js';

// ============================================================================
// Sentiment
// ============================================================================

/**
 * Sentiment classification values. The lowercase value is what gets stored.
 */
export const Sentiment = {
  POSITIVE: 'positive',
  NEUTRAL: 'neutral',
  NEGATIVE: 'negative',
} as const;

export const SentimentSchema = z.enum([Sentiment.POSITIVE, Sentiment.NEUTRAL, Sentiment.NEGATIVE]);

export type Sentiment = z.infer<typeof SentimentSchema>;

// ============================================================================
// Record Kinds
// ============================================================================

export const RECORD_KINDS = ['raw_text', 'cleaned_text', 'analyzed_text', 'processed_result'] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

// ============================================================================
// RawText
// ============================================================================

/**
 * Caller-supplied input. Content may be empty or contain markup.
 */
export const RawTextSchema = z.object({
  kind: z.literal('raw_text'),
  content: z.string(),
  /** Origin label, e.g. "review" or "support-ticket" */
  source: z.string(),
  receivedAt: ISO8601TimestampSchema,
  metadata: MetadataSchema,
});

export type RawText = Readonly<z.infer<typeof RawTextSchema>>;

// ============================================================================
// CleanedText
// ============================================================================

/**
 * Names of the cleaning steps, in the order they run.
 */
export const CleaningOperationSchema = z.enum([
  'html_stripping',
  'whitespace_collapse',
  'trim',
  'unicode_normalization',
  'zero_width_removal',
]);

export type CleaningOperation = z.infer<typeof CleaningOperationSchema>;

export const CleanedTextSchema = z.object({
  kind: z.literal('cleaned_text'),
  content: z.string(),
  source: z.string(),
  cleanedAt: ISO8601TimestampSchema,
  traceId: z.string().min(1),
  originalContent: z.string(),
  /** Steps that actually changed the text, in order */
  operations: z.array(CleaningOperationSchema),
  metadata: MetadataSchema,
});

export type CleanedText = Readonly<z.infer<typeof CleanedTextSchema>>;

// ============================================================================
// AnalyzedText
// ============================================================================

export const AnalyzedTextSchema = z.object({
  kind: z.literal('analyzed_text'),
  content: z.string(),
  source: z.string(),
  traceId: z.string().min(1),
  sentiment: SentimentSchema,
  sentimentScore: z.number().min(-1).max(1),
  confidence: z.number().min(0).max(1),
  originalContent: z.string(),
  analyzedAt: ISO8601TimestampSchema,
  metadata: MetadataSchema,
});

export type AnalyzedText = Readonly<z.infer<typeof AnalyzedTextSchema>>;

// ============================================================================
// ProcessedResult
// ============================================================================

export const ProcessedResultSchema = AnalyzedTextSchema.omit({ kind: true }).extend({
  kind: z.literal('processed_result'),
  /** Opaque identifier assigned by the store */
  storageId: z.string().min(1),
  storedAt: ISO8601TimestampSchema,
});

export type ProcessedResult = Readonly<z.infer<typeof ProcessedResultSchema>>;

// ============================================================================
// Unions and Guards
// ============================================================================

export type PipelineRecord = RawText | CleanedText | AnalyzedText | ProcessedResult;

/**
 * Record type for a given kind.
 */
export type RecordOfKind<K extends RecordKind> = Extract<PipelineRecord, { kind: K }>;

/**
 * Check whether a value is a record of the given kind.
 */
export function isRecordOfKind<K extends RecordKind>(
  value: unknown,
  kind: K
): value is RecordOfKind<K> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === kind
  );
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Input accepted by createRawText. `receivedAt` defaults to now.
 */
export interface RawTextInput {
  content: string;
  source: string;
  receivedAt?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Build a frozen RawText record.
 *
 * @example
 * ```typescript
 * const raw = createRawText({ content: '<p>Great!</p>', source: 'review' });
 * ```
 */
export function createRawText(input: RawTextInput): RawText {
  const record = RawTextSchema.parse({
    kind: 'raw_text',
    content: input.content,
    source: input.source,
    receivedAt: input.receivedAt ?? new Date().toISOString(),
    metadata: input.metadata ?? {},
  });
  return Object.freeze(record);
}
