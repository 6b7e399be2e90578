/**
 * Common Zod Schemas - Shared types used across the pipeline records
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Metadata Schema
// ============================================

/**
 * Free-form, JSON-serializable metadata attached by the caller.
 * Carried unchanged from RawText through to storage.
 */
export const MetadataSchema = z.record(z.string(), z.unknown()).default({});

export type Metadata = z.infer<typeof MetadataSchema>;

// ============================================
// Identifier Schemas
// ============================================

/**
 * Trace identifier: any non-empty token without whitespace.
 */
export const TraceIdSchema = z
  .string()
  .min(1, 'Trace id must not be empty')
  .max(128, 'Trace id must be at most 128 characters')
  .regex(/^\S+$/, 'Trace id must not contain whitespace');

export type TraceId = z.infer<typeof TraceIdSchema>;
