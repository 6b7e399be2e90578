/**
 * Sentiment Lexicon
 *
 * Two disjoint sets of marker words. Validated with zod on load and
 * read-only afterwards.
 *
 * @module stages/sentiment/lexicon
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { describeError } from '../../pipeline/errors.js';
import defaultLexiconJson from './default-lexicon.json';

// ============================================================================
// Errors
// ============================================================================

/**
 * A lexicon could not be loaded or validated. The sentiment stage surfaces
 * it as an AnalysisError with the same `retryable` flag.
 */
export class LexiconError extends Error {
  constructor(
    message: string,
    /** True when the failure came from I/O and may succeed later */
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'LexiconError';
  }
}

// ============================================================================
// Schema
// ============================================================================

/**
 * A single word: letters and digits, with internal apostrophes allowed.
 */
export const LEXICON_WORD_PATTERN = /^[\p{L}\p{N}]+(?:['\u2019][\p{L}\p{N}]+)*$/u;

const LexiconWordSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(LEXICON_WORD_PATTERN, 'Lexicon entries must be single words');

const WordListSchema = z
  .array(LexiconWordSchema)
  .min(1, 'Word list must not be empty')
  .transform((words) => [...new Set(words)]);

/**
 * Lexicon file format: `{ "positive": [...], "negative": [...] }`.
 */
export const LexiconSchema = z
  .object({
    positive: WordListSchema,
    negative: WordListSchema,
  })
  .superRefine((lexicon, ctx) => {
    const positive = new Set(lexicon.positive);
    const overlap = lexicon.negative.filter((word) => positive.has(word));
    if (overlap.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Words cannot be both positive and negative: ${overlap.join(', ')}`,
        path: ['negative'],
      });
    }
  });

export type LexiconInput = z.input<typeof LexiconSchema>;

// ============================================================================
// Lexicon
// ============================================================================

export interface Lexicon {
  readonly positive: ReadonlySet<string>;
  readonly negative: ReadonlySet<string>;
}

/**
 * Deferred lexicon, resolved the first time the sentiment stage runs.
 */
export type LexiconSource = () => Promise<Lexicon>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate and freeze a lexicon.
 *
 * @throws LexiconError (not retryable) if the lexicon is invalid
 *
 * @example
 * ```typescript
 * const lexicon = createLexicon({ positive: ['Tasty'], negative: ['bland'] });
 * lexicon.positive.has('tasty'); // true
 * ```
 */
export function createLexicon(input: unknown, origin = 'inline lexicon'): Lexicon {
  const parsed = LexiconSchema.safeParse(input);
  if (!parsed.success) {
    throw new LexiconError(`invalid lexicon (${origin}): ${formatIssues(parsed.error)}`, false, {
      cause: parsed.error,
    });
  }

  return Object.freeze({
    positive: new Set(parsed.data.positive),
    negative: new Set(parsed.data.negative),
  });
}

/**
 * Load a lexicon from a JSON file.
 *
 * @throws LexiconError, retryable when the file could not be read, not
 *   retryable when its content is invalid
 */
export async function loadLexiconFile(filePath: string): Promise<Lexicon> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new LexiconError(`could not read lexicon file ${filePath}: ${describeError(error)}`, true, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new LexiconError(`lexicon file ${filePath} is not valid JSON: ${describeError(error)}`, false, {
      cause: error,
    });
  }

  return createLexicon(data, filePath);
}

/**
 * Lexicon shipped with the package (20 positive, 20 negative words).
 */
export const DEFAULT_LEXICON: Lexicon = createLexicon(defaultLexiconJson, 'default lexicon');
