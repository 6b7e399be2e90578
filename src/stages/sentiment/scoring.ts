/**
 * Lexicon Scoring
 *
 * @module stages/sentiment/scoring
 */

import { Sentiment } from '../../schemas/records.js';
import type { Lexicon } from './lexicon.js';

/** Scores strictly above this are positive */
export const POSITIVE_THRESHOLD = 0.1;

/** Scores strictly below this are negative */
export const NEGATIVE_THRESHOLD = -0.1;

/** Marker count at which confidence reaches 1 */
const FULL_CONFIDENCE_MARKERS = 5;

/** Confidence for text with words but no markers */
const NO_MARKER_CONFIDENCE = 0.5;

const TOKEN_REGEX = /[\p{L}\p{N}]+(?:['\u2019][\p{L}\p{N}]+)*/gu;

export interface SentimentScore {
  sentiment: Sentiment;
  /** (P - N) / max(1, P + N), in [-1, 1] */
  score: number;
  confidence: number;
  positiveCount: number;
  negativeCount: number;
  tokenCount: number;
}

/**
 * Split text into lowercase word tokens. Internal apostrophes stay
 * (`don't` is one token).
 */
export function tokenize(text: string): string[] {
  return Array.from(text.toLowerCase().matchAll(TOKEN_REGEX), (match) => match[0]);
}

/**
 * Map a score to a sentiment label.
 */
export function classifyScore(score: number): Sentiment {
  if (score > POSITIVE_THRESHOLD) {
    return Sentiment.POSITIVE;
  }
  if (score < NEGATIVE_THRESHOLD) {
    return Sentiment.NEGATIVE;
  }
  return Sentiment.NEUTRAL;
}

/**
 * Score text against a lexicon. Never throws.
 *
 * @example
 * ```typescript
 * scoreText('Great product, terrible box. Great price!', DEFAULT_LEXICON);
 * // P = 2, N = 1 -> score 1/3, positive
 * ```
 */
export function scoreText(text: string, lexicon: Lexicon): SentimentScore {
  const tokens = tokenize(text);

  let positiveCount = 0;
  let negativeCount = 0;
  for (const token of tokens) {
    if (lexicon.positive.has(token)) {
      positiveCount++;
    } else if (lexicon.negative.has(token)) {
      negativeCount++;
    }
  }

  const markers = positiveCount + negativeCount;
  const score = (positiveCount - negativeCount) / Math.max(1, markers);

  let confidence: number;
  if (tokens.length === 0) {
    confidence = 1;
  } else if (markers === 0) {
    confidence = NO_MARKER_CONFIDENCE;
  } else {
    confidence = Math.min(1, markers / FULL_CONFIDENCE_MARKERS);
  }

  return {
    sentiment: classifyScore(score),
    score,
    confidence,
    positiveCount,
    negativeCount,
    tokenCount: tokens.length,
  };
}
