/**
 * Sentiment Stage
 *
 * Turns CleanedText into AnalyzedText by lexicon scoring. The lexicon is
 * either given up front or resolved once from a LexiconSource on first use.
 *
 * @module stages/sentiment
 */

import type { AnalyzedText, CleanedText } from '../schemas/records.js';
import { AnalysisError, describeError } from '../pipeline/errors.js';
import type { Stage, StageContext } from '../pipeline/types.js';
import { DEFAULT_LEXICON, LexiconError, loadLexiconFile, type Lexicon, type LexiconSource } from './sentiment/lexicon.js';
import { scoreText } from './sentiment/scoring.js';

export const SENTIMENT_STAGE_NAME = 'sentiment';

export interface SentimentStageOptions {
  /** Stage name (default: 'sentiment') */
  name?: string;
  /** Lexicon or deferred lexicon (default: the bundled lexicon) */
  lexicon?: Lexicon | LexiconSource;
}

/**
 * Wrap a lexicon failure as an AnalysisError for a stage.
 */
function toAnalysisError(error: unknown, stage: string, traceId?: string): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }
  return new AnalysisError(describeError(error), {
    stage,
    traceId,
    cause: error,
    retryable: error instanceof LexiconError && error.retryable,
  });
}

/**
 * Lexicon-based sentiment stage.
 *
 * @example
 * ```typescript
 * const stage = new SentimentStage({ lexicon: createLexicon({ positive: ['tasty'], negative: ['bland'] }) });
 * ```
 */
export class SentimentStage implements Stage<CleanedText, AnalyzedText> {
  readonly name: string;
  readonly inputKind = 'cleaned_text' as const;
  readonly outputKind = 'analyzed_text' as const;

  private lexicon: Lexicon | undefined;
  private readonly lexiconSource: LexiconSource | undefined;
  private pendingLexicon: Promise<Lexicon> | undefined;

  constructor(options: SentimentStageOptions = {}) {
    this.name = options.name ?? SENTIMENT_STAGE_NAME;
    const lexicon = options.lexicon ?? DEFAULT_LEXICON;
    if (typeof lexicon === 'function') {
      this.lexiconSource = lexicon;
    } else {
      this.lexicon = lexicon;
    }
  }

  async process(input: CleanedText, context: StageContext): Promise<AnalyzedText> {
    let lexicon: Lexicon;
    try {
      lexicon = await this.resolveLexicon();
    } catch (error) {
      const analysisError = toAnalysisError(error, this.name, context.traceId);
      context.logger.error('Lexicon unavailable', { error: analysisError.toJSON() });
      throw analysisError;
    }

    const result = scoreText(input.content, lexicon);

    context.logger.debug('Sentiment scored', {
      sentiment: result.sentiment,
      score: result.score,
      positiveCount: result.positiveCount,
      negativeCount: result.negativeCount,
    });

    return Object.freeze({
      kind: 'analyzed_text',
      content: input.content,
      source: input.source,
      traceId: context.traceId,
      sentiment: result.sentiment,
      sentimentScore: result.score,
      confidence: result.confidence,
      originalContent: input.originalContent,
      analyzedAt: new Date().toISOString(),
      metadata: { ...input.metadata },
    });
  }

  /**
   * Resolve the lexicon once. A failed load is not cached, so a retry can
   * succeed once the resource is back.
   */
  private async resolveLexicon(): Promise<Lexicon> {
    if (this.lexicon) {
      return this.lexicon;
    }
    if (!this.lexiconSource) {
      throw new LexiconError('no lexicon configured', false);
    }

    this.pendingLexicon ??= this.lexiconSource();
    try {
      this.lexicon = await this.pendingLexicon;
      return this.lexicon;
    } finally {
      this.pendingLexicon = undefined;
    }
  }
}

/**
 * Build a sentiment stage, loading the lexicon file eagerly when a path is
 * given.
 *
 * @throws AnalysisError if the lexicon file cannot be loaded or is invalid
 */
export async function createSentimentStage(options: { name?: string; lexiconPath?: string } = {}): Promise<SentimentStage> {
  const name = options.name ?? SENTIMENT_STAGE_NAME;
  if (!options.lexiconPath) {
    return new SentimentStage({ name });
  }
  try {
    const lexicon = await loadLexiconFile(options.lexiconPath);
    return new SentimentStage({ name, lexicon });
  } catch (error) {
    throw toAnalysisError(error, name);
  }
}
