/**
 * Cleaning Stage
 *
 * Turns RawText into CleanedText: strip HTML and decode its character
 * references, collapse whitespace, trim, NFKC-normalize, remove zero-width
 * characters.
 *
 * The Unicode steps can expose new markup or whitespace (full-width `＜b＞`
 * becomes `<b>`), so the step sequence is re-applied until the text stops
 * changing. Cleaning an already cleaned text is therefore a no-op.
 *
 * @module stages/clean
 */

import type { CleanedText, CleaningOperation, RawText } from '../schemas/records.js';
import { CleaningError, describeError } from '../pipeline/errors.js';
import type { Stage, StageContext } from '../pipeline/types.js';
import { stripMarkup } from './clean/html.js';
import { collapseWhitespace, normalizeUnicode, removeZeroWidth, trimWhitespace } from './clean/text.js';

// ============================================================================
// Constants
// ============================================================================

export const CLEANING_STAGE_NAME = 'cleaning';

/** Passes allowed before the text must have reached a fixed point */
export const MAX_CLEANING_PASSES = 4;

/**
 * Cleaning steps in the order they run.
 */
const CLEANING_STEPS: ReadonlyArray<readonly [CleaningOperation, (text: string) => string]> = [
  ['html_stripping', stripMarkup],
  ['whitespace_collapse', collapseWhitespace],
  ['trim', trimWhitespace],
  ['unicode_normalization', normalizeUnicode],
  ['zero_width_removal', removeZeroWidth],
];

// ============================================================================
// Core Cleaning Logic
// ============================================================================

export interface CleanTextResult {
  content: string;
  /** Steps that changed the text, in step order, each at most once */
  operations: CleaningOperation[];
}

/**
 * Raised when the step sequence keeps changing the text.
 */
export class CleaningNotConvergedError extends Error {
  constructor(passes: number) {
    super(`text did not reach a stable form after ${passes} passes`);
    this.name = 'CleaningNotConvergedError';
  }
}

/**
 * Clean a string.
 *
 * @throws MalformedMarkupError for unterminated tags or comments
 * @throws CleaningNotConvergedError if no fixed point is reached
 *
 * @example
 * ```typescript
 * cleanText('  <b>Hi</b>\n\tThere  ');
 * // { content: 'Hi There', operations: ['html_stripping', 'whitespace_collapse', 'trim'] }
 * ```
 */
export function cleanText(text: string): CleanTextResult {
  const changed = new Set<CleaningOperation>();
  let current = text;

  for (let pass = 0; pass < MAX_CLEANING_PASSES; pass++) {
    let next = current;
    for (const [operation, step] of CLEANING_STEPS) {
      const stepped = step(next);
      if (stepped !== next) {
        changed.add(operation);
      }
      next = stepped;
    }

    if (next === current) {
      return {
        content: current,
        operations: CLEANING_STEPS.map(([operation]) => operation).filter((operation) => changed.has(operation)),
      };
    }
    current = next;
  }

  throw new CleaningNotConvergedError(MAX_CLEANING_PASSES);
}

// ============================================================================
// Stage
// ============================================================================

/**
 * Pipeline stage wrapping cleanText. Holds no state.
 */
export class CleaningStage implements Stage<RawText, CleanedText> {
  readonly name: string;
  readonly inputKind = 'raw_text' as const;
  readonly outputKind = 'cleaned_text' as const;

  constructor(options: { name?: string } = {}) {
    this.name = options.name ?? CLEANING_STAGE_NAME;
  }

  async process(input: RawText, context: StageContext): Promise<CleanedText> {
    let result: CleanTextResult;
    try {
      result = cleanText(input.content);
    } catch (error) {
      const reason = describeError(error);
      context.logger.warn('Input rejected by cleaning', { source: input.source, reason });
      throw new CleaningError(reason, {
        stage: this.name,
        traceId: context.traceId,
        cause: error,
        originalText: input.content,
      });
    }

    context.logger.debug('Text cleaned', {
      operations: result.operations,
      inputLength: input.content.length,
      outputLength: result.content.length,
    });

    return Object.freeze({
      kind: 'cleaned_text',
      content: result.content,
      source: input.source,
      cleanedAt: new Date().toISOString(),
      traceId: context.traceId,
      originalContent: input.content,
      operations: result.operations,
      metadata: { ...input.metadata },
    });
  }
}
