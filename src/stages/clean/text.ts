/**
 * Text Normalization Steps
 *
 * Whitespace, Unicode and zero-width handling for the cleaning stage.
 *
 * @module stages/clean/text
 */

/**
 * Zero-width characters removed from cleaned text:
 * ZERO WIDTH SPACE, ZERO WIDTH NON-JOINER, ZERO WIDTH JOINER,
 * WORD JOINER and ZERO WIDTH NO-BREAK SPACE (BOM).
 */
export const ZERO_WIDTH_CHARS = ['\u200B', '\u200C', '\u200D', '\u2060', '\uFEFF'] as const;

const ZERO_WIDTH_REGEX = /[\u200B\u200C\u200D\u2060\uFEFF]/g;

// `\s` includes U+FEFF; it is excluded here so it is removed rather than turned into a space
const WHITESPACE_RUN_REGEX = /[^\S\uFEFF]+/g;
const EDGE_WHITESPACE_REGEX = /^[^\S\uFEFF]+|[^\S\uFEFF]+$/g;

/**
 * Collapse every whitespace run (including tabs, newlines and Unicode
 * spaces) to a single ASCII space.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN_REGEX, ' ');
}

/**
 * Remove leading and trailing whitespace.
 */
export function trimWhitespace(text: string): string {
  return text.replace(EDGE_WHITESPACE_REGEX, '');
}

/**
 * Apply Unicode compatibility normalization (NFKC).
 * Full-width forms become ASCII and `①` becomes `1`.
 */
export function normalizeUnicode(text: string): string {
  return text.normalize('NFKC');
}

/**
 * Remove every zero-width character.
 */
export function removeZeroWidth(text: string): string {
  return text.replace(ZERO_WIDTH_REGEX, '');
}
