/**
 * Sentiment Stage Exports
 *
 * @module stages/sentiment
 */

export * from './lexicon.js';
export * from './scoring.js';
