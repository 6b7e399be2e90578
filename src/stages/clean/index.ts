/**
 * Cleaning Stage Exports
 *
 * @module stages/clean
 */

export * from './html.js';
export * from './text.js';
