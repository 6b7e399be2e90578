/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export { BatchProgress, formatDuration, type SpinnerOptions } from './progress.js';

export {
  formatScore,
  formatCleanedText,
  formatAnalysis,
  formatProcessedResult,
  formatStoredRecord,
  formatOutcomeLine,
  formatBatchSummary,
} from './result-summary.js';
