/**
 * textpipe
 *
 * Multi-stage text pipeline: cleaning, lexicon sentiment scoring and
 * transactional storage, sequenced by an orchestrator.
 *
 * @example
 * ```typescript
 * import { PipelineOrchestrator, CleaningStage, SentimentStage, StorageStage, SqliteStoreConnector, createRawText } from 'textpipe';
 *
 * const connector = new SqliteStoreConnector({ filename: 'reviews.db' });
 * const orchestrator = new PipelineOrchestrator([
 *   new CleaningStage(),
 *   new SentimentStage(),
 *   new StorageStage(connector),
 * ]);
 * const result = await orchestrator.run(createRawText({ content: '<p>Great!</p>', source: 'review' }));
 * ```
 *
 * @module textpipe
 */

export * from './schemas/index.js';
export * from './pipeline/index.js';
export * from './stages/index.js';
export * from './storage/index.js';
export { createLogger, createSilentLogger, isLogLevel, LOG_LEVELS, type LogLevel, type LoggerOptions } from './logging/logger.js';
export {
  loadConfig,
  getConfig,
  resetConfig,
  ConfigValidationError,
  STORE_DRIVERS,
  type Config,
  type StoreDriver,
} from './config/index.js';
