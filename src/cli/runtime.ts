/**
 * CLI Runtime
 *
 * Wires configuration, logger, store connector and stages into an
 * orchestrator for one CLI invocation.
 *
 * @module cli/runtime
 */

import pino from 'pino';
import { loadConfig, type Config } from '../config/index.js';
import { createLogger, type LogLevel } from '../logging/logger.js';
import { PipelineConfigurationError } from '../pipeline/errors.js';
import { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { Logger } from '../pipeline/types.js';
import { CleaningStage } from '../stages/clean.js';
import { createSentimentStage } from '../stages/sentiment.js';
import { StorageStage } from '../stages/store.js';
import type { StoreConnector } from '../storage/connector.js';
import { InMemoryStoreConnector } from '../storage/memory.js';
import { SqliteStoreConnector } from '../storage/sqlite.js';
import { PostgresStoreConnector, createPostgresPool } from '../storage/postgres.js';
import type { GlobalOptions } from './base-command.js';

export interface CliRuntime {
  config: Config;
  logger: Logger;
  connector: StoreConnector;
  orchestrator: PipelineOrchestrator;
  /** Close the store connection */
  close(): Promise<void>;
}

/**
 * Load configuration with CLI flags taking precedence over the environment.
 */
export function resolveCliConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Config {
  return loadConfig({
    ...env,
    ...(options.store !== undefined && { TEXTPIPE_STORE: options.store }),
    ...(options.dbPath !== undefined && { TEXTPIPE_DB_PATH: options.dbPath }),
    ...(options.databaseUrl !== undefined && { DATABASE_URL: options.databaseUrl }),
  });
}

/**
 * Log level for a CLI run: --verbose forces debug, --quiet keeps only errors.
 */
export function cliLogLevel(options: GlobalOptions, config: Config): LogLevel {
  if (options.verbose) {
    return 'debug';
  }
  if (options.quiet) {
    return 'error';
  }
  return config.logLevel;
}

/**
 * Open the store the configuration names.
 */
export function createStoreConnector(store: Config['store'], logger: Logger): StoreConnector {
  switch (store.driver) {
    case 'memory':
      return new InMemoryStoreConnector();
    case 'sqlite':
      return new SqliteStoreConnector({ filename: store.dbPath });
    case 'postgres':
      if (!store.databaseUrl) {
        throw new PipelineConfigurationError('DATABASE_URL is required for the postgres store');
      }
      return new PostgresStoreConnector(createPostgresPool(store.databaseUrl, logger));
  }
}

/**
 * Build the three-stage pipeline over a connector.
 */
export async function createPipeline(config: Config, connector: StoreConnector, logger: Logger): Promise<PipelineOrchestrator> {
  const sentiment = await createSentimentStage({ lexiconPath: config.lexiconPath });
  return new PipelineOrchestrator(
    [new CleaningStage(), sentiment, new StorageStage(connector, { timeoutMs: config.store.timeoutMs })],
    { logger }
  );
}

/**
 * Logger for a CLI run. Lines go to stderr so stdout carries only command output.
 */
export function createCliLogger(options: GlobalOptions, config: Config): Logger {
  return createLogger({ level: cliLogLevel(options, config), destination: pino.destination(2) });
}

/**
 * Configuration, logger and an open store, for commands that only read.
 *
 * @throws ConfigValidationError or PipelineConfigurationError
 */
export function openStore(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Pick<CliRuntime, 'config' | 'logger' | 'connector'> {
  const config = resolveCliConfig(options, env);
  const logger = createCliLogger(options, config);
  return { config, logger, connector: createStoreConnector(config.store, logger) };
}

/**
 * Build everything a storing command needs.
 *
 * @throws ConfigValidationError, PipelineConfigurationError or AnalysisError
 */
export async function createCliRuntime(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Promise<CliRuntime> {
  const { config, logger, connector } = openStore(options, env);

  let orchestrator: PipelineOrchestrator;
  try {
    orchestrator = await createPipeline(config, connector, logger);
  } catch (error) {
    await connector.close();
    throw error;
  }

  return {
    config,
    logger,
    connector,
    orchestrator,
    close: () => connector.close(),
  };
}
