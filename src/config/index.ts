/**
 * Configuration Module
 *
 * Loads and validates environment variables for textpipe.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { getDefaultDatabasePath, resolveDatabasePath } from '../storage/paths.js';
import { DEFAULT_STORAGE_TIMEOUT_MS } from '../stages/store.js';
import { DEFAULT_RETRY_CONFIG } from '../pipeline/retry.js';

export const STORE_DRIVERS = ['memory', 'sqlite', 'postgres'] as const;

export type StoreDriver = (typeof STORE_DRIVERS)[number];

// Environment schema with optional values and defaults
const envSchema = z
  .object({
    // Store selection
    TEXTPIPE_STORE: z.enum(STORE_DRIVERS).default('sqlite'),
    TEXTPIPE_DB_PATH: z.string().min(1).optional(),
    DATABASE_URL: z.string().url().optional(),

    // Pipeline tuning
    TEXTPIPE_STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_STORAGE_TIMEOUT_MS),
    TEXTPIPE_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(DEFAULT_RETRY_CONFIG.maxRetries),
    TEXTPIPE_LEXICON_PATH: z.string().min(1).optional(),

    // Runtime options
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.TEXTPIPE_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'DATABASE_URL is required when TEXTPIPE_STORE=postgres',
        path: ['DATABASE_URL'],
      });
    }
  });

/**
 * Raised when environment variables fail validation.
 */
export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigValidationError';
  }
}

export interface Config {
  nodeEnv: 'development' | 'test' | 'production';
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  store: {
    driver: StoreDriver;
    /** Absolute SQLite path, or ':memory:' */
    dbPath: string;
    databaseUrl?: string;
    /** Bound on begin + write in ms */
    timeoutMs: number;
  };

  retry: {
    maxRetries: number;
  };

  /** Custom sentiment lexicon file */
  lexiconPath?: string;

  /** Defaults to 'silent' under test and 'info' otherwise */
  logLevel: LogLevel;
}

/**
 * Validate an environment and build the configuration.
 *
 * @param env - Variables to read (default: process.env, after dotenv has loaded .env)
 * @throws ConfigValidationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ TEXTPIPE_STORE: 'memory', NODE_ENV: 'test' });
 * config.store.driver; // 'memory'
 * config.logLevel;     // 'silent'
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigValidationError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isDevelopment: parsed.NODE_ENV === 'development',
    isTest: parsed.NODE_ENV === 'test',

    store: {
      driver: parsed.TEXTPIPE_STORE,
      dbPath: resolveDatabasePath(parsed.TEXTPIPE_DB_PATH ?? getDefaultDatabasePath()),
      databaseUrl: parsed.DATABASE_URL,
      timeoutMs: parsed.TEXTPIPE_STORAGE_TIMEOUT_MS,
    },

    retry: {
      maxRetries: parsed.TEXTPIPE_MAX_RETRIES,
    },

    lexiconPath: parsed.TEXTPIPE_LEXICON_PATH,

    logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
  };
}

let cachedConfig: Config | undefined;

/**
 * Application configuration singleton, loaded from process.env on first use.
 */
export function getConfig(): Config {
  cachedConfig ??= loadConfig();
  return cachedConfig;
}

/**
 * Forget the cached configuration (tests).
 */
export function resetConfig(): void {
  cachedConfig = undefined;
}
