/**
 * Structured Logger
 *
 * pino-backed implementation of the pipeline Logger interface.
 * Child loggers carry bindings (trace id, stage name) onto every line.
 *
 * @module logging/logger
 */

import pino, { type Logger as PinoLogger } from 'pino';
import type { LogFields, Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Accepted log levels. `silent` disables output entirely.
 */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Options for createLogger.
 */
export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  /** Value of the `service` field on every line (default: 'textpipe') */
  service?: string;
  /** Where to write lines (default: stdout) */
  destination?: pino.DestinationStream;
}

// ============================================================================
// Adapter
// ============================================================================

class PinoPipelineLogger implements Logger {
  constructor(private readonly pinoLogger: PinoLogger) {}

  debug(message: string, fields?: LogFields): void {
    this.pinoLogger.debug(fields ?? {}, message);
  }

  info(message: string, fields?: LogFields): void {
    this.pinoLogger.info(fields ?? {}, message);
  }

  warn(message: string, fields?: LogFields): void {
    this.pinoLogger.warn(fields ?? {}, message);
  }

  error(message: string, fields?: LogFields): void {
    this.pinoLogger.error(fields ?? {}, message);
  }

  child(bindings: LogFields): Logger {
    return new PinoPipelineLogger(this.pinoLogger.child(bindings));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a root logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const runLogger = logger.child({ traceId: 'abc-123' });
 * runLogger.info('Pipeline started'); // {"level":"info","traceId":"abc-123",...}
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    base: { service: options.service ?? 'textpipe' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const pinoLogger = options.destination
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);

  return new PinoPipelineLogger(pinoLogger);
}

/**
 * Logger that discards everything. Used when no logger is injected.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/**
 * Check if a string is a supported log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
