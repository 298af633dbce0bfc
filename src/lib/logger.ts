/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Records go to stderr so stdout stays free for
 * command output such as `show-packages`.
 */

import pino from 'pino';
import { nanoid } from 'nanoid';

export type { Logger } from 'pino';

export interface LoggerConfig extends pino.LoggerOptions {
  pretty?: boolean;
}

/**
 * Create a Pino logger with sensible defaults for provisioning runs
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const { pretty, ...options } = config;
  const isDevelopment = process.env.NODE_ENV === 'development';

  const baseOptions: pino.LoggerOptions = {
    name: 'ambry-provision',
    level: process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
    redact: {
      paths: ['password', '*.password', 'unregistered_key', '*.unregistered_key'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    ...options,
  };

  if (pretty ?? isDevelopment) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Child logger tagged with a fresh run id, one per provisioning run
 */
export function createRunLogger(logger: pino.Logger): pino.Logger {
  return logger.child({ runId: nanoid(10) });
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.info(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );

      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.warn(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );

      return duration;
    },
  };
}
