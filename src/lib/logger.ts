/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with the actuator's defaults and a timer helper.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  name?: string;
  level?: string;
  pretty?: boolean;
  /** Write JSON lines here instead of stdout; disables pretty printing */
  destination?: pino.DestinationStream;
}

/**
 * Create a Pino logger; credentials that reach a log line are redacted
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const pretty = !options.destination && (options.pretty ?? isDevelopment);

  const loggerOptions: pino.LoggerOptions = {
    name: options.name ?? 'azure-cluster-actuator',
    level: options.level ?? process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
    redact: {
      paths: [
        'clientSecret',
        'token',
        'authorization',
        'key',
        '*.clientSecret',
        '*.key',
        '*.token',
      ],
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    }),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
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
    end(additionalContext: Record<string, unknown> = {}): void {
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
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
