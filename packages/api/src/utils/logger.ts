import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggingOptions {
  level: string;
  pretty: boolean;
}

/**
 * pino options shared by the service logger and Fastify's request logger,
 * so both streams carry the same base fields and formatting.
 */
export function loggerOptions(options: LoggingOptions): LoggerOptions {
  return {
    level: options.level,
    base: { service: 'grounded-qa-api' },
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
          },
        }
      : undefined,
  };
}

export function createLogger(options: LoggingOptions): Logger {
  return pino(loggerOptions(options));
}

export type { Logger };
