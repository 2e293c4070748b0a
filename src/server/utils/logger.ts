import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Subset of the pino logger used by the parsing and download services.
 * Services accept one of these so callers (and tests) can swap the sink.
 */
export type ParserLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isTest = nodeEnv === 'test';
  const isDevelopment = nodeEnv === 'development';
  const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'nrwe-verdict-parser',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && process.env.LOG_PRETTY !== 'false' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

