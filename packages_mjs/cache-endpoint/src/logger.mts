/**
 * Structured logging for cache events
 */
import { pino } from 'pino';
import type { BaseLogger, LevelWithSilent, Logger } from 'pino';

/**
 * Any pino-compatible logger; `fastify.log` qualifies
 */
export type CacheLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Events recorded in the `event` field of every cache log line
 */
export enum CacheLogEvent {
  CONNECT_BEGIN = 'CONNECT_BEGIN',
  CONNECT_SUCCESS = 'CONNECT_SUCCESS',
  CONNECT_FAIL = 'CONNECT_FAIL',
  KEY_ADDED_TO_CACHE = 'KEY_ADDED_TO_CACHE',
  KEY_FOUND_IN_CACHE = 'KEY_FOUND_IN_CACHE',
  FAILED_TO_CACHE_KEY = 'FAILED_TO_CACHE_KEY',
  STORE_READ_FAILED = 'STORE_READ_FAILED',
  NOT_CACHEABLE = 'NOT_CACHEABLE',
  UNKEYABLE_ARGUMENTS = 'UNKEYABLE_ARGUMENTS',
  CORRUPT_ENTRY = 'CORRUPT_ENTRY',
}

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Pretty-print through pino-pretty (development only) */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', pretty = false } = options;

  if (pretty) {
    return pino({
      name: 'cache-endpoint',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      },
    });
  }

  return pino({ name: 'cache-endpoint', level });
}
