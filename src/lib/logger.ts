// src/lib/logger.ts
import { pino, type Logger, type LevelWithSilent } from 'pino';

/**
 * Accepted LOG_LEVEL values
 */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const PINO_LEVELS: Record<LogLevel, LevelWithSilent> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Map a configured level to pino's level name.
 * Under test everything is silenced.
 */
export function toPinoLevel(level: LogLevel, nodeEnv = process.env.NODE_ENV): LevelWithSilent {
  if (nodeEnv === 'test') return 'silent';
  return PINO_LEVELS[level];
}

/**
 * Create a pino logger (pretty-printed in development)
 */
export function createLogger(level: LogLevel, nodeEnv = process.env.NODE_ENV): Logger {
  if (nodeEnv === 'development') {
    return pino({
      level: toPinoLevel(level, nodeEnv),
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level: toPinoLevel(level, nodeEnv) });
}

const envLevel = process.env.LOG_LEVEL?.toUpperCase();

/**
 * Process-wide logger for code outside request handlers
 */
export const logger: Logger = createLogger(isLogLevel(envLevel) ? envLevel : 'INFO');
