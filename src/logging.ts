/**
 * @file Logger construction for the serial engines.
 * @module logging
 */

import pino from 'pino';

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

/** Levels accepted by configuration files */
export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Creates a pino logger. Defaults to `silent` so an embedding
 * application opts in to engine events.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'serialsim',
    level: options.level ?? 'silent',
  });
}

/** Shared quiet logger for components built without one. */
export const silentLogger: Logger = createLogger();

/**
 * Checks whether a value names a pino level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}
