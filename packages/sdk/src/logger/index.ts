/**
 * Logger module - structured logging for the SDK
 * @module logger
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

/**
 * Configuration for logger creation
 */
export interface LoggerConfig {
  name?: string;
  level?: LevelWithSilent;
}

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Narrow an arbitrary string (usually from the environment) to a pino level
 */
export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LevelWithSilent {
  const fromEnv = process.env.OBJECTSTORE_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Create a new root logger
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    name: config.name ?? 'objectsync',
    level: config.level ?? defaultLevel(),
  });
}

/**
 * Default SDK logger; modules derive children tagged with their name
 */
export const logger: Logger = createLogger();
