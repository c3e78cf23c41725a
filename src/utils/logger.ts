/**
 * Component loggers
 *
 * Logs go to stderr as JSON lines. stdout is reserved for report output.
 */

import pino from 'pino';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info';
};

const rootLogger = pino(
  {
    level: resolveLogLevel(),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

/**
 * Re-read LOG_LEVEL, e.g. after a .env file has been loaded.
 * Applies to loggers already handed out by createLogger.
 */
export function configureLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = resolveLogLevel(env);
  rootLogger.level = level;
  return level;
}

export function isLogLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return rootLogger.isLevelEnabled(level);
}

// Component loggers bind their name per call rather than through pino child
// loggers, which copy the parent's level once and miss later changes.
export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => rootLogger.debug({ component, ...meta }, message),
    info: (message, meta) => rootLogger.info({ component, ...meta }, message),
    warn: (message, meta) => rootLogger.warn({ component, ...meta }, message),
    error: (message, meta) => rootLogger.error({ component, ...meta }, message),
  };
}
