import type { Logger as PinoLogger } from 'pino';

/**
 * Pino's logger, used directly.
 *
 * Data-first calls:
 *   logger.info({ path }, 'Stage in');
 *   logger.error({ err }, 'Copy failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
