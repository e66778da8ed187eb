import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's Logger, used directly.
 *
 * Calls are data-first:
 *   logger.info({ service: 'http' }, 'Service stopped');
 *   logger.error({ err: error }, 'Shutdown failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const LOG_LEVEL_ENV = 'GRACEFUL_STOP_LOG_LEVEL';

/**
 * Read the log level from the environment.
 * Unknown values fall back to `info`.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV]?.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === raw);
  return match ?? 'info';
}
