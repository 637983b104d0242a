import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ location: 'CLASS_OUTPUT' }, 'Allocated output container');
 *   logger.error({ err: error }, 'Failed to close container');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVEL_ENV = 'COMPILATION_WORKSPACE_LOG_LEVEL';
