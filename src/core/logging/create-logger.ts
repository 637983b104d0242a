import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { LOG_LEVEL_ENV } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the log level from the environment.
 *
 * COMPILATION_WORKSPACE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (test runs stay quiet unless someone is debugging)
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env[LOG_LEVEL_ENV]?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}

/**
 * Root pino logger: JSON lines, synchronous, on stderr so test reporters keep stdout.
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger(resolveLogLevel());
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
