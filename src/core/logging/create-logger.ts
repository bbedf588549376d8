import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger.
 *
 * JSON lines, written synchronously to stderr (fd 2) unless a destination
 * is given. Stdout stays free for command output such as digests.
 */
export function createRootLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Creates component loggers. One per process, registered in DI.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel, destination?: DestinationStream) {
    this._root = createRootLogger(level, destination);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
