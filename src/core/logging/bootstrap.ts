import pino from 'pino';
import type { Logger } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Logger for code that runs before the DI container exists
 * (config loading, container initialization).
 *
 * Once DI is ready, take an ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const requested = process.env['JOBSTAGE_LOG_LEVEL']?.toLowerCase() ?? '';
    const level = isLogLevel(requested) ? requested : 'info';

    _bootstrapLogger = pino(
      {
        level,
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
