export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, isLogLevel } from './types.js';

export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

// Pre-DI code
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
