/**
 * jobstage public API.
 *
 * Typical job:
 *
 *   initializeContainer();
 *   const stage = await container.resolve<StagingSetFactory>(DI.Staging.SetFactory).create();
 *   const input = await stage.stageIn('/data/run42/events.root');
 *   const output = await stage.stageOut('/data/run42/histos.root', 'root://store//run42/histos.root');
 *   // ... work on input and output ...
 *   const status = await stage.finish();
 */

export * from './staging/index.js';
export * from './pipeline/index.js';

export { loadConfig, createValidatedConfig, defaultConfig } from './config/app-config.js';
export type { AppConfig, CopyConfig, PipelineConfig, StagingConfig, ValidatedConfig } from './config/app-config.js';

export { initializeContainer, resetContainer, isInitialized, container } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory, createRootLogger } from './core/logging/index.js';

export type { AppError, ConfigInvalidError, ConfigIssue } from './errors/index.js';
export { Err, formatAppError } from './errors/index.js';
