import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { TimeClockPort } from '../staging/ports/time-clock.port.js';
import type { DelayPort } from '../staging/ports/delay.port.js';
import type { RandomSourcePort } from '../staging/ports/random-source.port.js';
import type { CommandRunnerPort } from '../staging/ports/command-runner.port.js';
import type { ChecksumPort } from '../staging/ports/checksum.port.js';
import type { TextFilePort } from '../staging/ports/text-file.port.js';
import type { StorageBackendPort } from '../staging/ports/storage-backend.port.js';
import { NodeTimeClock } from '../staging/infra/local/time-clock/index.js';
import { NodeDelay } from '../staging/infra/local/delay/index.js';
import { NodeRandomSource } from '../staging/infra/local/random-source/index.js';
import { NodeCommandRunner } from '../staging/infra/local/command-runner/index.js';
import { NodeMd5Checksum } from '../staging/infra/local/checksum/index.js';
import { NodeTextFile } from '../staging/infra/local/text-file/index.js';
import { NodeFsBackend } from '../staging/infra/local/fs-backend/index.js';
import { XrootdBackend } from '../staging/infra/xrootd/index.js';
import { BackendSelector } from '../staging/backend-selection.js';
import { ResilientCopier, DEFAULT_COPY_POLICY } from '../staging/resilient-copy.js';
import { StagingSetFactory } from '../staging/staging-set-factory.js';
import { JobSummary } from '../pipeline/job-summary.js';
import { PipelineVariables } from '../pipeline/pipeline-variables.js';

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may register a config before initialization; keep theirs.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const loaded = loadConfig({ env: options.env ?? process.env, cwd: options.cwd ?? process.cwd() });
  if (loaded.isErr()) return err(loaded.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: loaded.value });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // The only place env is consulted for the mode.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'library' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;

  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new PinoLoggerFactory(config.logLevel);
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// STAGING PRIMITIVES
// Level 1: no dependencies. Level 2: depend on level 1.
// ═══════════════════════════════════════════════════════════════════════════

function registerInfra(): void {
  container.register<TimeClockPort>(DI.Infra.TimeClock, {
    useFactory: instanceCachingFactory(() => new NodeTimeClock()),
  });
  container.register<DelayPort>(DI.Infra.Delay, {
    useFactory: instanceCachingFactory(() => new NodeDelay()),
  });
  container.register<RandomSourcePort>(DI.Infra.RandomSource, {
    useFactory: instanceCachingFactory(() => new NodeRandomSource()),
  });
  container.register<ChecksumPort>(DI.Infra.Checksum, {
    useFactory: instanceCachingFactory(() => new NodeMd5Checksum()),
  });
  container.register<TextFilePort>(DI.Infra.TextFile, {
    useFactory: instanceCachingFactory(() => new NodeTextFile()),
  });

  container.register<CommandRunnerPort>(DI.Infra.CommandRunner, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const clock = c.resolve<TimeClockPort>(DI.Infra.TimeClock);
      const logger = c.resolve<ILoggerFactory>(DI.Logging.Factory).create('CommandRunner');
      return new NodeCommandRunner(clock, logger);
    }),
  });
}

function registerStorage(): void {
  container.register<StorageBackendPort>(DI.Storage.Local, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      return new NodeFsBackend(c.resolve<ChecksumPort>(DI.Infra.Checksum));
    }),
  });
  container.register<StorageBackendPort>(DI.Storage.Remote, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      const runner = c.resolve<CommandRunnerPort>(DI.Infra.CommandRunner);
      const logger = c.resolve<ILoggerFactory>(DI.Logging.Factory).create('XrootdBackend');
      return new XrootdBackend(runner, config.remote.binDir, logger);
    }),
  });
  container.register<BackendSelector>(DI.Storage.Selector, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      return new BackendSelector(
        c.resolve<StorageBackendPort>(DI.Storage.Local),
        c.resolve<StorageBackendPort>(DI.Storage.Remote)
      );
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  container.register<ResilientCopier>(DI.Staging.Copier, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new ResilientCopier(
        {
          selector: c.resolve<BackendSelector>(DI.Storage.Selector),
          clock: c.resolve<TimeClockPort>(DI.Infra.TimeClock),
          delay: c.resolve<DelayPort>(DI.Infra.Delay),
          random: c.resolve<RandomSourcePort>(DI.Infra.RandomSource),
          logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('ResilientCopier'),
        },
        { ...DEFAULT_COPY_POLICY, ...config.copy }
      );
    }),
  });

  container.register<StagingSetFactory>(DI.Staging.SetFactory, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new StagingSetFactory(
        {
          selector: c.resolve<BackendSelector>(DI.Storage.Selector),
          copier: c.resolve<ResilientCopier>(DI.Staging.Copier),
          checksum: c.resolve<ChecksumPort>(DI.Infra.Checksum),
          textFile: c.resolve<TextFilePort>(DI.Infra.TextFile),
          clock: c.resolve<TimeClockPort>(DI.Infra.TimeClock),
          logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('StagingSet'),
        },
        config.staging
      );
    }),
  });

  container.register<JobSummary>(DI.Pipeline.Summary, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new JobSummary(config.pipeline.summaryFile, {
        textFile: c.resolve<TextFilePort>(DI.Infra.TextFile),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('JobSummary'),
      });
    }),
  });

  container.register<PipelineVariables>(DI.Pipeline.Variables, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new PipelineVariables({
        runner: c.resolve<CommandRunnerPort>(DI.Infra.CommandRunner),
        config: config.pipeline,
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('PipelineVariables'),
      });
    }),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Register config and every service.
 *
 * Idempotent. Invalid configuration is returned, not thrown; nothing else is
 * registered in that case.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const configured = registerConfig(options);
  if (configured.isErr()) return configured;

  registerRuntime(options);
  registerLogging();
  registerInfra();
  registerStorage();
  registerServices();
  initialized = true;
  return ok(undefined);
}

/** Clear every registration (tests). */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
