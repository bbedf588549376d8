/**
 * Runtime configuration: parsed from the environment once, at the boundary.
 *
 * - zod validates and yields typed data
 * - failures come back as a Result, never thrown
 */

import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import { DEFAULT_EXCLUDE_IN } from '../staging/staging-set.js';

export const DEFAULT_XRD_BIN_DIR = '/usr/bin';
export const DEFAULT_SUMMARY_FILE = './pipeline_summary';

export interface StagingConfig {
  /** Wins over every other root choice, including explicit options. */
  readonly overrideRoot: string | undefined;
  readonly envRoot: string | undefined;
  readonly excludeIn: string;
  readonly excludeOut: string | undefined;
  readonly cwd: string;
}

export interface CopyConfig {
  readonly maxAttempts: number;
  readonly minWaitSeconds: number;
  readonly maxWaitSeconds: number;
}

export interface PipelineConfig {
  readonly summaryFile: string;
  readonly process: string | undefined;
  readonly stream: string | undefined;
  readonly task: string | undefined;
}

export interface AppConfig {
  readonly staging: StagingConfig;
  readonly copy: CopyConfig;
  readonly remote: { readonly binDir: string };
  readonly logLevel: LogLevel;
  readonly pipeline: PipelineConfig;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
}

// =============================================================================
// Schema
// =============================================================================

const nonEmpty = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const pattern = z.string().refine(
  (v) => {
    try {
      new RegExp(v);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Not a valid regular expression' }
);

const intFromEnv = (fallback: number, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : Number(v)))
    .pipe(z.number().int('Must be a whole number').min(min).max(max));

const EnvSchema = z
  .object({
    JOBSTAGE_STAGE_ROOT_DEV: nonEmpty,
    JOBSTAGE_STAGE_ROOT: nonEmpty,

    JOBSTAGE_EXCLUDE_IN: nonEmpty.transform((v) => v ?? DEFAULT_EXCLUDE_IN).pipe(pattern),
    JOBSTAGE_EXCLUDE_OUT: nonEmpty.pipe(pattern.optional()),

    JOBSTAGE_COPY_MAX_ATTEMPTS: intFromEnv(5, 1, 20),
    JOBSTAGE_RETRY_MIN_WAIT_S: intFromEnv(5, 0, 3600),
    JOBSTAGE_RETRY_MAX_WAIT_S: intFromEnv(10, 0, 3600),

    JOBSTAGE_XRD_BIN_DIR: z.string().min(1).default(DEFAULT_XRD_BIN_DIR),

    JOBSTAGE_LOG_LEVEL: z
      .string()
      .default('info')
      .transform((v) => v.toLowerCase())
      .pipe(z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])),

    PIPELINE_SUMMARY: z.string().min(1).default(DEFAULT_SUMMARY_FILE),
    PIPELINE_PROCESS: nonEmpty,
    PIPELINE_STREAM: nonEmpty,
    PIPELINE_TASK: nonEmpty,
  })
  .refine((env) => env.JOBSTAGE_RETRY_MAX_WAIT_S >= env.JOBSTAGE_RETRY_MIN_WAIT_S, {
    message: 'Must not be below JOBSTAGE_RETRY_MIN_WAIT_S',
    path: ['JOBSTAGE_RETRY_MAX_WAIT_S'],
  });

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options.cwd)));
}

/**
 * Brands an already-built config as validated. `loadConfig` goes through
 * here; tests use it to build configs without an environment.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

/** Config equal to an empty environment, for tests and library callers. */
export function defaultConfig(cwd: string): ValidatedConfig {
  return createValidatedConfig(buildConfig(EnvSchema.parse({}), cwd));
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, cwd: string): AppConfig {
  return {
    staging: {
      overrideRoot: env.JOBSTAGE_STAGE_ROOT_DEV,
      envRoot: env.JOBSTAGE_STAGE_ROOT,
      excludeIn: env.JOBSTAGE_EXCLUDE_IN,
      excludeOut: env.JOBSTAGE_EXCLUDE_OUT,
      cwd,
    },
    copy: {
      maxAttempts: env.JOBSTAGE_COPY_MAX_ATTEMPTS,
      minWaitSeconds: env.JOBSTAGE_RETRY_MIN_WAIT_S,
      maxWaitSeconds: env.JOBSTAGE_RETRY_MAX_WAIT_S,
    },
    remote: { binDir: env.JOBSTAGE_XRD_BIN_DIR },
    logLevel: env.JOBSTAGE_LOG_LEVEL,
    pipeline: {
      summaryFile: env.PIPELINE_SUMMARY,
      process: env.PIPELINE_PROCESS,
      stream: env.PIPELINE_STREAM,
      task: env.PIPELINE_TASK,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
