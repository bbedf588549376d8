import { ResultAsync, err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { BackendSelector } from './backend-selection.js';
import type { BackendError } from './ports/storage-backend.port.js';
import { DEFAULT_DIR_MODE } from './ports/storage-backend.port.js';
import type { DelayPort } from './ports/delay.port.js';
import type { RandomSourcePort } from './ports/random-source.port.js';
import type { TimeClockPort } from './ports/time-clock.port.js';

export interface CopyPolicy {
  readonly maxAttempts: number;
  readonly minWaitSeconds: number;
  readonly maxWaitSeconds: number;
  readonly dirMode: number;
}

export const DEFAULT_COPY_POLICY: CopyPolicy = {
  maxAttempts: 5,
  minWaitSeconds: 5,
  maxWaitSeconds: 10,
  dirMode: DEFAULT_DIR_MODE,
};

export type CopySuccess =
  | { readonly kind: 'self_copy'; readonly attempts: 0 }
  | {
      readonly kind: 'copied';
      readonly attempts: number;
      readonly bytes: number;
      readonly elapsedMs: number;
      /** null when the transfer finished within one clock tick */
      readonly bytesPerSecond: number | null;
      readonly checksum: string | null;
    };

export type AttemptError =
  | BackendError
  | {
      readonly code: 'SIZE_MISMATCH';
      readonly message: string;
      readonly expectedBytes: number;
      readonly actualBytes: number | null;
    };

export type CopyFailure =
  | { readonly kind: 'source_missing'; readonly attempts: number; readonly message: string }
  | {
      readonly kind: 'attempts_exhausted';
      readonly attempts: number;
      readonly lastError: AttemptError;
      readonly message: string;
    };

type AttemptOutcome =
  | { readonly kind: 'source_missing' }
  | { readonly kind: 'failed'; readonly error: AttemptError }
  | { readonly kind: 'copied'; readonly bytes: number; readonly elapsedMs: number; readonly checksum: string | null };

export interface ResilientCopierDeps {
  readonly selector: BackendSelector;
  readonly clock: TimeClockPort;
  readonly delay: DelayPort;
  readonly random: RandomSourcePort;
  readonly logger: Logger;
}

/**
 * Copy with bounded retries, temp-then-commit writes and size verification.
 *
 * Each attempt:
 * 1. stat the source (missing source ends the copy, no retry)
 * 2. remove the destination and its temp name
 * 3. create the destination's parent directory
 * 4. copy into the temp name
 * 5. compare temp size with source size
 * 6. commit the temp name onto the destination
 *
 * A failed attempt waits a random whole number of seconds within the policy
 * bounds before the next one. At most `maxAttempts` backend copies are made.
 */
export class ResilientCopier {
  private readonly selector: BackendSelector;
  private readonly clock: TimeClockPort;
  private readonly delay: DelayPort;
  private readonly random: RandomSourcePort;
  private readonly logger: Logger;

  constructor(
    private readonly deps: ResilientCopierDeps,
    private readonly policy: CopyPolicy = DEFAULT_COPY_POLICY
  ) {
    this.selector = deps.selector;
    this.clock = deps.clock;
    this.delay = deps.delay;
    this.random = deps.random;
    this.logger = deps.logger;
  }

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  /** Same backends and clock, different policy. */
  withPolicy(overrides: Partial<CopyPolicy>): ResilientCopier {
    return new ResilientCopier(this.deps, { ...this.policy, ...overrides });
  }

  copy(fromPath: string, toPath: string): ResultAsync<CopySuccess, CopyFailure> {
    return new ResultAsync(this.copyWithRetries(fromPath, toPath));
  }

  /** Integer status for callers that OR results together: 0 ok, 1 failed. */
  async copyStatus(fromPath: string, toPath: string): Promise<number> {
    const result = await this.copy(fromPath, toPath);
    return result.isOk() ? 0 : 1;
  }

  private async copyWithRetries(fromPath: string, toPath: string): Promise<Result<CopySuccess, CopyFailure>> {
    if (fromPath === toPath) {
      this.logger.info({ path: fromPath }, 'Not copying file onto itself');
      const selfCopy: CopySuccess = { kind: 'self_copy', attempts: 0 };
      return ok(selfCopy);
    }

    const tempPath = this.selector.forPath(toPath).tempName(toPath);
    this.logger.info({ fromPath, toPath, tempPath }, 'Copying file');

    let lastError: AttemptError | null = null;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      if (attempt > 1) await this.backoff(attempt);

      this.logger.debug({ toPath, attempt }, 'Starting copy attempt');
      const outcome = await this.attempt(fromPath, toPath, tempPath);

      switch (outcome.kind) {
        case 'source_missing':
          this.logger.error({ fromPath, attempt }, 'Source file does not exist');
          return err(this.sourceMissing(fromPath, attempt));

        case 'failed':
          lastError = outcome.error;
          this.logger.error(
            { fromPath, toPath, attempt, code: outcome.error.code, reason: outcome.error.message },
            'Copy attempt failed'
          );
          continue;

        case 'copied': {
          const bytesPerSecond = outcome.elapsedMs > 0 ? (outcome.bytes * 1000) / outcome.elapsedMs : null;
          this.logger.info(
            {
              toPath,
              attempts: attempt,
              bytes: outcome.bytes,
              elapsedMs: outcome.elapsedMs,
              bytesPerSecond,
              checksum: outcome.checksum,
            },
            'Copy succeeded'
          );
          const copied: CopySuccess = {
            kind: 'copied',
            attempts: attempt,
            bytes: outcome.bytes,
            elapsedMs: outcome.elapsedMs,
            bytesPerSecond,
            checksum: outcome.checksum,
          };
          return ok(copied);
        }
      }
    }

    const attempts = this.policy.maxAttempts;
    const finalError: AttemptError = lastError ?? {
      code: 'BACKEND_IO_ERROR',
      message: 'No copy attempt was made',
    };
    this.logger.error({ fromPath, toPath, attempts }, 'Copy failed, attempts exhausted');
    const exhausted: CopyFailure = {
      kind: 'attempts_exhausted',
      attempts,
      lastError: finalError,
      message: `Could not copy ${fromPath} to ${toPath} after ${attempts} attempt(s): ${finalError.message}`,
    };
    return err(exhausted);
  }

  private sourceMissing(fromPath: string, attempts: number): CopyFailure {
    return { kind: 'source_missing', attempts, message: `Source does not exist: ${fromPath}` };
  }

  private async attempt(fromPath: string, toPath: string, tempPath: string): Promise<AttemptOutcome> {
    const sourceSize = await this.selector.forPath(fromPath).size(fromPath);
    if (sourceSize.isErr()) return { kind: 'failed', error: sourceSize.error };
    if (sourceSize.value === null) return { kind: 'source_missing' };
    const expectedBytes = sourceSize.value;

    // Some stores fail on overwrite of an existing object, so clear both names first.
    const removedDest = await this.selector.forPath(toPath).removeFile(toPath);
    if (removedDest.isErr()) return { kind: 'failed', error: removedDest.error };
    if (tempPath !== toPath) {
      const removedTemp = await this.selector.forPath(tempPath).removeFile(tempPath);
      if (removedTemp.isErr()) return { kind: 'failed', error: removedTemp.error };
    }

    const parent = await this.selector.forPath(tempPath).makeDirectoryFor(tempPath, this.policy.dirMode);
    if (parent.isErr()) return { kind: 'failed', error: parent.error };

    const startedAtMs = this.clock.nowMs();

    const copied = await this.selector.select(fromPath, tempPath).copy(fromPath, tempPath);
    if (copied.isErr()) return { kind: 'failed', error: copied.error };

    const tempSize = await this.selector.forPath(tempPath).size(tempPath);
    if (tempSize.isErr()) return { kind: 'failed', error: tempSize.error };
    if (tempSize.value !== expectedBytes) {
      return {
        kind: 'failed',
        error: {
          code: 'SIZE_MISMATCH',
          message: `Size mismatch: ${expectedBytes} bytes at ${fromPath}, ${tempSize.value ?? 'no file'} at ${tempPath}`,
          expectedBytes,
          actualBytes: tempSize.value,
        },
      };
    }

    const committed = await this.selector.forPath(toPath).commitTemp(toPath);
    if (committed.isErr()) return { kind: 'failed', error: committed.error };

    return {
      kind: 'copied',
      bytes: expectedBytes,
      elapsedMs: this.clock.nowMs() - startedAtMs,
      checksum: copied.value.checksum,
    };
  }

  private async backoff(attempt: number): Promise<void> {
    const seconds = this.random.intInclusive(this.policy.minWaitSeconds, this.policy.maxWaitSeconds);
    this.logger.info({ attempt, seconds }, 'Waiting before retrying copy');
    await this.delay.wait(seconds * 1000);
  }
}
