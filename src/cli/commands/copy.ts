/**
 * Copy Command
 *
 * Resilient copy of one file, local or `root:` URL on either side.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { CopyFailure, CopySuccess } from '../../staging/resilient-copy.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CopyCommandOptions {
  /** Raw `--max-attempts` value */
  readonly maxAttempts?: string;
}

export interface CopyCommandDeps {
  readonly copyFile: (
    fromPath: string,
    toPath: string,
    maxAttempts: number | undefined
  ) => Promise<Result<CopySuccess, CopyFailure>>;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeCopyCommand(
  fromPath: string,
  toPath: string,
  options: CopyCommandOptions,
  deps: CopyCommandDeps
): Promise<CliResult> {
  let maxAttempts: number | undefined;
  if (options.maxAttempts !== undefined) {
    maxAttempts = Number(options.maxAttempts);
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      return misuse(`--max-attempts must be a positive whole number, got "${options.maxAttempts}"`);
    }
  }

  const result = await deps.copyFile(fromPath, toPath, maxAttempts);

  if (result.isErr()) {
    const failed = result.error;
    switch (failed.kind) {
      case 'source_missing':
        return failure(`Source not found: ${fromPath}`, {
          suggestions: ['Check the source path and try again'],
        });
      case 'attempts_exhausted':
        return failure(`Copy failed after ${failed.attempts} attempt(s): ${fromPath} -> ${toPath}`, {
          details: [`Last error (${failed.lastError.code}): ${failed.lastError.message}`],
        });
      default:
        return assertNever(failed);
    }
  }

  const copied = result.value;
  switch (copied.kind) {
    case 'self_copy':
      return success({ message: `Source and destination are the same, nothing copied: ${fromPath}` });
    case 'copied': {
      const details = [`Bytes: ${copied.bytes}`, `Attempts: ${copied.attempts}`, `Elapsed: ${copied.elapsedMs} ms`];
      if (copied.bytesPerSecond !== null) details.push(`Rate: ${Math.round(copied.bytesPerSecond)} B/s`);
      if (copied.checksum !== null) details.push(`MD5: ${copied.checksum}`);
      return success({ message: `Copied ${fromPath} -> ${toPath}`, details });
    }
    default:
      return assertNever(copied);
  }
}
