import * as path from 'path';
import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type {
  BackendError,
  CopyReceipt,
  RemoveOutcome,
  StorageBackendPort,
} from '../../ports/storage-backend.port.js';
import type { CommandError, CommandOutput, CommandRunnerPort } from '../../ports/command-runner.port.js';
import type { Logger } from '../../../core/logging/index.js';

function mapCommandError(e: CommandError): BackendError {
  return { code: 'BACKEND_IO_ERROR', message: e.message };
}

function commandFailed(what: string, output: CommandOutput): BackendError {
  return {
    code: 'BACKEND_COMMAND_FAILED',
    message: `${what} exited with status ${output.exitCode}`,
    exitCode: output.exitCode,
  };
}

/**
 * Storage backend for the distributed object store (`root:` URLs).
 *
 * Drives the store's command-line client. Outcomes are classified from exit
 * status only.
 *
 * The store has no rename and no directories: temp names are the final
 * names, and the directory operations are no-ops.
 */
export class XrootdBackend implements StorageBackendPort {
  readonly kind = 'remote' as const;

  private readonly xrdcp: string;
  private readonly xrd: string;

  constructor(
    private readonly runner: CommandRunnerPort,
    binDir: string,
    private readonly logger: Logger
  ) {
    this.xrdcp = path.join(binDir, 'xrdcp');
    this.xrd = path.join(binDir, 'xrd.pl');
  }

  /**
   * Two-phase copy. The client refuses to overwrite without `-f`, but `-f`
   * is rejected when the destination does not exist yet. So: plain copy
   * first, then exactly one overwrite copy if the plain one failed.
   */
  copy(fromPath: string, toPath: string): ResultAsync<CopyReceipt, BackendError> {
    const receipt: CopyReceipt = { checksum: null };

    return this.runner
      .run(this.xrdcp, ['-np', fromPath, toPath])
      .mapErr(mapCommandError)
      .andThen((plain) => {
        if (plain.exitCode === 0) return okAsync(receipt);

        this.logger.debug({ toPath, exitCode: plain.exitCode }, 'Plain copy refused, retrying with overwrite');
        return this.runner
          .run(this.xrdcp, ['-np', '-f', fromPath, toPath])
          .mapErr(mapCommandError)
          .andThen((forced) => {
            if (forced.exitCode === 0) return okAsync(receipt);
            this.logger.warn({ fromPath, toPath, exitCode: forced.exitCode }, 'Overwrite copy failed');
            return errAsync(commandFailed(`xrdcp -f ${fromPath} ${toPath}`, forced));
          });
      });
  }

  exists(target: string): ResultAsync<boolean, BackendError> {
    return this.stat(target).map((output) => output.exitCode === 0);
  }

  size(target: string): ResultAsync<number | null, BackendError> {
    return this.stat(target).andThen((output) => {
      if (output.exitCode !== 0) return okAsync(null);

      // stat output: "<path> <size> <flags> <mtime>"
      const token = output.stdout.trim().split(/\s+/)[1];
      const parsed = token === undefined ? Number.NaN : Number(token);
      if (!Number.isInteger(parsed) || parsed < 0) {
        return errAsync<number | null, BackendError>({
          code: 'BACKEND_IO_ERROR',
          message: `Unparseable stat output for ${target}: ${output.stdout.trim()}`,
        });
      }
      return okAsync(parsed);
    });
  }

  isWritable(target: string): ResultAsync<boolean, BackendError> {
    return this.exists(target);
  }

  makeDirectories(_dirPath: string, _mode: number): ResultAsync<void, BackendError> {
    return okAsync(undefined);
  }

  makeDirectoryFor(_filePath: string, _mode: number): ResultAsync<void, BackendError> {
    return okAsync(undefined);
  }

  removeFile(target: string): ResultAsync<RemoveOutcome, BackendError> {
    // A failed rm almost always means the file was not there.
    return this.runner
      .run(this.xrd, ['rm', target])
      .mapErr(mapCommandError)
      .map((output): RemoveOutcome => (output.exitCode === 0 ? 'removed' : 'absent'));
  }

  removeDirectory(_dirPath: string): ResultAsync<void, BackendError> {
    return okAsync(undefined);
  }

  removeTree(dirPath: string): ResultAsync<void, BackendError> {
    return this.runner
      .run(this.xrd, ['rmtree', dirPath])
      .mapErr(mapCommandError)
      .andThen((output) =>
        output.exitCode === 0 ? okAsync(undefined) : errAsync(commandFailed(`xrd.pl rmtree ${dirPath}`, output))
      );
  }

  listDirectory(_dirPath: string): ResultAsync<readonly string[], BackendError> {
    return okAsync([]);
  }

  tempName(target: string): string {
    return target;
  }

  commitTemp(_target: string): ResultAsync<void, BackendError> {
    return okAsync(undefined);
  }

  private stat(target: string): ResultAsync<CommandOutput, BackendError> {
    return this.runner.run(this.xrd, ['-w', 'stat', target]).mapErr(mapCommandError);
  }
}
