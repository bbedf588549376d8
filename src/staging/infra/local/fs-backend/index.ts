import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type {
  BackendError,
  CopyReceipt,
  RemoveOutcome,
  StorageBackendPort,
} from '../../../ports/storage-backend.port.js';
import type { ChecksumError, ChecksumPort } from '../../../ports/checksum.port.js';
import { describeError, nodeErrorCode } from '../node-error-code.js';

export const TEMP_SUFFIX = '.part';

function mapFsError(e: unknown, target: string): BackendError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'BACKEND_NOT_FOUND', message: `Not found: ${target}` };
  if (code === 'EACCES' || code === 'EPERM') {
    return { code: 'BACKEND_PERMISSION_DENIED', message: `Permission denied: ${target}` };
  }
  if (code === 'ENOTEMPTY' || code === 'EEXIST') {
    return { code: 'BACKEND_DIR_NOT_EMPTY', message: `Directory not empty: ${target}` };
  }
  return { code: 'BACKEND_IO_ERROR', message: `FS error at ${target}: ${describeError(e)}` };
}

function mapChecksumError(e: ChecksumError): BackendError {
  switch (e.code) {
    case 'CHECKSUM_NOT_FOUND':
      return { code: 'BACKEND_NOT_FOUND', message: e.message };
    case 'CHECKSUM_IO_ERROR':
      return { code: 'BACKEND_IO_ERROR', message: e.message };
  }
}

async function canAccess(target: string, mode: number): Promise<boolean> {
  try {
    await fs.access(target, mode);
    return true;
  } catch {
    // Any access failure means "no" for this probe.
    return false;
  }
}

/**
 * Storage backend for paths on a mounted filesystem.
 *
 * Copies are checksummed on the fly. Temp copies use the `.part` suffix and
 * are committed with a rename, so a reader never sees a half-written file
 * under the final name.
 */
export class NodeFsBackend implements StorageBackendPort {
  readonly kind = 'local' as const;

  constructor(private readonly checksum: ChecksumPort) {}

  copy(fromPath: string, toPath: string): ResultAsync<CopyReceipt, BackendError> {
    return this.checksum
      .copyAndDigest(fromPath, toPath)
      .mapErr(mapChecksumError)
      .map((checksum) => ({ checksum }));
  }

  exists(target: string): ResultAsync<boolean, BackendError> {
    return RA.fromSafePromise(canAccess(target, fsConstants.R_OK));
  }

  size(target: string): ResultAsync<number | null, BackendError> {
    return RA.fromPromise(this.statSize(target), (e) => mapFsError(e, target));
  }

  isWritable(target: string): ResultAsync<boolean, BackendError> {
    return RA.fromSafePromise(canAccess(target, fsConstants.W_OK));
  }

  makeDirectories(dirPath: string, mode: number): ResultAsync<void, BackendError> {
    return RA.fromPromise(
      fs.mkdir(dirPath, { recursive: true, mode }).then(() => undefined),
      (e) => mapFsError(e, dirPath)
    );
  }

  makeDirectoryFor(filePath: string, mode: number): ResultAsync<void, BackendError> {
    return this.makeDirectories(path.dirname(filePath), mode);
  }

  removeFile(target: string): ResultAsync<RemoveOutcome, BackendError> {
    return RA.fromPromise(this.unlinkIfPresent(target), (e) => mapFsError(e, target));
  }

  removeDirectory(dirPath: string): ResultAsync<void, BackendError> {
    return RA.fromPromise(fs.rmdir(dirPath), (e) => mapFsError(e, dirPath));
  }

  removeTree(dirPath: string): ResultAsync<void, BackendError> {
    return RA.fromPromise(fs.rm(dirPath, { recursive: true, force: true }), (e) => mapFsError(e, dirPath));
  }

  listDirectory(dirPath: string): ResultAsync<readonly string[], BackendError> {
    return RA.fromPromise(fs.readdir(dirPath), (e) => mapFsError(e, dirPath)).map((names) => [...names].sort());
  }

  tempName(target: string): string {
    return target + TEMP_SUFFIX;
  }

  commitTemp(target: string): ResultAsync<void, BackendError> {
    const temp = this.tempName(target);
    return RA.fromPromise(fs.rename(temp, target), (e) => mapFsError(e, `${temp} -> ${target}`));
  }

  private async statSize(target: string): Promise<number | null> {
    try {
      const stats = await fs.stat(target);
      return stats.size;
    } catch (e) {
      if (nodeErrorCode(e) === 'ENOENT') return null;
      throw e;
    }
  }

  private async unlinkIfPresent(target: string): Promise<RemoveOutcome> {
    try {
      await fs.unlink(target);
      return 'removed';
    } catch (e) {
      if (nodeErrorCode(e) === 'ENOENT') return 'absent';
      throw e;
    }
  }
}
