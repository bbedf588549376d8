import type { ResultAsync } from 'neverthrow';

export type BackendKind = 'local' | 'remote';

export type BackendError =
  | { readonly code: 'BACKEND_NOT_FOUND'; readonly message: string }
  | { readonly code: 'BACKEND_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'BACKEND_DIR_NOT_EMPTY'; readonly message: string }
  | { readonly code: 'BACKEND_IO_ERROR'; readonly message: string }
  | { readonly code: 'BACKEND_COMMAND_FAILED'; readonly message: string; readonly exitCode: number };

/**
 * What a single raw copy produced. `checksum` is the MD5 hex digest when the
 * backend computes one while copying, otherwise null.
 */
export interface CopyReceipt {
  readonly checksum: string | null;
}

export type RemoveOutcome = 'removed' | 'absent';

export const DEFAULT_DIR_MODE = 0o755;

/**
 * Port: one storage system (local filesystem, distributed object store).
 *
 * Absence is a value, not an error: `size` yields null and `removeFile`
 * yields 'absent' for a missing path. Errors are reserved for failures a
 * caller may want to retry.
 *
 * `copy` performs exactly one transfer attempt. Retry, temp-file handling and
 * size verification live in ResilientCopier.
 */
export interface StorageBackendPort {
  readonly kind: BackendKind;

  copy(fromPath: string, toPath: string): ResultAsync<CopyReceipt, BackendError>;
  exists(path: string): ResultAsync<boolean, BackendError>;
  size(path: string): ResultAsync<number | null, BackendError>;
  isWritable(path: string): ResultAsync<boolean, BackendError>;

  makeDirectories(dirPath: string, mode: number): ResultAsync<void, BackendError>;
  /** Create the parent directory of `filePath` when it is missing. */
  makeDirectoryFor(filePath: string, mode: number): ResultAsync<void, BackendError>;

  removeFile(path: string): ResultAsync<RemoveOutcome, BackendError>;
  /** Remove an empty directory. Fails with BACKEND_DIR_NOT_EMPTY otherwise. */
  removeDirectory(dirPath: string): ResultAsync<void, BackendError>;
  removeTree(dirPath: string): ResultAsync<void, BackendError>;
  listDirectory(dirPath: string): ResultAsync<readonly string[], BackendError>;

  /** Name a copy is written to before it is committed under `path`. */
  tempName(path: string): string;
  /** Move the temp copy of `path` into place. */
  commitTemp(path: string): ResultAsync<void, BackendError>;
}
