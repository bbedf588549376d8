import type { BackendKind, StorageBackendPort } from './ports/storage-backend.port.js';

/** URL prefix that routes a path to the object store. */
export const REMOTE_PREFIX = 'root:';

export function classifyPath(filePath: string): BackendKind {
  return filePath.startsWith(REMOTE_PREFIX) ? 'remote' : 'local';
}

export function isRemotePath(filePath: string): boolean {
  return classifyPath(filePath) === 'remote';
}

/**
 * Picks the one backend that services every path of an operation.
 *
 * The remote backend wins if any path is remote: the local backend cannot
 * address the store, while the store's client reads and writes local files.
 */
export class BackendSelector {
  constructor(
    private readonly local: StorageBackendPort,
    private readonly remote: StorageBackendPort
  ) {}

  select(...paths: readonly string[]): StorageBackendPort {
    return paths.some(isRemotePath) ? this.remote : this.local;
  }

  forPath(filePath: string): StorageBackendPort {
    return this.select(filePath);
  }

  get localBackend(): StorageBackendPort {
    return this.local;
  }
}
