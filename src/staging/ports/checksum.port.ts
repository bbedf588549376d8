import type { ResultAsync } from 'neverthrow';

export type ChecksumError =
  | { readonly code: 'CHECKSUM_NOT_FOUND'; readonly message: string }
  | { readonly code: 'CHECKSUM_IO_ERROR'; readonly message: string };

/**
 * Port: content digests for transfer verification.
 *
 * Digests are MD5, lowercase hex. They detect transfer corruption; they are
 * not a security control.
 */
export interface ChecksumPort {
  digestFile(filePath: string): ResultAsync<string, ChecksumError>;

  /**
   * Copy `fromPath` to `toPath` in one pass, hashing the bytes as they are
   * read. The source is read once and the destination is never re-read.
   */
  copyAndDigest(fromPath: string, toPath: string): ResultAsync<string, ChecksumError>;
}
