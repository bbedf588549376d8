import type { ResultAsync } from 'neverthrow';

export type TextFileError =
  | { readonly code: 'TEXT_FILE_IO_ERROR'; readonly message: string };

/**
 * Port: small text files written for the pipeline (summary lines, file lists).
 */
export interface TextFilePort {
  /** Append to `filePath`, creating it when missing. */
  appendText(filePath: string, text: string): ResultAsync<void, TextFileError>;
  /** Create or truncate `filePath` with `text`. */
  writeText(filePath: string, text: string): ResultAsync<void, TextFileError>;
}
