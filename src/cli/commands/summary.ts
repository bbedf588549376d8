/**
 * Summary Command
 *
 * Appends one `<prefix><key>: <value>` line to the job summary file.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';

export interface SummaryWriter {
  readonly filename: string;
  add(key: string, value: string): void;
  write(): Promise<number>;
}

export interface SummaryCommandOptions {
  readonly file?: string;
  readonly prefix?: string;
}

export interface SummaryCommandDeps {
  /** Writer for `file` (the configured summary file when undefined) */
  readonly createSummary: (file: string | undefined, prefix: string | undefined) => SummaryWriter;
}

export async function executeSummaryCommand(
  key: string,
  value: string,
  options: SummaryCommandOptions,
  deps: SummaryCommandDeps
): Promise<CliResult> {
  if (key.trim() === '') {
    return misuse('Summary key must not be empty');
  }

  const summary = deps.createSummary(options.file, options.prefix);
  summary.add(key, value);
  const status = await summary.write();

  if (status !== 0) {
    return failure(`Could not append to summary file: ${summary.filename}`);
  }
  return success({ message: `Recorded ${key} in ${summary.filename}` });
}
