/**
 * Checksum Command
 *
 * Prints the MD5 digest of a local file.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { ChecksumError } from '../../staging/ports/checksum.port.js';

export interface ChecksumCommandDeps {
  readonly digestFile: (filePath: string) => ResultAsync<string, ChecksumError>;
}

export async function executeChecksumCommand(filePath: string, deps: ChecksumCommandDeps): Promise<CliResult> {
  const digest = await deps.digestFile(filePath);

  if (digest.isErr()) {
    if (digest.error.code === 'CHECKSUM_NOT_FOUND') {
      return failure(`File not found: ${filePath}`, {
        suggestions: ['Check the file path and try again'],
      });
    }
    return failure(`Could not checksum ${filePath}`, { details: [digest.error.message] });
  }

  return success({ message: `${digest.value}  ${filePath}` });
}
