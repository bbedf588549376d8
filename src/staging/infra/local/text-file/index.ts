import * as fs from 'fs/promises';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { TextFileError, TextFilePort } from '../../../ports/text-file.port.js';
import { describeError } from '../node-error-code.js';

function mapTextFileError(e: unknown, filePath: string): TextFileError {
  return { code: 'TEXT_FILE_IO_ERROR', message: `Cannot write ${filePath}: ${describeError(e)}` };
}

export class NodeTextFile implements TextFilePort {
  appendText(filePath: string, text: string): ResultAsync<void, TextFileError> {
    return RA.fromPromise(fs.appendFile(filePath, text, 'utf8'), (e) => mapTextFileError(e, filePath));
  }

  writeText(filePath: string, text: string): ResultAsync<void, TextFileError> {
    return RA.fromPromise(fs.writeFile(filePath, text, 'utf8'), (e) => mapTextFileError(e, filePath));
  }
}
