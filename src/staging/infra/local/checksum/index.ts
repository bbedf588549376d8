import { createHash } from 'crypto';
import { createReadStream, createWriteStream } from 'fs';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { ChecksumError, ChecksumPort } from '../../../ports/checksum.port.js';
import { describeError, nodeErrorCode } from '../node-error-code.js';

const BLOCK_SIZE = 32 * 1024;

function mapChecksumError(e: unknown, filePath: string): ChecksumError {
  if (nodeErrorCode(e) === 'ENOENT') {
    return { code: 'CHECKSUM_NOT_FOUND', message: `Not found: ${filePath}` };
  }
  return { code: 'CHECKSUM_IO_ERROR', message: `Checksum failed for ${filePath}: ${describeError(e)}` };
}

/**
 * Streaming MD5 over local files, read in 32 KiB blocks.
 */
export class NodeMd5Checksum implements ChecksumPort {
  digestFile(filePath: string): ResultAsync<string, ChecksumError> {
    return RA.fromPromise(this.digest(filePath), (e) => mapChecksumError(e, filePath));
  }

  copyAndDigest(fromPath: string, toPath: string): ResultAsync<string, ChecksumError> {
    return RA.fromPromise(this.copyWithDigest(fromPath, toPath), (e) =>
      mapChecksumError(e, `${fromPath} -> ${toPath}`)
    );
  }

  private async digest(filePath: string): Promise<string> {
    const hash = createHash('md5');
    for await (const chunk of createReadStream(filePath, { highWaterMark: BLOCK_SIZE })) {
      hash.update(chunk);
    }
    return hash.digest('hex');
  }

  private async copyWithDigest(fromPath: string, toPath: string): Promise<string> {
    const hash = createHash('md5');
    const tap = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        hash.update(chunk);
        callback(null, chunk);
      },
    });

    await pipeline(
      createReadStream(fromPath, { highWaterMark: BLOCK_SIZE }),
      tap,
      createWriteStream(toPath)
    );

    return hash.digest('hex');
  }
}
