import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NodeFsBackend } from '../../../src/staging/infra/local/fs-backend/index.js';
import { NodeMd5Checksum } from '../../../src/staging/infra/local/checksum/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('NodeFsBackend (real filesystem)', () => {
  let dir: string;
  let backend: NodeFsBackend;
  let checksum: NodeMd5Checksum;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jobstage-fs-'));
    checksum = new NodeMd5Checksum();
    backend = new NodeFsBackend(checksum);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('copies and returns the MD5 of the bytes copied', async () => {
    const from = path.join(dir, 'in.txt');
    const to = path.join(dir, 'out.txt');
    await fs.writeFile(from, 'hello world');

    const receipt = expectOk(await backend.copy(from, to), 'copy');

    expect(receipt.checksum).toBe('5eb63bbbe01eeed093cb22bb8f5acdc3');
    expect(await fs.readFile(to, 'utf8')).toBe('hello world');
  });

  it('hashes files larger than one read block', async () => {
    const file = path.join(dir, 'big.bin');
    const content = Buffer.alloc(100 * 1024, 7);
    await fs.writeFile(file, content);

    const digest = expectOk(await checksum.digestFile(file), 'digest');

    expect(digest).toBe(createHash('md5').update(content).digest('hex'));
  });

  it('reports a missing file as not found', async () => {
    const error = expectErr(await checksum.digestFile(path.join(dir, 'nope')), 'digest');

    expect(error.code).toBe('CHECKSUM_NOT_FOUND');
  });

  it('reports size, or null for a missing file', async () => {
    const file = path.join(dir, 'sized');
    await fs.writeFile(file, '12345');

    expect(expectOk(await backend.size(file), 'size')).toBe(5);
    expect(expectOk(await backend.size(path.join(dir, 'nope')), 'size')).toBeNull();
  });

  it('commits a temp copy by renaming it', async () => {
    const target = path.join(dir, 'final.dat');
    const temp = backend.tempName(target);
    await fs.writeFile(temp, 'data');

    expectOk(await backend.commitTemp(target), 'commit');

    expect(temp).toBe(`${target}.part`);
    expect(await fs.readFile(target, 'utf8')).toBe('data');
    await expect(fs.access(temp)).rejects.toThrow();
  });

  it('removes files and treats a missing one as absent', async () => {
    const file = path.join(dir, 'gone');
    await fs.writeFile(file, 'x');

    expect(expectOk(await backend.removeFile(file), 'rm')).toBe('removed');
    expect(expectOk(await backend.removeFile(file), 'rm')).toBe('absent');
  });

  it('refuses to remove a non-empty directory but removes the tree', async () => {
    const sub = path.join(dir, 'stage');
    expectOk(await backend.makeDirectories(path.join(sub, 'nested'), 0o755), 'mkdir');
    await fs.writeFile(path.join(sub, 'b.txt'), 'b');
    await fs.writeFile(path.join(sub, 'a.txt'), 'a');

    expect(expectOk(await backend.listDirectory(sub), 'ls')).toEqual(['a.txt', 'b.txt', 'nested']);
    expect(expectErr(await backend.removeDirectory(sub), 'rmdir').code).toBe('BACKEND_DIR_NOT_EMPTY');

    expectOk(await backend.removeTree(sub), 'rmtree');
    expect(expectOk(await backend.exists(sub), 'exists')).toBe(false);
  });

  it('creates the parent directory of a file', async () => {
    const file = path.join(dir, 'x', 'y', 'file.dat');

    expectOk(await backend.makeDirectoryFor(file, 0o755), 'mkdir parent');

    expect(expectOk(await backend.isWritable(path.join(dir, 'x', 'y')), 'writable')).toBe(true);
  });
});
