import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NodeFsBackend } from '../../../src/staging/infra/local/fs-backend/index.js';
import { NodeMd5Checksum } from '../../../src/staging/infra/local/checksum/index.js';
import { NodeTextFile } from '../../../src/staging/infra/local/text-file/index.js';
import { NodeTimeClock } from '../../../src/staging/infra/local/time-clock/index.js';
import { XrootdBackend } from '../../../src/staging/infra/xrootd/index.js';
import { BackendSelector } from '../../../src/staging/backend-selection.js';
import { ResilientCopier, DEFAULT_COPY_POLICY } from '../../../src/staging/resilient-copy.js';
import { StagingSet } from '../../../src/staging/staging-set.js';
import { QueuedRandomSource, RecordingDelay, ScriptedCommandRunner, silentLogger } from '../../fakes/staging/index.js';

describe('StagingSet on a real filesystem', () => {
  let root: string;
  let dataDir: string;
  let stageArea: string;

  const createSet = (stageName: string) => {
    const logger = silentLogger();
    const checksum = new NodeMd5Checksum();
    const local = new NodeFsBackend(checksum);
    const remote = new XrootdBackend(new ScriptedCommandRunner(), '/usr/bin', logger);
    const selector = new BackendSelector(local, remote);
    const clock = new NodeTimeClock();
    const copier = new ResilientCopier(
      { selector, clock, delay: new RecordingDelay(), random: new QueuedRandomSource(), logger },
      { ...DEFAULT_COPY_POLICY, maxAttempts: 2 }
    );
    return StagingSet.create(
      { stageArea, stageName },
      { selector, copier, checksum, textFile: new NodeTextFile(), clock, logger, rootPolicy: { cwd: root } }
    );
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'jobstage-it-'));
    dataDir = path.join(root, 'data');
    stageArea = path.join(root, 'scratch');
    await fs.mkdir(dataDir);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('stages a 100 KB input in and an output back out', async () => {
    const input = Buffer.alloc(100 * 1024, 0x5a);
    await fs.writeFile(path.join(dataDir, 'events.dat'), input);

    const set = await createSet('job-1');
    const workDir = path.join(stageArea, 'job-1');
    expect(set.getStageDir()).toBe(workDir);

    const staged = await set.stageIn(path.join(dataDir, 'events.dat'));
    expect(staged).toBe(path.join(workDir, 'events.dat'));
    expect(await set.start()).toBe(0);
    expect((await fs.readFile(staged)).equals(input)).toBe(true);

    const out = await set.stageOut(path.join(dataDir, 'results', 'histos.dat'));
    expect(out).toBe(path.join(workDir, 'histos.dat'));
    await fs.writeFile(out, 'histogram data');

    const [sum] = await set.getChecksums();
    expect(sum?.digest).toBe(createHash('md5').update('histogram data').digest('hex'));

    expect(await set.finish()).toBe(0);

    expect(await fs.readFile(path.join(dataDir, 'results', 'histos.dat'), 'utf8')).toBe('histogram data');
    await expect(fs.access(workDir)).rejects.toThrow();
    expect(await fs.readdir(path.join(dataDir, 'results'))).toEqual(['histos.dat']);
  });

  it('writes the output file list for rollback', async () => {
    const set = await createSet('job-2');
    await set.stageOut(path.join(dataDir, 'a.dat'));
    await set.stageOut(path.join(dataDir, 'b.dat'));
    const listFile = path.join(root, 'outputs.txt');

    expect(await set.dumpFileList(listFile)).toBe(0);

    expect(await fs.readFile(listFile, 'utf8')).toBe(`${path.join(dataDir, 'a.dat')}\n${path.join(dataDir, 'b.dat')}\n`);
    await set.finish('wipe');
  });

  it('wipes a directory with leftovers', async () => {
    const set = await createSet('job-3');
    const workDir = path.join(stageArea, 'job-3');
    await fs.mkdir(path.join(workDir, 'tmp'));
    await fs.writeFile(path.join(workDir, 'tmp', 'scratch.bin'), 'x');

    expect(await set.finish('wipe')).toBe(0);
    await expect(fs.access(workDir)).rejects.toThrow();
  });
});
