import { describe, it, expect, beforeEach } from 'vitest';
import { StagingSetFactory } from '../../../src/staging/staging-set-factory.js';
import type { StagingConfig } from '../../../src/config/app-config.js';
import { loadConfig } from '../../../src/config/app-config.js';
import { expectOk } from '../../helpers/result-helpers.js';
import { createStagingHarness, silentLogger, type StagingHarness } from '../../fakes/staging/index.js';

const baseConfig: StagingConfig = {
  overrideRoot: undefined,
  envRoot: undefined,
  excludeIn: '^/afs/',
  excludeOut: undefined,
  cwd: '/work',
};

describe('StagingSetFactory', () => {
  let h: StagingHarness;

  const factory = (config: Partial<StagingConfig> = {}) =>
    new StagingSetFactory(
      {
        selector: h.selector,
        copier: h.copier,
        checksum: h.checksum,
        textFile: h.textFile,
        clock: h.clock,
        logger: silentLogger(),
      },
      { ...baseConfig, ...config }
    );

  beforeEach(() => {
    h = createStagingHarness();
    h.store.addFile('/afs/cell/in.dat', 'afs input');
  });

  it('falls back to the default scratch area', async () => {
    const set = await factory().create({ stageName: 'job' });

    expect(set.stageRoot).toEqual({ root: '/scratch', source: 'default_area' });
  });

  it('uses the configured root', async () => {
    const set = await factory({ envRoot: '/pool' }).create({ stageName: 'job' });

    expect(set.workingDirectory).toBe('/pool/job');
    expect(set.stageRoot.source).toBe('env');
  });

  it('lets the override root beat an explicit area', async () => {
    const set = await factory({ overrideRoot: '/dev-scratch' }).create({ stageArea: '/fast', stageName: 'job' });

    expect(set.workingDirectory).toBe('/dev-scratch/job');
  });

  it('applies the configured input exclusion', async () => {
    const set = await factory().create({ stageName: 'job' });

    expect(await set.stageIn('/afs/cell/in.dat')).toBe('/afs/cell/in.dat');
    expect(set.numIn).toBe(0);
  });

  it('lets an explicit null turn the exclusion off', async () => {
    const set = await factory().create({ stageName: 'job', excludeIn: null });

    expect(await set.stageIn('/afs/cell/in.dat')).toBe('/scratch/job/in.dat');
    expect(h.store.read('/scratch/job/in.dat')).toBe('afs input');
  });

  it('stages inputs when the input exclusion is set empty', async () => {
    h.store.addFile('/data/in.dat', 'input');
    const config = expectOk(loadConfig({ env: { JOBSTAGE_EXCLUDE_IN: '' }, cwd: '/work' }), 'empty exclusion');
    const set = await factory(config.staging).create({ stageName: 'job' });

    expect(await set.stageIn('/data/in.dat')).toBe('/scratch/job/in.dat');
  });

  it('applies the configured output exclusion', async () => {
    const set = await factory({ excludeOut: '^/keep/' }).create({ stageName: 'job' });

    expect(await set.stageOut('/keep/out.dat')).toBe('/keep/out.dat');
    expect(await set.stageOut('/data/out.dat')).toBe('/scratch/job/out.dat');
  });
});
