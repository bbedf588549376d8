import { describe, it, expect, beforeEach } from 'vitest';
import { StagedFile, type StagedFileInit } from '../../../src/staging/staged-file.js';
import { createStagingHarness, silentLogger, type StagingHarness } from '../../fakes/staging/index.js';

describe('StagedFile', () => {
  let h: StagingHarness;

  const stagedFile = (init: StagedFileInit) =>
    new StagedFile(init, { copier: h.copier, selector: h.selector, logger: silentLogger() });

  beforeEach(() => {
    h = createStagingHarness({ policy: { maxAttempts: 2 } });
    h.store.addDir('/scratch/job');
  });

  describe('start', () => {
    it('copies the source into the working location once', async () => {
      h.store.addFile('/data/in.dat', 'input');
      const file = stagedFile({ source: '/data/in.dat', location: '/scratch/job/in.dat', cleanup: true });

      expect(file.started).toBe(false);
      expect(await file.start()).toBe(0);
      expect(await file.start()).toBe(0);

      expect(file.started).toBe(true);
      expect(h.local.copies).toHaveLength(1);
      expect(h.store.read('/scratch/job/in.dat')).toBe('input');
    });

    it('remembers a failed copy-in instead of retrying it', async () => {
      h.store.addFile('/data/in.dat', 'input');
      h.local.failNextCopies(2);
      const file = stagedFile({ source: '/data/in.dat', location: '/scratch/job/in.dat', cleanup: true });

      expect(await file.start()).toBe(1);
      expect(await file.start()).toBe(1);
      expect(h.local.copies).toHaveLength(2);
    });

    it('has nothing to copy for a pure output', async () => {
      const file = stagedFile({
        source: null,
        location: '/scratch/job/out.dat',
        destinations: ['/data/out.dat'],
        cleanup: true,
      });

      expect(await file.start()).toBe(0);
      expect(h.local.copies).toEqual([]);
    });
  });

  describe('destinations', () => {
    it('drops duplicates and the working location itself', () => {
      const file = stagedFile({
        source: null,
        location: '/data/out.dat',
        destinations: ['/data/out.dat', 'root://store//out.dat', 'root://store//out.dat'],
        cleanup: true,
      });

      expect(file.destinations).toEqual(['root://store//out.dat']);
      expect(file.cleanup).toBe(false);
    });
  });

  describe('finish', () => {
    beforeEach(() => {
      h.store.addFile('/scratch/job/out.dat', 'result');
    });

    it('copies to every destination and deletes the working file', async () => {
      const file = stagedFile({
        source: null,
        location: '/scratch/job/out.dat',
        destinations: ['/data/out.dat', 'root://store//out.dat'],
        cleanup: true,
      });

      expect(await file.finish(false)).toBe(0);

      expect(h.store.read('/data/out.dat')).toBe('result');
      expect(h.store.read('root://store//out.dat')).toBe('result');
      expect(h.store.read('/scratch/job/out.dat')).toBeUndefined();
    });

    it('still serves the other destinations when one copy fails', async () => {
      h.remote.failNextCopies(2);
      const file = stagedFile({
        source: null,
        location: '/scratch/job/out.dat',
        destinations: ['root://store//out.dat', '/data/out.dat'],
        cleanup: true,
      });

      expect(await file.finish(false)).toBe(1);

      expect(h.remote.copies).toHaveLength(2);
      expect(h.store.read('/data/out.dat')).toBe('result');
    });

    it('leaves the working file when asked to keep it', async () => {
      const file = stagedFile({
        source: null,
        location: '/scratch/job/out.dat',
        destinations: ['/data/out.dat'],
        cleanup: true,
      });

      expect(await file.finish(true)).toBe(0);

      expect(h.store.read('/data/out.dat')).toBe('result');
      expect(h.store.read('/scratch/job/out.dat')).toBe('result');
    });

    it('leaves a working file it cannot write', async () => {
      h.store.readOnly.add('/scratch/job/out.dat');
      const file = stagedFile({
        source: null,
        location: '/scratch/job/out.dat',
        destinations: ['/data/out.dat'],
        cleanup: true,
      });

      expect(await file.finish(false)).toBe(0);
      expect(h.store.read('/scratch/job/out.dat')).toBe('result');
    });

    it('never deletes a file it does not own', async () => {
      const file = stagedFile({
        source: null,
        location: '/scratch/job/out.dat',
        destinations: ['root://store//out.dat'],
        cleanup: false,
      });

      expect(await file.finish(false)).toBe(0);
      expect(h.store.read('/scratch/job/out.dat')).toBe('result');
    });
  });

  it('describes its state', async () => {
    h.store.addFile('/data/in.dat', 'input');
    const file = stagedFile({ source: '/data/in.dat', location: '/scratch/job/in.dat', cleanup: true });
    await file.start();

    expect(file.describe()).toEqual({
      source: '/data/in.dat',
      location: '/scratch/job/in.dat',
      destinations: [],
      cleanup: true,
      started: true,
    });
  });
});
