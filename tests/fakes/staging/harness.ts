import type { Logger } from '../../../src/core/logging/index.js';
import { BackendSelector } from '../../../src/staging/backend-selection.js';
import { ResilientCopier, DEFAULT_COPY_POLICY, type CopyPolicy } from '../../../src/staging/resilient-copy.js';
import { StagingSet, type StagingSetOptions } from '../../../src/staging/staging-set.js';
import type { StageRootPolicy } from '../../../src/staging/stage-root.js';
import { InMemoryStore, InMemoryStorageBackend } from './storage-backend.fake.js';
import { FakeTimeClock } from './time-clock.fake.js';
import { RecordingDelay } from './delay.fake.js';
import { QueuedRandomSource } from './random-source.fake.js';
import { InMemoryTextFile } from './text-file.fake.js';
import { InMemoryChecksum } from './checksum.fake.js';
import { silentLogger } from './logger.fake.js';

export interface StagingHarness {
  readonly store: InMemoryStore;
  readonly local: InMemoryStorageBackend;
  readonly remote: InMemoryStorageBackend;
  readonly selector: BackendSelector;
  readonly clock: FakeTimeClock;
  readonly delay: RecordingDelay;
  readonly random: QueuedRandomSource;
  readonly textFile: InMemoryTextFile;
  readonly checksum: InMemoryChecksum;
  readonly copier: ResilientCopier;
  createSet(options?: StagingSetOptions, rootPolicy?: Partial<StageRootPolicy>): Promise<StagingSet>;
}

/**
 * Staging wired entirely to in-memory fakes. The scratch area `/scratch`
 * exists and is writable unless a test changes the store.
 */
export function createStagingHarness(
  options: { policy?: Partial<CopyPolicy>; logger?: Logger; randomValues?: number[] } = {}
): StagingHarness {
  const logger = options.logger ?? silentLogger();
  const store = new InMemoryStore();
  store.addDir('/scratch');

  const local = new InMemoryStorageBackend('local', store);
  const remote = new InMemoryStorageBackend('remote', store);
  const selector = new BackendSelector(local, remote);
  const clock = new FakeTimeClock();
  const delay = new RecordingDelay();
  const random = new QueuedRandomSource(options.randomValues);
  const textFile = new InMemoryTextFile();
  const checksum = new InMemoryChecksum(store);
  const copier = new ResilientCopier(
    { selector, clock, delay, random, logger },
    { ...DEFAULT_COPY_POLICY, ...options.policy }
  );

  return {
    store,
    local,
    remote,
    selector,
    clock,
    delay,
    random,
    textFile,
    checksum,
    copier,
    createSet: (setOptions = {}, rootPolicy = {}) =>
      StagingSet.create(setOptions, {
        selector,
        copier,
        checksum,
        textFile,
        clock,
        logger,
        rootPolicy: { candidates: ['/scratch'], cwd: '/work', ...rootPolicy },
      }),
  };
}
