import * as path from 'path';
import type { Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { assertNever } from '../runtime/assert-never.js';
import type { BackendSelector } from './backend-selection.js';
import { isRemotePath } from './backend-selection.js';
import type { ResilientCopier } from './resilient-copy.js';
import { StagedFile } from './staged-file.js';
import type { StagedFileInit, StagedFileState } from './staged-file.js';
import type { StageRootPolicy, ResolvedStageRoot } from './stage-root.js';
import { resolveStageRoot } from './stage-root.js';
import type { ChecksumPort } from './ports/checksum.port.js';
import type { BackendError, StorageBackendPort } from './ports/storage-backend.port.js';
import { DEFAULT_DIR_MODE } from './ports/storage-backend.port.js';
import type { TextFilePort } from './ports/text-file.port.js';
import type { TimeClockPort } from './ports/time-clock.port.js';

/** Inputs under this pattern are read in place by default. */
export const DEFAULT_EXCLUDE_IN = '^/afs/';

/** Status bit: a copy to or from the working area failed. */
export const STATUS_COPY_FAILED = 1;
/** Status bit: the working directory could not be removed. */
export const STATUS_DIR_NOT_REMOVED = 2;

export type StagingState = 'uninitialized' | 'ready' | 'disabled';

/**
 * - `full`: copy outputs back, delete working files, remove the directory
 * - `clean`: copy outputs back, delete working files, keep the directory
 * - `keep`: copy outputs back, leave everything in place
 * - `wipe`: remove the directory without copying anything back
 */
export type FinishMode = 'full' | 'clean' | 'keep' | 'wipe';

export interface StagingCounts {
  readonly numIn: number;
  readonly numOut: number;
  readonly numMod: number;
}

export interface FileChecksum {
  readonly location: string;
  readonly destinations: readonly string[];
  /** null when the working file could not be read */
  readonly digest: string | null;
}

export interface StagingSetSnapshot {
  readonly state: StagingState;
  readonly workingDirectory: string;
  readonly counts: StagingCounts;
  readonly members: readonly StagedFileState[];
}

export interface StagingSetOptions {
  /** Directory name under the root; defaults to the process ID. */
  readonly stageName?: string;
  /** Parent of the working directory. */
  readonly stageArea?: string;
  /** Inputs matching this are not staged. null disables the filter. */
  readonly excludeIn?: string | RegExp | null;
  /** Outputs matching this are written in place. null disables the filter. */
  readonly excludeOut?: string | RegExp | null;
  /** Copy inputs in as soon as they are requested. */
  readonly autoStart?: boolean;
}

export interface StagingSetDeps {
  readonly selector: BackendSelector;
  readonly copier: ResilientCopier;
  readonly checksum: ChecksumPort;
  readonly textFile: TextFilePort;
  readonly clock: TimeClockPort;
  readonly rootPolicy: StageRootPolicy;
  readonly logger: Logger;
}

// An empty pattern disables the filter.
function toPattern(value: string | RegExp | null | undefined, fallback: string | null): RegExp | null {
  if (value === undefined) return toPattern(fallback, null);
  if (value === null || value === '') return null;
  return typeof value === 'string' ? new RegExp(value) : value;
}

const ZERO_COUNTS: StagingCounts = { numIn: 0, numOut: 0, numMod: 0 };

/**
 * A job's private working area on local scratch disk.
 *
 * The job asks for working paths (`stageIn`, `stageOut`, `stageMod`), works
 * on them, then calls `finish` to copy products to their destinations and
 * clean up.
 *
 * Staging is an optimization. When the working directory cannot be set up,
 * the set switches to pass-through: the original paths are handed back and
 * nothing is thrown. Output copy failures at finish are the one thing
 * reported as a nonzero status the job must act on.
 *
 * Calls are meant to be awaited one at a time; a set is owned by one job.
 */
export class StagingSet {
  private state: StagingState = 'uninitialized';
  private members: StagedFile[] = [];
  private counts: StagingCounts = ZERO_COUNTS;

  private readonly excludeIn: RegExp | null;
  private readonly excludeOut: RegExp | null;
  private readonly autoStart: boolean;

  private constructor(
    readonly workingDirectory: string,
    readonly stageRoot: ResolvedStageRoot,
    options: StagingSetOptions,
    private readonly deps: StagingSetDeps
  ) {
    this.excludeIn = toPattern(options.excludeIn, DEFAULT_EXCLUDE_IN);
    this.excludeOut = toPattern(options.excludeOut, null);
    this.autoStart = options.autoStart ?? true;
  }

  /**
   * Resolve the staging root, then set up the working directory.
   * Never rejects because of the filesystem; a failed setup yields a
   * disabled set.
   */
  static async create(options: StagingSetOptions, deps: StagingSetDeps): Promise<StagingSet> {
    const local = deps.selector.localBackend;
    const root = await resolveStageRoot(options.stageArea, deps.rootPolicy, local, deps.logger);
    const stageName = options.stageName ?? String(deps.clock.getPid());
    const workingDirectory = path.join(root.root, stageName);

    deps.logger.debug({ workingDirectory, rootSource: root.source }, 'Targeted staging directory');

    const set = new StagingSet(workingDirectory, root, options, deps);
    await set.setup();
    return set;
  }

  get status(): StagingState {
    return this.state;
  }

  get numIn(): number {
    return this.counts.numIn;
  }

  get numOut(): number {
    return this.counts.numOut;
  }

  get numMod(): number {
    return this.counts.numMod;
  }

  get stagedFiles(): readonly StagedFile[] {
    return this.members;
  }

  private get local(): StorageBackendPort {
    return this.deps.selector.localBackend;
  }

  /** Create (or adopt) the working directory and reset bookkeeping. */
  async setup(): Promise<StagingState> {
    const dir = this.workingDirectory;
    const existing = await this.local.exists(dir);

    if (existing.isOk() && existing.value) {
      this.deps.logger.info({ workingDirectory: dir }, 'Requested stage directory already exists');
      this.state = 'ready';
      await this.listStageDir();
    } else {
      const created = await this.local.makeDirectories(dir, DEFAULT_DIR_MODE);
      if (created.isOk()) {
        this.deps.logger.debug({ workingDirectory: dir }, 'Created stage directory');
        this.state = 'ready';
      } else {
        this.deps.logger.warn(
          { workingDirectory: dir, reason: created.error.message },
          'Staging disabled: cannot create stage directory'
        );
        this.state = 'disabled';
      }
    }

    this.resetBookkeeping();
    return this.state;
  }

  /**
   * Stage an input file. Returns the path the job should read, which is the
   * original path when staging is disabled or the path is excluded.
   */
  async stageIn(inFile: string): Promise<string> {
    await this.ensureSetup();

    if (this.state !== 'ready') {
      this.deps.logger.warn({ path: inFile }, 'Stage in not available');
      return inFile;
    }
    if (this.excludeIn?.test(inFile)) {
      this.deps.logger.info({ path: inFile, pattern: this.excludeIn.source }, 'Staging disabled for file by pattern');
      return inFile;
    }

    this.deps.logger.info({ path: inFile }, 'Stage in');
    const member = await this.addMember({ source: inFile, location: this.stagedName(inFile), cleanup: true });
    this.counts = { ...this.counts, numIn: this.counts.numIn + 1 };
    return member.location;
  }

  /**
   * Stage an output file. Returns the path the job should write.
   *
   * The first argument is the primary destination; extra arguments are
   * further destinations (e.g. a mirror in the object store). When the
   * primary is not staged, the job writes it in place and the entry still
   * feeds the extra destinations at finish.
   */
  async stageOut(primary: string, ...extraDestinations: readonly string[]): Promise<string> {
    await this.ensureSetup();

    if (!primary) {
      this.deps.logger.error('Primary stage file not specified');
      return '';
    }

    let location: string;
    let cleanup: boolean;
    if (this.state !== 'ready') {
      this.deps.logger.warn({ path: primary }, 'Stage out not available');
      location = primary;
      cleanup = false;
    } else if (this.excludeOut?.test(primary)) {
      this.deps.logger.info({ path: primary, pattern: this.excludeOut.source }, 'Staging disabled for file by pattern');
      location = primary;
      cleanup = false;
    } else {
      this.deps.logger.info({ path: primary }, 'Stage out');
      location = this.stagedName(primary);
      cleanup = true;
    }

    const member = await this.addMember({
      source: null,
      location,
      destinations: [primary, ...extraDestinations],
      cleanup,
    });
    this.counts = { ...this.counts, numOut: this.counts.numOut + 1 };
    return member.location;
  }

  /**
   * Stage a file the job reads and rewrites: copied in now, copied back over
   * the original at finish.
   */
  async stageMod(modFile: string): Promise<string> {
    await this.ensureSetup();

    if (this.state !== 'ready') {
      this.deps.logger.warn({ path: modFile }, 'Stage mod not available');
      return modFile;
    }
    const pattern = this.excludeIn?.test(modFile) ? this.excludeIn : this.excludeOut?.test(modFile) ? this.excludeOut : null;
    if (pattern) {
      this.deps.logger.info({ path: modFile, pattern: pattern.source }, 'Staging disabled for file by pattern');
      return modFile;
    }

    this.deps.logger.info({ path: modFile }, 'Stage mod');
    const member = await this.addMember({
      source: modFile,
      location: this.stagedName(modFile),
      destinations: [modFile],
      cleanup: true,
    });
    this.counts = { ...this.counts, numMod: this.counts.numMod + 1 };
    return member.location;
  }

  /**
   * Copy in every input not yet copied. Safe to call after auto-start: each
   * file copies at most once and reports its first status again.
   */
  async start(): Promise<number> {
    let status = 0;
    for (const member of this.members) {
      status |= await member.start();
    }
    return status;
  }

  /**
   * Tear down according to `mode`. Every member is processed even when an
   * earlier one fails. Returns OR-ed status bits; never rejects because of
   * the filesystem.
   */
  async finish(mode: FinishMode = 'full'): Promise<number> {
    this.deps.logger.debug({ mode, state: this.state }, 'Finishing staging set');

    if (this.state === 'disabled') {
      this.deps.logger.warn('Staging disabled: only secondary destinations receive files');
    }

    switch (mode) {
      case 'wipe':
        this.deps.logger.info({ workingDirectory: this.workingDirectory }, 'Deleting stage directory without retrieving outputs');
        return this.removeWorkingDirectory(true);

      case 'keep':
        return this.finishMembers(true);

      case 'clean': {
        const status = await this.finishMembers(false);
        this.resetBookkeeping();
        return status;
      }

      case 'full': {
        let status = await this.finishMembers(false);
        this.resetBookkeeping();
        status |= await this.removeWorkingDirectory(false);
        return status;
      }

      default:
        return assertNever(mode);
    }
  }

  /** Working path for `fileName`: its basename inside the working directory. */
  stagedName(fileName: string): string {
    return path.join(this.workingDirectory, path.basename(fileName));
  }

  /** The working directory, or '' when staging is not in operation. */
  getStageDir(): string {
    return this.state === 'ready' ? this.workingDirectory : '';
  }

  /** 1 while staging is in operation, else 0. */
  getStageStatus(): number {
    return this.state === 'ready' ? 1 : 0;
  }

  /** MD5 of every working file that will be copied out. */
  async getChecksums(): Promise<readonly FileChecksum[]> {
    const sums: FileChecksum[] = [];
    for (const member of this.members) {
      if (member.destinations.length === 0) continue;

      let digest: string | null = null;
      if (!isRemotePath(member.location)) {
        const result = await this.deps.checksum.digestFile(member.location);
        if (result.isOk()) {
          digest = result.value;
        } else {
          this.deps.logger.warn({ location: member.location, reason: result.error.message }, 'Could not checksum working file');
        }
      }
      sums.push({ location: member.location, destinations: member.destinations, digest });
    }
    return sums;
  }

  async listStageDir(): Promise<readonly string[]> {
    if (this.state !== 'ready') return [];

    const listed = await this.local.listDirectory(this.workingDirectory);
    if (listed.isErr()) {
      this.deps.logger.warn({ workingDirectory: this.workingDirectory, reason: listed.error.message }, 'Cannot list stage directory');
      return [];
    }
    this.deps.logger.info({ workingDirectory: this.workingDirectory, entries: listed.value }, 'Contents of stage directory');
    return listed.value;
  }

  describe(): StagingSetSnapshot {
    return {
      state: this.state,
      workingDirectory: this.workingDirectory,
      counts: this.counts,
      members: this.members.map((m) => m.describe()),
    };
  }

  /**
   * Write every stage-out destination, one per line, so the pipeline can
   * delete produced files on rollback. Outputs written in place are listed
   * too; stage-mod files existed before the job and are not. Returns 0 on
   * success, 1 on failure.
   */
  async dumpFileList(filename: string): Promise<number> {
    const lines = this.members.filter((m) => m.source === null).flatMap((m) => m.requestedDestinations);
    const text = lines.map((line) => `${line}\n`).join('');
    const written = await this.deps.textFile.writeText(filename, text);
    if (written.isErr()) {
      this.deps.logger.error({ filename, reason: written.error.message }, 'Could not write file list');
      return STATUS_COPY_FAILED;
    }
    return 0;
  }

  private async ensureSetup(): Promise<void> {
    if (this.state === 'uninitialized') await this.setup();
  }

  private async addMember(init: StagedFileInit): Promise<StagedFile> {
    const member = new StagedFile(init, {
      copier: this.deps.copier,
      selector: this.deps.selector,
      logger: this.deps.logger,
    });
    if (this.autoStart) {
      const status = await member.start();
      if (status !== 0) {
        this.deps.logger.error({ source: init.source, location: init.location }, 'Stage in copy failed');
      }
    }
    this.members.push(member);
    return member;
  }

  private async finishMembers(keep: boolean): Promise<number> {
    let status = 0;
    for (const member of this.members) {
      status |= await member.finish(keep);
    }
    return status;
  }

  /** `force` deletes the contents without first trying an empty-directory removal. */
  private async removeWorkingDirectory(force: boolean): Promise<number> {
    let status = 0;

    if (this.state === 'ready') {
      const dir = this.workingDirectory;
      const removed = force ? await this.local.removeTree(dir) : await this.removeEmptyOrForce(dir);
      if (removed.isErr()) {
        this.deps.logger.error({ workingDirectory: dir, reason: removed.error.message }, 'Could not remove stage directory');
        status = STATUS_DIR_NOT_REMOVED;
      }
    }

    this.state = 'uninitialized';
    this.resetBookkeeping();
    return status;
  }

  private async removeEmptyOrForce(dir: string): Promise<Result<void, BackendError>> {
    const removed = await this.local.removeDirectory(dir);
    if (removed.isOk()) return removed;

    this.deps.logger.warn({ workingDirectory: dir, reason: removed.error.message }, 'Staging directory not empty after cleanup');
    await this.listStageDir();
    this.deps.logger.warn({ workingDirectory: dir }, 'All files and directories in the stage directory will be deleted');
    return this.local.removeTree(dir);
  }

  private resetBookkeeping(): void {
    this.members = [];
    this.counts = ZERO_COUNTS;
  }
}
