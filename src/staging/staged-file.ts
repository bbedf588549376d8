import type { Logger } from '../core/logging/index.js';
import type { BackendSelector } from './backend-selection.js';
import type { ResilientCopier } from './resilient-copy.js';

export interface StagedFileInit {
  /** Original file for stage-in and stage-modify; null for pure stage-out. */
  readonly source: string | null;
  /** Where the job reads and writes the file. */
  readonly location: string;
  readonly destinations?: readonly string[];
  readonly cleanup: boolean;
}

export interface StagedFileState {
  readonly source: string | null;
  readonly location: string;
  readonly destinations: readonly string[];
  readonly cleanup: boolean;
  readonly started: boolean;
}

export interface StagedFileDeps {
  readonly copier: ResilientCopier;
  readonly selector: BackendSelector;
  readonly logger: Logger;
}

/**
 * One file under staging: an optional source copied in, a working location,
 * and the destinations that receive the working copy at finish.
 *
 * The working location never appears among its own destinations. A file
 * already sitting at one of its destinations is not copied there and is not
 * deleted afterwards.
 */
export class StagedFile {
  readonly source: string | null;
  readonly location: string;
  readonly destinations: readonly string[];
  /** Destinations as requested, including one equal to the working location. */
  readonly requestedDestinations: readonly string[];
  readonly cleanup: boolean;

  private startStatus: number | null = null;

  constructor(
    init: StagedFileInit,
    private readonly deps: StagedFileDeps
  ) {
    const requested = [...new Set(init.destinations ?? [])];
    const selfDestined = requested.includes(init.location);

    this.source = init.source;
    this.location = init.location;
    this.destinations = requested.filter((d) => d !== init.location);
    this.requestedDestinations = requested;
    this.cleanup = selfDestined ? false : init.cleanup;
  }

  get started(): boolean {
    return this.startStatus !== null;
  }

  /**
   * Copy the source into the working location. Runs the copy at most once;
   * later calls return the first call's status.
   */
  async start(): Promise<number> {
    if (this.startStatus !== null) return this.startStatus;

    this.deps.logger.debug(this.describe(), 'Starting staged file');

    let status = 0;
    if (this.source !== null && this.source !== this.location) {
      status = await this.deps.copier.copyStatus(this.source, this.location);
    }
    this.startStatus = status;
    return status;
  }

  /**
   * Copy the working file to every destination, then delete it unless
   * `keep` is set or this entry does not own its working copy.
   *
   * Every destination is attempted; statuses are OR-ed.
   */
  async finish(keep: boolean): Promise<number> {
    this.deps.logger.debug(this.describe(), 'Finishing staged file');

    let status = 0;
    for (const destination of this.destinations) {
      status |= await this.deps.copier.copyStatus(this.location, destination);
    }

    if (keep || !this.cleanup) {
      this.deps.logger.info({ location: this.location, keep, cleanup: this.cleanup }, 'Leaving working file in place');
      return status;
    }

    const backend = this.deps.selector.forPath(this.location);
    const writable = await backend.isWritable(this.location);
    if (writable.isErr() || !writable.value) {
      this.deps.logger.info({ location: this.location }, 'Working file not writable, leaving it in place');
      return status;
    }

    const removed = await backend.removeFile(this.location);
    if (removed.isErr()) {
      this.deps.logger.warn({ location: this.location, reason: removed.error.message }, 'Could not remove working file');
    } else {
      this.deps.logger.info({ location: this.location }, 'Removed working file');
    }
    return status;
  }

  describe(): StagedFileState {
    return {
      source: this.source,
      location: this.location,
      destinations: this.destinations,
      cleanup: this.cleanup,
      started: this.started,
    };
  }
}
