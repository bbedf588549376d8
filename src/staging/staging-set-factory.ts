import type { StagingConfig } from '../config/app-config.js';
import { StagingSet } from './staging-set.js';
import type { StagingSetDeps, StagingSetOptions } from './staging-set.js';

/**
 * Creates staging sets with every dependency wired and the configured
 * exclusion patterns as defaults.
 */
export class StagingSetFactory {
  constructor(
    private readonly deps: Omit<StagingSetDeps, 'rootPolicy'>,
    private readonly config: StagingConfig
  ) {}

  create(options: StagingSetOptions = {}): Promise<StagingSet> {
    return StagingSet.create(
      {
        ...options,
        excludeIn: options.excludeIn === undefined ? this.config.excludeIn : options.excludeIn,
        excludeOut: options.excludeOut === undefined ? this.config.excludeOut ?? null : options.excludeOut,
      },
      {
        ...this.deps,
        rootPolicy: {
          overrideRoot: this.config.overrideRoot,
          envRoot: this.config.envRoot,
          cwd: this.config.cwd,
        },
      }
    );
  }
}
