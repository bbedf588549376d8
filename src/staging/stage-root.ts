import type { Logger } from '../core/logging/index.js';
import type { StorageBackendPort } from './ports/storage-backend.port.js';
import { DEFAULT_DIR_MODE } from './ports/storage-backend.port.js';

/** Machine-local scratch areas, most preferred first. */
export const DEFAULT_STAGE_AREAS: readonly string[] = ['/scratch', '/tmp'];

export type StageRootSource = 'env_override' | 'option' | 'env' | 'default_area' | 'cwd';

export interface StageRootPolicy {
  /** Wins over everything, including an explicit option. */
  readonly overrideRoot?: string;
  /** Used when no option is given. */
  readonly envRoot?: string;
  readonly candidates?: readonly string[];
  readonly cwd: string;
}

export interface ResolvedStageRoot {
  readonly root: string;
  readonly source: StageRootSource;
}

/**
 * Pick the parent directory for a job's working directory.
 *
 * Priority: override root > explicit `requestedRoot` > env root > first
 * default area that is writable or can be created > current directory.
 */
export async function resolveStageRoot(
  requestedRoot: string | undefined,
  policy: StageRootPolicy,
  local: StorageBackendPort,
  logger: Logger
): Promise<ResolvedStageRoot> {
  const chosen = await chooseRoot(requestedRoot, policy, local, logger);
  logger.debug({ root: chosen.root, source: chosen.source }, 'Selected staging root directory');
  return chosen;
}

async function chooseRoot(
  requestedRoot: string | undefined,
  policy: StageRootPolicy,
  local: StorageBackendPort,
  logger: Logger
): Promise<ResolvedStageRoot> {
  if (policy.overrideRoot) return { root: policy.overrideRoot, source: 'env_override' };
  if (requestedRoot) return { root: requestedRoot, source: 'option' };
  if (policy.envRoot) return { root: policy.envRoot, source: 'env' };

  for (const area of policy.candidates ?? DEFAULT_STAGE_AREAS) {
    const writable = await local.isWritable(area);
    if (writable.isOk() && writable.value) return { root: area, source: 'default_area' };

    const present = await local.exists(area);
    if (present.isOk() && present.value) {
      logger.warn({ area }, 'Staging area exists but is not writable');
      continue;
    }

    const created = await local.makeDirectories(area, DEFAULT_DIR_MODE);
    if (created.isOk()) {
      logger.debug({ area }, 'Created staging area');
      return { root: area, source: 'default_area' };
    }
    logger.warn({ area, reason: created.error.message }, 'Staging cannot use area');
  }

  return { root: policy.cwd, source: 'cwd' };
}
