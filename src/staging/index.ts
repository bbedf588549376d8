// Ports
export type { BackendKind, BackendError, CopyReceipt, RemoveOutcome, StorageBackendPort } from './ports/storage-backend.port.js';
export { DEFAULT_DIR_MODE } from './ports/storage-backend.port.js';
export type { ChecksumError, ChecksumPort } from './ports/checksum.port.js';
export type { CommandError, CommandOutput, CommandRunnerPort } from './ports/command-runner.port.js';
export type { DelayPort } from './ports/delay.port.js';
export type { RandomSourcePort } from './ports/random-source.port.js';
export type { TextFileError, TextFilePort } from './ports/text-file.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';

// Adapters
export { NodeFsBackend, TEMP_SUFFIX } from './infra/local/fs-backend/index.js';
export { NodeMd5Checksum } from './infra/local/checksum/index.js';
export { NodeCommandRunner } from './infra/local/command-runner/index.js';
export { NodeDelay } from './infra/local/delay/index.js';
export { NodeRandomSource } from './infra/local/random-source/index.js';
export { NodeTextFile } from './infra/local/text-file/index.js';
export { NodeTimeClock } from './infra/local/time-clock/index.js';
export { XrootdBackend } from './infra/xrootd/index.js';

// Staging
export { BackendSelector, REMOTE_PREFIX, classifyPath, isRemotePath } from './backend-selection.js';
export { ResilientCopier, DEFAULT_COPY_POLICY } from './resilient-copy.js';
export type { AttemptError, CopyFailure, CopyPolicy, CopySuccess, ResilientCopierDeps } from './resilient-copy.js';
export { StagedFile } from './staged-file.js';
export type { StagedFileDeps, StagedFileInit, StagedFileState } from './staged-file.js';
export { resolveStageRoot, DEFAULT_STAGE_AREAS } from './stage-root.js';
export type { ResolvedStageRoot, StageRootPolicy, StageRootSource } from './stage-root.js';
export {
  StagingSet,
  DEFAULT_EXCLUDE_IN,
  STATUS_COPY_FAILED,
  STATUS_DIR_NOT_REMOVED,
} from './staging-set.js';
export type {
  FileChecksum,
  FinishMode,
  StagingCounts,
  StagingSetDeps,
  StagingSetOptions,
  StagingSetSnapshot,
  StagingState,
} from './staging-set.js';
export { StagingSetFactory } from './staging-set-factory.js';
