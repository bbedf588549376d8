/**
 * CLI Commands - Public API
 */

export { executeCopyCommand, type CopyCommandDeps, type CopyCommandOptions } from './copy.js';
export { executeChecksumCommand, type ChecksumCommandDeps } from './checksum.js';
export {
  executeSummaryCommand,
  type SummaryCommandDeps,
  type SummaryCommandOptions,
  type SummaryWriter,
} from './summary.js';
export { executeSetVariableCommand, type SetVariableCommandDeps } from './set-variable.js';
