export { JobSummary, DEFAULT_SUMMARY_PREFIX } from './job-summary.js';
export type { JobSummaryDeps } from './job-summary.js';
export {
  PipelineVariables,
  MAX_VARIABLE_LENGTH,
  SET_VARIABLE_COMMAND,
  CREATE_STREAM_COMMAND,
} from './pipeline-variables.js';
export type { PipelineVariablesDeps } from './pipeline-variables.js';
