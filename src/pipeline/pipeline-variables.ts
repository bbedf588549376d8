import type { Logger } from '../core/logging/index.js';
import type { CommandRunnerPort } from '../staging/ports/command-runner.port.js';
import type { PipelineConfig } from '../config/app-config.js';

/** Longer values are passed on but may be truncated by the pipeline. */
export const MAX_VARIABLE_LENGTH = 1000;

export const SET_VARIABLE_COMMAND = 'pipelineSet';
export const CREATE_STREAM_COMMAND = 'pipelineCreateStream';

export interface PipelineVariablesDeps {
  readonly runner: CommandRunnerPort;
  readonly config: PipelineConfig;
  readonly logger: Logger;
}

/**
 * Talks to the pipeline server through its job-side helper commands and
 * exposes the job's identity as given by the pipeline environment.
 */
export class PipelineVariables {
  constructor(private readonly deps: PipelineVariablesDeps) {}

  /** Returns the helper's exit status; 1 when it could not be started. */
  async setVariable(name: string, value: string | number): Promise<number> {
    const text = String(value);
    if (text.length > MAX_VARIABLE_LENGTH) {
      this.deps.logger.warn(
        { name, length: text.length, max: MAX_VARIABLE_LENGTH },
        'Variable is probably too long to work correctly'
      );
    }
    return this.runHelper(SET_VARIABLE_COMMAND, [name, text]);
  }

  /** `stream` -1 lets the pipeline pick the stream number. */
  async createSubStream(subTask: string, stream: number = -1, args: string = ''): Promise<number> {
    return this.runHelper(CREATE_STREAM_COMMAND, [subTask, String(stream), args]);
  }

  getProcess(): string | undefined {
    return this.deps.config.process;
  }

  getStream(): string | undefined {
    return this.deps.config.stream;
  }

  getTask(): string | undefined {
    return this.deps.config.task;
  }

  private async runHelper(command: string, args: readonly string[]): Promise<number> {
    const result = await this.deps.runner.run(command, args);
    if (result.isErr()) {
      this.deps.logger.error({ command, reason: result.error.message }, 'Pipeline helper could not be started');
      return 1;
    }
    if (result.value.exitCode !== 0) {
      this.deps.logger.error(
        { command, exitCode: result.value.exitCode, stderr: result.value.stderr },
        'Pipeline helper failed'
      );
    }
    return result.value.exitCode;
  }
}
