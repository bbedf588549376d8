import { spawn } from 'child_process';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { CommandError, CommandOutput, CommandRunnerPort } from '../../../ports/command-runner.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import type { Logger } from '../../../../core/logging/index.js';
import { describeError } from '../node-error-code.js';

// Exit status reported when the child was killed by a signal.
const SIGNALLED_EXIT_CODE = 128;

/**
 * Runs external programs without a shell and logs start, exit status and
 * wall time for each run.
 */
export class NodeCommandRunner implements CommandRunnerPort {
  constructor(
    private readonly clock: TimeClockPort,
    private readonly logger: Logger
  ) {}

  run(command: string, args: readonly string[]): ResultAsync<CommandOutput, CommandError> {
    const commandLine = [command, ...args].join(' ');
    const startedAtMs = this.clock.nowMs();
    this.logger.info({ command: commandLine }, 'Running command');

    return RA.fromPromise(
      this.spawnAndCollect(command, args),
      (e): CommandError => ({
        code: 'COMMAND_SPAWN_FAILED',
        message: `Could not run ${command}: ${describeError(e)}`,
        command: commandLine,
      })
    )
      .map((output) => {
        this.logger.info(
          { command: commandLine, exitCode: output.exitCode, wallMs: this.clock.nowMs() - startedAtMs },
          'Command finished'
        );
        return output;
      })
      .mapErr((e) => {
        this.logger.error({ command: commandLine, reason: e.message }, 'Command could not be started');
        return e;
      });
  }

  private spawnAndCollect(command: string, args: readonly string[]): Promise<CommandOutput> {
    return new Promise<CommandOutput>((resolve, reject) => {
      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', reject);
      child.on('close', (code) => {
        resolve({ exitCode: code ?? SIGNALLED_EXIT_CODE, stdout, stderr });
      });
    });
  }
}
