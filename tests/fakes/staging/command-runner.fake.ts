/**
 * Scripted fake for the command runner port.
 *
 * Every call is recorded. Responses come from a handler (default: exit 0,
 * no output); `spawnFailure` makes the next calls fail to start.
 */

import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { CommandError, CommandOutput, CommandRunnerPort } from '../../../src/staging/ports/command-runner.port.js';

export interface CommandCall {
  readonly command: string;
  readonly args: readonly string[];
}

export type CommandHandler = (call: CommandCall) => Partial<CommandOutput>;

export class ScriptedCommandRunner implements CommandRunnerPort {
  readonly calls: CommandCall[] = [];
  private handler: CommandHandler = () => ({});
  private spawnFailuresLeft = 0;

  constructor(handler?: CommandHandler) {
    if (handler) this.handler = handler;
  }

  // Test utilities
  respondWith(handler: CommandHandler): void {
    this.handler = handler;
  }

  failToSpawn(count: number): void {
    this.spawnFailuresLeft = count;
  }

  /** Recorded calls as "command arg1 arg2" strings. */
  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(' '));
  }

  // Port
  run(command: string, args: readonly string[]): ResultAsync<CommandOutput, CommandError> {
    const call: CommandCall = { command, args: [...args] };
    this.calls.push(call);

    if (this.spawnFailuresLeft > 0) {
      this.spawnFailuresLeft--;
      const error: CommandError = { code: 'COMMAND_SPAWN_FAILED', message: `spawn ${command} ENOENT`, command };
      return errAsync(error);
    }

    const output = this.handler(call);
    return okAsync({ exitCode: output.exitCode ?? 0, stdout: output.stdout ?? '', stderr: output.stderr ?? '' });
  }
}
