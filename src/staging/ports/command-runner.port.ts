import type { ResultAsync } from 'neverthrow';

export interface CommandOutput {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export type CommandError =
  | { readonly code: 'COMMAND_SPAWN_FAILED'; readonly message: string; readonly command: string };

/**
 * Port: run an external program.
 *
 * A nonzero exit is NOT an error here; it is reported through `exitCode` so
 * callers classify outcomes from structured data. The error channel only
 * carries failures to start the program at all.
 *
 * Arguments are passed as a vector; no shell is involved.
 */
export interface CommandRunnerPort {
  run(command: string, args: readonly string[]): ResultAsync<CommandOutput, CommandError>;
}
