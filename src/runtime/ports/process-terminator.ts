/**
 * Ends the current process. Only the CLI entry point holds one.
 *
 * `status` carries the staging status bits (1 copy failure, 2 directory not removed).
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure'; status: number };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
