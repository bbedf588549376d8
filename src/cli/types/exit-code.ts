/**
 * Typed exit codes for CLI commands, Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - the operation failed
  | { kind: 'misuse' };        // 2 - bad arguments

/**
 * Convert ExitCode to the ProcessTerminator's form.
 */
export function toProcessExitCode(
  exitCode: ExitCode
): { kind: 'success' } | { kind: 'failure'; status: number } {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
    case 'misuse':
      return { kind: 'failure', status: toNumericExitCode(exitCode) };
  }
}

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
