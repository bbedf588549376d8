/**
 * Outcomes of CLI commands. Commands return these; the composition root
 * prints them and decides the exit status.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function successMessage(message: string): CliResult {
  return { kind: 'success', output: { message } };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/** Bad arguments: exit status 2. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
