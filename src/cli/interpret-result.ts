/**
 * The only place a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end by itself so pending log writes flush.
      return;

    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}

/**
 * For failures before the container exists (invalid configuration).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
