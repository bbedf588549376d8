/**
 * Set-Variable Command
 *
 * Forwards a name/value pair to the pipeline's variable helper.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';

export interface SetVariableCommandDeps {
  readonly setVariable: (name: string, value: string) => Promise<number>;
}

export async function executeSetVariableCommand(
  name: string,
  value: string,
  deps: SetVariableCommandDeps
): Promise<CliResult> {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    return misuse(`Invalid variable name: "${name}"`, ['Use letters, digits and underscores only']);
  }

  const status = await deps.setVariable(name, value);
  if (status !== 0) {
    return failure(`Pipeline helper exited with status ${status} while setting ${name}`);
  }
  return success({ message: `Set pipeline variable ${name}` });
}
