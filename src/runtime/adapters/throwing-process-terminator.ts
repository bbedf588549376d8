import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so a stray terminate fails the test.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    const detail = code.kind === 'failure' ? `failure:${code.status}` : code.kind;
    throw new Error(`[ProcessTerminator] terminate(${detail})`);
  }
}
