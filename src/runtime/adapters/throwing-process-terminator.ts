import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process.
 * Turns an accidental termination into an exception the test can see.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
