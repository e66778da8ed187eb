import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * No-op ProcessSignals for test mode: the test runner owns the process.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: () => void | Promise<void>): void {
    // no-op
  }
}
