import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Drops the signal name Node passes before calling the handler.
 *
 * Note: once a listener exists for SIGINT/SIGTERM, Node no longer exits on that
 * signal by itself. Termination becomes the job of whoever handles it.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    process.on(signal, () => {
      void handler();
    });
  }
}
