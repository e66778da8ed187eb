import { createBootstrapLogger, type Logger } from '../core/logging/index.js';
import { InMemoryTerminationSignals } from '../runtime/adapters/in-memory-termination-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { TerminationSignal, TerminationSignals } from '../runtime/ports/termination-signals.js';

export interface InstallTerminationOptions {
  /** Defaults to `['SIGINT']`. */
  readonly signals?: readonly TerminationSignal[];
  readonly processSignals?: ProcessSignals;
  readonly terminator?: ProcessTerminator;
  readonly logger?: Logger;
}

/**
 * Bridges OS termination signals into a broadcast source.
 *
 * Each delivery of a configured signal publishes one event. Any number of
 * shutdown groups can wait on the returned source.
 *
 * If an event cannot be delivered (nobody listens any more, or a listener
 * threw) the process exits with a failure code: a signal handler has no
 * caller to report to.
 *
 * Meant to be called once per process. A second call installs a second,
 * independent set of handlers feeding a second source.
 */
export function installTerminationHandle(options: InstallTerminationOptions = {}): TerminationSignals {
  const signals = options.signals ?? ['SIGINT'];
  const processSignals = options.processSignals ?? new NodeProcessSignals();
  const terminator = options.terminator ?? new NodeProcessTerminator();
  const logger = options.logger ?? createBootstrapLogger('TerminationHandle');

  const source = new InMemoryTerminationSignals();

  for (const signal of signals) {
    processSignals.on(signal, () => {
      const delivered = source.emit({ kind: 'termination_requested', signal });
      if (delivered.isErr()) {
        logger.fatal({ signal, error: delivered.error }, `Could not deliver termination signal: ${delivered.error.message}`);
        terminator.terminate({ kind: 'failure' });
      }
    });
  }

  logger.debug({ signals }, 'Termination handle installed');
  return source;
}
