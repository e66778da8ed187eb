import { container, initializeContainer, type ContainerInitOptions } from '../di/container.js';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { TerminationSignals } from '../runtime/ports/termination-signals.js';
import type { DescribableError } from '../shutdown/graceful.js';
import type { ShutdownGroup } from '../shutdown/shutdown-group.js';

export type RegisterServices = (group: ShutdownGroup<DescribableError>) => void | Promise<void>;

/**
 * Composition-root entry: start services, wait for termination, exit.
 *
 * `register` starts the application's services and pushes them onto the
 * group. The process then runs until the first termination signal; a second
 * one forces the shutdown. Only this function terminates the process.
 *
 * @example
 * ```ts
 * await runUntilTerminated((group) => {
 *   const server = app.listen(8080);
 *   group.push(new HttpServerGraceful(server));
 * });
 * ```
 */
export async function runUntilTerminated(
  register: RegisterServices,
  options: ContainerInitOptions = {}
): Promise<never> {
  initializeContainer(options);

  const group = container.resolve<ShutdownGroup<DescribableError>>(DI.Shutdown.Group);
  const source = container.resolve<TerminationSignals>(DI.Runtime.TerminationSignals);
  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('Application');

  // Subscribe before services start so a signal during startup still shuts down.
  const terminated = group.waitToTerminate(source);

  try {
    await register(group);
  } catch (error) {
    logger.fatal({ err: error }, 'Service registration failed');
    // While unwinding, a failed teardown is logged by the guard and rethrows `error`.
    await group.dispose({ kind: 'unwinding', error }).catch((rethrown: unknown) => {
      logger.debug({ err: rethrown }, 'Teardown after failed registration did not complete');
    });
    return terminator.terminate({ kind: 'failure' });
  }

  logger.info({ services: group.size }, 'Services running; waiting for termination signal');
  const outcome = await terminated;

  switch (outcome.kind) {
    case 'completed':
    case 'already_shutting_down':
      return terminator.terminate({ kind: 'success' });
    case 'failed':
      return terminator.terminate({ kind: 'failure' });
    default:
      return assertNever(outcome);
  }
}
