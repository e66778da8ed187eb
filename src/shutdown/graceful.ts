import { ResultAsync, type Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { UnexpectedError } from '../errors/app-error.js';
import type { ForceHandle } from './force-signal.js';

/**
 * Anything a shutdown report can describe: `Error` instances and tagged error objects alike.
 */
export interface DescribableError {
  readonly message: string;
}

/**
 * A service that supports graceful shutdown.
 *
 * `shutdown` must eventually settle. When `force` is given and fires, the
 * service should abandon remaining graceful work and return as soon as it
 * can; services with nothing to wait on may ignore it.
 *
 * @example
 * ```ts
 * class QueueConsumer implements Graceful<ConsumerError> {
 *   readonly name = 'queue-consumer';
 *
 *   shutdown(force?: ForceHandle): ResultAsync<void, ConsumerError> {
 *     const drained = this.drain();
 *     return ResultAsync.fromPromise(
 *       force ? Promise.race([drained, force.wait()]) : drained,
 *       toConsumerError
 *     );
 *   }
 * }
 * ```
 */
export interface Graceful<E extends DescribableError> {
  /** Label used in logs and shutdown reports. */
  readonly name?: string;

  shutdown(force: ForceHandle | undefined): PromiseLike<Result<void, E>>;
}

/**
 * Adapts a plain async stop function.
 * A rejection becomes an `Unexpected` error in the shutdown report.
 */
export function gracefulFromAsync(
  name: string,
  stop: (force: ForceHandle | undefined) => Promise<void>
): Graceful<UnexpectedError> {
  return {
    name,
    shutdown: (force) =>
      ResultAsync.fromPromise(stop(force), (cause) => Err.unexpected(`${name} failed to stop`, cause)),
  };
}
