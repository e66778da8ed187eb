import { ResultAsync, err, ok, type Result } from 'neverthrow';
import { createBootstrapLogger, type Logger } from '../core/logging/index.js';
import { dropGuard, type DisposeContext } from '../runtime/drop-guard.js';
import { timed } from '../runtime/elapsed.js';
import type { TerminationEvent, TerminationSignals } from '../runtime/ports/termination-signals.js';
import {
  ShutdownErr,
  formatShutdownError,
  type AlreadyShuttingDownError,
  type ServicesFailedError,
} from './errors.js';
import { SharedForceSignal, type ForceHandle } from './force-signal.js';
import type { DescribableError, Graceful } from './graceful.js';
import { failuresOf, type FailurePolicy, type ServiceOutcome, type ShutdownReport } from './shutdown-report.js';

export interface ShutdownGroupOptions {
  readonly logger?: Logger;
  readonly failurePolicy?: FailurePolicy;
}

/**
 * Settles once every service has settled.
 * Fails only under the `fail_on_error` policy.
 */
export type CompositeShutdown<E extends DescribableError> = ResultAsync<ShutdownReport<E>, ServicesFailedError<E>>;

export type TerminationOutcome<E extends DescribableError> =
  | { readonly kind: 'completed'; readonly report: ShutdownReport<E> }
  | { readonly kind: 'failed'; readonly error: ServicesFailedError<E> }
  | { readonly kind: 'already_shutting_down' };

/**
 * Thrown by `dispose()` when the forced teardown fails under `fail_on_error`.
 */
export class ShutdownFailure<E extends DescribableError> extends Error {
  constructor(readonly error: ServicesFailedError<E>) {
    super(formatShutdownError(error));
    this.name = 'ShutdownFailure';
  }
}

/**
 * Manages graceful shutdown for a group of services.
 *
 * Two-phase shutdown driven by a termination source:
 * - first signal: every service is asked to shut down gracefully
 * - second signal: the shared force signal fires for all of them
 *
 * A group shuts down at most once. `dispose()` tears the group down with an
 * already-fired force signal when nobody shut it down explicitly.
 *
 * `push` is only meant for setup: pushing while a shutdown is in flight is a
 * caller error and is not guarded against. The pushed service is neither
 * started nor reported.
 */
export class ShutdownGroup<E extends DescribableError> {
  private shuttingDown = false;
  private readonly services: Graceful<E>[] = [];
  private readonly logger: Logger;
  private readonly failurePolicy: FailurePolicy;

  constructor(options: ShutdownGroupOptions = {}) {
    this.logger = options.logger ?? createBootstrapLogger('ShutdownGroup');
    this.failurePolicy = options.failurePolicy ?? { kind: 'report' };
  }

  get size(): number {
    return this.services.length;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  push(service: Graceful<E>): void {
    this.services.push(service);
  }

  /**
   * Starts shutting down every service concurrently.
   *
   * `force`, when given, is shared: each service receives its own handle to
   * the same firing. Without it every service receives `undefined`.
   *
   * Returns `AlreadyShuttingDown` without touching any service when a
   * shutdown was already started.
   */
  shutdownAll(
    force?: SharedForceSignal | PromiseLike<unknown>
  ): Result<CompositeShutdown<E>, AlreadyShuttingDownError> {
    // Check and set with no yield in between.
    if (this.shuttingDown) {
      return err(ShutdownErr.alreadyShuttingDown());
    }
    this.shuttingDown = true;

    const signal =
      force === undefined ? undefined : force instanceof SharedForceSignal ? force : SharedForceSignal.from(force);

    this.logger.info({ services: this.services.length, force: signal !== undefined }, 'Shutting down services');

    // Every service is started here, before any of them is awaited.
    const running = this.services.map((service, index) =>
      this.shutdownOne(service, service.name ?? `service#${index}`, signal?.handle())
    );

    const composite = Promise.all(running).then((outcomes) =>
      this.settle({ outcomes, forced: signal?.isFired ?? false })
    );

    return ok(new ResultAsync(composite));
  }

  /**
   * Waits for the first termination event on `source`, then shuts everything
   * down with a force signal tied to the next event on the same source.
   *
   * Subscribes immediately; events emitted before this call are not seen.
   */
  waitToTerminate(source: TerminationSignals): Promise<TerminationOutcome<E>> {
    return new Promise<TerminationOutcome<E>>((resolve) => {
      const unsubscribe = source.onTermination((event) => {
        unsubscribe();
        resolve(this.terminate(event, source));
      });
    });
  }

  /**
   * Teardown for a group that is being discarded.
   *
   * Runs `shutdownAll` with an already-fired force signal and settles once
   * every service settled. Does nothing if a shutdown was already started,
   * whether or not it finished.
   */
  dispose(context: DisposeContext = { kind: 'normal' }): Promise<void> {
    return dropGuard(
      async () => {
        const started = this.shutdownAll(SharedForceSignal.fired());
        if (started.isErr()) {
          this.logger.debug('Shutdown already started; nothing to dispose');
          return;
        }

        const result = await started.value;
        if (result.isErr()) {
          throw new ShutdownFailure(result.error);
        }
      },
      { context, logger: this.logger }
    );
  }

  private async terminate(event: TerminationEvent, source: TerminationSignals): Promise<TerminationOutcome<E>> {
    this.logger.info({ signal: event.signal }, 'Received termination signal');
    this.logger.info(`Send ${event.signal} again to force shutdown`);

    // Created inside the delivery of the first event: it fires on the next one.
    const force = SharedForceSignal.fromNextTermination(source);
    void force.wait().then(() => {
      this.logger.warn('Force shutdown requested');
    });

    const started = this.shutdownAll(force);
    if (started.isErr()) {
      force.dispose();
      this.logger.info(`Shutdown already in progress: ${started.error.message}`);
      return { kind: 'already_shutting_down' };
    }

    const result = await started.value;
    force.dispose();

    if (result.isErr()) {
      this.logger.error({ failed: result.error.failures.length }, formatShutdownError(result.error));
      return { kind: 'failed', error: result.error };
    }
    return { kind: 'completed', report: result.value };
  }

  private async shutdownOne(
    service: Graceful<E>,
    label: string,
    force: ForceHandle | undefined
  ): Promise<ServiceOutcome<E>> {
    const { outcome, elapsedMs } = await timed(() => service.shutdown(force));

    if (outcome.status === 'rejected') {
      this.logger.error({ service: label, elapsedMs, err: outcome.reason }, 'Service crashed during shutdown');
      return { kind: 'crashed', service: label, elapsedMs, cause: outcome.reason };
    }

    const result = outcome.value;
    if (result.isErr()) {
      this.logger.warn({ service: label, elapsedMs, reason: result.error.message }, 'Service failed to shut down');
      return { kind: 'failed', service: label, elapsedMs, error: result.error };
    }

    this.logger.debug({ service: label, elapsedMs }, 'Service stopped');
    return { kind: 'stopped', service: label, elapsedMs };
  }

  private settle(report: ShutdownReport<E>): Result<ShutdownReport<E>, ServicesFailedError<E>> {
    const failures = failuresOf(report);
    this.logger.info(
      { stopped: report.outcomes.length - failures.length, failed: failures.length, forced: report.forced },
      'All services shut down'
    );

    if (failures.length > 0 && this.failurePolicy.kind === 'fail_on_error') {
      return err(ShutdownErr.servicesFailed(failures, report));
    }
    return ok(report);
  }
}
