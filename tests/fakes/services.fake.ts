import { errAsync, okAsync, ResultAsync, type Result } from 'neverthrow';
import type { ForceHandle } from '../../src/shutdown/force-signal.js';
import type { Graceful } from '../../src/shutdown/graceful.js';

export interface ServiceError {
  readonly _tag: 'ServiceError';
  readonly message: string;
}

export const serviceError = (message: string): ServiceError => ({ _tag: 'ServiceError', message });

/**
 * Records every shutdown call so tests can assert on what each service was given.
 */
abstract class RecordingService implements Graceful<ServiceError> {
  readonly calls: Array<{ readonly force: ForceHandle | undefined }> = [];
  finished = false;

  constructor(readonly name: string) {}

  get callCount(): number {
    return this.calls.length;
  }

  /** The force handle of the last call. */
  get lastForce(): ForceHandle | undefined {
    return this.calls[this.calls.length - 1]?.force;
  }

  shutdown(force: ForceHandle | undefined): PromiseLike<Result<void, ServiceError>> {
    this.calls.push({ force });
    return this.stop(force);
  }

  protected abstract stop(force: ForceHandle | undefined): ResultAsync<void, ServiceError>;
}

/**
 * Blocks until force fires; returns immediately when given no force.
 */
export class SlowService extends RecordingService {
  protected stop(force: ForceHandle | undefined): ResultAsync<void, ServiceError> {
    if (!force) {
      this.finished = true;
      return okAsync(undefined);
    }
    return ResultAsync.fromSafePromise(
      force.wait().then(() => {
        this.finished = true;
      })
    );
  }
}

/**
 * Ignores force and returns at once.
 */
export class ImmediateService extends RecordingService {
  protected stop(): ResultAsync<void, ServiceError> {
    this.finished = true;
    return okAsync(undefined);
  }
}

/**
 * Stays pending until the test calls `release()`.
 */
export class ManualService extends RecordingService {
  private releaseStop: () => void = () => {};
  private readonly stopped = new Promise<void>((resolve) => {
    this.releaseStop = resolve;
  });

  release(): void {
    this.releaseStop();
  }

  protected stop(): ResultAsync<void, ServiceError> {
    return ResultAsync.fromSafePromise(
      this.stopped.then(() => {
        this.finished = true;
      })
    );
  }
}

/**
 * Resolves to a service error.
 */
export class FailingService extends RecordingService {
  protected stop(): ResultAsync<void, ServiceError> {
    this.finished = true;
    return errAsync(serviceError(`${this.name} could not flush`));
  }
}

/**
 * Throws synchronously from `shutdown`.
 */
export class ThrowingService extends RecordingService {
  protected stop(): ResultAsync<void, ServiceError> {
    throw new Error(`${this.name} exploded`);
  }
}
