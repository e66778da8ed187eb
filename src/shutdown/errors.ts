import { assertNever } from '../runtime/assert-never.js';
import { safeToString } from '../errors/formatter.js';
import type { DescribableError } from './graceful.js';
import type { FailedOutcome, ShutdownReport } from './shutdown-report.js';

export type AlreadyShuttingDownError = Readonly<{
  readonly _tag: 'AlreadyShuttingDown';
  readonly message: string;
}>;

export type ServicesFailedError<E extends DescribableError> = Readonly<{
  readonly _tag: 'ServicesFailed';
  readonly failures: readonly FailedOutcome<E>[];
  readonly report: ShutdownReport<E>;
  readonly message: string;
}>;

export type ShutdownError<E extends DescribableError> = AlreadyShuttingDownError | ServicesFailedError<E>;

export const ShutdownErr = {
  alreadyShuttingDown: (): AlreadyShuttingDownError => ({
    _tag: 'AlreadyShuttingDown',
    message: 'ShutdownGroup is already shutting down',
  }),

  servicesFailed: <E extends DescribableError>(
    failures: readonly FailedOutcome<E>[],
    report: ShutdownReport<E>
  ): ServicesFailedError<E> => ({
    _tag: 'ServicesFailed',
    failures,
    report,
    message: `${failures.length} of ${report.outcomes.length} service(s) failed to shut down: ${failures
      .map((f) => f.service)
      .join(', ')}`,
  }),
} as const;

export function formatShutdownError<E extends DescribableError>(error: ShutdownError<E>): string {
  switch (error._tag) {
    case 'AlreadyShuttingDown':
      return error.message;

    case 'ServicesFailed': {
      const lines = error.failures.map((f) => `  - ${f.service}: ${describeFailure(f)}`);
      return `${error.message}\n${lines.join('\n')}`;
    }

    default:
      return assertNever(error);
  }
}

export function describeFailure<E extends DescribableError>(failure: FailedOutcome<E>): string {
  switch (failure.kind) {
    case 'failed':
      return failure.error.message;
    case 'crashed':
      return `crashed (${safeToString(failure.cause)})`;
    default:
      return assertNever(failure);
  }
}
