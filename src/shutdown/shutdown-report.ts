import type { DescribableError } from './graceful.js';

/**
 * What the composite shutdown does with per-service failures.
 *
 * - `report`: the composite always succeeds; failures are in the report.
 * - `fail_on_error`: the composite fails once every service has settled,
 *   if any of them failed.
 */
export type FailurePolicy =
  | { readonly kind: 'report' }
  | { readonly kind: 'fail_on_error' };

export type ServiceOutcome<E extends DescribableError> =
  | { readonly kind: 'stopped'; readonly service: string; readonly elapsedMs: number }
  | { readonly kind: 'failed'; readonly service: string; readonly elapsedMs: number; readonly error: E }
  | { readonly kind: 'crashed'; readonly service: string; readonly elapsedMs: number; readonly cause: unknown };

export type FailedOutcome<E extends DescribableError> = Exclude<ServiceOutcome<E>, { readonly kind: 'stopped' }>;

export interface ShutdownReport<E extends DescribableError> {
  /** One entry per registered service, in registration order. */
  readonly outcomes: readonly ServiceOutcome<E>[];
  /** Whether the force signal had fired by the time every service settled. */
  readonly forced: boolean;
}

export function failuresOf<E extends DescribableError>(report: ShutdownReport<E>): readonly FailedOutcome<E>[] {
  return report.outcomes.filter((o): o is FailedOutcome<E> => o.kind !== 'stopped');
}
