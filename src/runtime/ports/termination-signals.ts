import type { Result } from 'neverthrow';
import type { ProcessSignal } from './process-signals.js';

export type TerminationSignal = ProcessSignal;

export type TerminationEvent =
  | { readonly kind: 'termination_requested'; readonly signal: TerminationSignal };

export type Unsubscribe = () => void;

export type TerminationDeliveryError =
  | { readonly _tag: 'NoListeners'; readonly signal: TerminationSignal; readonly message: string }
  | {
      readonly _tag: 'ListenerFailed';
      readonly signal: TerminationSignal;
      readonly failures: readonly unknown[];
      readonly message: string;
    };

/**
 * Multi-consumer broadcast of termination requests.
 *
 * The termination bridge publishes one event per OS signal; any number of
 * shutdown groups (and their force signals) subscribe to the same source.
 * `emit` reports how many listeners were reached, or why delivery failed.
 */
export interface TerminationSignals {
  onTermination(listener: (event: TerminationEvent) => void): Unsubscribe;
  emit(event: TerminationEvent): Result<number, TerminationDeliveryError>;
}
