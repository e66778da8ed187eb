import { err, ok, type Result } from 'neverthrow';
import type {
  TerminationDeliveryError,
  TerminationEvent,
  TerminationSignals,
  Unsubscribe,
} from '../ports/termination-signals.js';

/**
 * In-memory TerminationSignals implementation.
 * Safe for tests and single-process usage.
 *
 * Delivery iterates over a snapshot of the listeners, so a listener that
 * subscribes while an event is being delivered only sees the next event.
 * The two-phase shutdown depends on this: the force subscription is created
 * inside the delivery of the first signal and must wait for the second.
 */
export class InMemoryTerminationSignals implements TerminationSignals {
  private readonly listeners = new Set<(event: TerminationEvent) => void>();

  get listenerCount(): number {
    return this.listeners.size;
  }

  onTermination(listener: (event: TerminationEvent) => void): Unsubscribe {
    // Wrap so the same function can subscribe twice and unsubscribe independently.
    const entry = (event: TerminationEvent): void => listener(event);
    this.listeners.add(entry);
    return () => {
      this.listeners.delete(entry);
    };
  }

  emit(event: TerminationEvent): Result<number, TerminationDeliveryError> {
    const snapshot = [...this.listeners];
    if (snapshot.length === 0) {
      return err({
        _tag: 'NoListeners',
        signal: event.signal,
        message: `No listener for ${event.signal}`,
      });
    }

    const failures: unknown[] = [];
    for (const listener of snapshot) {
      try {
        listener(event);
      } catch (error) {
        failures.push(error);
      }
    }

    if (failures.length > 0) {
      return err({
        _tag: 'ListenerFailed',
        signal: event.signal,
        failures,
        message: `${failures.length} of ${snapshot.length} listener(s) failed on ${event.signal}`,
      });
    }

    return ok(snapshot.length);
  }
}
