import type { TerminationSignals, Unsubscribe } from '../runtime/ports/termination-signals.js';

/**
 * What a service sees of the force signal.
 *
 * Every service gets its own handle; all handles of one signal observe the
 * same single firing.
 */
export interface ForceHandle {
  readonly isFired: boolean;
  /** Resolves once the signal fires. Never rejects. */
  wait(): Promise<void>;
}

export type ForceSignalState = 'pending' | 'fired';

const noop = (): void => {};

/**
 * Broadcast-once "stop now" notification shared by every service of a shutdown.
 *
 * The underlying producer (a promise, a termination source) is consumed at
 * most once regardless of how many handles wait on it. A handle created or
 * awaited after the firing resolves immediately.
 */
export class SharedForceSignal {
  private state: ForceSignalState = 'pending';
  private readonly firing: Promise<void>;
  private readonly release: () => void;
  private detach: Unsubscribe = noop;

  private constructor() {
    let release: () => void = noop;
    this.firing = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.release = release;
  }

  /** A signal fired manually with `fire()`. */
  static pending(): SharedForceSignal {
    return new SharedForceSignal();
  }

  /** An already-fired signal: every service takes its fast path. */
  static fired(): SharedForceSignal {
    const signal = new SharedForceSignal();
    signal.fire();
    return signal;
  }

  /**
   * Fires when `source` settles. A rejected source fires too: once the
   * producer is gone nothing can ask for a gentler stop.
   */
  static from(source: PromiseLike<unknown>): SharedForceSignal {
    const signal = new SharedForceSignal();
    const fire = (): void => {
      signal.fire();
    };
    void Promise.resolve(source).then(fire, fire);
    return signal;
  }

  /**
   * Fires on the next termination event delivered after this call.
   *
   * Subscribes synchronously, so a signal created while the first event is
   * being delivered waits for the second one.
   */
  static fromNextTermination(source: TerminationSignals): SharedForceSignal {
    const signal = new SharedForceSignal();
    signal.detach = source.onTermination(() => {
      signal.fire();
    });
    return signal;
  }

  get isFired(): boolean {
    return this.state === 'fired';
  }

  /**
   * Moves the signal to `fired`. Returns false when it had already fired.
   */
  fire(): boolean {
    if (this.state === 'fired') {
      return false;
    }
    this.state = 'fired';
    this.dropSubscription();
    this.release();
    return true;
  }

  /**
   * Drops the termination subscription without firing.
   * Call once the shutdown this signal belongs to has completed.
   */
  dispose(): void {
    this.dropSubscription();
  }

  wait(): Promise<void> {
    return this.firing;
  }

  handle(): ForceHandle {
    return new SignalHandle(this);
  }

  private dropSubscription(): void {
    const detach = this.detach;
    this.detach = noop;
    detach();
  }
}

class SignalHandle implements ForceHandle {
  constructor(private readonly signal: SharedForceSignal) {}

  get isFired(): boolean {
    return this.signal.isFired;
  }

  wait(): Promise<void> {
    return this.signal.wait();
  }
}
