/**
 * Port for registering process signal handlers.
 * Keeps `process.on` out of the shutdown coordinator so tests can deliver signals by hand.
 */
export type ProcessSignal = NodeJS.Signals;

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void;
}
