import { ResultAsync } from 'neverthrow';
import type { ForceHandle } from '../shutdown/force-signal.js';
import type { Graceful } from '../shutdown/graceful.js';

/**
 * The part of `http.Server` (and `https.Server`) this adapter drives.
 */
export interface ClosableServer {
  close(callback: (error?: Error) => void): unknown;
  closeIdleConnections(): void;
  closeAllConnections(): void;
}

export type HttpServerCloseFailedError = Readonly<{
  readonly _tag: 'HttpServerCloseFailed';
  readonly message: string;
  readonly cause: unknown;
}>;

/**
 * Graceful shutdown for an HTTP server.
 *
 * Graceful phase: stop accepting connections, drop idle keep-alive sockets and
 * let in-flight requests finish. Force: destroy every remaining connection,
 * which lets `close` complete.
 */
export class HttpServerGraceful implements Graceful<HttpServerCloseFailedError> {
  constructor(
    private readonly server: ClosableServer,
    readonly name: string = 'http-server'
  ) {}

  shutdown(force: ForceHandle | undefined): ResultAsync<void, HttpServerCloseFailedError> {
    const closed = new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server.closeIdleConnections();

    if (force) {
      void force.wait().then(() => {
        this.server.closeAllConnections();
      });
    }

    return ResultAsync.fromPromise(closed, (cause): HttpServerCloseFailedError => ({
      _tag: 'HttpServerCloseFailed',
      message: `${this.name} failed to close: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    }));
  }
}
