import { performance } from 'node:perf_hooks';

export interface Timed<T> {
  readonly outcome: PromiseSettledResult<T>;
  readonly elapsedMs: number;
}

/**
 * Starts `operation` and measures wall time until it settles.
 *
 * `operation` is called synchronously, before this function first yields.
 * A synchronous throw or a rejection is captured as a `rejected` outcome,
 * so the returned promise never rejects.
 */
export async function timed<T>(operation: () => PromiseLike<T>): Promise<Timed<T>> {
  const startedAt = performance.now();
  try {
    const value = await operation();
    return { outcome: { status: 'fulfilled', value }, elapsedMs: performance.now() - startedAt };
  } catch (reason) {
    return { outcome: { status: 'rejected', reason }, elapsedMs: performance.now() - startedAt };
  }
}
