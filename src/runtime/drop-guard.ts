import pino from 'pino';
import type { Logger } from '../core/logging/index.js';

/**
 * Why a cleanup runs: a normal teardown, or teardown on the way out of
 * another failure (`error`), which must not be replaced by a cleanup error.
 */
export type DisposeContext =
  | { readonly kind: 'normal' }
  | { readonly kind: 'unwinding'; readonly error: unknown };

export interface DropGuardOptions {
  readonly context: DisposeContext;
  readonly logger: Logger;
}

/**
 * Runs a teardown callback that may itself fail.
 *
 * Normal context: the cleanup's own failure propagates unchanged.
 * Unwinding context: a cleanup failure is logged together with the original
 * failure and a stack captured at the guard, then the ORIGINAL error is
 * rethrown so the caller still sees what started the unwinding.
 */
export async function dropGuard<R>(cleanup: () => Promise<R>, options: DropGuardOptions): Promise<R> {
  const { context, logger } = options;

  try {
    return await cleanup();
  } catch (failure) {
    if (context.kind === 'normal') {
      throw failure;
    }

    logger.error(
      {
        err: failure,
        original: serializeCause(context.error),
        guardStack: new Error('dropGuard').stack,
      },
      'Cleanup failed while unwinding from another failure'
    );
    throw context.error;
  }
}

function serializeCause(cause: unknown): unknown {
  return cause instanceof Error ? pino.stdSerializers.err(cause) : cause;
}
