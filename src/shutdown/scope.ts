import type { DescribableError } from './graceful.js';
import { ShutdownGroup, type ShutdownGroupOptions } from './shutdown-group.js';

/**
 * Runs `body` with a fresh group and always disposes the group before
 * returning or rethrowing.
 *
 * When `body` fails, the group is disposed in the `unwinding` context, so a
 * failing teardown is logged and the body's error is the one that propagates.
 */
export async function withShutdownGroup<E extends DescribableError, T>(
  body: (group: ShutdownGroup<E>) => Promise<T>,
  options: ShutdownGroupOptions = {}
): Promise<T> {
  const group = new ShutdownGroup<E>(options);

  let value: T;
  try {
    value = await body(group);
  } catch (error) {
    await group.dispose({ kind: 'unwinding', error });
    throw error;
  }

  await group.dispose();
  return value;
}
