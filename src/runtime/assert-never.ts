/**
 * Exhaustiveness helper for discriminated unions.
 * The `never` parameter turns a missing `case` into a compile error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
