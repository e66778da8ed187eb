/**
 * Brand helper for "parse, don't validate".
 *
 * A branded type proves that a value went through a parsing boundary
 * (for example the zod config schema). Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
