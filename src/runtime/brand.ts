/**
 * A branded type proves parsing happened at a boundary.
 *
 * String-keyed marker rather than a `unique symbol`, so types derived from
 * exported zod schemas stay nameable. Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
