/**
 * Exhaustiveness guard for `switch` over a discriminated union.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(x)}`);
}
