/**
 * Read the `code` property Node attaches to system errors.
 *
 * Node's system errors carry `code` at runtime but not in their declared type.
 */
export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
