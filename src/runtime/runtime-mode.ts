/**
 * How the process was started. Injected, not sniffed from env vars inside services.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'library' }
  | { kind: 'test' };
