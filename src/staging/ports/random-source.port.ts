/**
 * Random source for retry jitter.
 *
 * Not security-relevant; spreads retries from many jobs hitting the same
 * storage server.
 */
export interface RandomSourcePort {
  /** Uniform integer in [min, max], both ends included. */
  intInclusive(min: number, max: number): number;
}
