/**
 * Port: wait before the next retry attempt.
 *
 * The caller awaits the returned promise, so the job does nothing else while
 * it waits.
 */
export interface DelayPort {
  wait(ms: number): Promise<void>;
}
