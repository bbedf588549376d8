/**
 * Time and process info port.
 *
 * Purpose:
 * - Stopwatch readings for transfer timing
 * - Process ID for the default working-directory name
 *
 * Injectable so tests can pin both.
 */
export interface TimeClockPort {
  /** Current time in milliseconds since the Unix epoch. */
  nowMs(): number;

  getPid(): number;
}
