import type { TimeClockPort } from '../../../ports/time-clock.port.js';

/**
 * Node time/process adapter using platform APIs.
 */
export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }

  getPid(): number {
    return process.pid;
  }
}
