import { setTimeout as sleep } from 'timers/promises';
import type { DelayPort } from '../../../ports/delay.port.js';

export class NodeDelay implements DelayPort {
  async wait(ms: number): Promise<void> {
    if (ms <= 0) return;
    await sleep(ms);
  }
}
