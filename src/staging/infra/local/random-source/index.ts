import { randomInt } from 'crypto';
import type { RandomSourcePort } from '../../../ports/random-source.port.js';

export class NodeRandomSource implements RandomSourcePort {
  intInclusive(min: number, max: number): number {
    if (max <= min) return min;
    // randomInt's upper bound is exclusive
    return randomInt(min, max + 1);
  }
}
