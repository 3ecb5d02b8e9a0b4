/**
 * Fixed-interval rate gate
 * Shared by all workers calling the same upstream API
 */

import { sleep, type SleepFn } from './retry.js';

export interface RateGateOptions {
  requestsPerMinute: number;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Spaces acquisitions at least `60000 / requestsPerMinute` ms apart.
 * Slots are reserved synchronously, so callers are served in call order.
 */
export class RateGate {
  readonly intervalMs: number;
  private nextSlot = 0;
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;

  constructor(options: RateGateOptions) {
    if (!(options.requestsPerMinute > 0)) {
      throw new RangeError('requestsPerMinute must be positive');
    }
    this.intervalMs = 60000 / options.requestsPerMinute;
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleep ?? sleep;
  }

  /**
   * Wait for the next free slot
   * @returns milliseconds waited
   */
  async acquire(): Promise<number> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    const wait = slot - now;
    if (wait > 0) {
      await this.sleepFn(wait);
    }
    return wait;
  }
}
