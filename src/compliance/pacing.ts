import { setTimeout as sleep } from 'node:timers/promises';
import { logger } from '../utils/logger.js';

/**
 * Delay taken before every simulated user action (navigation, click, scroll).
 * The target site fingerprints behaviour rather than request rate, so waits
 * happen in-page too, not only between page loads.
 */
export interface PacingStrategy {
  wait(): Promise<void>;
}

/** Waits a whole number of milliseconds drawn uniformly from `[minMs, maxMs]`. */
export class UniformPacing implements PacingStrategy {
  constructor(
    private readonly minMs: number,
    private readonly maxMs: number,
    private readonly random: () => number = Math.random,
  ) {
    if (minMs < 0 || maxMs < minMs) {
      throw new RangeError(`Invalid pacing range ${minMs}..${maxMs}`);
    }
  }

  nextDelayMs(): number {
    return this.minMs + Math.floor(this.random() * (this.maxMs - this.minMs + 1));
  }

  async wait(): Promise<void> {
    const delayMs = this.nextDelayMs();
    logger.debug({ delayMs }, 'Pacing');
    await sleep(delayMs);
  }
}

export class NoPacing implements PacingStrategy {
  async wait(): Promise<void> {}
}
