import { sleep } from '../utils/sleep.js';
import type { DownloadDelayConfig } from './types.js';

const DEFAULT_FACTORS: readonly [number, number] = [0.5, 1.5];

/**
 * Pause taken by a worker right before each physical fetch. Workers wait
 * independently: the delay throttles each worker's own cadence and never
 * serializes fetches across workers.
 */
export class RateLimiter {
  private readonly baseDelayMs: number;
  private readonly factors: readonly [number, number] | undefined;
  private readonly random: () => number;

  constructor(config: DownloadDelayConfig, random: () => number = Math.random) {
    this.baseDelayMs = config.downloadDelayMs;
    this.random = random;

    if (config.randomDownloadDelay === true) {
      this.factors = DEFAULT_FACTORS;
    } else if (config.randomDownloadDelay === false) {
      this.factors = undefined;
    } else {
      const [first, second] = config.randomDownloadDelay;
      this.factors = first <= second ? [first, second] : [second, first];
    }
  }

  nextDelay(): number {
    if (this.baseDelayMs <= 0) {
      return 0;
    }

    if (!this.factors) {
      return this.baseDelayMs;
    }

    const [low, high] = this.factors;
    return this.baseDelayMs * (low + (high - low) * this.random());
  }

  async wait(signal?: AbortSignal): Promise<number> {
    const delayMs = this.nextDelay();
    await sleep(delayMs, signal);
    return delayMs;
  }
}
