/**
 * Request Rate Limiter
 *
 * Spaces outbound requests at least `intervalMs` apart across every caller
 * sharing the instance. Each `acquire()` reserves the next free slot at call
 * time, so concurrent callers are released in arrival order.
 */

/**
 * Time source used by the limiter and the retry policy
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RateLimiter {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private nextSlot: number = 0;

  constructor(intervalMs: number, clock: Clock = systemClock) {
    this.intervalMs = Math.max(0, intervalMs);
    this.clock = clock;
  }

  /**
   * Wait until the caller's request slot is due
   */
  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    const waitTime = slot - now;
    if (waitTime > 0) {
      await this.clock.sleep(waitTime);
    }
  }
}
