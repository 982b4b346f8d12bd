import { sleep } from "./env.js";
import type { Clock } from "./types.js";

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Sliding-log limiter: at most `maxRequests` acquisitions in any `windowMs`
 * interval. Shared by every worker of a run; waiters are served in call order.
 */
export class RateLimiter {
  private readonly dispatched: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly maxRequests: number,
    readonly windowMs: number = 60_000,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(maxRequests) || maxRequests < 1) {
      throw new Error(`RateLimiter: maxRequests must be a positive integer, got ${maxRequests}`);
    }
    if (!(windowMs > 0)) {
      throw new Error(`RateLimiter: windowMs must be positive, got ${windowMs}`);
    }
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    this.tail = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      while (this.dispatched.length > 0 && now - (this.dispatched[0] ?? now) >= this.windowMs) {
        this.dispatched.shift();
      }
      const oldest = this.dispatched[0];
      if (oldest === undefined || this.dispatched.length < this.maxRequests) {
        this.dispatched.push(now);
        return;
      }
      await this.clock.sleep(oldest + this.windowMs - now);
    }
  }
}
