import { sleep } from "./timeout.js";

/**
 * Minimum-interval rate limiter shared by concurrent callers.
 * Each `acquire()` reserves the next free slot, so N callers are spaced
 * `intervalMs` apart no matter how many file pipelines run at once.
 */
export class RateLimiter {
  private nextSlot = 0;

  constructor(private readonly intervalMs: number) {}

  async acquire(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    if (slot > now) {
      await sleep(slot - now);
    }
  }
}
