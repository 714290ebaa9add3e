export interface RateLimiterOptions {
  intervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Leaky bucket with a capacity of one: grants at most one slot per interval.
 * The first acquire is immediate; each later one waits until a full interval
 * has passed since the previous grant, including callers that arrive together.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private nextSlotAt: number | null = null;

  constructor({ intervalMs, now = Date.now, sleep: sleepFn = sleep }: RateLimiterOptions) {
    this.intervalMs = intervalMs;
    this.now = now;
    this.sleep = sleepFn;
  }

  async acquire(): Promise<void> {
    // Claim the slot before sleeping.
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt ?? now);
    this.nextSlotAt = slot + this.intervalMs;
    if (slot > now) {
      await this.sleep(slot - now);
    }
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    return task();
  }
}
