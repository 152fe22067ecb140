export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sliding-window limiter. `acquire()` resolves once a slot is free; callers are
 * served in arrival order and never rejected.
 */
export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (options.maxRequests < 1 || options.windowMs <= 0) {
      throw new Error("RateLimiter requires maxRequests >= 1 and a positive window");
    }

    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    this.tail = turn;
    return turn;
  }

  inFlightWindow(): number {
    this.evict(this.now());
    return this.timestamps.length;
  }

  private evict(at: number): void {
    while (this.timestamps.length > 0 && this.timestamps[0] <= at - this.windowMs) {
      this.timestamps.shift();
    }
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const at = this.now();
      this.evict(at);

      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(at);
        return;
      }

      const waitMs = this.timestamps[0] + this.windowMs - at;
      await this.sleep(Math.max(1, waitMs));
    }
  }
}
