export interface RateLimiter {
  acquire(): Promise<void>;
}

export interface TokenBucketOptions {
  /** Permits added per interval */
  rate: number;
  intervalMs: number;
  /** Burst size; the bucket starts full */
  capacity: number;
}

/**
 * Token bucket shared by every task of a run. Permits refill continuously at
 * rate/intervalMs and waiters are released in arrival order, so a task that
 * started waiting first is never overtaken. Nothing is ever rejected.
 */
export class TokenBucketLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly msPerToken: number;
  private readonly capacity: number;
  private readonly waiters: Array<() => void> = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    options: TokenBucketOptions,
    private readonly now: () => number = () => Date.now()
  ) {
    if (!(options.rate > 0) || !(options.intervalMs > 0)) {
      throw new Error(`Invalid limiter rate ${options.rate}/${options.intervalMs}ms`);
    }
    if (!(options.capacity >= 1)) {
      throw new Error(`Invalid limiter capacity ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.msPerToken = options.intervalMs / options.rate;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
  }

  acquire(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
      this.drain();
    });
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed / this.msPerToken);
    this.lastRefill = now;
  }

  private drain(): void {
    this.refill();

    while (this.waiters.length > 0 && this.tokens >= 1) {
      this.tokens -= 1;
      const release = this.waiters.shift();
      release?.();
    }

    if (this.waiters.length > 0 && this.timer === null) {
      const waitMs = Math.max(1, Math.ceil((1 - this.tokens) * this.msPerToken));
      this.timer = setTimeout(() => {
        this.timer = null;
        this.drain();
      }, waitMs);
    }
  }
}
