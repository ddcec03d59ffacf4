import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TokenBucketLimiter } from "../lib/llm/rate-limiter";

describe("TokenBucketLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function acquireMany(limiter: TokenBucketLimiter, count: number, released: number[]): void {
    for (let i = 0; i < count; i++) {
      void limiter.acquire().then(() => released.push(i));
    }
  }

  it("releases a full bucket immediately and paces the rest", async () => {
    const limiter = new TokenBucketLimiter({ rate: 1, intervalMs: 1000, capacity: 2 });
    const released: number[] = [];

    acquireMany(limiter, 4, released);
    await vi.advanceTimersByTimeAsync(0);
    expect(released).toEqual([0, 1]);

    await vi.advanceTimersByTimeAsync(999);
    expect(released).toEqual([0, 1]);

    await vi.advanceTimersByTimeAsync(1);
    expect(released).toEqual([0, 1, 2]);

    await vi.advanceTimersByTimeAsync(1000);
    expect(released).toEqual([0, 1, 2, 3]);
  });

  it("never banks more than its capacity while idle", async () => {
    const limiter = new TokenBucketLimiter({ rate: 1, intervalMs: 1000, capacity: 2 });
    await vi.advanceTimersByTimeAsync(10_000);

    const released: number[] = [];
    acquireMany(limiter, 3, released);
    await vi.advanceTimersByTimeAsync(0);

    expect(released).toEqual([0, 1]);
  });

  it("rejects nonsensical settings", () => {
    expect(() => new TokenBucketLimiter({ rate: 0, intervalMs: 1000, capacity: 1 })).toThrow(
      "Invalid limiter rate"
    );
    expect(() => new TokenBucketLimiter({ rate: 1, intervalMs: 1000, capacity: 0 })).toThrow(
      "Invalid limiter capacity"
    );
  });
});
