import { describe, expect, it } from "vitest";
import { TokenBucketRateLimiter } from "../../src/core/rate-limiter.js";

describe("TokenBucketRateLimiter", () => {
  it("acquires immediately when under the unit budget", async () => {
    const limiter = new TokenBucketRateLimiter({
      maxUnitsPerWindow: 100,
      unitsWindowMs: 1000,
    });
    const start = Date.now();
    await limiter.acquire(5);
    const elapsed = Date.now() - start;
    expect(elapsed).toBeLessThan(50);
  });

  it("respects min delay between calls", async () => {
    const limiter = new TokenBucketRateLimiter({ minDelayMs: 50 });
    await limiter.acquire();
    const start = Date.now();
    await limiter.acquire();
    const elapsed = Date.now() - start;
    expect(elapsed).toBeGreaterThanOrEqual(45); // allow small margin
  });

  it("waits for the window when a call would exceed the budget", async () => {
    const limiter = new TokenBucketRateLimiter({
      maxUnitsPerWindow: 10,
      unitsWindowMs: 100,
    });
    await limiter.acquire(6);
    const start = Date.now();
    await limiter.acquire(6);
    const elapsed = Date.now() - start;
    expect(elapsed).toBeGreaterThanOrEqual(90);
  });

  it("backoff pauses subsequent calls", async () => {
    const limiter = new TokenBucketRateLimiter();
    limiter.backoff(100);
    const start = Date.now();
    await limiter.acquire();
    const elapsed = Date.now() - start;
    expect(elapsed).toBeGreaterThanOrEqual(90);
  });
});
