import type { RateLimiter, RateLimiterConfig } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Quota-unit limiter. Gmail bills each call in "units" against a per-user
 * per-minute budget, so callers pass the cost of the call they are about to
 * make.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly minDelayMs: number;
  private readonly maxUnits: number;
  private readonly unitsWindowMs: number;

  private unitTimestamps: { ts: number; cost: number }[] = [];
  private backoffUntil = 0;
  private lastCallAt = 0;

  constructor(config: RateLimiterConfig = {}) {
    this.minDelayMs = config.minDelayMs ?? 0;
    this.maxUnits = config.maxUnitsPerWindow ?? Infinity;
    this.unitsWindowMs = config.unitsWindowMs ?? 60_000;
  }

  async acquire(cost = 1): Promise<void> {
    // Wait for backoff (429 response)
    const now = Date.now();
    if (this.backoffUntil > now) {
      await sleep(this.backoffUntil - now);
    }

    // Enforce min delay between calls
    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed);
      }
    }

    // Enforce unit budget
    if (this.maxUnits < Infinity && cost > 0) {
      this.pruneUnits();
      while (
        this.unitTimestamps.length > 0 &&
        this.usedUnits() + cost > this.maxUnits
      ) {
        const oldest = this.unitTimestamps[0];
        await sleep(this.unitsWindowMs - (Date.now() - oldest.ts) + 50);
        this.pruneUnits();
      }
      this.unitTimestamps.push({ ts: Date.now(), cost });
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  private pruneUnits(): void {
    this.unitTimestamps = this.unitTimestamps.filter(
      (u) => Date.now() - u.ts < this.unitsWindowMs,
    );
  }

  private usedUnits(): number {
    return this.unitTimestamps.reduce((sum, u) => sum + u.cost, 0);
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new TokenBucketRateLimiter(config);
}
