import type { RateLimiter, RateLimiterConfig } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface Spend {
  at: number;
  cost: number;
}

/**
 * Sliding-window limiter over two budgets: request count and quota units
 * (Gmail bills calls in units, Sheets by request). Either budget may be left
 * unbounded.
 *
 * Concurrent callers each re-check every budget after waking and only
 * record their call in the same tick as a passing check, so a window is
 * never overspent.
 */
export class QuotaRateLimiter implements RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minDelayMs: number;
  private readonly maxUnits: number;
  private readonly unitsWindowMs: number;

  private requests: number[] = [];
  private spends: Spend[] = [];
  private lastCallAt = Number.NEGATIVE_INFINITY;

  constructor(config: RateLimiterConfig = {}) {
    this.maxRequests = config.maxRequests ?? Infinity;
    this.windowMs = config.windowMs ?? 60_000;
    this.minDelayMs = config.minDelayMs ?? 0;
    this.maxUnits = config.maxUnitsPerWindow ?? Infinity;
    this.unitsWindowMs = config.unitsWindowMs ?? config.windowMs ?? 60_000;
  }

  async acquire(cost = 1): Promise<void> {
    for (;;) {
      const now = Date.now();
      const waitMs = this.waitFor(now, cost);
      if (waitMs <= 0) {
        this.requests.push(now);
        if (cost > 0) this.spends.push({ at: now, cost });
        this.lastCallAt = now;
        return;
      }
      await sleep(waitMs);
    }
  }

  /** Milliseconds until a call of `cost` fits every budget; 0 when it fits now. */
  private waitFor(now: number, cost: number): number {
    this.requests = this.requests.filter((at) => now - at < this.windowMs);
    this.spends = this.spends.filter((s) => now - s.at < this.unitsWindowMs);

    let waitMs = this.lastCallAt + this.minDelayMs - now;

    if (this.requests.length >= this.maxRequests) {
      const freedAt = this.requests[this.requests.length - this.maxRequests];
      if (freedAt !== undefined) {
        waitMs = Math.max(waitMs, freedAt + this.windowMs - now);
      }
    }

    let used = this.spends.reduce((sum, s) => sum + s.cost, 0);
    for (const spend of this.spends) {
      if (used + cost <= this.maxUnits) break;
      used -= spend.cost;
      waitMs = Math.max(waitMs, spend.at + this.unitsWindowMs - now);
    }

    return waitMs;
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new QuotaRateLimiter(config);
}
