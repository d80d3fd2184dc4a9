interface Bucket {
  tokens: number;
  lastRefillMs: number;
}

/** Fixed-window token bucket keyed by caller; refills fully once per window. */
export class TokenBucketRateLimiter {
  private readonly buckets = new Map<string, Bucket>();

  constructor(
    private readonly maxTokens: number,
    private readonly refillWindowMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  allow(key: string): boolean {
    const now = this.now();
    const existing = this.buckets.get(key) ?? {
      tokens: this.maxTokens,
      lastRefillMs: now,
    };

    const elapsed = now - existing.lastRefillMs;
    const refillCount = Math.floor(elapsed / this.refillWindowMs);
    const updated: Bucket = {
      tokens:
        refillCount > 0
          ? Math.min(this.maxTokens, existing.tokens + refillCount * this.maxTokens)
          : existing.tokens,
      lastRefillMs: refillCount > 0 ? now : existing.lastRefillMs,
    };

    if (updated.tokens <= 0) {
      this.buckets.set(key, updated);
      return false;
    }

    this.buckets.set(key, { ...updated, tokens: updated.tokens - 1 });
    return true;
  }

  /** Seconds until the caller's bucket refills. */
  retryAfterSeconds(key: string): number {
    const bucket = this.buckets.get(key);
    if (bucket === undefined) {
      return 0;
    }

    const remainingMs = bucket.lastRefillMs + this.refillWindowMs - this.now();
    return Math.max(0, Math.ceil(remainingMs / 1000));
  }
}
