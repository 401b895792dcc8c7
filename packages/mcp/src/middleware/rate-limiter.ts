/**
 * Rate Limiter Middleware — token bucket per-tool rate limiting.
 */

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterMs?: number;
}

export interface RateLimiterMiddleware {
  check(toolName: string): RateLimitDecision;
  reset(toolName: string): void;
}

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

/**
 * Each tool gets a bucket of `maxPerSecond` tokens refilled continuously.
 * `now` is injectable so tests can move time.
 */
export function createRateLimiter(maxPerSecond: number, now: () => number = Date.now): RateLimiterMiddleware {
  const buckets = new Map<string, TokenBucket>();

  function getBucket(toolName: string): TokenBucket {
    const at = now();
    let bucket = buckets.get(toolName);
    if (!bucket) {
      bucket = { tokens: maxPerSecond, lastRefill: at };
      buckets.set(toolName, bucket);
      return bucket;
    }

    const refill = ((at - bucket.lastRefill) / 1000) * maxPerSecond;
    bucket.tokens = Math.min(maxPerSecond, bucket.tokens + refill);
    bucket.lastRefill = at;
    return bucket;
  }

  return {
    check(toolName) {
      const bucket = getBucket(toolName);
      if (bucket.tokens >= 1) {
        bucket.tokens -= 1;
        return { allowed: true };
      }
      return { allowed: false, retryAfterMs: Math.ceil(((1 - bucket.tokens) / maxPerSecond) * 1000) };
    },

    reset(toolName) {
      buckets.delete(toolName);
    },
  };
}
