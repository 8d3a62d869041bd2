/**
 * Lightweight in-memory fixed-window request throttle. Each key gets
 * `maxRequests` slots per window; the window restarts on the first request
 * after it expires.
 *
 * Usage:
 *   const limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 45 });
 *   const { allowed, retryAfterMs } = limiter.check("ip-api");
 *   await limiter.acquire("ip-api"); // waits for the next free slot instead
 *
 * Process-local and owned by whoever created it; call destroy() when done.
 */

export interface RateLimitConfig {
  /** Window duration in milliseconds */
  windowMs: number;
  /** Maximum requests allowed per window */
  maxRequests: number;
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;

export function createRateLimiter(config: RateLimitConfig) {
  const store = new Map<string, RateLimitEntry>();

  // Purge expired windows so idle keys do not accumulate
  const cleanup = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) store.delete(key);
    }
  }, config.windowMs * 2);

  // Don't keep the process alive just for cleanup
  if (cleanup.unref) cleanup.unref();

  function check(key: string): RateLimitResult {
    const now = Date.now();
    const entry = store.get(key);

    // New window or expired window → allow and start fresh
    if (!entry || entry.resetAt <= now) {
      store.set(key, { count: 1, resetAt: now + config.windowMs });
      return { allowed: true, remaining: config.maxRequests - 1, retryAfterMs: 0 };
    }

    if (entry.count < config.maxRequests) {
      entry.count++;
      return { allowed: true, remaining: config.maxRequests - entry.count, retryAfterMs: 0 };
    }

    return { allowed: false, remaining: 0, retryAfterMs: entry.resetAt - now };
  }

  return {
    check,

    /** Resolve once a slot is available for `key`, consuming it. */
    async acquire(key: string): Promise<void> {
      for (;;) {
        const result = check(key);
        if (result.allowed) return;
        await new Promise((resolve) => setTimeout(resolve, result.retryAfterMs));
      }
    },

    /** Tear down the cleanup interval */
    destroy() {
      clearInterval(cleanup);
      store.clear();
    },
  };
}
