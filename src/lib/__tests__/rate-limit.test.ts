import { describe, it, expect, afterEach, vi } from "vitest";
import { createRateLimiter } from "../rate-limit";

describe("createRateLimiter", () => {
  let limiter: ReturnType<typeof createRateLimiter>;

  afterEach(() => {
    limiter?.destroy();
    vi.useRealTimers();
  });

  it("allows requests within limit", () => {
    limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 3 });

    expect(limiter.check("ip-api").allowed).toBe(true);
    expect(limiter.check("ip-api").allowed).toBe(true);
    expect(limiter.check("ip-api").allowed).toBe(true);
  });

  it("blocks requests exceeding limit", () => {
    limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 2 });

    limiter.check("ip-api");
    limiter.check("ip-api");
    const result = limiter.check("ip-api");

    expect(result.allowed).toBe(false);
    expect(result.retryAfterMs).toBeGreaterThan(0);
    expect(result.remaining).toBe(0);
  });

  it("tracks different endpoints independently", () => {
    limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 1 });

    expect(limiter.check("http://a.test").allowed).toBe(true);
    expect(limiter.check("http://b.test").allowed).toBe(true);
    expect(limiter.check("http://a.test").allowed).toBe(false);
    expect(limiter.check("http://b.test").allowed).toBe(false);
  });

  it("returns correct remaining count", () => {
    limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 3 });

    expect(limiter.check("ip-api").remaining).toBe(2);
    expect(limiter.check("ip-api").remaining).toBe(1);
    expect(limiter.check("ip-api").remaining).toBe(0);
  });

  it("resets after window expires", async () => {
    limiter = createRateLimiter({ windowMs: 50, maxRequests: 1 });

    expect(limiter.check("ip-api").allowed).toBe(true);
    expect(limiter.check("ip-api").allowed).toBe(false);

    await new Promise((r) => setTimeout(r, 60));

    expect(limiter.check("ip-api").allowed).toBe(true);
  });

  it("frees every slot at once when the window ends", () => {
    vi.useFakeTimers();
    limiter = createRateLimiter({ windowMs: 1_000, maxRequests: 2 });

    expect(limiter.check("ip-api").allowed).toBe(true);
    vi.advanceTimersByTime(900);
    expect(limiter.check("ip-api").allowed).toBe(true);
    expect(limiter.check("ip-api").retryAfterMs).toBe(100);

    vi.advanceTimersByTime(100);
    expect(limiter.check("ip-api")).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
    expect(limiter.check("ip-api").allowed).toBe(true);
  });

  it("acquire resolves immediately while slots remain", async () => {
    limiter = createRateLimiter({ windowMs: 60_000, maxRequests: 2 });

    await limiter.acquire("ip-api");
    await limiter.acquire("ip-api");

    expect(limiter.check("ip-api").allowed).toBe(false);
  });

  it("acquire waits for the next window when exhausted", async () => {
    vi.useFakeTimers();
    limiter = createRateLimiter({ windowMs: 1_000, maxRequests: 1 });

    await limiter.acquire("ip-api");

    let acquired = false;
    const pending = limiter.acquire("ip-api").then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(acquired).toBe(true);
  });
});
