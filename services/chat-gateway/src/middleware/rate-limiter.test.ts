import { describe, it, expect } from 'vitest';
import { RateLimiter, RateLimitPresets } from './rate-limiter.js';

const WINDOW = 60_000;

function fill(limiter: RateLimiter, key: string, count: number, now: number): void {
  for (let i = 0; i < count; i++) {
    expect(limiter.allow(key, now)).toBe(true);
  }
}

describe('RateLimiter', () => {
  it('admits 30 requests in a window and denies the 31st', () => {
    const limiter = RateLimitPresets.chatSession();
    fill(limiter, 's1', 30, 1_000);

    expect(limiter.allow('s1', 1_500)).toBe(false);
  });

  it('does not record denied requests', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 2 });
    fill(limiter, 's1', 2, 1_000);

    limiter.allow('s1', 2_000);
    limiter.allow('s1', 3_000);

    expect(limiter.getTimestamps('s1')).toEqual([1_000, 1_000]);
  });

  it('admits again once old timestamps leave the window', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 2 });
    limiter.allow('s1', 0);
    limiter.allow('s1', 10_000);

    expect(limiter.allow('s1', WINDOW)).toBe(false);
    expect(limiter.allow('s1', WINDOW + 1)).toBe(true);
    expect(limiter.getTimestamps('s1')).toEqual([10_000, WINDOW + 1]);
  });

  it('never holds more than the limit inside any rolling window', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 30 });
    const accepted: number[] = [];

    for (let t = 0; t < 5 * WINDOW; t += 500) {
      if (limiter.allow('s1', t)) {
        accepted.push(t);
      }
    }

    for (const start of accepted) {
      const inWindow = accepted.filter((t) => t >= start && t - start <= WINDOW);
      expect(inWindow.length).toBeLessThanOrEqual(30);
    }
  });

  it('tracks keys independently', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 1 });

    expect(limiter.allow('a', 0)).toBe(true);
    expect(limiter.allow('b', 0)).toBe(true);
    expect(limiter.allow('a', 1)).toBe(false);
  });

  it('reports remaining slots and a retry delay', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 2 });

    expect(limiter.check('s1', 1_000)).toEqual({ allowed: true, limit: 2, remaining: 1, reset: 61_000 });
    limiter.check('s1', 2_000);

    expect(limiter.check('s1', 31_000)).toEqual({
      allowed: false,
      limit: 2,
      remaining: 0,
      reset: 61_000,
      retryAfter: 30,
    });
  });

  it('drops emptied windows on sweep and keeps live ones', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 5 });
    limiter.allow('old', 0);
    limiter.allow('recent', 50_000);

    const removed = limiter.sweep(WINDOW + 1);

    expect(removed).toBe(1);
    expect(limiter.size()).toBe(1);
    expect(limiter.getTimestamps('recent')).toEqual([50_000]);
  });

  it('forgets a key on remove', () => {
    const limiter = new RateLimiter({ windowMs: WINDOW, maxRequests: 1 });
    limiter.allow('s1', 0);

    expect(limiter.remove('s1')).toBe(true);
    expect(limiter.remove('s1')).toBe(false);
    expect(limiter.allow('s1', 1)).toBe(true);
  });
});
