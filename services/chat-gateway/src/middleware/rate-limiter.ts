import type { Request, Response, NextFunction } from 'express';
import type { RateLimitInfo } from '../types/index.js';

export interface RateLimitConfig {
  windowMs: number; // Sliding window width in milliseconds
  maxRequests: number; // Maximum accepted requests inside any window
  keyGenerator?: (req: Request) => string;
  onLimitReached?: (req: Request, res: Response, next: NextFunction, info: RateLimitInfo) => void;
}

/**
 * Sliding-window request throttle.
 *
 * Each key owns the ascending list of timestamps it was admitted at. A check
 * first drops timestamps older than the window, then admits only while fewer
 * than `maxRequests` remain, recording the new timestamp. Denied requests are
 * not recorded.
 */
export class RateLimiter {
  private windows: Map<string, number[]> = new Map();
  private readonly config: Required<Pick<RateLimitConfig, 'windowMs' | 'maxRequests' | 'keyGenerator'>> &
    Pick<RateLimitConfig, 'onLimitReached'>;

  constructor(config: RateLimitConfig) {
    this.config = {
      keyGenerator: (req: Request) => req.ip || 'unknown',
      ...config,
    };
  }

  /**
   * Admit or deny one request for `key` at `now`
   */
  allow(key: string, now: number = Date.now()): boolean {
    return this.check(key, now).allowed;
  }

  /**
   * Admit or deny one request and report the window state
   */
  check(key: string, now: number = Date.now()): RateLimitInfo {
    let timestamps = this.windows.get(key);
    if (!timestamps) {
      timestamps = [];
      this.windows.set(key, timestamps);
    }

    this.prune(timestamps, now);

    if (timestamps.length >= this.config.maxRequests) {
      const reset = timestamps[0] + this.config.windowMs;
      return {
        allowed: false,
        limit: this.config.maxRequests,
        remaining: 0,
        reset,
        retryAfter: Math.max(1, Math.ceil((reset - now) / 1000)),
      };
    }

    timestamps.push(now);
    return {
      allowed: true,
      limit: this.config.maxRequests,
      remaining: this.config.maxRequests - timestamps.length,
      reset: timestamps[0] + this.config.windowMs,
    };
  }

  /**
   * Express middleware keyed by `keyGenerator`
   */
  middleware() {
    return (req: Request, res: Response, next: NextFunction): void => {
      const info = this.check(this.config.keyGenerator(req));
      applyRateLimitHeaders(res, info);

      if (!info.allowed) {
        if (this.config.onLimitReached) {
          this.config.onLimitReached(req, res, next, info);
        } else {
          res.status(429).json({
            error: 'Too Many Requests',
            message: 'Rate limit exceeded',
            retryAfter: info.retryAfter,
            timestamp: new Date().toISOString(),
          });
        }
        return;
      }

      next();
    };
  }

  /**
   * Accepted timestamps currently recorded for a key
   */
  getTimestamps(key: string): number[] {
    return [...(this.windows.get(key) ?? [])];
  }

  /**
   * Forget a key entirely
   */
  remove(key: string): boolean {
    return this.windows.delete(key);
  }

  /**
   * Prune every window and drop the ones left empty.
   * Returns how many keys were dropped.
   */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, timestamps] of this.windows) {
      this.prune(timestamps, now);
      if (timestamps.length === 0) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.windows.size;
  }

  private prune(timestamps: number[], now: number): void {
    let expired = 0;
    while (expired < timestamps.length && now - timestamps[expired] > this.config.windowMs) {
      expired++;
    }
    if (expired > 0) {
      timestamps.splice(0, expired);
    }
  }
}

export function applyRateLimitHeaders(res: Response, info: RateLimitInfo): void {
  res.set({
    'X-RateLimit-Limit': info.limit.toString(),
    'X-RateLimit-Remaining': info.remaining.toString(),
    'X-RateLimit-Reset': new Date(info.reset).toISOString(),
  });
  if (!info.allowed && info.retryAfter !== undefined) {
    res.set('Retry-After', info.retryAfter.toString());
  }
}

/**
 * Pre-configured rate limiters
 */
export class RateLimitPresets {
  /**
   * Per-session chat admission: 30 messages per rolling minute
   */
  static chatSession(windowMs: number = 60 * 1000, maxRequests: number = 30): RateLimiter {
    return new RateLimiter({ windowMs, maxRequests });
  }

  /**
   * Coarse per-client guard for the whole API
   */
  static perClient(
    maxRequests: number = 600,
    windowMs: number = 60 * 1000,
    onLimitReached?: RateLimitConfig['onLimitReached']
  ): RateLimiter {
    return new RateLimiter({
      windowMs,
      maxRequests,
      keyGenerator: (req: Request) => req.ip || 'unknown',
      onLimitReached,
    });
  }
}
