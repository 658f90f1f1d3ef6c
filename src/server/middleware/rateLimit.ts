import { RequestHandler } from "express";
import { ErrorBody } from "./validation";

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  now?: () => number;
}

interface Window {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window request counter per client key. Memory is per process.
 */
export class FixedWindowRateLimiter {
  private store = new Map<string, Window>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimitOptions) {
    this.now = options.now ?? Date.now;
  }

  get limit(): number {
    return this.options.max;
  }

  check(key: string): { allowed: boolean; remaining: number; resetTime: number } {
    const now = this.now();
    const entry = this.store.get(key);

    if (!entry || now >= entry.resetTime) {
      const resetTime = now + this.options.windowMs;
      this.store.set(key, { count: 1, resetTime });
      return { allowed: true, remaining: this.options.max - 1, resetTime };
    }

    if (entry.count >= this.options.max) {
      return { allowed: false, remaining: 0, resetTime: entry.resetTime };
    }

    entry.count++;
    return { allowed: true, remaining: this.options.max - entry.count, resetTime: entry.resetTime };
  }

  /** Drops expired windows. */
  cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.store) {
      if (entry.resetTime <= now) this.store.delete(key);
    }
  }

  get size(): number {
    return this.store.size;
  }
}

const MAX_TRACKED_CLIENTS = 10_000;

export function rateLimit(limiter: FixedWindowRateLimiter): RequestHandler {
  return (req, res, next) => {
    if (limiter.size > MAX_TRACKED_CLIENTS) limiter.cleanup();
    const key = req.ip || req.socket.remoteAddress || "unknown";
    const result = limiter.check(key);

    res.setHeader("X-RateLimit-Limit", limiter.limit);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", new Date(result.resetTime).toISOString());

    if (!result.allowed) {
      const body: ErrorBody = {
        ok: false,
        error: { code: "rate_limited", message: "Rate limit exceeded", details: { resetTime: result.resetTime } },
      };
      res.status(429).json(body);
      return;
    }
    next();
  };
}
