// backend/src/middleware/rateLimit.ts

import type { NextFunction, Request, Response } from "express";
import { sendError } from "../http/sendError";

type Bucket = { count: number; resetAt: number };

export type RateLimitOptions = {
  windowMs?: number;
  max?: number;
  now?: () => number;
};

function keyForReq(req: Request): string {
  return String(req.ip || req.socket?.remoteAddress || "unknown");
}

/**
 * Fixed-window limiter kept in process memory. Each limiter owns its buckets,
 * so routes with tighter limits (turn generation) get their own instance.
 */
export function createRateLimit(opts: RateLimitOptions = {}) {
  const windowMs = opts.windowMs ?? 60_000;
  const max = opts.max ?? 120;
  const clock = opts.now ?? Date.now;
  const buckets = new Map<string, Bucket>();

  const maybePrune = (now: number) => {
    if (buckets.size < 5000) return;
    for (const [k, b] of buckets) {
      if (b.resetAt <= now) buckets.delete(k);
    }
  };

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    const key = keyForReq(req);
    const now = clock();
    maybePrune(now);

    const b = buckets.get(key);
    if (!b || b.resetAt <= now) {
      buckets.set(key, { count: 1, resetAt: now + windowMs });
      res.setHeader("x-rate-limit-limit", String(max));
      res.setHeader("x-rate-limit-remaining", String(max - 1));
      return next();
    }

    b.count += 1;

    const remaining = Math.max(0, max - b.count);
    res.setHeader("x-rate-limit-limit", String(max));
    res.setHeader("x-rate-limit-remaining", String(remaining));
    res.setHeader("x-rate-limit-reset", String(Math.ceil((b.resetAt - now) / 1000)));

    if (b.count > max) {
      return sendError(res, 429, "Too many requests. Please slow down and try again.", "RATE_LIMITED");
    }

    return next();
  };
}
