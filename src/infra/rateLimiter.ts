import type { Request, Response, NextFunction } from 'express';

type RateLimitOptions = {
  windowMs: number;
  max: number;
  now?: () => number;
};

type RateLimitWindow = {
  count: number;
  resetAt: number;
};

/**
 * Fixed-window per-IP limiter. A non-positive window or max disables it.
 */
export function createRateLimiter({ windowMs, max, now = Date.now }: RateLimitOptions) {
  if (windowMs <= 0 || max <= 0) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const windows = new Map<string, RateLimitWindow>();

  return (req: Request, res: Response, next: NextFunction) => {
    const timestamp = now();
    const key = req.ip || 'unknown';

    let current = windows.get(key);
    if (!current || timestamp >= current.resetAt) {
      // Drop expired windows so the map only holds active clients
      for (const [ip, window] of windows) {
        if (timestamp >= window.resetAt) windows.delete(ip);
      }
      current = { count: 0, resetAt: timestamp + windowMs };
      windows.set(key, current);
    }
    current.count += 1;

    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - current.count)));
    res.setHeader('X-RateLimit-Reset', String(current.resetAt));

    if (current.count > max) {
      res.setHeader('Retry-After', String(Math.ceil((current.resetAt - timestamp) / 1000)));
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Too many requests. Please retry later.',
      });
      return;
    }

    next();
  };
}
