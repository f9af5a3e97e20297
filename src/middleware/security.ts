import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { RATE_LIMITS } from '../config/constants.js';

export const securityMiddleware = [
  // JSON API only: no scripts, frames or inline content to allow
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginEmbedderPolicy: false,
  }),
];

/**
 * Sliding-window rate limiter keyed by client IP
 */
export const rateLimitByIp = (windowMs: number, maxRequests: number) => {
  const requests = new Map<string, number[]>();

  // Periodic cleanup of old IPs (every 2x window duration)
  const cleanupInterval = setInterval(() => {
    const cutoff = Date.now() - windowMs;

    for (const [ip, timestamps] of requests.entries()) {
      const last = timestamps[timestamps.length - 1];
      if (last === undefined || last < cutoff) {
        requests.delete(ip);
      }
    }

    if (requests.size > RATE_LIMITS.MAX_TRACKED_IPS) {
      const oldestFirst = Array.from(requests.entries()).sort(
        ([, a], [, b]) => (a[a.length - 1] ?? 0) - (b[b.length - 1] ?? 0)
      );

      // Remove oldest 10% of IPs
      const toRemove = Math.ceil(requests.size * 0.1);
      for (const [ip] of oldestFirst.slice(0, toRemove)) {
        requests.delete(ip);
      }
    }
  }, windowMs * 2);

  // Ensure cleanup interval doesn't prevent process exit
  cleanupInterval.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const windowStart = now - windowMs;

    const recentRequests = (requests.get(ip) ?? []).filter(timestamp => timestamp > windowStart);
    requests.set(ip, recentRequests);

    const remaining = Math.max(0, maxRequests - recentRequests.length);
    const oldestRequest = recentRequests[0] ?? now;
    const resetSeconds = Math.ceil((oldestRequest + windowMs - now) / 1000);

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', remaining.toString());
    res.setHeader('X-RateLimit-Reset', resetSeconds.toString());

    if (recentRequests.length >= maxRequests) {
      res.setHeader('Retry-After', resetSeconds.toString());
      res.status(429).json({
        error: {
          message: 'Too many requests',
          status: 429,
          retryAfter: resetSeconds,
        },
      });
      return;
    }

    recentRequests.push(now);
    next();
  };
};
