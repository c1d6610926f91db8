// src/middleware/caller-rate-limit.ts: per-caller admission check backed by the shared counter store
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimiter } from '@/stability/rateLimiter';
import { RateLimitExceededError } from '@/utils/errors';

/** API key when present (opaque, never validated), else the client address. */
export function callerIdentity(req: Request): string {
  const apiKey = req.header('x-api-key')?.trim();
  if (apiKey) return `key:${apiKey}`;
  return `ip:${req.ip ?? req.socket.remoteAddress ?? 'unknown'}`;
}

export function callerRateLimit(limiter: RateLimiter): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const decision = await limiter.check(callerIdentity(req), req.project?.plan);
      res.setHeader('X-RateLimit-Limit', String(decision.limit));
      res.setHeader('X-RateLimit-Remaining', String(Math.max(0, decision.limit - decision.count)));
      if (!decision.allowed) {
        next(new RateLimitExceededError(decision.limit, Math.max(1, Math.ceil(decision.resetInMs / 1000))));
        return;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
