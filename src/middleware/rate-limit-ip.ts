// src/middleware/rate-limit-ip.ts: coarse per-IP limiter in front of the per-caller one
import rateLimit from 'express-rate-limit';
import { createErrorResponse } from '@/utils/errorResponse';

const UNTHROTTLED_PATHS = new Set(['/health', '/ready']);

export function createIpRateLimiter(options: { windowMs: number; limit: number }) {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => UNTHROTTLED_PATHS.has(req.path),
    handler: (_req, res) => {
      res.status(429).json(createErrorResponse('Too many requests from this address', undefined, 'rate_limited'));
    },
  });
}
