// Per-caller request throttling over a shared counter store

import type { Plan } from '@/types/core';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';
import type { CounterStore } from './counterStore';

export interface RateLimiterOptions {
  store: CounterStore;
  windowSeconds: number;
  /** Limit for callers without a plan. */
  maxRequests: number;
  planLimits?: Partial<Record<Plan, number>>;
  /** What to do when the counter store is unreachable. */
  failMode?: 'open' | 'closed';
}

export interface RateLimitDecision {
  allowed: boolean;
  count: number;
  limit: number;
  resetInMs: number;
}

const KEY_PREFIX = 'ratelimit:';

export class RateLimiter {
  private readonly windowMs: number;
  private readonly failMode: 'open' | 'closed';

  constructor(private readonly options: RateLimiterOptions) {
    this.windowMs = options.windowSeconds * 1000;
    this.failMode = options.failMode ?? 'open';
  }

  limitFor(plan?: Plan): number {
    return (plan && this.options.planLimits?.[plan]) ?? this.options.maxRequests;
  }

  /**
   * Counts this request against the caller's window. The increment happens on
   * every call, denied or not, so hammering a closed window keeps it closed.
   */
  async check(callerId: string, plan?: Plan): Promise<RateLimitDecision> {
    const limit = this.limitFor(plan);
    try {
      const { count, ttlMs } = await this.options.store.incrementWindow(KEY_PREFIX + callerId, this.windowMs);
      const allowed = count <= limit;
      if (!allowed) {
        logger.warn('rate_limit.exceeded', { callerId, plan, count, limit });
      }
      return { allowed, count, limit, resetInMs: ttlMs };
    } catch (err) {
      const allowed = this.failMode === 'open';
      logger.warn('rate_limit.store_unavailable', {
        callerId,
        failMode: this.failMode,
        allowed,
        error: errorMessage(err),
      });
      return { allowed, count: 0, limit, resetInMs: this.windowMs };
    }
  }

  async checkAndIncrement(callerId: string, plan?: Plan): Promise<boolean> {
    return (await this.check(callerId, plan)).allowed;
  }
}
