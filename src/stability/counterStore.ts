// Fixed-window counters behind the rate limiter
import type Redis from 'ioredis';
import { z } from 'zod';

export interface WindowCount {
  count: number;
  /** Milliseconds until the window resets; always positive after an increment. */
  ttlMs: number;
}

export interface CounterStore {
  /** Atomically increments `key`, (re)arming its expiry when it has none. */
  incrementWindow(key: string, windowMs: number): Promise<WindowCount>;
  /** Remaining TTL in ms; -1 when the key has no expiry, -2 when it does not exist. */
  ttl(key: string): Promise<number>;
}

interface Counter {
  count: number;
  /** null: no expiry set. */
  expiresAt: number | null;
}

/** Single-process counters with the same semantics as the Redis store. */
export class InMemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, Counter>();

  constructor(private readonly now: () => number = Date.now) {}

  async incrementWindow(key: string, windowMs: number): Promise<WindowCount> {
    const now = this.now();
    this.evictExpired(now);

    const counter = this.counters.get(key) ?? { count: 0, expiresAt: null };
    counter.count += 1;
    if (counter.expiresAt === null || counter.expiresAt <= now) {
      counter.expiresAt = now + windowMs;
    }
    this.counters.set(key, counter);
    return { count: counter.count, ttlMs: counter.expiresAt - now };
  }

  async ttl(key: string): Promise<number> {
    const now = this.now();
    this.evictExpired(now);
    const counter = this.counters.get(key);
    if (!counter) return -2;
    if (counter.expiresAt === null) return -1;
    return counter.expiresAt - now;
  }

  /** Test hook: writes a counter directly, `ttlMs: null` leaves it without expiry. */
  seed(key: string, count: number, ttlMs: number | null): void {
    this.counters.set(key, { count, expiresAt: ttlMs === null ? null : this.now() + ttlMs });
  }

  private evictExpired(now: number): void {
    for (const [key, counter] of this.counters.entries()) {
      if (counter.expiresAt !== null && counter.expiresAt <= now) {
        this.counters.delete(key);
      }
    }
  }
}

// INCR, then re-arm the expiry whenever PTTL says there is none (-1) or it is gone.
const INCREMENT_WINDOW_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
local ttl = redis.call('PTTL', KEYS[1])
if ttl <= 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return {count, ttl}
`;

const scriptReply = z.tuple([z.number().int(), z.number().int()]);

export class RedisCounterStore implements CounterStore {
  constructor(private readonly redis: Redis) {}

  async incrementWindow(key: string, windowMs: number): Promise<WindowCount> {
    const reply: unknown = await this.redis.eval(INCREMENT_WINDOW_SCRIPT, 1, key, windowMs);
    const [count, ttlMs] = scriptReply.parse(reply);
    return { count, ttlMs };
  }

  async ttl(key: string): Promise<number> {
    return this.redis.pttl(key);
  }
}
