// src/services/redis.ts: optional shared Redis connection for rate-limit counters
import Redis from 'ioredis';
import { logger } from './logger';

function redisError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Connects and pings; null when no URL is configured or the server is unreachable. */
export async function initRedis(redisUrl: string | undefined): Promise<Redis | null> {
  if (!redisUrl) {
    logger.info('redis:skipped', { reason: 'REDIS_URL not set' });
    return null;
  }

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 3) return null;
      return Math.min(times * 200, 2000);
    },
  });

  client.on('error', (err: Error) => {
    logger.warn('redis:error', { error: redisError(err) });
  });

  try {
    await client.ping();
    logger.info('redis:connected');
    return client;
  } catch (err) {
    logger.warn('redis:connect_failed', { error: redisError(err) });
    client.disconnect();
    return null;
  }
}

export async function closeRedis(client: Redis | null): Promise<void> {
  if (!client) return;
  try {
    await client.quit();
    logger.info('redis:closed');
  } catch (err) {
    logger.warn('redis:close_failed', { error: redisError(err) });
    client.disconnect();
  }
}
