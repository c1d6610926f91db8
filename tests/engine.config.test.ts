import { describe, expect, it } from 'vitest';
import { ConfigError, PLAN_RATE_LIMITS, loadEngineConfig } from '@/config/engine.config';
import { LOG_LEVELS, logger, setLogLevel } from '@/services/logger';

describe('loadEngineConfig', () => {
  it('fills defaults from an empty environment', () => {
    const config = loadEngineConfig({});
    expect(config.port).toBe(4000);
    expect(config.rateLimit).toEqual({
      windowSeconds: 60,
      maxRequests: 100,
      failMode: 'open',
      ipMaxRequests: 300,
      planLimits: PLAN_RATE_LIMITS,
    });
    expect(config.embeddings.backend).toBe('hashed');
    expect(config.embeddings.large).toEqual({ model: 'text-embedding-3-large', dimensions: 1024 });
    expect(config.embeddings.small).toEqual({ model: 'text-embedding-3-small', dimensions: 384 });
    expect(config.embeddings.minSimilarity).toBe(0.3);
    expect(config.supabase).toBeUndefined();
    expect(config.redisUrl).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('coerces numeric strings and splits CORS origins', () => {
    const config = loadEngineConfig({
      PORT: '8080',
      RATE_LIMIT_FAIL_MODE: 'closed',
      SEMANTIC_MIN_SIMILARITY: '0.45',
      CORS_ORIGIN: 'http://a.test, http://b.test',
      REDIS_URL: '  ',
    });
    expect(config.port).toBe(8080);
    expect(config.rateLimit.failMode).toBe('closed');
    expect(config.embeddings.minSimilarity).toBe(0.45);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.redisUrl).toBeUndefined();
  });

  it('enables Supabase only when both URL and key are set', () => {
    expect(loadEngineConfig({ SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeUndefined();
    expect(
      loadEngineConfig({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }).supabase,
    ).toEqual({ url: 'http://localhost:54321', serviceRoleKey: 'test-secret' });
  });

  it('requires an API key for the openai backend', () => {
    try {
      loadEngineConfig({ EMBEDDINGS_BACKEND: 'openai' });
      expect.unreachable('config should not load');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          { path: 'OPENAI_API_KEY', message: 'OPENAI_API_KEY is required when EMBEDDINGS_BACKEND=openai' },
        ]);
      }
    }
  });

  it('rejects equal model widths and out-of-range values', () => {
    expect(() =>
      loadEngineConfig({ EMBEDDING_LARGE_DIMENSIONS: '512', EMBEDDING_SMALL_DIMENSIONS: '512' }),
    ).toThrow(ConfigError);
    expect(() => loadEngineConfig({ SEMANTIC_MIN_SIMILARITY: '1.5' })).toThrow(/SEMANTIC_MIN_SIMILARITY/);
    expect(() => loadEngineConfig({ RATE_LIMIT_MAX_REQUESTS: '0' })).toThrow(/RATE_LIMIT_MAX_REQUESTS/);
  });
});

describe('log level', () => {
  it('applies the configured LOG_LEVEL to the shared logger', () => {
    const config = loadEngineConfig({ LOG_LEVEL: 'debug' });
    expect(config.logLevel).toBe('debug');
    try {
      setLogLevel(config.logLevel);
      expect(logger.settings.minLevel).toBe(2);
    } finally {
      logger.settings.minLevel = LOG_LEVELS.fatal;
    }
  });
});
