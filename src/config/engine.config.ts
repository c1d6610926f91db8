// src/config/engine.config.ts: typed runtime configuration parsed from the environment
import { z } from 'zod';
import type { Plan } from '@/types/core';
import type { LogLevelName } from '@/services/logger';

const ratioFromEnv = (fallback: number) =>
  z.coerce.number().finite().min(0).max(1).default(fallback);

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z
  .object({
    PORT: intFromEnv(4000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    REDIS_URL: optionalString,
    RATE_LIMIT_WINDOW_SECONDS: intFromEnv(60),
    RATE_LIMIT_MAX_REQUESTS: intFromEnv(100),
    RATE_LIMIT_FAIL_MODE: z.enum(['open', 'closed']).default('open'),
    IP_RATE_LIMIT_MAX: intFromEnv(300),
    EMBEDDINGS_BACKEND: z.enum(['hashed', 'openai']).default('hashed'),
    OPENAI_API_KEY: optionalString,
    EMBEDDING_LARGE_MODEL: z.string().min(1).default('text-embedding-3-large'),
    EMBEDDING_LARGE_DIMENSIONS: intFromEnv(1024),
    EMBEDDING_SMALL_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_SMALL_DIMENSIONS: intFromEnv(384),
    INFERENCE_CONCURRENCY: intFromEnv(4),
    INFERENCE_QUEUE_LIMIT: intFromEnv(256),
    EMBEDDING_BATCH_SIZE: intFromEnv(32),
    SEMANTIC_MIN_SIMILARITY: ratioFromEnv(0.3),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    DOCUMENTS_FILE: optionalString,
    CORS_ORIGIN: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDINGS_BACKEND === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when EMBEDDINGS_BACKEND=openai',
      });
    }
    if (env.EMBEDDING_LARGE_DIMENSIONS === env.EMBEDDING_SMALL_DIMENSIONS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EMBEDDING_SMALL_DIMENSIONS'],
        message: 'large and small embedding models must have different dimensionalities',
      });
    }
  });

/** Requests per rate-limit window, by subscription plan. */
export const PLAN_RATE_LIMITS: Readonly<Record<Plan, number>> = {
  FREE: 30,
  PRO: 120,
  TEAM: 300,
  ENTERPRISE: 1000,
  PARTNER: 3000,
};

export interface EmbeddingModelSettings {
  model: string;
  dimensions: number;
}

export interface EngineConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  redisUrl?: string;
  rateLimit: {
    windowSeconds: number;
    maxRequests: number;
    failMode: 'open' | 'closed';
    ipMaxRequests: number;
    planLimits: Readonly<Record<Plan, number>>;
  };
  embeddings: {
    backend: 'hashed' | 'openai';
    openaiApiKey?: string;
    large: EmbeddingModelSettings;
    small: EmbeddingModelSettings;
    concurrency: number;
    queueLimit: number;
    batchSize: number;
    minSimilarity: number;
  };
  supabase?: { url: string; serviceRoleKey: string };
  documentsFile?: string;
  /** Comma-separated CORS_ORIGIN; unset allows any origin. */
  corsOrigins?: string[];
}

export class ConfigError extends Error {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }

  const e = result.data;
  const supabase =
    e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
      : undefined;

  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    redisUrl: e.REDIS_URL,
    rateLimit: {
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
      maxRequests: e.RATE_LIMIT_MAX_REQUESTS,
      failMode: e.RATE_LIMIT_FAIL_MODE,
      ipMaxRequests: e.IP_RATE_LIMIT_MAX,
      planLimits: PLAN_RATE_LIMITS,
    },
    embeddings: {
      backend: e.EMBEDDINGS_BACKEND,
      openaiApiKey: e.OPENAI_API_KEY,
      large: { model: e.EMBEDDING_LARGE_MODEL, dimensions: e.EMBEDDING_LARGE_DIMENSIONS },
      small: { model: e.EMBEDDING_SMALL_MODEL, dimensions: e.EMBEDDING_SMALL_DIMENSIONS },
      concurrency: e.INFERENCE_CONCURRENCY,
      queueLimit: e.INFERENCE_QUEUE_LIMIT,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      minSimilarity: e.SEMANTIC_MIN_SIMILARITY,
    },
    supabase,
    documentsFile: e.DOCUMENTS_FILE,
    corsOrigins: e.CORS_ORIGIN?.split(',').map((o) => o.trim()).filter((o) => o.length > 0),
  });
}
