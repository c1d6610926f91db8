// src/app.ts: express app wiring; no listening, no process handlers (see index.ts)
import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ContextOptimizer } from '@/services/retrieval-orchestrator';
import type { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import type { DocumentStore } from '@/services/stores/document-store';
import type { TierGate } from '@/services/tier-gate';
import type { RateLimiter } from '@/stability/rateLimiter';
import { attachCorrelationId } from '@/middleware/correlation';
import { createIpRateLimiter } from '@/middleware/rate-limit-ip';
import { errorMiddleware } from '@/middleware/error.middleware';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createContextRouter } from '@/routes/context';
import { createHealthRouter } from '@/routes/health';

export interface AppDeps {
  optimizer: ContextOptimizer;
  embeddings: EmbeddingProvider;
  store: DocumentStore;
  tierGate: TierGate;
  limiter: RateLimiter;
  /** Omit to disable the per-IP limiter. */
  ipRateLimit?: { windowMs: number; limit: number };
  corsOrigins?: string[];
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors(deps.corsOrigins ? { origin: deps.corsOrigins } : undefined));
  app.use(express.json({ limit: '1mb' }));
  app.use(attachCorrelationId);
  if (deps.ipRateLimit) {
    app.use(createIpRateLimiter(deps.ipRateLimit));
  }

  app.use(createHealthRouter(deps.embeddings));
  app.use(
    '/v1',
    createContextRouter({
      optimizer: deps.optimizer,
      store: deps.store,
      tierGate: deps.tierGate,
      limiter: deps.limiter,
    }),
  );

  app.use(notFoundHandler);
  app.use(errorMiddleware);
  return app;
}
