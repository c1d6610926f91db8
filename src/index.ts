// Load environment variables FIRST
import 'dotenv/config';

import { loadEngineConfig } from '@/config/engine.config';
import { createApp } from '@/app';
import { logger, setLogLevel } from '@/services/logger';
import { initRedis, closeRedis } from '@/services/redis';
import { createEmbeddingProvider } from '@/services/embeddings';
import { SemanticScorer } from '@/services/scoring/semantic-scorer';
import { ContextOptimizer } from '@/services/retrieval-orchestrator';
import { SectionIndexer } from '@/services/section-indexer';
import { PlanTierGate } from '@/services/tier-gate';
import { InMemoryDocumentStore } from '@/services/stores/in-memory-store';
import { SupabaseSectionStore } from '@/services/stores/supabase-store';
import { loadDocumentsFile } from '@/services/stores/seed-loader';
import type { DocumentStore, SimilarityIndex } from '@/services/stores/document-store';
import { InMemoryCounterStore, RedisCounterStore } from '@/stability/counterStore';
import { RateLimiter } from '@/stability/rateLimiter';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { errorMessage } from '@/utils/errors';

async function main(): Promise<void> {
  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const config = loadEngineConfig();
  setLogLevel(config.logLevel);

  const embeddings = createEmbeddingProvider(config.embeddings);
  await embeddings.preload();

  let store: DocumentStore & SimilarityIndex;
  if (config.supabase) {
    store = SupabaseSectionStore.fromCredentials(config.supabase.url, config.supabase.serviceRoleKey);
    logger.info('store:supabase');
  } else {
    const memory = new InMemoryDocumentStore();
    if (config.documentsFile) {
      await loadDocumentsFile(config.documentsFile, memory, new SectionIndexer(embeddings));
    }
    store = memory;
    logger.info('store:in_memory');
  }

  const redis = await initRedis(config.redisUrl);
  onShutdown(() => closeRedis(redis));

  const limiter = new RateLimiter({
    store: redis ? new RedisCounterStore(redis) : new InMemoryCounterStore(),
    windowSeconds: config.rateLimit.windowSeconds,
    maxRequests: config.rateLimit.maxRequests,
    planLimits: config.rateLimit.planLimits,
    failMode: config.rateLimit.failMode,
  });

  const scorer = new SemanticScorer(embeddings, store, { minSimilarity: config.embeddings.minSimilarity });
  const app = createApp({
    optimizer: new ContextOptimizer({ store, scorer, embeddings }),
    embeddings,
    store,
    tierGate: new PlanTierGate(),
    limiter,
    ipRateLimit: { windowMs: config.rateLimit.windowSeconds * 1000, limit: config.rateLimit.ipMaxRequests },
    corsOrigins: config.corsOrigins,
  });

  const server = app.listen(config.port, () => {
    logger.info('http:listening', { port: config.port, env: config.nodeEnv, ready: embeddings.isReady() });
  });
  setServerInstance(server);
}

main().catch((err: unknown) => {
  logger.fatal('process:startup_failed', { error: errorMessage(err) });
  process.exit(1);
});
