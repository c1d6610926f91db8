import express, { type Router } from 'express';
import type { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import { createErrorResponse } from '@/utils/errorResponse';

export function createHealthRouter(embeddings: EmbeddingProvider): Router {
  const router = express.Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Not ready until the large model is loaded; the small one is optional.
  router.get('/ready', (_req, res) => {
    if (!embeddings.isReady()) {
      res.status(503).json(createErrorResponse('Embedding model not loaded', undefined, 'not_ready'));
      return;
    }
    res.status(200).json({
      status: 'READY',
      models: {
        large: embeddings.modelName('large'),
        small: embeddings.isSmallModelAvailable() ? embeddings.modelName('small') : null,
      },
    });
  });

  return router;
}
