/**
 * Embedding models and the provider that pairs them.
 */

import type { EngineConfig } from '@/config/engine.config';
import { EmbeddingProvider } from './embedding-provider';
import type { BaseEmbedding, EmbeddingModelConfig } from './embedding-model';
import { HashedEmbeddingModel } from './hashed-embedding';
import { InferencePool } from './inference-pool';
import OpenAIEmbedding from './openai-embedding';

export { EmbeddingProvider } from './embedding-provider';
export { InferencePool } from './inference-pool';
export { HashedEmbeddingModel } from './hashed-embedding';
export { default as OpenAIEmbedding } from './openai-embedding';
export { BaseEmbedding, cosineSimilarity } from './embedding-model';
export type { EmbeddingKind, EmbeddingModelConfig } from './embedding-model';

function buildModel(config: EngineConfig['embeddings'], settings: EmbeddingModelConfig): BaseEmbedding {
  if (config.backend === 'openai' && config.openaiApiKey) {
    return new OpenAIEmbedding({ ...settings, apiKey: config.openaiApiKey });
  }
  return new HashedEmbeddingModel(settings);
}

export function createEmbeddingProvider(config: EngineConfig['embeddings']): EmbeddingProvider {
  return new EmbeddingProvider({
    large: buildModel(config, config.large),
    small: buildModel(config, config.small),
    pool: new InferencePool({ concurrency: config.concurrency, queueLimit: config.queueLimit }),
    batchSize: config.batchSize,
  });
}
