// src/services/embeddings/embedding-provider.ts: the large/small embedding pair, loaded once per process
//
// Built once at startup and handed to the scorer and orchestrator by reference.
// Large model: everything persisted and the precomputed path; failing to load it
// keeps the process unready. Small model: on-the-fly scoring only; failing to
// load it degrades that path to lexical-only.

import type { Embedding } from '@/types/core';
import { logger } from '@/services/logger';
import { ModelUnavailableError, errorMessage } from '@/utils/errors';
import { assertDimensions, type BaseEmbedding, type EmbeddingKind } from './embedding-model';
import type { InferencePool } from './inference-pool';

export interface EmbeddingProviderOptions {
  large: BaseEmbedding;
  small: BaseEmbedding;
  pool: InferencePool;
  batchSize: number;
}

type ModelStatus = 'pending' | 'ready' | 'failed';

export class EmbeddingProvider {
  private readonly models: Record<EmbeddingKind, BaseEmbedding>;
  private readonly status: Record<EmbeddingKind, ModelStatus> = { large: 'pending', small: 'pending' };
  private loading: Promise<void> | null = null;

  constructor(private readonly options: EmbeddingProviderOptions) {
    if (options.large.dimensions === options.small.dimensions) {
      throw new Error('large and small embedding models must differ in dimensionality');
    }
    this.models = { large: options.large, small: options.small };
  }

  /** Loads both models; repeated calls share the first attempt. */
  preload(): Promise<void> {
    this.loading ??= this.loadAll();
    return this.loading;
  }

  isReady(): boolean {
    return this.status.large === 'ready';
  }

  isSmallModelAvailable(): boolean {
    return this.status.small === 'ready';
  }

  dimensions(kind: EmbeddingKind): number {
    return this.models[kind].dimensions;
  }

  modelName(kind: EmbeddingKind): string {
    return this.models[kind].name;
  }

  /** Blocking variant: inference runs on the caller's turn. Batch indexing only. */
  async embedTexts(kind: EmbeddingKind, texts: string[]): Promise<Embedding[]> {
    const model = this.require(kind);
    const out: Embedding[] = [];
    for (const batch of this.batches(texts)) {
      out.push(...assertDimensions(await model.embedText(batch), model.dimensions));
    }
    return out;
  }

  async embedText(kind: EmbeddingKind, text: string): Promise<Embedding> {
    const [vector] = await this.embedTexts(kind, [text]);
    return vector;
  }

  /** Non-blocking variant: batches are queued through the inference pool. Use on every request path. */
  async embedTextsAsync(kind: EmbeddingKind, texts: string[]): Promise<Embedding[]> {
    const model = this.require(kind);
    const results = await Promise.all(
      this.batches(texts).map((batch) =>
        this.options.pool.run(async () => assertDimensions(await model.embedText(batch), model.dimensions)),
      ),
    );
    return results.flat();
  }

  async embedTextAsync(kind: EmbeddingKind, text: string): Promise<Embedding> {
    const [vector] = await this.embedTextsAsync(kind, [text]);
    return vector;
  }

  private require(kind: EmbeddingKind): BaseEmbedding {
    if (this.status[kind] !== 'ready') {
      throw new ModelUnavailableError(`Embedding model ${this.models[kind].name} (${kind}) is not loaded`);
    }
    return this.models[kind];
  }

  private batches(texts: string[]): string[][] {
    const size = Math.max(1, this.options.batchSize);
    const out: string[][] = [];
    for (let i = 0; i < texts.length; i += size) {
      out.push(texts.slice(i, i + size));
    }
    return out;
  }

  private async loadAll(): Promise<void> {
    await this.loadOne('large');
    await this.loadOne('small');
  }

  private async loadOne(kind: EmbeddingKind): Promise<void> {
    const model = this.models[kind];
    const startedAt = Date.now();
    try {
      await model.load();
      this.status[kind] = 'ready';
      logger.info('embeddings:loaded', {
        kind,
        model: model.name,
        dimensions: model.dimensions,
        ms: Date.now() - startedAt,
      });
    } catch (err) {
      this.status[kind] = 'failed';
      if (kind === 'large') {
        logger.error('embeddings:large_failed', { model: model.name, error: errorMessage(err) });
      } else {
        logger.warn('embeddings:small_failed', {
          model: model.name,
          error: errorMessage(err),
          effect: 'on-the-fly scoring falls back to lexical-only',
        });
      }
    }
  }
}
