/**
 * OpenAIEmbedding: BaseEmbedding backed by the OpenAI embeddings endpoint.
 * Requests a fixed `dimensions` so the large and small models stay distinguishable.
 */

import OpenAI from 'openai';
import type { Embedding } from '@/types/core';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { BaseEmbedding, assertDimensions, type EmbeddingModelConfig } from './embedding-model';

export interface OpenAIEmbeddingConfig extends EmbeddingModelConfig {
  apiKey: string;
  /** Injected in tests; otherwise built from apiKey on load. */
  client?: OpenAI;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof OpenAI.APIError) {
    return error.status === undefined || error.status === 429 || error.status >= 500;
  }
  return true;
}

class OpenAIEmbedding extends BaseEmbedding<OpenAIEmbeddingConfig> {
  private client: OpenAI | null = null;

  async load(): Promise<void> {
    if (this.client) return;
    const client = this.config.client ?? new OpenAI({ apiKey: this.config.apiKey });
    // Embed once so a bad key or model name surfaces at startup, not on the first query.
    const sample = await this.request(client, ['ready']);
    assertDimensions(sample, this.dimensions);
    this.client = client;
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) return [];
    if (!this.client) {
      throw new Error(`Embedding model ${this.name} used before load()`);
    }
    return this.request(this.client, texts);
  }

  private async request(client: OpenAI, texts: string[]): Promise<Embedding[]> {
    const res = await retryWithBackoff(
      () =>
        client.embeddings.create({
          model: this.config.model,
          input: texts,
          dimensions: this.config.dimensions,
        }),
      { shouldRetry: isRetryable, label: `embeddings:${this.config.model}` },
    );

    return [...res.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

export default OpenAIEmbedding;
