// src/services/embeddings/hashed-embedding.ts
// Deterministic local embedding: hashed bag of stemmed tokens, L2-normalised.
// No network and no weights, so it is the default backend for development and tests.

import type { Embedding } from '@/types/core';
import { stemKeyword, tokenizeWords } from '@/services/scoring/stemmer';
import { BaseEmbedding, type EmbeddingModelConfig } from './embedding-model';

function hashToken(token: string, seed: number): number {
  let hash = seed >>> 0;
  for (let i = 0; i < token.length; i++) {
    hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
  }
  return hash;
}

export class HashedEmbeddingModel extends BaseEmbedding {
  private readonly seed: number;

  constructor(config: EmbeddingModelConfig) {
    super(config);
    this.seed = hashToken(config.model, 7);
  }

  async load(): Promise<void> {
    // nothing to load
  }

  embedOne(text: string): Embedding {
    const vec: number[] = new Array(this.dimensions).fill(0);
    for (const token of tokenizeWords(text)) {
      const stem = stemKeyword(token);
      vec[hashToken(stem, this.seed) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    return texts.map((t) => this.embedOne(t));
  }
}
