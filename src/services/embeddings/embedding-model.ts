/**
 * BaseEmbedding: abstract base class for embedding models.
 *
 * Every model produces vectors of one fixed dimensionality; vectors from
 * different models must never meet in one similarity computation.
 */

import type { Embedding } from '@/types/core';
import { DimensionMismatchError } from '@/utils/errors';

/** `large` backs everything persisted; `small` only ever scores fresh, throwaway vectors. */
export type EmbeddingKind = 'large' | 'small';

export interface EmbeddingModelConfig {
  model: string;
  dimensions: number;
}

export abstract class BaseEmbedding<CONFIG extends EmbeddingModelConfig = EmbeddingModelConfig> {
  constructor(protected readonly config: CONFIG) {}

  get name(): string {
    return this.config.model;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  /** Prepares the model for inference (weights, credentials); must be safe to call twice. */
  abstract load(): Promise<void>;

  /**
   * Embed an array of text strings
   * @returns one vector per input, in input order
   */
  abstract embedText(texts: string[]): Promise<Embedding[]>;
}

export function assertDimensions(vectors: Embedding[], expected: number): Embedding[] {
  for (const v of vectors) {
    if (v.length !== expected) throw new DimensionMismatchError(expected, v.length);
  }
  return vectors;
}

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) throw new DimensionMismatchError(a.length, b.length);
  if (a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
