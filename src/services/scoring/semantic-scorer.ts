// src/services/scoring/semantic-scorer.ts: semantic similarity for candidate sections
//
// Two paths:
//  - precomputed: large-model query vector against stored vectors via the similarity index;
//  - on-the-fly: small-model vectors computed fresh for the query and each candidate.
// A section is scored by one model only, so vectors of different sizes never meet.
// Choosing the path per section is the orchestrator's job.

import type { QueryScope, Section } from '@/types/core';
import type { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import { cosineSimilarity } from '@/services/embeddings/embedding-model';
import type { NearestHit, SimilarityIndex } from '@/services/stores/document-store';
import { logger } from '@/services/logger';
import { InferenceQueueFullError, RetrievalError, errorMessage } from '@/utils/errors';
import { MAX_SEMANTIC_CANDIDATES, ON_THE_FLY_SNIPPET_CHARS } from './constants';

export interface SemanticScorerOptions {
  /** Index hits below this cosine similarity are ignored. */
  minSimilarity: number;
  maxCandidates?: number;
}

export class SemanticScorer {
  private readonly maxCandidates: number;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: SimilarityIndex,
    private readonly options: SemanticScorerOptions,
  ) {
    this.maxCandidates = options.maxCandidates ?? MAX_SEMANTIC_CANDIDATES;
  }

  /**
   * Precomputed path. Hits outside `allowedIds` (sections filtered out earlier in
   * the query) are dropped. Index failures fail the query.
   */
  async scoreFromIndex(
    query: string,
    allowedIds: ReadonlySet<string>,
    scope: QueryScope,
  ): Promise<Map<string, number>> {
    const queryVector = await this.embeddings.embedTextAsync('large', query);

    let hits: NearestHit[];
    try {
      hits = await this.index.nearest(queryVector, this.maxCandidates, scope);
    } catch (err) {
      if (err instanceof RetrievalError) throw err;
      throw new RetrievalError(`similarity search failed: ${errorMessage(err)}`, { cause: err });
    }

    const scores = new Map<string, number>();
    for (const hit of hits.slice(0, this.maxCandidates)) {
      if (hit.similarity < this.options.minSimilarity || !allowedIds.has(hit.sectionId)) continue;
      scores.set(hit.sectionId, Math.max(scores.get(hit.sectionId) ?? 0, hit.similarity));
    }

    logger.debug('semantic:precomputed', { hits: hits.length, scored: scores.size });
    return scores;
  }

  /**
   * On-the-fly path, small model only. Returns an empty map (lexical-only) when the
   * small model is unavailable or inference fails.
   */
  async scoreOnTheFly(query: string, sections: readonly Section[]): Promise<Map<string, number>> {
    const scores = new Map<string, number>();
    if (sections.length === 0) return scores;

    if (!this.embeddings.isSmallModelAvailable()) {
      logger.warn('semantic:on_the_fly_unavailable', { reason: 'small model not loaded' });
      return scores;
    }

    const batch = sections.slice(0, this.maxCandidates);
    if (batch.length < sections.length) {
      logger.info('semantic:on_the_fly_capped', { from: sections.length, to: batch.length });
    }

    try {
      const queryVector = await this.embeddings.embedTextAsync('small', query);
      const vectors = await this.embeddings.embedTextsAsync(
        'small',
        batch.map((s) => `${s.title}\n${s.body.slice(0, ON_THE_FLY_SNIPPET_CHARS)}`),
      );
      batch.forEach((section, i) => {
        scores.set(section.id, cosineSimilarity(queryVector, vectors[i]));
      });
    } catch (err) {
      // Queue overload is surfaced; anything else degrades to lexical-only.
      if (err instanceof InferenceQueueFullError) throw err;
      logger.warn('semantic:on_the_fly_failed', { error: errorMessage(err) });
      return new Map();
    }

    return scores;
  }
}
