// src/services/retrieval-orchestrator.ts: one query from raw text to a budgeted, ranked context
//
// RECEIVED -> LEXICAL_SCORED -> {PRECOMPUTED_SEMANTIC | ON_THE_FLY_SEMANTIC | SKIPPED}
//          -> FUSED -> BUDGETED -> DONE
// Strictly sequential within a query; nothing here outlives the call.

import type {
  Candidate,
  Capability,
  ContextRequest,
  ContextSection,
  DocumentMeta,
  RankedResult,
  RetrievalState,
  Section,
  SemanticPath,
} from '@/types/core';
import type { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import type { DocumentStore } from '@/services/stores/document-store';
import { logger } from '@/services/logger';
import { packContext } from '@/services/context-budgeter';
import { resolveSearchMode } from '@/services/tier-gate';
import {
  DROP_OFF_FLOOR,
  DROP_OFF_RATIO,
  MAX_SEMANTIC_CANDIDATES,
} from '@/services/scoring/constants';
import {
  extractKeywords,
  isListQuery,
  rankByKeywords,
  titleMatchesKeywords,
  type LexicalScore,
} from '@/services/scoring/keyword-scorer';
import { gradedRelevance, reciprocalRankFusion } from '@/services/scoring/rrf-fusion';
import type { SemanticScorer } from '@/services/scoring/semantic-scorer';
import { ModelUnavailableError, QueryValidationError } from '@/utils/errors';

export interface ContextOptimizerDeps {
  store: DocumentStore;
  scorer: SemanticScorer;
  embeddings: EmbeddingProvider;
}

/**
 * Drop-off then cap. Keeps scores >= max(ratio * top, floor) and at most
 * `max` entries; input must already be sorted best first.
 */
export function applySafeguards(
  scored: readonly LexicalScore[],
  max: number = MAX_SEMANTIC_CANDIDATES,
): LexicalScore[] {
  if (scored.length === 0 || scored[0].score <= 0) return [];
  const threshold = Math.max(DROP_OFF_RATIO * scored[0].score, DROP_OFF_FLOOR);
  return scored.filter((s) => s.score >= threshold).slice(0, max);
}

/**
 * Non-mandatory shared documents stay only when a query keyword hits their
 * title. Project-owned and mandatory documents always stay.
 */
export function filterSharedSections(
  sections: readonly Section[],
  documents: ReadonlyMap<string, DocumentMeta>,
  keywords: readonly string[],
): Section[] {
  const titleHits = new Map<string, boolean>();
  return sections.filter((section) => {
    const doc = documents.get(section.documentId);
    if (!doc) return false;
    if (!doc.shared || doc.category === 'MANDATORY') return true;
    let hit = titleHits.get(doc.id);
    if (hit === undefined) {
      hit = titleMatchesKeywords(doc.title, keywords);
      titleHits.set(doc.id, hit);
    }
    return hit;
  });
}

function validateRequest(request: ContextRequest): void {
  const issues: Array<{ path: string; message: string }> = [];
  if (request.query.trim().length === 0) {
    issues.push({ path: 'query', message: 'Query text must not be empty' });
  }
  if (!Number.isInteger(request.maxTokens) || request.maxTokens <= 0) {
    issues.push({ path: 'maxTokens', message: 'Token budget must be a positive integer' });
  }
  if (request.scope.projectId.trim().length === 0) {
    issues.push({ path: 'projectId', message: 'Project id must not be empty' });
  }
  if (issues.length > 0) {
    throw new QueryValidationError('Invalid context request', issues);
  }
}

function rankSemantic(scores: ReadonlyMap<string, number>): string[] {
  return Array.from(scores.entries())
    .filter(([, score]) => score > 0)
    .sort((a, b) => b[1] - a[1])
    .map(([id]) => id);
}

export class ContextOptimizer {
  constructor(private readonly deps: ContextOptimizerDeps) {}

  async optimizeContext(
    request: ContextRequest,
    allowedModes: ReadonlySet<Capability>,
  ): Promise<RankedResult> {
    const startedAt = Date.now();
    const trace: RetrievalState[] = [];
    const enter = (state: RetrievalState, detail: Record<string, unknown> = {}): void => {
      trace.push(state);
      logger.debug(`retrieval:${state.toLowerCase()}`, { projectId: request.scope.projectId, ...detail });
    };

    validateRequest(request);
    enter('RECEIVED', { maxTokens: request.maxTokens, requested: request.searchMode });

    const { mode, downgraded } = resolveSearchMode(request.searchMode, allowedModes);
    if (downgraded) {
      logger.info('retrieval:mode_downgraded', { requested: request.searchMode, used: mode });
    }

    const { scope } = request;
    const [documentList, sections] = await Promise.all([
      this.deps.store.listDocuments(scope),
      this.deps.store.listSections(scope),
    ]);
    const documents = new Map(documentList.map((d) => [d.id, d]));

    // Lexical
    const lexicalStart = Date.now();
    const keywords = extractKeywords(request.query);
    const eligible = filterSharedSections(sections, documents, keywords);
    const lexical = rankByKeywords(keywords, eligible, isListQuery(request.query));
    const candidates = applySafeguards(lexical);
    const lexicalMs = Date.now() - lexicalStart;
    enter('LEXICAL_SCORED', {
      sections: sections.length,
      eligible: eligible.length,
      candidates: candidates.length,
    });

    // Semantic
    const semanticStart = Date.now();
    let semanticPath: SemanticPath = 'skipped';
    let semanticScores = new Map<string, number>();
    if (mode === 'keyword') {
      enter('SKIPPED');
    } else {
      // Without lexical candidates the first scoped sections stand in.
      const pool = candidates.length > 0
        ? candidates.map((c) => c.section)
        : eligible.slice(0, MAX_SEMANTIC_CANDIDATES);

      if (pool.some((s) => s.embedding !== undefined)) {
        if (!this.deps.embeddings.isReady()) {
          throw new ModelUnavailableError('Large embedding model is not loaded');
        }
        semanticPath = 'precomputed';
        const allowed = new Set(pool.map((s) => s.id));
        semanticScores = await this.deps.scorer.scoreFromIndex(request.query, allowed, scope);
        // Pool sections not indexed yet are scored on the fly; index failures above never reach here.
        const unindexed = pool.filter((s) => s.embedding === undefined);
        if (unindexed.length > 0) {
          const fresh = await this.deps.scorer.scoreOnTheFly(request.query, unindexed);
          for (const [id, score] of fresh) semanticScores.set(id, score);
        }
        enter('PRECOMPUTED_SEMANTIC', {
          pool: pool.length,
          unindexed: unindexed.length,
          scored: semanticScores.size,
        });
      } else {
        semanticPath = 'on_the_fly';
        semanticScores = await this.deps.scorer.scoreOnTheFly(request.query, pool);
        enter('ON_THE_FLY_SEMANTIC', { pool: pool.length, scored: semanticScores.size });
      }
    }
    const semanticMs = Date.now() - semanticStart;

    // Fusion
    const fusionStart = Date.now();
    const lexicalRanking = candidates.map((c) => c.section.id);
    const semanticRanking = rankSemantic(semanticScores);
    const rankings =
      mode === 'keyword'
        ? [lexicalRanking]
        : mode === 'semantic'
          ? [semanticRanking, lexicalRanking]
          : [lexicalRanking, semanticRanking];
    const fused = reciprocalRankFusion(rankings, { tieBreak: lexicalRanking });

    const byId = new Map(eligible.map((s) => [s.id, s]));
    const lexicalById = new Map(candidates.map((c) => [c.section.id, c.score]));
    const ranked: Candidate[] = [];
    for (const entry of fused) {
      const section = byId.get(entry.id);
      if (!section) continue;
      ranked.push({
        section,
        lexicalScore: lexicalById.get(entry.id) ?? 0,
        semanticScore: semanticScores.get(entry.id) ?? null,
        fusedScore: entry.score,
        fusedRank: entry.rank,
      });
    }
    const relevance = gradedRelevance(fused);
    const fusionMs = Date.now() - fusionStart;
    enter('FUSED', { ranked: ranked.length });

    // Budget
    const budgetStart = Date.now();
    const packed = packContext(
      ranked.map((candidate) => ({ candidate, tokenCount: candidate.section.tokenCount })),
      request.maxTokens,
    );
    const selected: ContextSection[] = packed.selected.map(({ candidate }) => ({
      id: candidate.section.id,
      documentId: candidate.section.documentId,
      title: candidate.section.title,
      body: candidate.section.body,
      tokenCount: candidate.section.tokenCount,
      relevanceScore: relevance.get(candidate.section.id) ?? 0,
      lexicalScore: candidate.lexicalScore,
      semanticScore: candidate.semanticScore,
      shared: documents.get(candidate.section.documentId)?.shared ?? false,
    }));
    const suggestions = packed.skipped.map(({ candidate }) => candidate.section.title);
    const budgetMs = Date.now() - budgetStart;
    enter('BUDGETED', { selected: selected.length, totalTokens: packed.totalTokens });

    const shared = selected.filter((s) => s.shared);
    enter('DONE');

    const result: RankedResult = Object.freeze({
      query: request.query,
      sections: Object.freeze(selected.map((s) => Object.freeze(s))),
      totalTokens: packed.totalTokens,
      maxTokens: request.maxTokens,
      searchMode: mode,
      searchModeDowngraded: downgraded,
      semanticPath,
      suggestions: Object.freeze(suggestions),
      sharedContextIncluded: shared.length > 0,
      sharedContextTokens: shared.reduce((sum, s) => sum + s.tokenCount, 0),
      trace: Object.freeze([...trace]),
      timing: Object.freeze({
        lexicalMs,
        semanticMs,
        fusionMs,
        budgetMs,
        totalMs: Date.now() - startedAt,
      }),
    });

    logger.info('context:budgeted', {
      projectId: scope.projectId,
      mode,
      semanticPath,
      candidates: candidates.length,
      selected: selected.length,
      totalTokens: packed.totalTokens,
      ms: result.timing.totalMs,
    });
    return result;
  }
}
