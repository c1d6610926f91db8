// Several context queries sharing one token budget
import type { Capability, QueryScope, RankedResult, SearchMode } from '@/types/core';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';
import type { ContextOptimizer } from './retrieval-orchestrator';

/** Queries are not started once less than this many tokens remain. */
export const MIN_QUERY_BUDGET = 100;

export interface MultiQueryItem {
  query: string;
  maxTokens?: number;
}

export type MultiQueryOutcome =
  | { query: string; success: true; result: RankedResult }
  | { query: string; success: false; error: string };

export interface MultiQueryResult {
  results: MultiQueryOutcome[];
  totalTokens: number;
  maxTokens: number;
  queriesExecuted: number;
  queriesSkipped: number;
}

export interface MultiQueryOptions {
  scope: QueryScope;
  searchMode: SearchMode;
  allowedModes: ReadonlySet<Capability>;
}

export async function runMultiQuery(
  optimizer: ContextOptimizer,
  queries: readonly MultiQueryItem[],
  totalBudget: number,
  options: MultiQueryOptions,
): Promise<MultiQueryResult> {
  const results: MultiQueryOutcome[] = [];
  let remaining = totalBudget;
  let skipped = 0;

  for (const item of queries) {
    if (remaining < MIN_QUERY_BUDGET) {
      skipped++;
      continue;
    }
    const budget = Math.min(item.maxTokens ?? remaining, remaining);
    try {
      const result = await optimizer.optimizeContext(
        { query: item.query, maxTokens: budget, searchMode: options.searchMode, scope: options.scope },
        options.allowedModes,
      );
      remaining -= result.totalTokens;
      results.push({ query: item.query, success: true, result });
    } catch (err) {
      logger.warn('multi_query:query_failed', { query: item.query, error: errorMessage(err) });
      results.push({ query: item.query, success: false, error: errorMessage(err) });
    }
  }

  if (skipped > 0) {
    logger.info('multi_query:budget_exhausted', { skipped, remaining });
  }

  return {
    results,
    totalTokens: totalBudget - remaining,
    maxTokens: totalBudget,
    queriesExecuted: results.length,
    queriesSkipped: skipped,
  };
}
