// src/services/scoring/rrf-fusion.ts: reciprocal-rank fusion of lexical and semantic rankings
import { RELEVANCE_DECAY, RRF_K } from './constants';

export interface FusedEntry {
  id: string;
  score: number;
  /** 1-based position in the fused ranking. */
  rank: number;
}

export interface FusionOptions {
  k?: number;
  /** Ranking consulted for equal fused scores; defaults to the first ranking. */
  tieBreak?: readonly string[];
}

/**
 * Fuses rankings (ordered id lists, best first). Each id scores
 * sum(1 / (k + rank)) over the rankings it appears in; absent ids add nothing.
 *
 * Ties go to the id ranked higher in `tieBreak` (the first ranking by default),
 * then to the id present in more rankings, then to first appearance. The result
 * depends only on the input.
 */
export function reciprocalRankFusion(
  rankings: ReadonlyArray<readonly string[]>,
  options: FusionOptions = {},
): FusedEntry[] {
  const k = options.k ?? RRF_K;
  const scores = new Map<string, number>();
  const appearances = new Map<string, number>();
  const firstSeen = new Map<string, number>();

  for (const ranking of rankings) {
    const seenInRanking = new Set<string>();
    ranking.forEach((id, idx) => {
      if (seenInRanking.has(id)) return;
      seenInRanking.add(id);
      scores.set(id, (scores.get(id) ?? 0) + 1 / (k + idx + 1));
      appearances.set(id, (appearances.get(id) ?? 0) + 1);
      if (!firstSeen.has(id)) firstSeen.set(id, firstSeen.size);
    });
  }

  const primary = new Map<string, number>();
  (options.tieBreak ?? rankings[0] ?? []).forEach((id, idx) => {
    if (!primary.has(id)) primary.set(id, idx);
  });

  const ids = Array.from(scores.keys());
  ids.sort((a, b) => {
    const diff = (scores.get(b) ?? 0) - (scores.get(a) ?? 0);
    if (diff !== 0) return diff;
    const pa = primary.get(a) ?? Number.POSITIVE_INFINITY;
    const pb = primary.get(b) ?? Number.POSITIVE_INFINITY;
    if (pa !== pb) return pa - pb;
    const ap = (appearances.get(b) ?? 0) - (appearances.get(a) ?? 0);
    if (ap !== 0) return ap;
    return (firstSeen.get(a) ?? 0) - (firstSeen.get(b) ?? 0);
  });

  return ids.map((id, idx) => ({ id, score: scores.get(id) ?? 0, rank: idx + 1 }));
}

/**
 * Maps fused scores to 0-1 relevance: the top entry gets 1, the rest blend a
 * per-rank decay (40%) with their score ratio to the top (60%), floored at 0.01.
 */
export function gradedRelevance(fused: readonly FusedEntry[]): Map<string, number> {
  const out = new Map<string, number>();
  if (fused.length === 0) return out;

  const top = fused[0].score > 0 ? fused[0].score : 1;
  fused.forEach((entry, i) => {
    if (i === 0) {
      out.set(entry.id, 1);
      return;
    }
    const graded = 0.4 * RELEVANCE_DECAY ** i + 0.6 * (entry.score / top);
    out.set(entry.id, Math.max(Math.round(graded * 1000) / 1000, 0.01));
  });
  return out;
}
