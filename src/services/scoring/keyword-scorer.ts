// src/services/scoring/keyword-scorer.ts: stem-aware keyword relevance over section titles and bodies
import type { Section } from '@/types/core';
import {
  AVG_BODY_LENGTH,
  BODY_WEIGHT,
  GENERIC_TITLE_TERMS,
  LENGTH_NORM_B,
  LENGTH_NORM_FLOOR,
  LIST_NUMBERED_BOOST,
  LIST_PLANNED_BOOST,
  LIST_QUERY_PATTERNS,
  NUMBERED_SECTION_PATTERNS,
  PLANNED_CONTENT_MARKERS,
  STOP_WORDS,
  TITLE_WEIGHT_DISTINCTIVE,
  TITLE_WEIGHT_GENERIC,
} from './constants';
import { stemKeyword, stemText, tokenizeWords } from './stemmer';

export interface LexicalScore {
  section: Section;
  score: number;
}

/** Lowercased query keywords with stop words and 1-char tokens removed, in query order. */
export function extractKeywords(query: string): string[] {
  return tokenizeWords(query).filter((w) => w.length >= 2 && !STOP_WORDS.has(w));
}

/** True when the query asks for a list of items ("what are the next steps", "roadmap"). */
export function isListQuery(query: string): boolean {
  const lower = query.toLowerCase();
  return LIST_QUERY_PATTERNS.some((pattern) => lower.includes(pattern));
}

function listPatternBoost(section: Section): number {
  const combined = `${section.title}\n${section.body}`.toLowerCase();
  if (NUMBERED_SECTION_PATTERNS.some((pattern) => pattern.test(combined))) return LIST_NUMBERED_BOOST;
  if (PLANNED_CONTENT_MARKERS.some((marker) => combined.includes(marker))) return LIST_PLANNED_BOOST;
  return 1;
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return count;
    count++;
    from = idx + needle.length;
  }
}

/** Stem match against stemmed text first, raw keyword against raw text as a fallback. */
function countKeyword(keyword: string, stem: string, rawLower: string, stemmed: string): number {
  const stemCount = countOccurrences(stemmed, stem);
  return stemCount > 0 ? stemCount : countOccurrences(rawLower, keyword);
}

function lengthNorm(bodyLength: number): number {
  const norm = 1 / (1 + LENGTH_NORM_B * (bodyLength / AVG_BODY_LENGTH - 1));
  return Math.max(norm, LENGTH_NORM_FLOOR);
}

export function scoreSection(section: Section, keywords: readonly string[], listQuery = false): number {
  if (keywords.length === 0) return 0;

  const titleLower = section.title.toLowerCase();
  const bodyLower = section.body.toLowerCase();
  const stemmedTitle = stemText(section.title);
  const stemmedBody = stemText(section.body);
  const norm = lengthNorm(bodyLower.length);

  let score = 0;
  let titleHits = 0;

  for (const keyword of keywords) {
    if (keyword.length < 2) continue;
    const stem = stemKeyword(keyword);

    const titleCount = countKeyword(keyword, stem, titleLower, stemmedTitle);
    if (titleCount > 0) {
      titleHits++;
      const generic = GENERIC_TITLE_TERMS.has(keyword) || GENERIC_TITLE_TERMS.has(stem);
      score += titleCount * (generic ? TITLE_WEIGHT_GENERIC : TITLE_WEIGHT_DISTINCTIVE);
    }

    const bodyCount = countKeyword(keyword, stem, bodyLower, stemmedBody);
    score += bodyCount * BODY_WEIGHT * norm;
  }

  if (score > 0 && section.level !== undefined) {
    score += Math.max(0, 4 - section.level) * 0.5;
  }

  // Several distinct keywords in one title is a strong topical signal.
  if (titleHits >= 2) {
    score *= 1 + titleHits * 2;
  }

  const phraseWords = keywords.filter((k) => k.length >= 3);
  if (phraseWords.length >= 2 && titleLower.includes(phraseWords.slice(0, 4).join(' '))) {
    score *= 3;
  }

  if (listQuery && score > 0) {
    score *= listPatternBoost(section);
  }

  return score;
}

/**
 * Scores every section against the query. Output is sorted by score, descending;
 * equal scores keep input order.
 */
export function scoreSections(query: string, sections: readonly Section[]): LexicalScore[] {
  return rankByKeywords(extractKeywords(query), sections, isListQuery(query));
}

export function rankByKeywords(
  keywords: readonly string[],
  sections: readonly Section[],
  listQuery = false,
): LexicalScore[] {
  return sections
    .map((section) => ({ section, score: scoreSection(section, keywords, listQuery) }))
    .sort((a, b) => b.score - a.score);
}

/** Title-only, stem-aware match; body text is deliberately ignored. */
export function titleMatchesKeywords(title: string, keywords: readonly string[]): boolean {
  const titleLower = title.toLowerCase();
  const stemmedTitle = stemText(title);
  return keywords.some((k) => countKeyword(k, stemKeyword(k), titleLower, stemmedTitle) > 0);
}
