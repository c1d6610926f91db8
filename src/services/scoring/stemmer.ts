// src/services/scoring/stemmer.ts: lightweight suffix stemmer for keyword matching
//
// Stems are used for substring matching, so a shorter stem matches more variants:
// "prices" -> "pric" is a substring of "pricing", "priced", "price".

interface SuffixRule {
  suffix: string;
  /** Word must be strictly longer than this before the suffix is stripped. */
  minLength: number;
  /** Do not strip when the word ends with this longer suffix instead. */
  unless?: string;
}

// Longest suffixes first; the first matching rule wins.
const SUFFIX_RULES: readonly SuffixRule[] = [
  { suffix: 'tion', minLength: 7 },
  { suffix: 'ment', minLength: 7 },
  { suffix: 'ness', minLength: 7 },
  { suffix: 'ible', minLength: 7 },
  { suffix: 'able', minLength: 7 },
  { suffix: 'ing', minLength: 6 },
  { suffix: 'ies', minLength: 6 },
  { suffix: 'ed', minLength: 5, unless: 'eed' },
  { suffix: 'er', minLength: 5 },
  { suffix: 'ly', minLength: 5 },
  { suffix: 'es', minLength: 5 },
  { suffix: 's', minLength: 4, unless: 'ss' },
  { suffix: 'e', minLength: 4, unless: 'ee' },
];

export function stemKeyword(word: string): string {
  const lower = word.toLowerCase();
  for (const rule of SUFFIX_RULES) {
    if (lower.length <= rule.minLength || !lower.endsWith(rule.suffix)) continue;
    if (rule.unless && lower.endsWith(rule.unless)) continue;
    return lower.slice(0, -rule.suffix.length);
  }
  return lower;
}

export function tokenizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter(Boolean);
}

/** Stems every word of `text`; the result is space-joined for substring matching. */
export function stemText(text: string): string {
  return tokenizeWords(text).map(stemKeyword).join(' ');
}
