// Tuning constants for hybrid retrieval
import stopWordList from './stop-words.json';

/** Closed list of function words excluded from keyword scoring. */
export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/** Reciprocal-rank-fusion constant; ranks past ~30 contribute next to nothing. */
export const RRF_K = 60;

/** Candidates below max(DROP_OFF_RATIO × top score, DROP_OFF_FLOOR) never reach semantic scoring. */
export const DROP_OFF_RATIO = 0.1;
export const DROP_OFF_FLOOR = 2.0;

/** Hard cap on sections handed to semantic scoring per query. */
export const MAX_SEMANTIC_CANDIDATES = 30;

/** Body characters embedded per section on the on-the-fly path (title carries most signal). */
export const ON_THE_FLY_SNIPPET_CHARS = 120;

export const TITLE_WEIGHT_DISTINCTIVE = 5.0;
export const TITLE_WEIGHT_GENERIC = 1.5;
export const BODY_WEIGHT = 1.0;

/** Average body length (chars) used for length normalisation. */
export const AVG_BODY_LENGTH = 2000;
export const LENGTH_NORM_B = 0.75;
export const LENGTH_NORM_FLOOR = 0.15;

/** Terms that show up in many titles; title hits on them get reduced weight. */
export const GENERIC_TITLE_TERMS: ReadonlySet<string> = new Set([
  'tool',
  'tools',
  'guide',
  'reference',
  'overview',
  'docs',
  'documentation',
  'introduction',
  'intro',
  'setup',
  'general',
  'notes',
]);

/** Query phrases that ask for an enumeration of items (substring match on the lowercased query). */
export const LIST_QUERY_PATTERNS: readonly string[] = [
  'what are the',
  'list the',
  'list all',
  'which',
  'what to write',
  'what to do',
  'next articles',
  'next tasks',
  'next steps',
  'upcoming',
  'planned',
  'todo',
  'to-do',
  'roadmap',
];

/** Enumerated items in a section's title or body: "### Task #2", "## 1.", "1)", "#3". */
export const NUMBERED_SECTION_PATTERNS: readonly RegExp[] = [
  /^#+\s*(?:article|task|step|item|feature|issue|bug|story)\s*#?\d+/im,
  /^#+\s*\d+[.):]/m,
  /^\d+[.)]/m,
  /#\d+\b/,
];

/** Markers of planned or unfinished content, matched case-insensitively. */
export const PLANNED_CONTENT_MARKERS: readonly string[] = [
  '\u{1F4DD}',
  'unpublished',
  'planned',
  'draft',
  'todo',
  'upcoming',
  'next:',
  'status:',
  'wip',
  'in progress',
  'pending',
];

export const LIST_NUMBERED_BOOST = 1.5;
export const LIST_PLANNED_BOOST = 1.3;

/** Graded relevance decay per rank position. */
export const RELEVANCE_DECAY = 0.94;
