// src/types/core.ts: shared domain types for the context engine

export type SearchMode = 'keyword' | 'semantic' | 'hybrid';

/** Capabilities a caller's tier can unlock; search modes plus batch operations. */
export type Capability = SearchMode | 'multi_query';

export type Plan = 'FREE' | 'PRO' | 'TEAM' | 'ENTERPRISE' | 'PARTNER';

export type DocumentCategory = 'MANDATORY' | 'BEST_PRACTICES' | 'GUIDELINES' | 'REFERENCE';

export type Embedding = number[];

/** A unit of indexed content. Immutable after ingest except for re-embedding. */
export interface Section {
  readonly id: string;
  readonly documentId: string;
  readonly title: string;
  readonly body: string;
  readonly tokenCount: number;
  /** Markdown heading level (1-6) when the section came from a heading. */
  readonly level?: number;
  /** Large-model vector, present once the section has been indexed. */
  readonly embedding?: Embedding;
}

export interface DocumentMeta {
  id: string;
  projectId: string;
  title: string;
  path: string;
  category: DocumentCategory;
  /** Shared documents come from cross-tenant collections linked to the project. */
  shared: boolean;
  collectionId?: string;
}

export interface Project {
  id: string;
  plan: Plan;
  sharedCollectionIds: string[];
}

export interface QueryScope {
  projectId: string;
  sharedCollectionIds: string[];
}

export interface ContextRequest {
  query: string;
  maxTokens: number;
  searchMode: SearchMode;
  scope: QueryScope;
}

/** Per-query working state for one section; never outlives the query. */
export interface Candidate {
  section: Section;
  lexicalScore: number;
  semanticScore: number | null;
  fusedScore: number;
  fusedRank: number;
}

export type SemanticPath = 'precomputed' | 'on_the_fly' | 'skipped';

export type RetrievalState =
  | 'RECEIVED'
  | 'LEXICAL_SCORED'
  | 'PRECOMPUTED_SEMANTIC'
  | 'ON_THE_FLY_SEMANTIC'
  | 'SKIPPED'
  | 'FUSED'
  | 'BUDGETED'
  | 'DONE';

export interface ContextSection {
  id: string;
  documentId: string;
  title: string;
  body: string;
  tokenCount: number;
  /** 0-1, graded from the fused rank. */
  relevanceScore: number;
  lexicalScore: number;
  semanticScore: number | null;
  shared: boolean;
}

export interface RetrievalTiming {
  lexicalMs: number;
  semanticMs: number;
  fusionMs: number;
  budgetMs: number;
  totalMs: number;
}

export interface RankedResult {
  readonly query: string;
  readonly sections: readonly ContextSection[];
  readonly totalTokens: number;
  readonly maxTokens: number;
  readonly searchMode: SearchMode;
  readonly searchModeDowngraded: boolean;
  readonly semanticPath: SemanticPath;
  /** Titles of ranked sections that did not fit the budget. */
  readonly suggestions: readonly string[];
  readonly sharedContextIncluded: boolean;
  readonly sharedContextTokens: number;
  readonly trace: readonly RetrievalState[];
  readonly timing: RetrievalTiming;
}
