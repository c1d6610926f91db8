// src/services/stores/document-store.ts: collaborator contracts for section storage and vector search
import type { DocumentMeta, Embedding, Project, QueryScope, Section } from '@/types/core';

/** Read-only access to indexed content, scoped to a project and its linked shared collections. */
export interface DocumentStore {
  getProject(projectId: string): Promise<Project | null>;
  listDocuments(scope: QueryScope): Promise<DocumentMeta[]>;
  listSections(scope: QueryScope): Promise<Section[]>;
}

export interface NearestHit {
  sectionId: string;
  similarity: number;
}

/** Nearest-neighbour search over stored large-model vectors; results best first. */
export interface SimilarityIndex {
  nearest(vector: Embedding, topK: number, scope: QueryScope): Promise<NearestHit[]>;
}

/** Write side used by the indexer. */
export interface SectionWriter {
  upsertDocument(doc: DocumentMeta): Promise<void>;
  upsertSections(sections: Section[]): Promise<void>;
}

export function scopeIncludes(scope: QueryScope, doc: DocumentMeta): boolean {
  if (doc.shared) {
    return doc.collectionId !== undefined && scope.sharedCollectionIds.includes(doc.collectionId);
  }
  return doc.projectId === scope.projectId;
}
