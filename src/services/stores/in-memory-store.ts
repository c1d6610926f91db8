// Process-local document store and brute-force vector index
import type { DocumentMeta, Embedding, Project, QueryScope, Section } from '@/types/core';
import { cosineSimilarity } from '@/services/embeddings/embedding-model';
import type {
  DocumentStore,
  NearestHit,
  SectionWriter,
  SimilarityIndex,
} from './document-store';
import { scopeIncludes } from './document-store';

export class InMemoryDocumentStore implements DocumentStore, SimilarityIndex, SectionWriter {
  private readonly projects = new Map<string, Project>();
  private readonly documents = new Map<string, DocumentMeta>();
  private readonly sections = new Map<string, Section>();

  addProject(project: Project): void {
    this.projects.set(project.id, project);
  }

  async upsertDocument(doc: DocumentMeta): Promise<void> {
    this.documents.set(doc.id, doc);
  }

  async upsertSections(sections: Section[]): Promise<void> {
    for (const s of sections) this.sections.set(s.id, Object.freeze({ ...s }));
  }

  async getProject(projectId: string): Promise<Project | null> {
    return this.projects.get(projectId) ?? null;
  }

  async listDocuments(scope: QueryScope): Promise<DocumentMeta[]> {
    return Array.from(this.documents.values()).filter((d) => scopeIncludes(scope, d));
  }

  async listSections(scope: QueryScope): Promise<Section[]> {
    const docIds = new Set((await this.listDocuments(scope)).map((d) => d.id));
    return Array.from(this.sections.values()).filter((s) => docIds.has(s.documentId));
  }

  async nearest(vector: Embedding, topK: number, scope: QueryScope): Promise<NearestHit[]> {
    const sections = await this.listSections(scope);
    const hits: NearestHit[] = [];
    for (const s of sections) {
      if (!s.embedding) continue;
      hits.push({ sectionId: s.id, similarity: cosineSimilarity(vector, s.embedding) });
    }
    hits.sort((a, b) => b.similarity - a.similarity);
    return hits.slice(0, topK);
  }
}
