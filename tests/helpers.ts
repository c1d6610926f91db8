// Shared builders for tests: small hashed models, an in-memory store and a seeded optimizer.
import type { DocumentMeta, Embedding, Project, Section } from '@/types/core';
import { BaseEmbedding, type EmbeddingModelConfig } from '@/services/embeddings/embedding-model';
import { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import { HashedEmbeddingModel } from '@/services/embeddings/hashed-embedding';
import { InferencePool } from '@/services/embeddings/inference-pool';
import { InMemoryDocumentStore } from '@/services/stores/in-memory-store';
import { SemanticScorer } from '@/services/scoring/semantic-scorer';
import { ContextOptimizer } from '@/services/retrieval-orchestrator';

export const LARGE = { model: 'test-large', dimensions: 64 };
export const SMALL = { model: 'test-small', dimensions: 32 };

export class FailingModel extends BaseEmbedding {
  constructor(config: EmbeddingModelConfig = SMALL) {
    super(config);
  }

  async load(): Promise<void> {
    throw new Error('weights missing');
  }

  async embedText(): Promise<Embedding[]> {
    throw new Error('model not loaded');
  }
}

export interface ProviderOverrides {
  large?: BaseEmbedding;
  small?: BaseEmbedding;
  pool?: InferencePool;
  batchSize?: number;
}

export function makeProvider(overrides: ProviderOverrides = {}): EmbeddingProvider {
  return new EmbeddingProvider({
    large: overrides.large ?? new HashedEmbeddingModel(LARGE),
    small: overrides.small ?? new HashedEmbeddingModel(SMALL),
    pool: overrides.pool ?? new InferencePool({ concurrency: 2, queueLimit: 100 }),
    batchSize: overrides.batchSize ?? 8,
  });
}

export async function readyProvider(overrides: ProviderOverrides = {}): Promise<EmbeddingProvider> {
  const provider = makeProvider(overrides);
  await provider.preload();
  return provider;
}

export function makeSection(
  id: string,
  title: string,
  body: string,
  extra: { documentId?: string; tokenCount?: number; level?: number; embedding?: Embedding } = {},
): Section {
  return {
    id,
    documentId: extra.documentId ?? 'doc-main',
    title,
    body,
    tokenCount: extra.tokenCount ?? 50,
    ...(extra.level !== undefined && { level: extra.level }),
    ...(extra.embedding !== undefined && { embedding: extra.embedding }),
  };
}

export function makeDocument(id: string, overrides: Partial<DocumentMeta> = {}): DocumentMeta {
  return {
    id,
    projectId: 'proj-1',
    title: id,
    path: `${id}.md`,
    category: 'REFERENCE',
    shared: false,
    ...overrides,
  };
}

export const PROJECT: Project = { id: 'proj-1', plan: 'PRO', sharedCollectionIds: ['shared-1'] };
export const SCOPE = { projectId: PROJECT.id, sharedCollectionIds: PROJECT.sharedCollectionIds };

export async function makeStore(
  documents: DocumentMeta[],
  sections: Section[],
  projects: Project[] = [PROJECT],
): Promise<InMemoryDocumentStore> {
  const store = new InMemoryDocumentStore();
  for (const project of projects) store.addProject(project);
  for (const doc of documents) await store.upsertDocument(doc);
  await store.upsertSections(sections);
  return store;
}

export async function makeOptimizer(store: InMemoryDocumentStore, embeddings?: EmbeddingProvider) {
  const provider = embeddings ?? (await readyProvider());
  const scorer = new SemanticScorer(provider, store, { minSimilarity: 0.3 });
  return { optimizer: new ContextOptimizer({ store, scorer, embeddings: provider }), scorer, provider };
}
