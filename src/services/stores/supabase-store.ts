// src/services/stores/supabase-store.ts: Supabase/pgvector adapter for sections and vector search
// Tables and the match_sections RPC are declared in db/schema.sql.
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { DocumentMeta, Embedding, Project, QueryScope, Section } from '@/types/core';
import { RetrievalError } from '@/utils/errors';
import type { DocumentStore, NearestHit, SectionWriter, SimilarityIndex } from './document-store';

const projectRow = z.object({
  id: z.string(),
  plan: z.enum(['FREE', 'PRO', 'TEAM', 'ENTERPRISE', 'PARTNER']),
  shared_collection_ids: z.array(z.string()).nullable(),
});

const documentRow = z.object({
  id: z.string(),
  project_id: z.string(),
  title: z.string(),
  path: z.string(),
  category: z.enum(['MANDATORY', 'BEST_PRACTICES', 'GUIDELINES', 'REFERENCE']),
  shared: z.boolean(),
  collection_id: z.string().nullable(),
});

// pgvector columns come back as their text form, e.g. "[0.1,0.2]".
const vectorColumn = z
  .union([
    z.array(z.number()),
    z
      .string()
      .transform((s, ctx): unknown => {
        try {
          return JSON.parse(s);
        } catch {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a vector literal' });
          return z.NEVER;
        }
      })
      .pipe(z.array(z.number())),
  ])
  .nullable();

const sectionRow = z.object({
  id: z.string(),
  document_id: z.string(),
  title: z.string(),
  body: z.string(),
  token_count: z.number().int().nonnegative(),
  level: z.number().int().nullable(),
  embedding: vectorColumn,
});

const matchRow = z.object({
  section_id: z.string(),
  similarity: z.number(),
});

const DOCUMENT_COLUMNS = 'id, project_id, title, path, category, shared, collection_id';
const SECTION_COLUMNS = 'id, document_id, title, body, token_count, level, embedding';

function toDocument(row: z.infer<typeof documentRow>): DocumentMeta {
  return {
    id: row.id,
    projectId: row.project_id,
    title: row.title,
    path: row.path,
    category: row.category,
    shared: row.shared,
    ...(row.collection_id !== null && { collectionId: row.collection_id }),
  };
}

function toSection(row: z.infer<typeof sectionRow>): Section {
  return {
    id: row.id,
    documentId: row.document_id,
    title: row.title,
    body: row.body,
    tokenCount: row.token_count,
    ...(row.level !== null && { level: row.level }),
    ...(row.embedding !== null && { embedding: row.embedding }),
  };
}

function fail(operation: string, message: string): never {
  throw new RetrievalError(`supabase ${operation} failed: ${message}`);
}

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, operation: string): T[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    fail(operation, `unexpected row shape (${parsed.error.errors[0]?.path.join('.') ?? 'root'})`);
  }
  return parsed.data;
}

export class SupabaseSectionStore implements DocumentStore, SimilarityIndex, SectionWriter {
  constructor(private readonly client: SupabaseClient) {}

  static fromCredentials(url: string, serviceRoleKey: string): SupabaseSectionStore {
    return new SupabaseSectionStore(
      createClient(url, serviceRoleKey, { auth: { persistSession: false } }),
    );
  }

  async getProject(projectId: string): Promise<Project | null> {
    const { data, error } = await this.client
      .from('projects')
      .select('id, plan, shared_collection_ids')
      .eq('id', projectId)
      .maybeSingle();
    if (error) fail('getProject', error.message);
    if (data === null) return null;

    const [row] = parseRows(projectRow, [data], 'getProject');
    return { id: row.id, plan: row.plan, sharedCollectionIds: row.shared_collection_ids ?? [] };
  }

  async listDocuments(scope: QueryScope): Promise<DocumentMeta[]> {
    const own = await this.client
      .from('documents')
      .select(DOCUMENT_COLUMNS)
      .eq('project_id', scope.projectId)
      .eq('shared', false);
    if (own.error) fail('listDocuments', own.error.message);

    const rows: unknown[] = [...(own.data ?? [])];
    if (scope.sharedCollectionIds.length > 0) {
      const shared = await this.client
        .from('documents')
        .select(DOCUMENT_COLUMNS)
        .eq('shared', true)
        .in('collection_id', scope.sharedCollectionIds);
      if (shared.error) fail('listDocuments', shared.error.message);
      rows.push(...(shared.data ?? []));
    }

    return parseRows(documentRow, rows, 'listDocuments').map(toDocument);
  }

  async listSections(scope: QueryScope): Promise<Section[]> {
    const docIds = (await this.listDocuments(scope)).map((d) => d.id);
    if (docIds.length === 0) return [];

    const { data, error } = await this.client
      .from('sections')
      .select(SECTION_COLUMNS)
      .in('document_id', docIds);
    if (error) fail('listSections', error.message);

    return parseRows(sectionRow, data, 'listSections').map(toSection);
  }

  async nearest(vector: Embedding, topK: number, scope: QueryScope): Promise<NearestHit[]> {
    const { data, error } = await this.client.rpc('match_sections', {
      query_embedding: vector,
      match_count: topK,
      filter_project_id: scope.projectId,
      filter_collection_ids: scope.sharedCollectionIds,
    });
    if (error) fail('match_sections', error.message);

    return parseRows(matchRow, data, 'match_sections').map((r) => ({
      sectionId: r.section_id,
      similarity: r.similarity,
    }));
  }

  async upsertDocument(doc: DocumentMeta): Promise<void> {
    const { error } = await this.client.from('documents').upsert({
      id: doc.id,
      project_id: doc.projectId,
      title: doc.title,
      path: doc.path,
      category: doc.category,
      shared: doc.shared,
      collection_id: doc.collectionId ?? null,
    });
    if (error) fail('upsertDocument', error.message);
  }

  async upsertSections(sections: Section[]): Promise<void> {
    if (sections.length === 0) return;
    const { error } = await this.client.from('sections').upsert(
      sections.map((s) => ({
        id: s.id,
        document_id: s.documentId,
        title: s.title,
        body: s.body,
        token_count: s.tokenCount,
        level: s.level ?? null,
        embedding: s.embedding ?? null,
      })),
    );
    if (error) fail('upsertSections', error.message);
  }
}
