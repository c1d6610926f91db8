// src/services/stores/seed-loader.ts: loads a JSON document seed into the in-memory store
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SectionIndexer, SectionDraft } from '@/services/section-indexer';
import { logger } from '@/services/logger';
import type { InMemoryDocumentStore } from './in-memory-store';

const seedSchema = z.object({
  projects: z.array(
    z.object({
      id: z.string().min(1),
      plan: z.enum(['FREE', 'PRO', 'TEAM', 'ENTERPRISE', 'PARTNER']),
      sharedCollectionIds: z.array(z.string()).default([]),
    }),
  ),
  documents: z.array(
    z.object({
      id: z.string().min(1),
      projectId: z.string().min(1),
      title: z.string(),
      path: z.string(),
      category: z.enum(['MANDATORY', 'BEST_PRACTICES', 'GUIDELINES', 'REFERENCE']).default('REFERENCE'),
      shared: z.boolean().default(false),
      collectionId: z.string().optional(),
      sections: z.array(
        z.object({
          id: z.string().min(1),
          title: z.string(),
          body: z.string(),
          level: z.number().int().min(1).max(6).optional(),
        }),
      ),
    }),
  ),
});

export type DocumentSeed = z.infer<typeof seedSchema>;

export function parseDocumentSeed(raw: unknown): DocumentSeed {
  const parsed = seedSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid document seed: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function seedStore(
  store: InMemoryDocumentStore,
  indexer: SectionIndexer,
  seed: DocumentSeed,
): Promise<{ projects: number; documents: number; sections: number }> {
  for (const project of seed.projects) store.addProject(project);

  const drafts: SectionDraft[] = [];
  for (const { sections, ...doc } of seed.documents) {
    await store.upsertDocument(doc);
    for (const section of sections) drafts.push({ ...section, documentId: doc.id });
  }

  const indexed = await indexer.indexSections(drafts);
  await store.upsertSections(indexed);
  return { projects: seed.projects.length, documents: seed.documents.length, sections: indexed.length };
}

export async function loadDocumentsFile(
  path: string,
  store: InMemoryDocumentStore,
  indexer: SectionIndexer,
): Promise<void> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  const counts = await seedStore(store, indexer, parseDocumentSeed(raw));
  logger.info('store:seeded', { path, ...counts });
}
