// src/services/section-indexer.ts: turns raw section drafts into token-counted, embedded Sections
import type { Section } from '@/types/core';
import type { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import type { SectionWriter } from '@/services/stores/document-store';
import { logger } from '@/services/logger';
import { countTokens } from './tokens';

export interface SectionDraft {
  id: string;
  documentId: string;
  title: string;
  body: string;
  level?: number;
}

function embeddingInput(section: { title: string; body: string }): string {
  return `${section.title}\n${section.body}`;
}

export class SectionIndexer {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly writer?: SectionWriter,
  ) {}

  /**
   * Counts tokens and embeds with the large model. Runs inline (blocking
   * variant), so keep it off request paths.
   */
  async indexSections(drafts: readonly SectionDraft[]): Promise<Section[]> {
    if (drafts.length === 0) return [];
    const startedAt = Date.now();
    const vectors = await this.embeddings.embedTexts('large', drafts.map(embeddingInput));

    const sections = drafts.map((draft, i): Section =>
      Object.freeze({
        id: draft.id,
        documentId: draft.documentId,
        title: draft.title,
        body: draft.body,
        tokenCount: countTokens(embeddingInput(draft)),
        ...(draft.level !== undefined && { level: draft.level }),
        embedding: vectors[i],
      }),
    );

    if (this.writer) await this.writer.upsertSections(sections);
    logger.info('indexer:indexed', { sections: sections.length, ms: Date.now() - startedAt });
    return sections;
  }

  /** Replaces embeddings only; text and token counts are kept. */
  async reindex(sections: readonly Section[]): Promise<Section[]> {
    if (sections.length === 0) return [];
    const vectors = await this.embeddings.embedTexts('large', sections.map(embeddingInput));
    const updated = sections.map((section, i): Section => Object.freeze({ ...section, embedding: vectors[i] }));

    if (this.writer) await this.writer.upsertSections(updated);
    logger.info('indexer:reindexed', { sections: updated.length });
    return updated;
  }
}
