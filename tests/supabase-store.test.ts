import { createClient } from '@supabase/supabase-js';
import { describe, expect, it } from 'vitest';
import { SupabaseSectionStore } from '@/services/stores/supabase-store';
import { RetrievalError } from '@/utils/errors';
import { SCOPE } from './helpers';

interface Captured {
  url: string;
  body: unknown;
}

// Answers PostgREST calls in process; `route` maps a request URL to a status and JSON body.
function storeWith(route: (url: string) => { status: number; body: unknown }) {
  const requests: Captured[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = input instanceof Request ? input.url : String(input);
    requests.push({ url, body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined });
    const { status, body } = route(url);
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
  };
  const client = createClient('http://localhost:54321', 'test-secret', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fakeFetch },
  });
  return { store: new SupabaseSectionStore(client), requests };
}

describe('SupabaseSectionStore', () => {
  it('calls match_sections with the scope and maps hits', async () => {
    const { store, requests } = storeWith(() => ({
      status: 200,
      body: [
        { section_id: 's1', similarity: 0.91 },
        { section_id: 's2', similarity: 0.42 },
      ],
    }));

    const hits = await store.nearest([0.1, 0.2], 30, SCOPE);
    expect(hits).toEqual([
      { sectionId: 's1', similarity: 0.91 },
      { sectionId: 's2', similarity: 0.42 },
    ]);
    expect(requests[0].url).toContain('/rest/v1/rpc/match_sections');
    expect(requests[0].body).toEqual({
      query_embedding: [0.1, 0.2],
      match_count: 30,
      filter_project_id: 'proj-1',
      filter_collection_ids: ['shared-1'],
    });
  });

  it('turns PostgREST errors into RetrievalError', async () => {
    const { store } = storeWith(() => ({ status: 500, body: { message: 'statement timeout' } }));
    await expect(store.nearest([0.1], 30, SCOPE)).rejects.toThrow(
      new RetrievalError('supabase match_sections failed: statement timeout'),
    );
  });

  it('merges project and shared documents', async () => {
    const doc = (id: string, shared: boolean, collection: string | null) => ({
      id,
      project_id: shared ? 'owner' : 'proj-1',
      title: id,
      path: `${id}.md`,
      category: 'REFERENCE',
      shared,
      collection_id: collection,
    });
    const { store } = storeWith((url) => ({
      status: 200,
      body: url.includes('shared=eq.false') ? [doc('own', false, null)] : [doc('linked', true, 'shared-1')],
    }));

    const docs = await store.listDocuments(SCOPE);
    expect(docs).toEqual([
      { id: 'own', projectId: 'proj-1', title: 'own', path: 'own.md', category: 'REFERENCE', shared: false },
      {
        id: 'linked',
        projectId: 'owner',
        title: 'linked',
        path: 'linked.md',
        category: 'REFERENCE',
        shared: true,
        collectionId: 'shared-1',
      },
    ]);
  });

  it('rejects rows of an unexpected shape', async () => {
    const { store } = storeWith(() => ({ status: 200, body: [{ section_id: 's1' }] }));
    await expect(store.nearest([0.1], 30, SCOPE)).rejects.toBeInstanceOf(RetrievalError);
  });
});
