import { once } from 'node:events';
import type { Express } from 'express';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { Plan } from '@/types/core';
import { createApp } from '@/app';
import type { EmbeddingProvider } from '@/services/embeddings/embedding-provider';
import { PlanTierGate } from '@/services/tier-gate';
import type { InMemoryDocumentStore } from '@/services/stores/in-memory-store';
import { InMemoryCounterStore } from '@/stability/counterStore';
import { RateLimiter } from '@/stability/rateLimiter';
import { PROJECT, makeDocument, makeOptimizer, makeProvider, makeSection, makeStore } from './helpers';

interface RunningApp {
  url: string;
  close: () => Promise<void>;
}

async function start(app: Express): Promise<RunningApp> {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server did not bind a port');
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

async function buildStore(): Promise<InMemoryDocumentStore> {
  return makeStore(
    [
      makeDocument('doc-main'),
      makeDocument('doc-free', { projectId: 'proj-free' }),
      makeDocument('doc-team', { projectId: 'proj-team' }),
    ],
    ['doc-main', 'doc-free', 'doc-team'].flatMap((documentId) => [
      makeSection(`${documentId}-plans`, 'Pricing Plans', 'Plans renew monthly.', { documentId, tokenCount: 40 }),
      makeSection(`${documentId}-refunds`, 'Refunds', 'Refunds take five days.', { documentId, tokenCount: 20 }),
    ]),
    [
      PROJECT,
      { id: 'proj-free', plan: 'FREE', sharedCollectionIds: [] },
      { id: 'proj-team', plan: 'TEAM', sharedCollectionIds: [] },
    ],
  );
}

async function startEngine(options: {
  planLimits?: Partial<Record<Plan, number>>;
  embeddings?: EmbeddingProvider;
} = {}): Promise<RunningApp> {
  const store = await buildStore();
  const { optimizer, provider } = await makeOptimizer(store, options.embeddings);
  const limiter = new RateLimiter({
    store: new InMemoryCounterStore(),
    windowSeconds: 60,
    maxRequests: 1000,
    planLimits: options.planLimits,
  });
  return start(createApp({ optimizer, embeddings: provider, store, tierGate: new PlanTierGate(), limiter }));
}

function post(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('HTTP surface', () => {
  let engine: RunningApp;

  beforeAll(async () => {
    engine = await startEngine();
  });

  afterAll(async () => {
    await engine.close();
  });

  it('answers liveness and readiness', async () => {
    const health = await fetch(`${engine.url}/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'OK' });

    const ready = await fetch(`${engine.url}/ready`);
    expect(ready.status).toBe(200);
    expect(await ready.json()).toEqual({ status: 'READY', models: { large: 'test-large', small: 'test-small' } });
  });

  it('returns a budgeted context for a project', async () => {
    const res = await post(`${engine.url}/v1/proj-1/context`, { query: 'pricing plans', maxTokens: 1000 });
    expect(res.status).toBe(200);
    expect(res.headers.get('x-correlation-id')).toBeTruthy();
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        searchMode: 'hybrid',
        searchModeDowngraded: false,
        semanticPath: 'on_the_fly',
        totalTokens: 40,
        maxTokens: 1000,
        sections: [{ id: 'doc-main-plans', title: 'Pricing Plans', relevanceScore: 1 }],
      },
    });
  });

  it('downgrades search mode for a FREE project', async () => {
    const res = await post(`${engine.url}/v1/proj-free/context`, { query: 'refunds' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      data: {
        searchMode: 'keyword',
        searchModeDowngraded: true,
        maxTokens: 4000,
        sections: [{ id: 'doc-free-refunds' }],
      },
    });
  });

  it('rejects an invalid body with field-level errors', async () => {
    const res = await post(`${engine.url}/v1/proj-1/context`, { query: '' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      message: 'Invalid context request',
      errors: [{ path: 'query', message: 'Query is required and cannot be empty' }],
      code: 'invalid_query',
    });

    const tooSmall = await post(`${engine.url}/v1/proj-1/context`, { query: 'pricing', maxTokens: 50 });
    expect(tooSmall.status).toBe(400);
    expect(await tooSmall.json()).toMatchObject({ code: 'invalid_query', errors: [{ path: 'maxTokens' }] });
  });

  it('rejects malformed JSON', async () => {
    const res = await post(`${engine.url}/v1/proj-1/context`, '{"query":');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      message: 'Request body is not valid JSON',
      code: 'invalid_json',
    });
  });

  it('returns 404 for unknown projects and routes', async () => {
    const project = await post(`${engine.url}/v1/nope/context`, { query: 'pricing' });
    expect(project.status).toBe(404);
    expect(await project.json()).toEqual({
      success: false,
      message: 'Project nope not found',
      code: 'project_not_found',
    });

    const route = await fetch(`${engine.url}/nope`);
    expect(route.status).toBe(404);
    expect(await route.json()).toMatchObject({ code: 'not_found' });
  });

  it('gates multi-query on the plan', async () => {
    const body = { queries: [{ query: 'pricing' }, { query: 'refunds' }], maxTokens: 1000 };

    const denied = await post(`${engine.url}/v1/proj-1/multi-query`, body);
    expect(denied.status).toBe(403);
    expect(await denied.json()).toEqual({
      success: false,
      message: 'Plan PRO does not include multi-query',
      code: 'capability_denied',
    });

    const allowed = await post(`${engine.url}/v1/proj-team/multi-query`, body);
    expect(allowed.status).toBe(200);
    expect(await allowed.json()).toMatchObject({
      success: true,
      data: { totalTokens: 60, maxTokens: 1000, queriesExecuted: 2, queriesSkipped: 0 },
    });
  });
});

describe('HTTP rate limiting', () => {
  let engine: RunningApp;

  beforeAll(async () => {
    engine = await startEngine({ planLimits: { PRO: 2 } });
  });

  afterAll(async () => {
    await engine.close();
  });

  it('returns 429 with Retry-After once a caller exceeds its plan limit', async () => {
    const url = `${engine.url}/v1/proj-1/context`;
    const headers = { 'x-api-key': 'test-key-1' };

    expect((await post(url, { query: 'pricing' }, headers)).status).toBe(200);
    const second = await post(url, { query: 'pricing' }, headers);
    expect(second.status).toBe(200);
    expect(second.headers.get('x-ratelimit-remaining')).toBe('0');

    const third = await post(url, { query: 'pricing' }, headers);
    expect(third.status).toBe(429);
    expect(third.headers.get('retry-after')).toBe('60');
    expect(await third.json()).toEqual({
      success: false,
      message: 'Rate limit exceeded: 2 requests per window',
      code: 'rate_limited',
    });

    expect((await post(url, { query: 'pricing' }, { 'x-api-key': 'test-key-2' })).status).toBe(200);
  });
});

describe('readiness before models load', () => {
  it('reports 503 until the large model is loaded', async () => {
    const provider = makeProvider();
    const engine = await startEngine({ embeddings: provider });
    try {
      const res = await fetch(`${engine.url}/ready`);
      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ success: false, message: 'Embedding model not loaded', code: 'not_ready' });

      await provider.preload();
      expect((await fetch(`${engine.url}/ready`)).status).toBe(200);
    } finally {
      await engine.close();
    }
  });
});
