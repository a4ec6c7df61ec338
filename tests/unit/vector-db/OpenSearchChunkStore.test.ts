/**
 * Unit tests for the OpenSearch backend
 *
 * Requests go to an in-process fake cluster through a stubbed fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  OpenSearchChunkStore,
  buildKnnFilter,
  scoreToDistance,
} from '../../../src/vector-db/OpenSearchChunkStore.js';
import { ErrorCode } from '../../../src/core/errors.js';
import { isRecord } from '../../../src/shared/utils.js';
import { FakeOpenSearch } from '../../support/FakeOpenSearch.js';
import { angled, makeChunk, untypedFilters } from '../../support/fixtures.js';

describe('scoreToDistance', () => {
  it('should map lucene cosinesimil scores back to cosine distance', () => {
    expect(scoreToDistance(1)).toBe(0);
    expect(scoreToDistance(0.5)).toBe(1);
    expect(scoreToDistance(0)).toBe(2);
    expect(scoreToDistance(0.75)).toBeCloseTo(0.5, 10);
  });

  it('should never go negative', () => {
    expect(scoreToDistance(1.0000001)).toBe(0);
  });
});

describe('buildKnnFilter', () => {
  it('should use term for one value and terms for several', () => {
    expect(
      buildKnnFilter([
        { field: 'docType', values: ['issue'] },
        { field: 'roleTags', values: ['support', 'manager'] },
      ])
    ).toEqual({
      bool: {
        filter: [{ term: { doc_type: 'issue' } }, { terms: { role_tags: ['support', 'manager'] } }],
      },
    });
  });

  it('should return undefined without filters', () => {
    expect(buildKnnFilter([])).toBeUndefined();
  });
});

describe('OpenSearchChunkStore', () => {
  let cluster: FakeOpenSearch;

  beforeEach(() => {
    cluster = new FakeOpenSearch();
    vi.stubGlobal('fetch', cluster.fetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function createStore(overrides: Partial<ConstructorParameters<typeof OpenSearchChunkStore>[0]> = {}) {
    return new OpenSearchChunkStore({
      endpoint: 'http://search.test:9200/',
      indexPrefix: 'kb',
      dimension: 4,
      ...overrides,
    });
  }

  it('should create one k-NN index per partition', async () => {
    await createStore({ m: 24, efConstruction: 128 }).initialize();

    expect([...cluster.indexes.keys()]).toEqual(['kb-developer', 'kb-support', 'kb-manager', 'kb-general']);

    const mapping = cluster.indexes.get('kb-general')?.mapping;
    expect(mapping).toMatchObject({
      settings: { index: { knn: true } },
      mappings: {
        properties: {
          embedding: {
            type: 'knn_vector',
            dimension: 4,
            method: {
              name: 'hnsw',
              space_type: 'cosinesimil',
              engine: 'lucene',
              parameters: { ef_construction: 128, m: 24 },
            },
          },
          role_tags: { type: 'keyword' },
          degraded: { type: 'boolean' },
          metadata: { type: 'object', enabled: false },
        },
      },
    });
  });

  it('should not recreate existing indexes', async () => {
    await createStore().initialize();
    await createStore().initialize();

    const creates = cluster.requests.filter((request) => request.method === 'PUT');
    expect(creates).toHaveLength(4);
  });

  it('should send api key auth when configured', async () => {
    await createStore({ apiKey: 'test-secret' }).initialize();

    expect(cluster.requests[0].headers.Authorization).toBe('ApiKey test-secret');
  });

  it('should send basic auth for a username', async () => {
    await createStore({ username: 'admin', password: 'test-secret' }).initialize();

    const expected = `Basic ${Buffer.from('admin:test-secret').toString('base64')}`;
    expect(cluster.requests[0].headers.Authorization).toBe(expected);
  });

  it('should store keyword fields beside the stored metadata', async () => {
    const store = createStore();
    await store.write(
      makeChunk({ id: 'c/1', embedding: angled(0), roleTags: ['support'], documentKey: 'K', contentType: 'faq' }),
      ['support']
    );

    const [doc] = cluster.docs('kb-support');
    expect(doc).toMatchObject({
      id: 'c/1',
      source: 'wiki',
      doc_type: 'documentation',
      role_tags: ['support'],
      source_document_id: 'doc-c/1',
      document_key: 'K',
      content_type: 'faq',
      embedding: angled(0),
      degraded: false,
    });
    expect(cluster.requests.at(-1)?.path).toBe('/kb-support/_doc/c%2F1?refresh=false');
  });

  it('should put filters inside the knn clause', async () => {
    const store = createStore();
    await store.search(angled(0), 'developer', 3, { source: 'wiki' });

    const searches = cluster.requests.filter((request) => request.path.endsWith('/_search'));
    expect(searches.map((request) => request.path)).toEqual(['/kb-general/_search', '/kb-developer/_search']);

    const body = searches[0].body;
    expect(body).toEqual({
      size: 3,
      _source: { excludes: ['embedding'] },
      query: {
        knn: {
          embedding: {
            vector: angled(0),
            k: 3,
            filter: { bool: { filter: [{ term: { source: 'wiki' } }] } },
          },
        },
      },
    });
  });

  it('should not contact the cluster for an invalid filter', async () => {
    const store = createStore();

    await expect(store.search(angled(0), 'general', 3, untypedFilters('{"nope":"x"}'))).rejects.toMatchObject({
      code: ErrorCode.INVALID_FILTER,
    });
    expect(cluster.requests).toEqual([]);
  });

  it('should report partitions whose write failed', async () => {
    const store = createStore();
    await store.initialize();
    cluster.failing.add('kb-support');

    const report = await store.write(makeChunk({ id: 'c1', embedding: angled(0) }), ['developer', 'support']);

    expect(report).toEqual({ written: ['developer'], failed: ['support'] });
    expect(cluster.docs('kb-developer')).toHaveLength(1);
  });

  it('should keep results from healthy partitions when one query fails', async () => {
    const store = createStore();
    await store.write(makeChunk({ id: 'shared', embedding: angled(0) }), ['general']);
    await store.write(makeChunk({ id: 'dev', embedding: angled(1) }), ['developer']);
    cluster.failing.add('kb-developer');

    const hits = await store.search(angled(0), 'developer', 5);

    expect(hits.map((hit) => hit.id)).toEqual(['shared']);
    expect(console.error).toHaveBeenCalledWith(
      '[OpenSearchChunkStore]',
      'Failed to query partition developer:',
      'OpenSearch POST /kb-developer/_search failed with 500: shard failure'
    );
  });

  it('should count a missing index as empty', async () => {
    const store = createStore();
    await store.initialize();
    cluster.indexes.delete('kb-manager');

    expect(await store.stats()).toEqual({ developer: 0, support: 0, manager: 0, general: 0 });
  });

  it('should report cluster health', async () => {
    expect(await createStore().health()).toBe('green');
  });

  it('should fail initialization when the cluster rejects index creation', async () => {
    cluster.failing.add('kb-developer');

    const error: unknown = await createStore()
      .initialize()
      .then(
        () => undefined,
        (caught: unknown) => caught
      );

    expect(isRecord(error) && error.code).toBe(ErrorCode.STORE_UNAVAILABLE);
  });

  it('should retry initialization after a failed attempt', async () => {
    const store = createStore();
    cluster.failing.add('kb-developer');
    await expect(store.initialize()).rejects.toMatchObject({ code: ErrorCode.STORE_UNAVAILABLE });

    cluster.failing.delete('kb-developer');
    await store.initialize();

    expect([...cluster.indexes.keys()].sort()).toEqual(['kb-developer', 'kb-general', 'kb-manager', 'kb-support']);
  });

  it('should accept an index another writer created between the check and the create', async () => {
    let raced = false;
    vi.stubGlobal('fetch', async (input: string | URL | Request, init: RequestInit = {}) => {
      if (!raced && init.method === 'PUT') {
        raced = true;
        await cluster.fetch(input, init);
      }
      return cluster.fetch(input, init);
    });

    await createStore().initialize();

    const creates = cluster.requests.filter((request) => request.method === 'PUT');
    expect(creates.map((request) => request.path)).toEqual([
      '/kb-developer',
      '/kb-developer',
      '/kb-support',
      '/kb-manager',
      '/kb-general',
    ]);
    expect(cluster.indexes.size).toBe(4);
  });

  it('should store a zero-vector chunk without its embedding', async () => {
    const store = createStore();
    const report = await store.write(makeChunk({ id: 'c1', embedding: [0, 0, 0, 0] }), ['support']);

    expect(report).toEqual({ written: ['support'], failed: [] });
    const [doc] = cluster.docs('kb-support');
    expect(doc).toMatchObject({ id: 'c1', degraded: true });
    expect(doc).not.toHaveProperty('embedding');
  });
});
