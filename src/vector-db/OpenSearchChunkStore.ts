/**
 * ============================================================================
 * OPENSEARCH CHUNK STORE - Managed Cluster Backend
 * ============================================================================
 *
 * Talks to an OpenSearch cluster over its REST API. Each partition is one
 * k-NN index named `${indexPrefix}-${partition}`.
 *
 * INDEX LAYOUT:
 * - `embedding`: knn_vector, HNSW graph (lucene engine, cosinesimil)
 * - keyword fields for filtering: id, source, doc_type, role_tags,
 *   source_document_id, document_key, content_type
 * - chunk_index / total_chunks integers, created_at / updated_at dates
 * - `metadata`: stored, not indexed
 * - `degraded`: true for chunks stored without a vector
 *
 * Lucene's cosinesimil rejects all-zero vectors, so a chunk whose
 * embedding degraded to zeros is stored without the `embedding` field.
 * It stays countable and prunable but never matches a k-NN query.
 *
 * QUERIES:
 * Filters go inside the `knn` clause, so the cluster filters while it
 * walks the graph and `k` counts matching documents only.
 *
 * SCORES:
 * The lucene engine reports cosinesimil hits as `(1 + cos) / 2`. Hits are
 * converted back to `distance = 1 - cos` so both backends agree.
 */

import { PartitionedChunkStore, type FilterClause } from './ChunkStore.js';
import type { OpenSearchStoreConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import type { Chunk, FilterField, Partition, SearchHit } from '../core/types.js';
import { createRagError, ErrorCode } from '../core/errors.js';
import { isRecord, isZeroVector } from '../shared/utils.js';

/** Filter field → index field */
const FIELDS: Record<FilterField, string> = {
  id: 'id',
  source: 'source',
  docType: 'doc_type',
  roleTags: 'role_tags',
  sourceDocumentId: 'source_document_id',
  documentKey: 'document_key',
  contentType: 'content_type',
};

export interface OpenSearchChunkStoreOptions extends Partial<OpenSearchStoreConfig> {
  /** Embedding width of the knn_vector field */
  dimension: number;
}

interface RequestOptions {
  body?: unknown;
  /** Return 404 responses instead of throwing */
  allowNotFound?: boolean;
  /** Return error responses this accepts instead of throwing */
  tolerate?: (response: ClusterResponse) => boolean;
}

export interface ClusterResponse {
  status: number;
  body: unknown;
}

/**
 * Convert a lucene cosinesimil score to cosine distance
 */
export function scoreToDistance(score: number): number {
  const similarity = 2 * score - 1;
  return Math.max(0, 1 - similarity);
}

/**
 * Index creation lost a race with another writer creating the same index
 */
export function isIndexAlreadyExists({ status, body }: ClusterResponse): boolean {
  return (
    status === 400 &&
    isRecord(body) &&
    isRecord(body.error) &&
    body.error.type === 'resource_already_exists_exception'
  );
}

/**
 * Bool filter for normalized clauses: `term` for one value, `terms` for several
 */
export function buildKnnFilter(filters: readonly FilterClause[]): Record<string, unknown> | undefined {
  if (filters.length === 0) {
    return undefined;
  }
  return {
    bool: {
      filter: filters.map(({ field, values }) =>
        values.length === 1
          ? { term: { [FIELDS[field]]: values[0] } }
          : { terms: { [FIELDS[field]]: values } }
      ),
    },
  };
}

export class OpenSearchChunkStore extends PartitionedChunkStore {
  readonly backend = 'opensearch';
  private readonly config: OpenSearchStoreConfig;
  private readonly dimension: number;

  constructor(options: OpenSearchChunkStoreOptions) {
    super('OpenSearchChunkStore');
    const { dimension, ...overrides } = options;
    this.config = { ...DEFAULT_CONFIG.store.opensearch, ...overrides };
    this.config.endpoint = this.config.endpoint.replace(/\/+$/, '');
    this.dimension = dimension;
  }

  indexName(partition: Partition): string {
    return `${this.config.indexPrefix}-${partition}`;
  }

  /**
   * Cluster health status (green, yellow or red)
   */
  async health(): Promise<string> {
    const { body } = await this.request('GET', '/_cluster/health');
    return isRecord(body) && typeof body.status === 'string' ? body.status : 'unknown';
  }

  // ==========================================================================
  // PARTITION PRIMITIVES
  // ==========================================================================

  protected async initializePartition(partition: Partition): Promise<void> {
    const index = this.indexName(partition);
    const { status } = await this.request('HEAD', `/${index}`, { allowNotFound: true });
    if (status !== 404) {
      return;
    }

    const created = await this.request('PUT', `/${index}`, {
      body: this.indexDefinition(),
      tolerate: isIndexAlreadyExists,
    });
    if (isIndexAlreadyExists(created)) {
      this.logger.debug(`Index ${index} was created by another writer`);
      return;
    }
    this.logger.info(`Created index ${index}`);
  }

  protected async upsertIntoPartition(partition: Partition, chunk: Chunk): Promise<void> {
    if (chunk.embedding.length !== this.dimension) {
      throw new Error(
        `Embedding dimension mismatch: expected ${this.dimension}, got ${chunk.embedding.length}`
      );
    }

    const { metadata } = chunk;
    const degraded = isZeroVector(chunk.embedding);
    const refresh = this.config.refreshOnWrite ? 'true' : 'false';
    await this.request('PUT', `/${this.indexName(partition)}/_doc/${encodeURIComponent(chunk.id)}?refresh=${refresh}`, {
      body: {
        id: chunk.id,
        content: chunk.content,
        ...(degraded ? {} : { embedding: chunk.embedding }),
        degraded,
        source: metadata.source,
        doc_type: metadata.docType,
        role_tags: metadata.roleTags,
        source_document_id: chunk.sourceDocumentId,
        document_key: metadata.documentKey,
        content_type: metadata.contentType,
        chunk_index: chunk.chunkIndex,
        total_chunks: chunk.totalChunks,
        created_at: metadata.createdAt,
        updated_at: metadata.updatedAt,
        metadata,
      },
    });
  }

  protected async queryPartition(
    partition: Partition,
    queryEmbedding: readonly number[],
    limit: number,
    filters: readonly FilterClause[]
  ): Promise<SearchHit[]> {
    const knn: Record<string, unknown> = { vector: queryEmbedding, k: limit };
    const filter = buildKnnFilter(filters);
    if (filter) {
      knn.filter = filter;
    }

    const { body } = await this.request('POST', `/${this.indexName(partition)}/_search`, {
      body: {
        size: limit,
        _source: { excludes: ['embedding'] },
        query: { knn: { embedding: knn } },
      },
    });

    return parseHits(body, partition);
  }

  protected async countPartition(partition: Partition): Promise<number> {
    const { status, body } = await this.request('GET', `/${this.indexName(partition)}/_count`, {
      allowNotFound: true,
    });
    if (status === 404) {
      return 0;
    }
    return isRecord(body) && typeof body.count === 'number' ? body.count : 0;
  }

  protected async deleteStaleInPartition(
    partition: Partition,
    documentKey: string,
    currentSourceDocumentId: string
  ): Promise<number> {
    const { body } = await this.request('POST', `/${this.indexName(partition)}/_delete_by_query?refresh=true`, {
      body: {
        query: {
          bool: {
            filter: [{ term: { document_key: documentKey } }],
            must_not: [{ term: { source_document_id: currentSourceDocumentId } }],
          },
        },
      },
    });
    return isRecord(body) && typeof body.deleted === 'number' ? body.deleted : 0;
  }

  protected async clearPartitionStorage(partition: Partition): Promise<void> {
    await this.request('POST', `/${this.indexName(partition)}/_delete_by_query?refresh=true`, {
      body: { query: { match_all: {} } },
    });
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private indexDefinition(): Record<string, unknown> {
    const { shards, replicas, efSearch, efConstruction, m } = this.config;
    const keyword = { type: 'keyword' };

    return {
      settings: {
        index: {
          knn: true,
          'knn.algo_param.ef_search': efSearch,
          number_of_shards: shards,
          number_of_replicas: replicas,
        },
      },
      mappings: {
        properties: {
          id: keyword,
          content: { type: 'text' },
          embedding: {
            type: 'knn_vector',
            dimension: this.dimension,
            method: {
              name: 'hnsw',
              space_type: 'cosinesimil',
              engine: 'lucene',
              parameters: { ef_construction: efConstruction, m },
            },
          },
          source: keyword,
          doc_type: keyword,
          role_tags: keyword,
          source_document_id: keyword,
          document_key: keyword,
          content_type: keyword,
          chunk_index: { type: 'integer' },
          total_chunks: { type: 'integer' },
          created_at: { type: 'date' },
          updated_at: { type: 'date' },
          degraded: { type: 'boolean' },
          metadata: { type: 'object', enabled: false },
        },
      },
    };
  }

  private authHeaders(): Record<string, string> {
    const { apiKey, username, password } = this.config;
    if (apiKey) {
      return { Authorization: `ApiKey ${apiKey}` };
    }
    if (username) {
      const credentials = Buffer.from(`${username}:${password ?? ''}`).toString('base64');
      return { Authorization: `Basic ${credentials}` };
    }
    return {};
  }

  private async request(method: string, path: string, options: RequestOptions = {}): Promise<ClusterResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(`${this.config.endpoint}${path}`, {
        method,
        headers: {
          'Content-Type': 'application/json',
          ...this.authHeaders(),
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      const text = method === 'HEAD' ? '' : await response.text();
      const body = parseBody(text);

      const result: ClusterResponse = { status: response.status, body };
      if (response.ok || (options.allowNotFound && response.status === 404) || options.tolerate?.(result)) {
        return result;
      }

      throw createRagError(
        ErrorCode.STORE_UNAVAILABLE,
        `OpenSearch ${method} ${path} failed with ${response.status}: ${describeError(body, text)}`,
        { status: response.status, path }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function describeError(body: unknown, text: string): string {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.reason === 'string') {
    return body.error.reason;
  }
  return text.slice(0, 200);
}

function parseHits(body: unknown, partition: Partition): SearchHit[] {
  const outer = isRecord(body) ? body.hits : undefined;
  const hits = isRecord(outer) && Array.isArray(outer.hits) ? outer.hits : [];
  const results: SearchHit[] = [];

  for (const hit of hits) {
    if (!isRecord(hit) || typeof hit._score !== 'number' || !isRecord(hit._source)) {
      continue;
    }
    const source = hit._source;
    const id = typeof source.id === 'string' ? source.id : typeof hit._id === 'string' ? hit._id : undefined;
    if (id === undefined) {
      continue;
    }

    results.push({
      id,
      content: typeof source.content === 'string' ? source.content : '',
      metadata: isRecord(source.metadata) ? source.metadata : {},
      distance: scoreToDistance(hit._score),
      partition,
    });
  }

  return results;
}
