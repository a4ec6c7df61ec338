/**
 * ============================================================================
 * SQLITE CHUNK STORE - Embedded Persistent Backend
 * ============================================================================
 *
 * **Purpose**: Stores chunks for every partition in one SQLite database and
 * answers nearest-neighbour queries through an in-memory HNSW graph per
 * partition.
 *
 * **KEY FEATURES:**
 *
 * 1. PERSISTENT STORAGE
 *    - Chunks, embeddings (Float32 BLOBs) and metadata survive restarts
 *    - Database location: ~/.rolerag/chunks.db (configurable, or `:memory:`)
 *
 * 2. ANN SEARCH
 *    - One hnswlib-node cosine index per partition
 *    - Rebuilt from SQLite when the store is initialized
 *
 *    - All-zero (degraded) embeddings stay in SQLite only; cosine distance
 *      is undefined for them, so the graph never sees them
 *
 * 3. PRE-FILTERING
 *    - Filters become a SQL predicate; only matching ids are eligible
 *      during graph search, so `limit` applies after filtering
 *
 * 4. MIGRATION SYSTEM
 *    - Numbered SQL files under migrations/, applied in order once
 *
 * **SCHEMA:**
 * - chunks: (partition, id) primary key, keyword columns for filtering
 * - schema_migrations: applied migration versions
 *
 * **PERFORMANCE:**
 * - WAL mode for concurrent readers
 * - Indexed lookups by document key and source document id
 *
 * @see ../../migrations/001_chunk_store.sql for schema
 */

import Database from 'better-sqlite3';
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { PartitionedChunkStore, type FilterClause } from './ChunkStore.js';
import { HNSWIndex } from './HNSWIndex.js';
import type { SqliteStoreConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import { expandTilde } from '../config/loader.js';
import type { Chunk, FilterField, Partition, SearchHit } from '../core/types.js';
import { createRagError, ErrorCode, errorMessage } from '../core/errors.js';
import { decodeFloat32Array, encodeFloat32Array, isRecord, isZeroVector } from '../shared/utils.js';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

const MIGRATION_FILE = /^(\d+)_.*\.sql$/;

/** Filter field → column */
const COLUMNS: Record<FilterField, string> = {
  id: 'id',
  source: 'source',
  docType: 'doc_type',
  roleTags: 'role_tags',
  sourceDocumentId: 'source_document_id',
  documentKey: 'document_key',
  contentType: 'content_type',
};

interface EmbeddingRow {
  id: string;
  embedding: Buffer;
}

interface ChunkRow {
  id: string;
  content: string;
  metadata: string;
}

export interface SqliteChunkStoreOptions extends Partial<SqliteStoreConfig> {
  /** Embedding width; every written vector must match */
  dimension: number;
  /** Directory of numbered .sql migrations */
  migrationsDir?: string;
}

/**
 * SQLite + HNSW implementation of the chunk store
 */
export class SqliteChunkStore extends PartitionedChunkStore {
  readonly backend = 'sqlite';
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly dimension: number;
  private readonly migrationsDir: string;
  private readonly config: SqliteStoreConfig;
  private readonly indexes = new Map<Partition, HNSWIndex>();

  constructor(options: SqliteChunkStoreOptions) {
    super('SqliteChunkStore');
    const { dimension, migrationsDir, ...overrides } = options;
    this.config = { ...DEFAULT_CONFIG.store.sqlite, ...overrides };
    this.dimension = dimension;
    this.migrationsDir = migrationsDir ?? MIGRATIONS_DIR;
    this.dbPath = this.config.path === ':memory:' ? ':memory:' : expandTilde(this.config.path);
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  protected async openBackend(): Promise<void> {
    try {
      if (this.dbPath !== ':memory:') {
        await fs.ensureDir(path.dirname(this.dbPath));
      }

      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL'); // Write-Ahead Logging
      db.pragma('synchronous = NORMAL'); // Faster writes
      db.pragma('cache_size = -64000'); // 64MB cache
      db.pragma('temp_store = MEMORY'); // In-memory temp tables
      this.db = db;

      await this.runMigrations(db);
    } catch (error) {
      throw createRagError(
        ErrorCode.STORE_UNAVAILABLE,
        `Failed to open SQLite chunk store at ${this.dbPath}: ${errorMessage(error)}`,
        { path: this.dbPath }
      );
    }
  }

  protected async closeBackend(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.indexes.clear();
  }

  protected async initializePartition(partition: Partition): Promise<void> {
    const index = new HNSWIndex({
      dimension: this.dimension,
      maxElements: this.config.maxElements,
      m: this.config.m,
      efConstruction: this.config.efConstruction,
      efSearch: this.config.efSearch,
    });

    const rows = this.connection
      .prepare<[string], EmbeddingRow>('SELECT id, embedding FROM chunks WHERE partition = ?')
      .all(partition);

    for (const row of rows) {
      const vector = decodeFloat32Array(row.embedding);
      if (vector.length !== this.dimension) {
        throw createRagError(
          ErrorCode.STORE_UNAVAILABLE,
          `Stored embedding for ${row.id} has ${vector.length} dimensions, store expects ${this.dimension}; re-ingest with the original provider or use a new database`,
          { partition, id: row.id }
        );
      }
      if (!isZeroVector(vector)) {
        index.upsert(row.id, vector);
      }
    }

    this.indexes.set(partition, index);
    this.logger.debug(`Loaded ${rows.length} chunks into partition ${partition}`);
  }

  // ==========================================================================
  // PARTITION PRIMITIVES
  // ==========================================================================

  protected async upsertIntoPartition(partition: Partition, chunk: Chunk): Promise<void> {
    if (chunk.embedding.length !== this.dimension) {
      throw new Error(
        `Embedding dimension mismatch: expected ${this.dimension}, got ${chunk.embedding.length}`
      );
    }

    const { metadata } = chunk;
    this.connection
      .prepare(`
        INSERT INTO chunks (
          partition, id, content, embedding, source, doc_type, role_tags,
          source_document_id, document_key, content_type, chunk_index,
          total_chunks, created_at, updated_at, metadata, written_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(partition, id) DO UPDATE SET
          content = excluded.content,
          embedding = excluded.embedding,
          source = excluded.source,
          doc_type = excluded.doc_type,
          role_tags = excluded.role_tags,
          source_document_id = excluded.source_document_id,
          document_key = excluded.document_key,
          content_type = excluded.content_type,
          chunk_index = excluded.chunk_index,
          total_chunks = excluded.total_chunks,
          created_at = excluded.created_at,
          updated_at = excluded.updated_at,
          metadata = excluded.metadata,
          written_at = excluded.written_at
      `)
      .run(
        partition,
        chunk.id,
        chunk.content,
        encodeFloat32Array(chunk.embedding),
        metadata.source,
        metadata.docType,
        JSON.stringify(metadata.roleTags),
        chunk.sourceDocumentId,
        metadata.documentKey,
        metadata.contentType,
        chunk.chunkIndex,
        chunk.totalChunks,
        metadata.createdAt,
        metadata.updatedAt,
        JSON.stringify(metadata),
        Date.now()
      );

    const index = this.partitionIndex(partition);
    if (isZeroVector(chunk.embedding)) {
      index.remove(chunk.id);
    } else {
      index.upsert(chunk.id, chunk.embedding);
    }
  }

  protected async queryPartition(
    partition: Partition,
    queryEmbedding: readonly number[],
    limit: number,
    filters: readonly FilterClause[]
  ): Promise<SearchHit[]> {
    const index = this.partitionIndex(partition);

    let allowed: Set<string> | undefined;
    if (filters.length > 0) {
      const { clause, params } = buildFilterClause(filters);
      const rows = this.connection
        .prepare<unknown[], { id: string }>(`SELECT id FROM chunks WHERE partition = ? AND ${clause}`)
        .all(partition, ...params);
      allowed = new Set(rows.map((row) => row.id));
      if (allowed.size === 0) {
        return [];
      }
    }

    const neighbors = index.search(queryEmbedding, limit, allowed);
    if (neighbors.length === 0) {
      return [];
    }

    const placeholders = neighbors.map(() => '?').join(', ');
    const rows = this.connection
      .prepare<unknown[], ChunkRow>(
        `SELECT id, content, metadata FROM chunks WHERE partition = ? AND id IN (${placeholders})`
      )
      .all(partition, ...neighbors.map((neighbor) => neighbor.id));
    const byId = new Map(rows.map((row) => [row.id, row]));

    const hits: SearchHit[] = [];
    for (const neighbor of neighbors) {
      const row = byId.get(neighbor.id);
      if (!row) continue;
      hits.push({
        id: row.id,
        content: row.content,
        metadata: parseMetadata(row.metadata),
        distance: Math.max(0, neighbor.distance),
        partition,
      });
    }
    return hits;
  }

  protected async countPartition(partition: Partition): Promise<number> {
    const row = this.connection
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM chunks WHERE partition = ?')
      .get(partition);
    return row?.count ?? 0;
  }

  protected async deleteStaleInPartition(
    partition: Partition,
    documentKey: string,
    currentSourceDocumentId: string
  ): Promise<number> {
    const db = this.connection;
    const stale = db
      .prepare<[string, string, string], { id: string }>(
        'SELECT id FROM chunks WHERE partition = ? AND document_key = ? AND source_document_id != ?'
      )
      .all(partition, documentKey, currentSourceDocumentId);

    if (stale.length === 0) {
      return 0;
    }

    db.prepare('DELETE FROM chunks WHERE partition = ? AND document_key = ? AND source_document_id != ?')
      .run(partition, documentKey, currentSourceDocumentId);

    const index = this.partitionIndex(partition);
    for (const row of stale) {
      index.remove(row.id);
    }
    return stale.length;
  }

  protected async clearPartitionStorage(partition: Partition): Promise<void> {
    this.connection.prepare('DELETE FROM chunks WHERE partition = ?').run(partition);
    this.partitionIndex(partition).clear();
  }

  // ==========================================================================
  // PRIVATE HELPERS
  // ==========================================================================

  private get connection(): Database.Database {
    if (!this.db) {
      throw createRagError(ErrorCode.STORE_UNAVAILABLE, 'SQLite chunk store is not open');
    }
    return this.db;
  }

  private partitionIndex(partition: Partition): HNSWIndex {
    const index = this.indexes.get(partition);
    if (!index) {
      throw createRagError(ErrorCode.STORE_UNAVAILABLE, `Partition ${partition} is not initialized`);
    }
    return index;
  }

  /**
   * Apply numbered migrations newer than the recorded schema version
   */
  private async runMigrations(db: Database.Database): Promise<void> {
    const tracked = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_migrations'"
      )
      .get();
    let current = 0;
    if (tracked) {
      const row = db
        .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
        .get();
      current = row?.version ?? 0;
    }

    const files = (await fs.readdir(this.migrationsDir))
      .map((file) => ({ file, match: MIGRATION_FILE.exec(file) }))
      .flatMap(({ file, match }) => (match ? [{ file, version: Number(match[1]) }] : []))
      .filter(({ version }) => version > current)
      .sort((a, b) => a.version - b.version);

    for (const { file, version } of files) {
      const sql = await fs.readFile(path.join(this.migrationsDir, file), 'utf-8');
      db.exec(sql);
      this.logger.debug(`Applied migration ${version} (${file})`);
    }
  }
}

/**
 * SQL predicate for normalized filters, AND-ed
 */
export function buildFilterClause(filters: readonly FilterClause[]): { clause: string; params: string[] } {
  const parts: string[] = [];
  const params: string[] = [];

  for (const { field, values } of filters) {
    const placeholders = values.map(() => '?').join(', ');
    if (field === 'roleTags') {
      parts.push(
        `EXISTS (SELECT 1 FROM json_each(chunks.role_tags) WHERE json_each.value IN (${placeholders}))`
      );
    } else {
      parts.push(`${COLUMNS[field]} IN (${placeholders})`);
    }
    params.push(...values);
  }

  return { clause: parts.join(' AND '), params };
}

function parseMetadata(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  return isRecord(parsed) ? parsed : {};
}
