/**
 * ============================================================================
 * CHUNK STORE - Multi-Partition Vector Index Contract
 * ============================================================================
 *
 * A chunk store keeps one vector partition per audience role. Writes fan
 * out to every partition named by the chunk's role tags; searches fan in
 * from `general` plus the caller's role partition and merge by distance.
 *
 * {@link PartitionedChunkStore} owns that fan-out/fan-in logic. Backends
 * only implement single-partition primitives:
 *
 * - `initializePartition`   create storage for one partition
 * - `upsertIntoPartition`   idempotent upsert by chunk id
 * - `queryPartition`        filtered nearest-neighbour query
 * - `countPartition`        number of chunks
 * - `deleteStaleInPartition` remove other versions of a logical document
 * - `clearPartitionStorage` drop every chunk of one partition
 *
 * Partition failures are contained: a failed write is logged and reported,
 * a failed query is logged and contributes nothing to the merge.
 *
 * An all-zero embedding (a degraded remote encode) has no direction, so it
 * cannot be ranked by cosine distance. Backends still store such chunks but
 * leave them out of nearest-neighbour search, and a zero query returns
 * nothing.
 */

import {
  PARTITIONS,
  isFilterField,
  resolvePartitions,
  searchPartitions,
  type Chunk,
  type FilterField,
  type Partition,
  type SearchFilters,
  type SearchHit,
} from '../core/types.js';
import { createRagError, ErrorCode, errorMessage } from '../core/errors.js';
import { createLogger, isZeroVector, type Logger } from '../shared/utils.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Outcome of one `write`
 */
export interface WriteReport {
  /** Partitions that accepted the chunk */
  written: Partition[];
  /** Partitions whose upsert failed */
  failed: Partition[];
}

export type PartitionStats = Record<Partition, number>;

/**
 * Normalized filter: every value as a non-empty list
 */
export type FilterClause = { field: FilterField; values: string[] };

export interface ChunkStore {
  /** Backend identifier for logs and CLI output */
  readonly backend: string;

  /** Create storage for every partition; safe to call repeatedly */
  initialize(): Promise<void>;

  /** Upsert into each target partition; never throws for partition failures */
  write(chunk: Chunk, roleTags: readonly string[]): Promise<WriteReport>;

  /**
   * Nearest chunks to `queryEmbedding` across `general` and `role`
   *
   * @throws {RagError} INVALID_FILTER before any partition is queried
   */
  search(
    queryEmbedding: readonly number[],
    role: string,
    limit: number,
    filters?: SearchFilters
  ): Promise<SearchHit[]>;

  stats(): Promise<PartitionStats>;

  /**
   * Remove chunks of `documentKey` whose source document id differs from
   * `currentSourceDocumentId`
   *
   * @returns Number of chunk copies removed across partitions
   */
  deleteStale(documentKey: string, currentSourceDocumentId: string): Promise<number>;

  clearPartition(partition: Partition): Promise<void>;

  /** Backend health summary for diagnostics, where the backend has one */
  health?(): Promise<string>;

  close(): Promise<void>;
}

// ============================================================================
// FILTERS
// ============================================================================

/**
 * Validate and normalize search filters
 *
 * @throws {RagError} INVALID_FILTER on unknown fields or empty/non-string values
 */
export function normalizeFilters(filters: SearchFilters | Record<string, unknown> = {}): FilterClause[] {
  const clauses: FilterClause[] = [];

  for (const [field, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    if (!isFilterField(field)) {
      throw createRagError(ErrorCode.INVALID_FILTER, `Unknown filter field: ${field}`, { field });
    }

    const values: unknown[] = Array.isArray(value) ? value : [value];
    const strings = values.filter((item): item is string => typeof item === 'string');
    if (strings.length !== values.length || strings.length === 0) {
      throw createRagError(
        ErrorCode.INVALID_FILTER,
        `Filter "${field}" needs a string or a non-empty list of strings`,
        { field }
      );
    }

    clauses.push({ field, values: [...new Set(strings)] });
  }

  return clauses;
}

/**
 * Ascending distance, ties by id so results are stable across backends
 */
export function compareHits(a: SearchHit, b: SearchHit): number {
  return a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Merge per-partition hit lists: keep the closest copy of each chunk id,
 * sort by distance, truncate.
 */
export function mergeHits(lists: readonly SearchHit[][], limit: number): SearchHit[] {
  const best = new Map<string, SearchHit>();
  for (const hits of lists) {
    for (const hit of hits) {
      const existing = best.get(hit.id);
      if (!existing || hit.distance < existing.distance) {
        best.set(hit.id, hit);
      }
    }
  }
  return [...best.values()].sort(compareHits).slice(0, limit);
}

// ============================================================================
// BASE CLASS
// ============================================================================

export abstract class PartitionedChunkStore implements ChunkStore {
  abstract readonly backend: string;
  protected readonly logger: Logger;
  private initializing?: Promise<void>;

  constructor(logContext: string) {
    this.logger = createLogger(logContext);
  }

  protected abstract initializePartition(partition: Partition): Promise<void>;
  protected abstract upsertIntoPartition(partition: Partition, chunk: Chunk): Promise<void>;
  protected abstract queryPartition(
    partition: Partition,
    queryEmbedding: readonly number[],
    limit: number,
    filters: readonly FilterClause[]
  ): Promise<SearchHit[]>;
  protected abstract countPartition(partition: Partition): Promise<number>;
  protected abstract deleteStaleInPartition(
    partition: Partition,
    documentKey: string,
    currentSourceDocumentId: string
  ): Promise<number>;
  protected abstract clearPartitionStorage(partition: Partition): Promise<void>;

  /** Backend hook run once before partitions are created */
  protected async openBackend(): Promise<void> {}

  /** Backend hook for `close` */
  protected async closeBackend(): Promise<void> {}

  /**
   * Concurrent callers share one in-flight initialization; a failed attempt
   * is forgotten so the next call retries.
   */
  initialize(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.initializeBackend().catch((error: unknown) => {
        this.initializing = undefined;
        throw error;
      });
    }
    return this.initializing;
  }

  private async initializeBackend(): Promise<void> {
    await this.openBackend();
    for (const partition of PARTITIONS) {
      await this.initializePartition(partition);
    }
  }

  async write(chunk: Chunk, roleTags: readonly string[]): Promise<WriteReport> {
    await this.initialize();
    const report: WriteReport = { written: [], failed: [] };

    for (const partition of resolvePartitions(roleTags)) {
      try {
        await this.upsertIntoPartition(partition, chunk);
        report.written.push(partition);
      } catch (error) {
        report.failed.push(partition);
        this.logger.error(`Failed to write chunk ${chunk.id} to partition ${partition}:`, errorMessage(error));
      }
    }

    return report;
  }

  async search(
    queryEmbedding: readonly number[],
    role: string,
    limit: number,
    filters?: SearchFilters
  ): Promise<SearchHit[]> {
    const clauses = normalizeFilters(filters);
    if (limit < 1) {
      return [];
    }
    if (isZeroVector(queryEmbedding)) {
      this.logger.warn('Query embedding is all zeros; nothing can be ranked against it');
      return [];
    }
    await this.initialize();

    const lists = await Promise.all(
      searchPartitions(role).map(async (partition) => {
        try {
          return await this.queryPartition(partition, queryEmbedding, limit, clauses);
        } catch (error) {
          this.logger.error(`Failed to query partition ${partition}:`, errorMessage(error));
          return [];
        }
      })
    );

    return mergeHits(lists, limit);
  }

  async stats(): Promise<PartitionStats> {
    await this.initialize();
    const stats: PartitionStats = { developer: 0, support: 0, manager: 0, general: 0 };

    for (const partition of PARTITIONS) {
      try {
        stats[partition] = await this.countPartition(partition);
      } catch (error) {
        this.logger.error(`Failed to count partition ${partition}:`, errorMessage(error));
      }
    }

    return stats;
  }

  async deleteStale(documentKey: string, currentSourceDocumentId: string): Promise<number> {
    await this.initialize();
    let removed = 0;

    for (const partition of PARTITIONS) {
      try {
        removed += await this.deleteStaleInPartition(partition, documentKey, currentSourceDocumentId);
      } catch (error) {
        this.logger.error(`Failed to prune stale chunks in partition ${partition}:`, errorMessage(error));
      }
    }

    if (removed > 0) {
      this.logger.debug(`Removed ${removed} stale chunk copies for document key ${documentKey}`);
    }
    return removed;
  }

  async clearPartition(partition: Partition): Promise<void> {
    await this.initialize();
    await this.clearPartitionStorage(partition);
  }

  async close(): Promise<void> {
    const pending = this.initializing;
    this.initializing = undefined;
    if (pending) {
      // A close racing a failed initialization still releases the backend
      await pending.catch(() => undefined);
    }
    await this.closeBackend();
  }
}
