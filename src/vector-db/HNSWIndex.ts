/**
 * ============================================================================
 * HNSW (Hierarchical Navigable Small World) INDEX
 * ============================================================================
 *
 * Wrapper around hnswlib-node for approximate nearest neighbor search over
 * chunk embeddings. One instance backs one partition of the embedded store.
 *
 * HNSW Algorithm:
 * - Builds a graph structure where nearby points are connected
 * - Uses multiple layers for hierarchical search
 * - O(log n) search complexity instead of O(n) brute-force
 *
 * The index lives in memory only; the embedded store rebuilds it from
 * SQLite on startup.
 *
 * @see https://github.com/yoshoku/hnswlib-node
 */

import hnswlib from 'hnswlib-node';
import type { HierarchicalNSW } from 'hnswlib-node';

// ============================================================================
// TYPES
// ============================================================================

/**
 * HNSW index configuration
 */
export interface HNSWConfig {
  /** Vector dimensionality */
  dimension: number;

  /** Initial capacity; doubled whenever it fills up */
  maxElements?: number;

  /** Max connections per node (16-32, default: 16) */
  m?: number;

  /** Build-time accuracy parameter (100-200, default: 200) */
  efConstruction?: number;

  /** Search-time accuracy parameter (default: 100) */
  efSearch?: number;
}

/**
 * HNSW search result
 */
export interface HNSWResult {
  /** External id (chunk id) */
  id: string;

  /** Cosine distance, `1 - similarity` */
  distance: number;
}

/**
 * HNSW index statistics
 */
export interface HNSWStats {
  count: number;
  capacity: number;
  dimension: number;
  m: number;
  ef: number;
}

// ============================================================================
// HNSW INDEX CLASS
// ============================================================================

/**
 * HNSW Index wrapper
 *
 * Provides:
 * - String ID mapping (external chunk IDs ↔ internal HNSW numeric labels)
 * - Upsert semantics (re-adding an id replaces its vector)
 * - Label filters, so only allowed ids are considered during graph search
 * - Dynamic resizing
 */
export class HNSWIndex {
  private index: HierarchicalNSW;
  private readonly dimension: number;
  private maxElements: number;
  private readonly m: number;
  private readonly efConstruction: number;
  private readonly efSearch: number;

  /** Map from internal HNSW numeric labels to external string IDs */
  private internalToExternal: Map<number, string> = new Map();

  /** Map from external string IDs to internal HNSW numeric labels */
  private externalToInternal: Map<string, number> = new Map();

  /** Next available internal label; labels are never reused */
  private nextId = 0;

  /** Labels allocated so far, deleted ones included */
  private allocated = 0;

  constructor(config: HNSWConfig) {
    this.dimension = config.dimension;
    this.maxElements = config.maxElements ?? 10000;
    this.m = config.m ?? 16;
    this.efConstruction = config.efConstruction ?? 200;
    this.efSearch = config.efSearch ?? 100;
    this.index = this.createIndex();
  }

  // ========================================================================
  // CORE OPERATIONS
  // ========================================================================

  /**
   * Insert or replace the vector stored under `id`
   *
   * @throws Error on dimension mismatch
   */
  upsert(id: string, vector: readonly number[]): void {
    this.assertDimension(vector, 'Vector');

    this.remove(id);

    // Deleted labels still occupy capacity in hnswlib
    if (this.allocated >= this.maxElements) {
      this.resize(this.maxElements * 2);
    }

    const label = this.nextId++;
    this.index.addPoint([...vector], label);
    this.allocated++;

    this.internalToExternal.set(label, id);
    this.externalToInternal.set(id, label);
  }

  /**
   * Search for the k nearest neighbors
   *
   * @param allowed - When given, only these external ids are eligible
   * @returns Nearest first
   */
  search(queryVector: readonly number[], k: number, allowed?: ReadonlySet<string>): HNSWResult[] {
    this.assertDimension(queryVector, 'Query');

    const eligible = allowed ? this.countAllowed(allowed) : this.externalToInternal.size;
    const neighbors = Math.min(k, eligible);
    if (neighbors < 1) {
      return [];
    }

    this.index.setEf(Math.max(this.efSearch, neighbors));

    const filter = allowed
      ? (label: number): boolean => {
          const id = this.internalToExternal.get(label);
          return id !== undefined && allowed.has(id);
        }
      : undefined;

    const result = this.index.searchKnn([...queryVector], neighbors, filter);

    const hits: HNSWResult[] = [];
    result.neighbors.forEach((label, i) => {
      const id = this.internalToExternal.get(label);
      if (id !== undefined) {
        hits.push({ id, distance: result.distances[i] });
      }
    });
    return hits;
  }

  /**
   * Remove a vector from the index
   *
   * The point is marked deleted in the graph; it stays in memory but is
   * never returned again.
   *
   * @returns true if removed, false if not found
   */
  remove(id: string): boolean {
    const label = this.externalToInternal.get(id);
    if (label === undefined) {
      return false;
    }

    this.index.markDelete(label);
    this.internalToExternal.delete(label);
    this.externalToInternal.delete(id);
    return true;
  }

  /**
   * Drop every vector
   */
  clear(): void {
    this.index = this.createIndex();
    this.internalToExternal.clear();
    this.externalToInternal.clear();
    this.nextId = 0;
    this.allocated = 0;
  }

  // ========================================================================
  // UTILITIES
  // ========================================================================

  has(id: string): boolean {
    return this.externalToInternal.has(id);
  }

  /** Live (non-deleted) vectors */
  getCount(): number {
    return this.externalToInternal.size;
  }

  getStats(): HNSWStats {
    return {
      count: this.getCount(),
      capacity: this.maxElements,
      dimension: this.dimension,
      m: this.m,
      ef: this.efSearch,
    };
  }

  /**
   * Grow capacity in place
   */
  resize(newMaxElements: number): void {
    if (newMaxElements <= this.maxElements) {
      return; // Don't shrink
    }
    this.index.resizeIndex(newMaxElements);
    this.maxElements = newMaxElements;
  }

  // ========================================================================
  // PRIVATE HELPERS
  // ========================================================================

  private createIndex(): HierarchicalNSW {
    const index = new hnswlib.HierarchicalNSW('cosine', this.dimension);
    index.initIndex(this.maxElements, this.m, this.efConstruction);
    index.setEf(this.efSearch);
    return index;
  }

  private countAllowed(allowed: ReadonlySet<string>): number {
    let count = 0;
    for (const id of allowed) {
      if (this.externalToInternal.has(id)) count++;
    }
    return count;
  }

  private assertDimension(vector: readonly number[], what: string): void {
    if (vector.length !== this.dimension) {
      throw new Error(
        `${what} dimension mismatch: expected ${this.dimension}, got ${vector.length}`
      );
    }
  }
}
