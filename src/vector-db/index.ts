/**
 * Chunk store selection
 *
 * @module vector-db
 */

import type { StoreConfig } from '../config/types.js';
import type { ChunkStore } from './ChunkStore.js';
import { OpenSearchChunkStore } from './OpenSearchChunkStore.js';
import { SqliteChunkStore } from './SqliteChunkStore.js';

export {
  PartitionedChunkStore,
  compareHits,
  mergeHits,
  normalizeFilters,
  type ChunkStore,
  type FilterClause,
  type PartitionStats,
  type WriteReport,
} from './ChunkStore.js';
export { HNSWIndex } from './HNSWIndex.js';
export { OpenSearchChunkStore, scoreToDistance } from './OpenSearchChunkStore.js';
export { SqliteChunkStore } from './SqliteChunkStore.js';

/**
 * Build the configured backend
 *
 * @param config - Store section of the configuration
 * @param dimension - Embedding width of the provider feeding the store
 */
export function createChunkStore(config: StoreConfig, dimension: number): ChunkStore {
  if (config.backend === 'opensearch') {
    return new OpenSearchChunkStore({ ...config.opensearch, dimension });
  }
  return new SqliteChunkStore({ ...config.sqlite, dimension });
}
