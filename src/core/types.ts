/**
 * ============================================================================
 * CORE DOMAIN TYPES
 * ============================================================================
 *
 * Documents come in, chunks are stored, ranked results go out. Nothing in
 * this module performs I/O.
 *
 * @module core/types
 */

// ============================================================================
// ROLES AND PARTITIONS
// ============================================================================

/**
 * Fixed role vocabulary. Each role names one partition of the chunk store.
 */
export const PARTITIONS = ['developer', 'support', 'manager', 'general'] as const;

export type Partition = (typeof PARTITIONS)[number];

/** Partition every chunk without a known role tag falls back to */
export const DEFAULT_PARTITION: Partition = 'general';

export function isPartition(value: string): value is Partition {
  return PARTITIONS.some((partition) => partition === value);
}

/**
 * Map role tags to the partitions a chunk is written into.
 *
 * Unknown tags are ignored, duplicates collapse, tag order is kept.
 * No known tag means `['general']`.
 */
export function resolvePartitions(roleTags: readonly string[]): Partition[] {
  const partitions: Partition[] = [];
  for (const tag of roleTags) {
    if (isPartition(tag) && !partitions.includes(tag)) {
      partitions.push(tag);
    }
  }
  return partitions.length > 0 ? partitions : [DEFAULT_PARTITION];
}

/**
 * Partitions a search for `role` fans out to: always general, plus the
 * role's own partition when it names one.
 */
export function searchPartitions(role: string): Partition[] {
  if (isPartition(role) && role !== DEFAULT_PARTITION) {
    return [DEFAULT_PARTITION, role];
  }
  return [DEFAULT_PARTITION];
}

// ============================================================================
// DOCUMENTS
// ============================================================================

export const DOCUMENT_SOURCES = ['code-host', 'wiki', 'ticket-tracker'] as const;

export type DocumentSource = (typeof DOCUMENT_SOURCES)[number];

/**
 * Raw unit of knowledge handed to the pipeline. Never stored directly.
 */
export interface Document {
  content: string;
  source: DocumentSource;
  /** Free-form classification: documentation, configuration, code, issue, ... */
  docType: string;
  /** Audience roles; treated as a set */
  roleTags: readonly string[];
  /** Open map: repository, file_path, page_id, issue_key, labels, urls, ... */
  metadata: Record<string, unknown>;
  createdAt?: Date;
  updatedAt?: Date;
}

// ============================================================================
// CHUNKS
// ============================================================================

/**
 * Fields derived for every chunk. The parent document's own metadata is
 * merged underneath these.
 */
export interface ChunkMetadata extends Record<string, unknown> {
  source: DocumentSource;
  docType: string;
  roleTags: string[];
  documentKey: string;
  createdAt: string | null;
  updatedAt: string | null;
  chunkIndex: number;
  totalChunks: number;
  tokenCount: number;
  charCount: number;
  contentType: string;
  complexityScore: number;
  keywords: string[];
  summary: string;
  hasCode: boolean;
  hasUrls: boolean;
  processedAt: string;
}

export interface Chunk {
  /** `${sourceDocumentId}_chunk_${chunkIndex}` */
  id: string;
  content: string;
  embedding: number[];
  sourceDocumentId: string;
  chunkIndex: number;
  totalChunks: number;
  metadata: ChunkMetadata;
}

// ============================================================================
// SEARCH
// ============================================================================

/**
 * Keyword fields a search may filter on
 */
export const FILTERABLE_FIELDS = [
  'id',
  'source',
  'docType',
  'roleTags',
  'sourceDocumentId',
  'documentKey',
  'contentType',
] as const;

export type FilterField = (typeof FILTERABLE_FIELDS)[number];

export function isFilterField(value: string): value is FilterField {
  return FILTERABLE_FIELDS.some((field) => field === value);
}

/**
 * A scalar is an exact match, a list is set membership. All entries AND.
 */
export type FilterValue = string | readonly string[];

export type SearchFilters = Partial<Record<FilterField, FilterValue>>;

export interface SearchHit {
  id: string;
  content: string;
  /** Stored chunk metadata, as read back from the backend */
  metadata: Record<string, unknown>;
  /** 0 = identical; `1 - cosine similarity` */
  distance: number;
  partition: Partition;
}

export interface RankedResult extends SearchHit {
  roleRelevanceScore: number;
  /** `(1 - distance) + roleRelevanceScore` */
  combinedScore: number;
}
