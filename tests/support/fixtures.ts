/**
 * Chunk builders shared by store, retrieval and pipeline tests
 */

import type { Chunk, ChunkMetadata, SearchFilters, SearchHit } from '../../src/core/types.js';

export interface ChunkFixture {
  id: string;
  embedding: number[];
  content?: string;
  roleTags?: string[];
  sourceDocumentId?: string;
  documentKey?: string;
  source?: ChunkMetadata['source'];
  docType?: string;
  contentType?: string;
  updatedAt?: string | null;
}

export function makeChunk(fixture: ChunkFixture): Chunk {
  const sourceDocumentId = fixture.sourceDocumentId ?? `doc-${fixture.id}`;
  const content = fixture.content ?? `content of ${fixture.id}`;

  return {
    id: fixture.id,
    content,
    embedding: fixture.embedding,
    sourceDocumentId,
    chunkIndex: 0,
    totalChunks: 1,
    metadata: {
      source: fixture.source ?? 'wiki',
      docType: fixture.docType ?? 'documentation',
      roleTags: fixture.roleTags ?? [],
      documentKey: fixture.documentKey ?? `key-${fixture.id}`,
      createdAt: null,
      updatedAt: fixture.updatedAt ?? null,
      chunkIndex: 0,
      totalChunks: 1,
      tokenCount: Math.ceil(content.length / 4),
      charCount: content.length,
      contentType: fixture.contentType ?? 'general',
      complexityScore: 0,
      keywords: [],
      summary: content,
      hasCode: false,
      hasUrls: false,
      processedAt: '2024-01-01T00:00:00.000Z',
    },
  };
}

export function makeHit(
  id: string,
  distance: number,
  content = `content of ${id}`,
  metadata: Record<string, unknown> = {}
): SearchHit {
  return { id, content, metadata, distance, partition: 'general' };
}

/** Unit-ish 4-d vector at a growing angle from [1, 0, 0, 0] */
export function angled(step: number): number[] {
  return [1, step * 0.5, 0, 0];
}

/** Filters as an untyped caller (JSON body, CLI) could send them */
export function untypedFilters(json: string): SearchFilters {
  return JSON.parse(json);
}
