/**
 * ============================================================================
 * DOCUMENT IDENTITY - Deterministic Content Addressing
 * ============================================================================
 *
 * **Purpose**: Derives stable ids for documents and their chunks so that
 * re-ingesting unchanged content upserts the same chunk ids.
 *
 * **Algorithm**:
 * 1. Join `source`, `docType`, the source's natural-key fields and the first
 *    8 hex characters of the content's MD5 with `_`
 * 2. SHA-256 the result, keep the first 16 hex characters
 *
 * Natural keys per source:
 * - code-host: `repository`, `file_path`
 * - wiki: `page_id`
 * - ticket-tracker: `issue_key`
 *
 * Missing natural-key fields count as empty strings.
 *
 * **Document key**: the same digest without the content hash. It stays
 * constant across versions of one logical document and drives stale chunk
 * cleanup.
 *
 * **Usage:**
 * ```typescript
 * const id = documentId(doc);          // '3f9a0c1d2e4b5a67'
 * const first = chunkId(id, 0);        // '3f9a0c1d2e4b5a67_chunk_0'
 * ```
 */

import { createHash } from 'crypto';
import type { Document, DocumentSource } from '../core/types.js';

/** Length of the truncated SHA-256 hex digest */
export const DOCUMENT_ID_LENGTH = 16;

/** Length of the MD5 content prefix mixed into the id */
const CONTENT_HASH_LENGTH = 8;

/**
 * Metadata fields forming each source's natural key, in order
 */
export const NATURAL_KEY_FIELDS: Record<DocumentSource, readonly string[]> = {
  'code-host': ['repository', 'file_path'],
  wiki: ['page_id'],
  'ticket-tracker': ['issue_key'],
};

/**
 * Calculate SHA-256 checksum for content
 *
 * @param content - Content to hash
 * @returns Hexadecimal SHA-256 checksum
 */
export function calculateChecksum(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

function contentHash(content: string): string {
  return createHash('md5').update(content).digest('hex').slice(0, CONTENT_HASH_LENGTH);
}

function metadataString(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value : String(value);
}

/**
 * Natural-key values for a document, missing fields as ''
 */
export function naturalKey(document: Pick<Document, 'source' | 'metadata'>): string[] {
  return NATURAL_KEY_FIELDS[document.source].map((field) =>
    metadataString(document.metadata[field])
  );
}

function keyParts(document: Pick<Document, 'source' | 'docType' | 'metadata'>): string[] {
  return [document.source, document.docType, ...naturalKey(document)];
}

/**
 * Deterministic id of one version of a document
 *
 * @returns 16 hex characters
 */
export function documentId(
  document: Pick<Document, 'source' | 'docType' | 'metadata' | 'content'>
): string {
  const material = [...keyParts(document), contentHash(document.content)].join('_');
  return calculateChecksum(material).slice(0, DOCUMENT_ID_LENGTH);
}

/**
 * Id of the logical document, shared by all of its versions
 *
 * @returns 16 hex characters
 */
export function documentKey(document: Pick<Document, 'source' | 'docType' | 'metadata'>): string {
  return calculateChecksum(keyParts(document).join('_')).slice(0, DOCUMENT_ID_LENGTH);
}

export function chunkId(sourceDocumentId: string, chunkIndex: number): string {
  return `${sourceDocumentId}_chunk_${chunkIndex}`;
}
