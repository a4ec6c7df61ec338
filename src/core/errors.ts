/**
 * Error types shared across the rolerag core
 *
 * Every failure the core raises is a {@link RagError} carrying an
 * {@link ErrorCode}, so callers can branch on the code rather than on
 * message text.
 *
 * @module core/errors
 */

import type { ZodError } from 'zod';

export enum ErrorCode {
  /** Cleaned document content is below the minimum length */
  CONTENT_TOO_SHORT = 'CONTENT_TOO_SHORT',
  /** Splitter produced nothing for adequate content */
  SPLIT_FAILED = 'SPLIT_FAILED',
  /** Embedding backend could not produce vectors */
  EMBEDDING_BACKEND_FAILURE = 'EMBEDDING_BACKEND_FAILURE',
  /** Upsert into a single partition failed */
  PARTITION_WRITE_FAILED = 'PARTITION_WRITE_FAILED',
  /** Query against a single partition failed */
  PARTITION_QUERY_FAILED = 'PARTITION_QUERY_FAILED',
  /** Store could not be opened or reached */
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  /** Search filter names an unknown field or carries a bad value */
  INVALID_FILTER = 'INVALID_FILTER',
  /** Configuration failed validation */
  INVALID_CONFIG = 'INVALID_CONFIG',
  /** Input document failed validation */
  INVALID_DOCUMENT = 'INVALID_DOCUMENT',
  /** Another ingestion job holds the tracker */
  INGESTION_IN_PROGRESS = 'INGESTION_IN_PROGRESS',
  /** Answer generator failed */
  GENERATION_FAILED = 'GENERATION_FAILED',
}

export class RagError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RagError';
  }
}

/**
 * Create a RagError
 *
 * @param code - Error code
 * @param message - Human-readable message
 * @param details - Extra context for logs and `--verbose` output
 */
export function createRagError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): RagError {
  return new RagError(code, message, details);
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One line per schema issue: `path.to.field: message`
 */
export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
