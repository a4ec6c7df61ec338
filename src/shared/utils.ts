/**
 * Shared utility functions for rolerag
 *
 * Common utilities used across the indexer, stores, retrieval and CLI:
 * leveled logging, bounded concurrency, vector math and encoding.
 *
 * @module shared/utils
 */

// ============================================================================
// Constants
// ============================================================================

export const CONFIG = {
  /** Default chunk size in characters */
  DEFAULT_CHUNK_SIZE: 1000,
  /** Default overlap between adjacent chunks in characters */
  DEFAULT_CHUNK_OVERLAP: 200,
  /** Cleaned content shorter than this is skipped */
  MIN_CONTENT_LENGTH: 50,
  /** Candidates fetched from the store before re-ranking */
  OVER_FETCH_LIMIT: 15,
  /** Results kept after re-ranking */
  RESULT_LIMIT: 8,
  /** Maximum concurrent remote embedding calls */
  MAX_EMBEDDING_CONCURRENCY: 10,
  /** Local model vector width */
  LOCAL_EMBEDDING_DIMENSIONS: 1024,
  /** Remote model vector width */
  REMOTE_EMBEDDING_DIMENSIONS: 1536,
  /** Maximum query length */
  MAX_QUERY_LENGTH: 1000,
} as const;

// ============================================================================
// Logging Utilities
// ============================================================================

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel = LogLevel.INFO;

const LOG_LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Set the global log level
 * @param level - Log level or its name (error, warn, info, debug)
 */
export function setLogLevel(level: LogLevel | string): void {
  if (typeof level === 'string') {
    currentLogLevel = LOG_LEVEL_NAMES[level.toLowerCase()] ?? LogLevel.INFO;
  } else {
    currentLogLevel = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Set log level from environment variable string
 * @param envLevel - Log level from environment (error, warn, info, debug)
 */
export function setLogLevelFromEnv(envLevel?: string): void {
  if (!envLevel) return;
  setLogLevel(envLevel);
}

/**
 * Logger class for leveled logging
 */
export class Logger {
  constructor(private context: string) {}

  /** Log debug message (only in debug mode) */
  debug(...args: unknown[]): void {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(`[${this.context}]`, ...args);
    }
  }

  /** Log info message (info and above) */
  info(...args: unknown[]): void {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(`[${this.context}]`, ...args);
    }
  }

  /** Log warning (warn and above) */
  warn(...args: unknown[]): void {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(`[${this.context}]`, ...args);
    }
  }

  /** Log error (always logged) */
  error(...args: unknown[]): void {
    console.error(`[${this.context}]`, ...args);
  }
}

/**
 * Create a logger instance for a context
 * @param context - Logging context (e.g., "Pipeline", "SqliteChunkStore")
 * @returns Logger instance
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}

// ============================================================================
// Concurrency
// ============================================================================

/**
 * Map over items with at most `concurrency` calls in flight.
 *
 * Results keep input order. A rejection from `fn` rejects the whole call;
 * callers that need per-item tolerance catch inside `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Vector Utilities
// ============================================================================

/**
 * Calculate cosine similarity between two vectors
 * @returns Similarity in [-1, 1]; 0 when either vector has zero norm
 * @throws Error if vector dimensions don't match
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(
      `Vector dimensions must match: ${a.length} != ${b.length}`
    );
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/**
 * Cosine distance, `1 - similarity`
 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  return 1 - cosineSimilarity(a, b);
}

/**
 * Scale a vector to unit length. Zero vectors are returned unchanged.
 */
export function normalizeVector(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm > 0 ? vector.map((v) => v / norm) : vector;
}

export function zeroVector(dimension: number): number[] {
  return new Array<number>(dimension).fill(0);
}

/**
 * True when every component is 0; such a vector has no direction
 */
export function isZeroVector(vector: readonly number[]): boolean {
  return vector.every((v) => v === 0);
}

/**
 * Encode float array to a Buffer for SQLite BLOB storage
 */
export function encodeFloat32Array(array: readonly number[]): Buffer {
  const float32Array = new Float32Array(array);
  return Buffer.from(float32Array.buffer);
}

/**
 * Decode a BLOB written by {@link encodeFloat32Array}
 * @throws Error if the byte length is not a multiple of 4
 */
export function decodeFloat32Array(bytes: Uint8Array): number[] {
  if (bytes.length % 4 !== 0) {
    throw new Error(
      `Invalid blob length for float32: ${bytes.length} (must be multiple of 4)`
    );
  }

  // Copy first: pooled Buffers may sit at an unaligned offset
  const copy = new Uint8Array(bytes);
  return Array.from(new Float32Array(copy.buffer, 0, copy.length / 4));
}

// ============================================================================
// Text Utilities
// ============================================================================

/**
 * Sanitize search query
 */
export function sanitizeQuery(query: string): string {
  return query.trim().slice(0, CONFIG.MAX_QUERY_LENGTH);
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
