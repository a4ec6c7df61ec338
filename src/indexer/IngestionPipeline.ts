/**
 * ============================================================================
 * INGESTION PIPELINE
 * ============================================================================
 *
 * Coordinates chunking, embedding and storage, one document at a time.
 *
 * PER-DOCUMENT STAGES:
 *
 * 1. IDENTITY
 *    - Content-addressed document id and version-independent document key
 *
 * 2. CHUNKING
 *    - Clean and split; too-short or unsplittable content is skipped
 *
 * 3. EMBEDDING
 *    - One `embedBatch` call for the document's chunk list
 *    - Zero vectors from a degrading backend are counted, not fatal
 *    - A backend that fails the batch aborts this document only
 *
 * 4. STALE CLEANUP (optional, on by default)
 *    - Chunks of earlier versions of the same document are removed
 *
 * 5. STORAGE
 *    - One write per chunk; the store fans out to role partitions
 *
 * ERROR CONTAINMENT:
 * A failing document is counted and logged; the batch always finishes.
 */

import type { Chunk, ChunkMetadata, Document } from '../core/types.js';
import { resolvePartitions } from '../core/types.js';
import { createRagError, ErrorCode, errorMessage, isRagError } from '../core/errors.js';
import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider.js';
import type { ChunkStore, PartitionStats } from '../vector-db/ChunkStore.js';
import { loadLexicon, type Lexicon } from '../config/lexicon.js';
import { Chunker, cleanContent } from './Chunker.js';
import { ContentAnalyzer } from './ContentAnalyzer.js';
import { chunkId, documentId, documentKey } from './identity.js';
import type { IngestionJobTracker } from './IngestionJob.js';
import { createLogger, mapWithConcurrency } from '../shared/utils.js';

const logger = createLogger('IngestionPipeline');

// ============================================================================
// TYPES
// ============================================================================

type ProgressCallback = (processed: number, total: number, documentId: string) => void;

export interface IngestionOptions {
  /** Documents processed in parallel (default: 1) */
  documentConcurrency?: number;
  /** Remove chunks of earlier document versions (default: true) */
  pruneStale?: boolean;
  onProgress?: ProgressCallback;
}

export interface PipelineDependencies {
  chunker: Chunker;
  embeddings: EmbeddingProvider;
  store: ChunkStore;
  lexicon?: Lexicon;
  /** Clock for processing timestamps */
  now?: () => Date;
}

export type DocumentOutcome =
  | {
      status: 'ingested';
      documentId: string;
      chunks: number;
      /** Chunks embedded as zero vectors */
      degradedEmbeddings: number;
      partitionWriteFailures: number;
      staleChunksRemoved: number;
    }
  | {
      status: 'skipped';
      documentId: string;
      reason: ErrorCode.CONTENT_TOO_SHORT | ErrorCode.SPLIT_FAILED;
    };

export interface DocumentFailure {
  documentId: string;
  code: ErrorCode | 'UNKNOWN';
  message: string;
}

/**
 * Aggregated result of one ingestion run
 */
export interface IngestionResult {
  processedDocuments: number;
  skippedDocuments: number;
  totalChunks: number;
  /** Documents that failed */
  errors: number;
  degradedEmbeddings: number;
  partitionWriteFailures: number;
  staleChunksRemoved: number;
  failures: DocumentFailure[];
  partitionStats: PartitionStats;
  /** Time taken in milliseconds */
  duration: number;
}

function isZeroVector(vector: readonly number[]): boolean {
  return vector.every((value) => value === 0);
}

// ============================================================================
// PIPELINE
// ============================================================================

export class IngestionPipeline {
  private readonly chunker: Chunker;
  private readonly embeddings: EmbeddingProvider;
  private readonly store: ChunkStore;
  private readonly analyzer: ContentAnalyzer;
  private readonly now: () => Date;

  constructor(deps: PipelineDependencies) {
    this.chunker = deps.chunker;
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.analyzer = new ContentAnalyzer(deps.lexicon ?? loadLexicon());
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Chunk and embed a document without storing it
   *
   * @returns Chunks in order; `[]` when the document is skipped
   * @throws {RagError} EMBEDDING_BACKEND_FAILURE from an atomic backend
   */
  async processDocument(document: Document): Promise<Chunk[]> {
    const spans = this.chunker.split(document);
    if (spans.length === 0) {
      return [];
    }

    const sourceDocumentId = documentId(document);
    const key = documentKey(document);
    const embeddings = await this.embeddings.embedBatch(spans);
    if (embeddings.length !== spans.length) {
      throw createRagError(
        ErrorCode.EMBEDDING_BACKEND_FAILURE,
        `Embedding provider returned ${embeddings.length} vectors for ${spans.length} chunks`,
        { documentId: sourceDocumentId }
      );
    }

    const processedAt = this.now().toISOString();
    const roleTags = [...new Set(document.roleTags)];

    return spans.map((content, index): Chunk => {
      const metadata: ChunkMetadata = {
        ...document.metadata,
        source: document.source,
        docType: document.docType,
        roleTags,
        documentKey: key,
        createdAt: document.createdAt?.toISOString() ?? null,
        updatedAt: document.updatedAt?.toISOString() ?? null,
        chunkIndex: index,
        totalChunks: spans.length,
        ...this.analyzer.analyze(content, document.docType),
        processedAt,
      };

      return {
        id: chunkId(sourceDocumentId, index),
        content,
        embedding: embeddings[index],
        sourceDocumentId,
        chunkIndex: index,
        totalChunks: spans.length,
        metadata,
      };
    });
  }

  /**
   * Chunk, embed and store one document
   */
  async ingestDocument(document: Document, options: IngestionOptions = {}): Promise<DocumentOutcome> {
    const sourceDocumentId = documentId(document);
    const chunks = await this.processDocument(document);

    if (chunks.length === 0) {
      const tooShort = cleanContent(document.content).length < this.chunker.minContentLength;
      const reason = tooShort ? ErrorCode.CONTENT_TOO_SHORT : ErrorCode.SPLIT_FAILED;
      logger.debug(`Skipping document ${sourceDocumentId}: ${reason}`);
      return { status: 'skipped', documentId: sourceDocumentId, reason };
    }

    const pruneStale = options.pruneStale ?? true;
    const staleChunksRemoved = pruneStale
      ? await this.store.deleteStale(documentKey(document), sourceDocumentId)
      : 0;

    let partitionWriteFailures = 0;
    for (const chunk of chunks) {
      const report = await this.store.write(chunk, document.roleTags);
      partitionWriteFailures += report.failed.length;
    }

    const degradedEmbeddings = chunks.filter((chunk) => isZeroVector(chunk.embedding)).length;
    if (degradedEmbeddings > 0) {
      logger.warn(`Document ${sourceDocumentId}: ${degradedEmbeddings}/${chunks.length} chunks stored with zero embeddings`);
    }

    logger.debug(
      `Stored ${chunks.length} chunks of ${sourceDocumentId} in ${resolvePartitions(document.roleTags).join(', ')}`
    );

    return {
      status: 'ingested',
      documentId: sourceDocumentId,
      chunks: chunks.length,
      degradedEmbeddings,
      partitionWriteFailures,
      staleChunksRemoved,
    };
  }

  /**
   * Ingest a batch of documents
   *
   * Never throws for a single document's failure; see `failures` in the
   * result.
   */
  async ingest(documents: readonly Document[], options: IngestionOptions = {}): Promise<IngestionResult> {
    const startTime = Date.now();
    const result: IngestionResult = {
      processedDocuments: 0,
      skippedDocuments: 0,
      totalChunks: 0,
      errors: 0,
      degradedEmbeddings: 0,
      partitionWriteFailures: 0,
      staleChunksRemoved: 0,
      failures: [],
      partitionStats: { developer: 0, support: 0, manager: 0, general: 0 },
      duration: 0,
    };

    await this.store.initialize();
    let finished = 0;

    await mapWithConcurrency(documents, options.documentConcurrency ?? 1, async (document) => {
      const id = documentId(document);
      try {
        const outcome = await this.ingestDocument(document, options);
        if (outcome.status === 'skipped') {
          result.skippedDocuments++;
        } else {
          result.processedDocuments++;
          result.totalChunks += outcome.chunks;
          result.degradedEmbeddings += outcome.degradedEmbeddings;
          result.partitionWriteFailures += outcome.partitionWriteFailures;
          result.staleChunksRemoved += outcome.staleChunksRemoved;
        }
      } catch (error) {
        result.errors++;
        result.failures.push({
          documentId: id,
          code: isRagError(error) ? error.code : 'UNKNOWN',
          message: errorMessage(error),
        });
        logger.error(`Failed to ingest document ${id}:`, errorMessage(error));
      }
      finished++;
      options.onProgress?.(finished, documents.length, id);
    });

    result.partitionStats = await this.store.stats();
    result.duration = Date.now() - startTime;

    logger.info(
      `Ingested ${result.processedDocuments} documents (${result.totalChunks} chunks), ` +
        `skipped ${result.skippedDocuments}, errors ${result.errors}`
    );
    return result;
  }

  /**
   * Ingest under a job tracker, rejecting a concurrent run
   *
   * @throws {RagError} INGESTION_IN_PROGRESS when another job holds the tracker
   */
  async runJob(
    tracker: IngestionJobTracker,
    documents: readonly Document[],
    options: IngestionOptions = {}
  ): Promise<IngestionResult> {
    const job = tracker.tryStart(documents.length);
    if (!job) {
      throw createRagError(ErrorCode.INGESTION_IN_PROGRESS, 'An ingestion job is already running', {
        current: tracker.snapshot().jobId,
      });
    }

    try {
      const result = await this.ingest(documents, options);
      job.complete(result);
      return result;
    } catch (error) {
      job.fail(error);
      throw error;
    }
  }
}
