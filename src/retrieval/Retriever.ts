/**
 * ============================================================================
 * RETRIEVER - Over-fetch, Re-rank, Score Confidence
 * ============================================================================
 *
 * 1. Embed the query and over-fetch candidates from the chunk store
 * 2. Re-rank by similarity plus role relevance, keep the top results
 * 3. Derive a confidence in [0, 1]:
 *
 *      avg(1 - distance)
 *        × min(count / evidenceTarget, 1)
 *        × (1 + recentFraction × recencyBonus)
 *
 *    clamped to [0, 1]; an empty result set scores exactly 0.
 *
 * Stateless apart from its collaborators. Retries belong to the embedding
 * provider and the store, not here.
 */

import type { EmbeddingProvider } from '../embeddings/EmbeddingProvider.js';
import type { ChunkStore } from '../vector-db/ChunkStore.js';
import type { RetrievalConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import { loadLexicon, type Lexicon } from '../config/lexicon.js';
import type { RankedResult, SearchFilters, SearchHit } from '../core/types.js';
import { RoleRanker } from './RoleRanker.js';
import { createLogger, sanitizeQuery } from '../shared/utils.js';

const logger = createLogger('Retriever');

const DAY_MS = 24 * 60 * 60 * 1000;

export type RetrievalOptions = Omit<RetrievalConfig, 'lexiconPath'>;

export interface ConfidenceOptions {
  evidenceTarget: number;
  recencyWindowDays: number;
  recencyBonus: number;
  now: Date;
}

export interface RetrievalResult {
  query: string;
  role: string;
  results: RankedResult[];
  confidence: number;
  /** Candidates returned by the store before truncation */
  candidateCount: number;
}

export interface RetrieverDependencies {
  embeddings: EmbeddingProvider;
  store: ChunkStore;
  lexicon?: Lexicon;
  options?: Partial<RetrievalOptions>;
  /** Clock for recency; defaults to the system clock */
  now?: () => Date;
}

function isRecent(metadata: Record<string, unknown>, now: Date, windowDays: number): boolean {
  const updatedAt = metadata.updatedAt;
  if (typeof updatedAt !== 'string') {
    return false;
  }
  const timestamp = Date.parse(updatedAt);
  return !Number.isNaN(timestamp) && now.getTime() - timestamp < windowDays * DAY_MS;
}

/**
 * Confidence of a final result set
 */
export function computeConfidence(
  results: readonly Pick<SearchHit, 'distance' | 'metadata'>[],
  options: ConfidenceOptions
): number {
  if (results.length === 0) {
    return 0;
  }

  const averageSimilarity =
    results.reduce((sum, result) => sum + (1 - result.distance), 0) / results.length;
  const evidenceFactor = Math.min(results.length / options.evidenceTarget, 1);
  const recentCount = results.filter((result) =>
    isRecent(result.metadata, options.now, options.recencyWindowDays)
  ).length;
  const recencyFactor = 1 + (recentCount / results.length) * options.recencyBonus;

  const confidence = averageSimilarity * evidenceFactor * recencyFactor;
  return Math.min(Math.max(confidence, 0), 1);
}

export class Retriever {
  private readonly embeddings: EmbeddingProvider;
  private readonly store: ChunkStore;
  private readonly ranker: RoleRanker;
  private readonly options: RetrievalOptions;
  private readonly now: () => Date;

  constructor(deps: RetrieverDependencies) {
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.ranker = new RoleRanker(deps.lexicon ?? loadLexicon());
    this.options = { ...DEFAULT_CONFIG.retrieval, ...deps.options };
    this.now = deps.now ?? (() => new Date());
  }

  async retrieve(query: string, role: string, filters?: SearchFilters): Promise<RetrievalResult> {
    const cleaned = sanitizeQuery(query);
    if (cleaned.length === 0) {
      logger.warn('Empty query, nothing to retrieve');
      return { query: cleaned, role, results: [], confidence: 0, candidateCount: 0 };
    }

    const queryEmbedding = await this.embeddings.embedOne(cleaned);
    const candidates = await this.store.search(queryEmbedding, role, this.options.overFetchLimit, filters);
    const results = this.ranker.rank(candidates, role, this.options.resultLimit);

    const confidence = computeConfidence(results, {
      evidenceTarget: this.options.evidenceTarget,
      recencyWindowDays: this.options.recencyWindowDays,
      recencyBonus: this.options.recencyBonus,
      now: this.now(),
    });

    logger.debug(
      `Retrieved ${results.length}/${candidates.length} candidates for role ${role} (confidence ${confidence.toFixed(3)})`
    );

    return { query: cleaned, role, results, confidence, candidateCount: candidates.length };
  }
}
