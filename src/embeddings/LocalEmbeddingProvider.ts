/**
 * ============================================================================
 * LOCAL EMBEDDING PROVIDER
 * ============================================================================
 *
 * Embeds text with an in-process model. The model sits behind
 * {@link LocalEmbeddingModel}, so any encoder that runs in the process can be
 * plugged in. The default, {@link FeatureHashingModel}, needs no download:
 * it hashes word unigrams and bigrams into a fixed-width vector (the
 * "hashing trick"), which gives lexical rather than semantic similarity.
 *
 * Models are looked up by name (`embedding.local.model` in the config)
 * through a registry; embedders register their encoder with
 * {@link registerLocalModel}.
 *
 * FAILURE SEMANTICS:
 * A local model that fails is unrecoverable, so the whole batch fails with
 * EMBEDDING_BACKEND_FAILURE. The same applies when the model returns the
 * wrong number of vectors or a vector of the wrong width.
 */

import { BaseEmbeddingProvider } from './EmbeddingProvider.js';
import { createRagError, ErrorCode, errorMessage } from '../core/errors.js';
import { CONFIG, createLogger, normalizeVector } from '../shared/utils.js';

const logger = createLogger('LocalEmbeddingProvider');

/**
 * In-process encoder
 */
export interface LocalEmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  encode(texts: readonly string[]): Promise<number[][]>;
}

const TOKEN_PATTERN = /[a-z0-9_]+/g;

/** Bigrams carry half the weight of single words */
const BIGRAM_WEIGHT = 0.5;

/**
 * DJB2 hash, unsigned 32-bit
 */
function djb2Hash(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) | 0;
  }
  return hash >>> 0;
}

/**
 * Deterministic feature-hashing encoder
 *
 * Each feature lands in bucket `hash % dimension` with a sign taken from a
 * higher hash bit, so unrelated features cancel rather than pile up. The
 * result is L2-normalized; identical text always yields identical vectors.
 */
export class FeatureHashingModel implements LocalEmbeddingModel {
  readonly name = 'feature-hashing';

  constructor(readonly dimension: number = CONFIG.LOCAL_EMBEDDING_DIMENSIONS) {}

  async encode(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.encodeOne(text));
  }

  private encodeOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];

    for (let i = 0; i < tokens.length; i++) {
      this.addFeature(vector, tokens[i], 1);
      if (i + 1 < tokens.length) {
        this.addFeature(vector, `${tokens[i]} ${tokens[i + 1]}`, BIGRAM_WEIGHT);
      }
    }

    return normalizeVector(vector);
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = djb2Hash(feature);
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[hash % this.dimension] += sign * weight;
  }
}

// ============================================================================
// MODEL REGISTRY
// ============================================================================

/** Builds a model producing vectors of the given width */
export type LocalModelFactory = (dimension: number) => LocalEmbeddingModel;

const registry = new Map<string, LocalModelFactory>([
  ['feature-hashing', (dimension) => new FeatureHashingModel(dimension)],
]);

/**
 * Make a model available by name; replaces an earlier registration
 */
export function registerLocalModel(name: string, factory: LocalModelFactory): void {
  registry.set(name, factory);
}

export function localModelNames(): string[] {
  return [...registry.keys()];
}

/**
 * Instantiate a registered model
 *
 * @throws {RagError} INVALID_CONFIG for an unknown name
 */
export function createLocalModel(name: string, dimension: number): LocalEmbeddingModel {
  const factory = registry.get(name);
  if (!factory) {
    throw createRagError(
      ErrorCode.INVALID_CONFIG,
      `Unknown local embedding model "${name}" (available: ${localModelNames().join(', ')})`,
      { model: name }
    );
  }
  return factory(dimension);
}

// ============================================================================
// PROVIDER
// ============================================================================

export interface LocalEmbeddingProviderOptions {
  /** Defaults to a {@link FeatureHashingModel} */
  model?: LocalEmbeddingModel;
  /** Expected vector width; must match an injected model's */
  dimension?: number;
}

export class LocalEmbeddingProvider extends BaseEmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  private readonly model: LocalEmbeddingModel;

  constructor(options: LocalEmbeddingProviderOptions = {}) {
    super();
    const { model, dimension } = options;
    if (model && dimension !== undefined && model.dimension !== dimension) {
      throw createRagError(
        ErrorCode.INVALID_CONFIG,
        `Local model ${model.name} produces ${model.dimension}-dimensional vectors, but ${dimension} are configured`,
        { model: model.name, dimension }
      );
    }
    this.model = model ?? new FeatureHashingModel(dimension);
    this.dimension = this.model.dimension;
    this.name = `local:${this.model.name}`;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let vectors: number[][];
    try {
      vectors = await this.model.encode(texts);
    } catch (error) {
      logger.error(`Model ${this.model.name} failed on a batch of ${texts.length}:`, errorMessage(error));
      throw createRagError(
        ErrorCode.EMBEDDING_BACKEND_FAILURE,
        `Local embedding model failed: ${errorMessage(error)}`,
        { model: this.model.name, batchSize: texts.length }
      );
    }

    if (vectors.length !== texts.length) {
      throw createRagError(
        ErrorCode.EMBEDDING_BACKEND_FAILURE,
        `Local embedding model returned ${vectors.length} vectors for ${texts.length} texts`,
        { model: this.model.name }
      );
    }

    const bad = vectors.findIndex((vector) => vector.length !== this.dimension);
    if (bad !== -1) {
      throw createRagError(
        ErrorCode.EMBEDDING_BACKEND_FAILURE,
        `Local embedding model returned a ${vectors[bad].length}-dimensional vector (expected ${this.dimension})`,
        { model: this.model.name, index: bad }
      );
    }

    return vectors;
  }
}
