/**
 * Embedding provider selection
 *
 * @module embeddings
 */

import type { EmbeddingConfig } from '../config/types.js';
import type { EmbeddingProvider } from './EmbeddingProvider.js';
import {
  LocalEmbeddingProvider,
  createLocalModel,
  type LocalEmbeddingModel,
} from './LocalEmbeddingProvider.js';
import { RemoteEmbeddingProvider } from './RemoteEmbeddingProvider.js';

export type { EmbeddingProvider } from './EmbeddingProvider.js';
export { BaseEmbeddingProvider } from './EmbeddingProvider.js';
export {
  FeatureHashingModel,
  LocalEmbeddingProvider,
  createLocalModel,
  localModelNames,
  registerLocalModel,
  type LocalEmbeddingModel,
  type LocalModelFactory,
} from './LocalEmbeddingProvider.js';
export { RemoteEmbeddingProvider, extractEmbedding } from './RemoteEmbeddingProvider.js';

/**
 * Build the configured provider
 *
 * @param config - Embedding section of the configuration
 * @param localModel - Used instead of the model named by `config.local.model`
 * @throws {RagError} INVALID_CONFIG for an unknown local model or a width mismatch
 */
export function createEmbeddingProvider(
  config: EmbeddingConfig,
  localModel?: LocalEmbeddingModel
): EmbeddingProvider {
  if (config.provider === 'remote') {
    return new RemoteEmbeddingProvider(config.remote);
  }
  const { model, dimension } = config.local;
  return new LocalEmbeddingProvider({
    model: localModel ?? createLocalModel(model, dimension),
    dimension,
  });
}
