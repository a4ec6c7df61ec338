/**
 * Wiring shared by CLI commands: configuration, provider, store, lexicon
 */

import type { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { loadLexicon, type Lexicon } from '../config/lexicon.js';
import type { RagConfig } from '../config/types.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../embeddings/index.js';
import { createChunkStore, type ChunkStore } from '../vector-db/index.js';
import { setLogLevel } from '../shared/utils.js';

/** Options declared on the root program */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export interface CLIContext {
  config: RagConfig;
  embeddings: EmbeddingProvider;
  store: ChunkStore;
  lexicon: Lexicon;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Load configuration and set the log level
 *
 * `--verbose` raises the level to debug regardless of configuration.
 */
export async function loadCLIConfig(options: GlobalOptions = {}): Promise<RagConfig> {
  const config = await loadConfig({ path: options.config });
  setLogLevel(options.verbose ? 'debug' : config.logging.level);
  return config;
}

/**
 * Load configuration and build the configured backends
 */
export async function createContext(options: GlobalOptions = {}): Promise<CLIContext> {
  const config = await loadCLIConfig(options);

  const embeddings = createEmbeddingProvider(config.embedding);
  const store = createChunkStore(config.store, embeddings.dimension);
  const lexicon = loadLexicon(config.retrieval.lexiconPath);

  return { config, embeddings, store, lexicon };
}
