/**
 * rolerag - role-aware document retrieval
 *
 * @module rolerag
 */

export * from './core/types.js';
export * from './core/errors.js';

export { DEFAULT_CONFIG, RagConfigSchema } from './config/types.js';
export type * from './config/types.js';
export {
  DEFAULT_CONFIG_PATH,
  applyEnvOverrides,
  expandTilde,
  loadConfig,
  parseConfig,
  type LoadConfigOptions,
} from './config/loader.js';
export { DEFAULT_LEXICON_PATH, loadLexicon, parseLexicon, type Lexicon } from './config/lexicon.js';

export { chunkId, documentId, documentKey, naturalKey } from './indexer/identity.js';
export { Chunker, RecursiveTextSplitter, cleanContent, selectStrategy, type ChunkerOptions } from './indexer/Chunker.js';
export { ContentAnalyzer, estimateTokens, type ContentAnalysis } from './indexer/ContentAnalyzer.js';
export { parseDocument, parseDocuments } from './indexer/documents.js';
export {
  IngestionPipeline,
  type DocumentFailure,
  type DocumentOutcome,
  type IngestionOptions,
  type IngestionResult,
} from './indexer/IngestionPipeline.js';
export { IngestionJobTracker, type IngestionJob, type JobSnapshot, type JobStatus } from './indexer/IngestionJob.js';

export * from './embeddings/index.js';
export * from './vector-db/index.js';

export { RoleRanker, combinedScore } from './retrieval/RoleRanker.js';
export { Retriever, computeConfidence, type RetrievalResult } from './retrieval/Retriever.js';
export {
  INSUFFICIENT_INFORMATION_ANSWER,
  QueryService,
  formatSources,
  roleGuidance,
  type AnswerGenerator,
  type AssistantAnswer,
  type GenerationRequest,
  type RoleGuidanceResult,
  type SourceReference,
} from './retrieval/QueryService.js';

export { createLogger, setLogLevel, LogLevel } from './shared/utils.js';
