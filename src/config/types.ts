/**
 * Configuration schema and defaults
 *
 * Every section and field has a default, so an empty document parses to
 * the full default configuration. Types are inferred from the schema.
 *
 * @module config/types
 */

import { z } from 'zod';
import { CONFIG } from '../shared/utils.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const EmbeddingProviderKindSchema = z.enum(['local', 'remote']);

/** Request/response shape spoken by the remote embedding endpoint */
export const RemoteEmbeddingFormatSchema = z.enum(['openai', 'cloudflare', 'ollama']);

export const LocalEmbeddingConfigSchema = z.object({
  /** Name of the in-process encoder */
  model: z.string().min(1).default('feature-hashing'),
  dimension: positiveInt.default(CONFIG.LOCAL_EMBEDDING_DIMENSIONS),
});

export const RemoteEmbeddingConfigSchema = z.object({
  format: RemoteEmbeddingFormatSchema.default('openai'),
  /** Base URL, e.g. https://api.openai.com/v1 */
  endpoint: z.string().default('https://api.openai.com/v1'),
  apiKey: z.string().optional(),
  /** Cloudflare account id (cloudflare format only) */
  accountId: z.string().optional(),
  model: z.string().default('text-embedding-3-small'),
  dimension: positiveInt.default(CONFIG.REMOTE_EMBEDDING_DIMENSIONS),
  /** Maximum concurrent requests */
  concurrency: positiveInt.default(CONFIG.MAX_EMBEDDING_CONCURRENCY),
  maxRetries: nonNegativeInt.default(2),
  /** Base delay for exponential backoff */
  retryDelayMs: z.number().nonnegative().default(500),
  timeoutMs: positiveInt.default(30000),
});

export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderKindSchema.default('local'),
  local: LocalEmbeddingConfigSchema.default({}),
  remote: RemoteEmbeddingConfigSchema.default({}),
});

export const ChunkingConfigSchema = z.object({
  chunkSize: positiveInt.default(CONFIG.DEFAULT_CHUNK_SIZE),
  chunkOverlap: nonNegativeInt.default(CONFIG.DEFAULT_CHUNK_OVERLAP),
  minContentLength: nonNegativeInt.default(CONFIG.MIN_CONTENT_LENGTH),
});

export const StoreBackendSchema = z.enum(['sqlite', 'opensearch']);

export const SqliteStoreConfigSchema = z.object({
  /** Database file; `:memory:` keeps everything in process */
  path: z.string().default('~/.rolerag/chunks.db'),
  /** Initial per-partition ANN capacity; grows on demand */
  maxElements: positiveInt.default(10000),
  m: positiveInt.default(16),
  efConstruction: positiveInt.default(200),
  efSearch: positiveInt.default(100),
});

export const OpenSearchStoreConfigSchema = z.object({
  endpoint: z.string().default('http://localhost:9200'),
  /** Partition indexes are named `${indexPrefix}-${partition}` */
  indexPrefix: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lowercase letters, digits, "-" or "_"')
    .default('rolerag'),
  username: z.string().optional(),
  password: z.string().optional(),
  apiKey: z.string().optional(),
  shards: positiveInt.default(2),
  replicas: nonNegativeInt.default(1),
  m: positiveInt.default(16),
  efConstruction: positiveInt.default(512),
  efSearch: positiveInt.default(512),
  timeoutMs: positiveInt.default(30000),
  /** Refresh after each write so it is searchable immediately */
  refreshOnWrite: z.boolean().default(false),
});

export const StoreConfigSchema = z.object({
  backend: StoreBackendSchema.default('sqlite'),
  sqlite: SqliteStoreConfigSchema.default({}),
  opensearch: OpenSearchStoreConfigSchema.default({}),
});

export const RetrievalConfigSchema = z.object({
  overFetchLimit: positiveInt.default(CONFIG.OVER_FETCH_LIMIT),
  resultLimit: positiveInt.default(CONFIG.RESULT_LIMIT),
  /** Documents updated within this many days count as recent */
  recencyWindowDays: z.number().nonnegative().default(30),
  /** Confidence bonus for a fully recent result set */
  recencyBonus: z.number().nonnegative().default(0.1),
  /** Result count at which the evidence factor reaches 1 */
  evidenceTarget: positiveInt.default(5),
  /** Custom lexicon JSON; bundled lexicon when unset */
  lexiconPath: z.string().optional(),
});

export const IngestionConfigSchema = z.object({
  /** Documents processed in parallel */
  documentConcurrency: positiveInt.default(1),
  /** Remove chunks of older versions before writing a document */
  pruneStale: z.boolean().default(true),
});

export const LogLevelNameSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const RagConfigSchema = z
  .object({
    embedding: EmbeddingConfigSchema.default({}),
    chunking: ChunkingConfigSchema.default({}),
    store: StoreConfigSchema.default({}),
    retrieval: RetrievalConfigSchema.default({}),
    ingestion: IngestionConfigSchema.default({}),
    logging: z.object({ level: LogLevelNameSchema.default('info') }).default({}),
  })
  .superRefine((config, ctx) => {
    const { chunking, embedding, retrieval } = config;

    if (chunking.chunkOverlap >= chunking.chunkSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'chunkOverlap'],
        message: `must be smaller than chunking.chunkSize (${chunking.chunkOverlap} >= ${chunking.chunkSize})`,
      });
    }
    if (embedding.provider === 'remote' && embedding.remote.format === 'cloudflare' && !embedding.remote.accountId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['embedding', 'remote', 'accountId'],
        message: 'is required for the cloudflare format',
      });
    }
    if (retrieval.resultLimit > retrieval.overFetchLimit) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retrieval', 'resultLimit'],
        message: 'must not exceed retrieval.overFetchLimit',
      });
    }
  });

export type EmbeddingProviderKind = z.infer<typeof EmbeddingProviderKindSchema>;
export type RemoteEmbeddingFormat = z.infer<typeof RemoteEmbeddingFormatSchema>;
export type LocalEmbeddingConfig = z.infer<typeof LocalEmbeddingConfigSchema>;
export type RemoteEmbeddingConfig = z.infer<typeof RemoteEmbeddingConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type StoreBackend = z.infer<typeof StoreBackendSchema>;
export type SqliteStoreConfig = z.infer<typeof SqliteStoreConfigSchema>;
export type OpenSearchStoreConfig = z.infer<typeof OpenSearchStoreConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;
export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
export type RagConfig = z.infer<typeof RagConfigSchema>;

export const DEFAULT_CONFIG: RagConfig = RagConfigSchema.parse({});
