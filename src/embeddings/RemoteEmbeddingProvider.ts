/**
 * ============================================================================
 * REMOTE EMBEDDING PROVIDER
 * ============================================================================
 *
 * Calls an external embedding API once per text. No native batch endpoint
 * is assumed; a batch fans out over a bounded worker pool instead.
 *
 * SUPPORTED WIRE FORMATS:
 *
 * 1. OPENAI-COMPATIBLE
 *    - POST {endpoint}/embeddings  { model, input }
 *    - Response: { data: [{ embedding }] }
 *
 * 2. CLOUDFLARE WORKERS AI
 *    - POST {endpoint}/accounts/{accountId}/ai/run/{model}  { text: [text] }
 *    - Response: { success, result: { data: [[...]] } }
 *
 * 3. OLLAMA
 *    - POST {endpoint}/api/embeddings  { model, prompt }
 *    - Response: { embedding }
 *
 * FAILURE SEMANTICS:
 * - Each request has a timeout and is retried with exponential backoff
 * - A text whose request still fails (or returns a vector of the wrong
 *   width) is logged and replaced with a zero vector of the declared
 *   dimension; the batch always completes
 */

import { BaseEmbeddingProvider } from './EmbeddingProvider.js';
import type { RemoteEmbeddingConfig, RemoteEmbeddingFormat } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import { errorMessage } from '../core/errors.js';
import {
  createLogger,
  isRecord,
  mapWithConcurrency,
  sleep,
  zeroVector,
} from '../shared/utils.js';

const logger = createLogger('RemoteEmbeddingProvider');

export type RemoteEmbeddingProviderOptions = Partial<RemoteEmbeddingConfig>;

/**
 * Counters since construction
 */
export interface RemoteEmbeddingStats {
  requests: number;
  retries: number;
  /** Texts that fell back to the zero vector */
  degraded: number;
}

interface PreparedRequest {
  url: string;
  body: Record<string, unknown>;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

export class RemoteEmbeddingProvider extends BaseEmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  private readonly config: RemoteEmbeddingConfig;
  private readonly stats: RemoteEmbeddingStats = { requests: 0, retries: 0, degraded: 0 };

  constructor(options: RemoteEmbeddingProviderOptions = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG.embedding.remote, ...options };
    this.config.endpoint = this.config.endpoint.replace(/\/+$/, '');
    this.dimension = this.config.dimension;
    this.name = `remote:${this.config.format}:${this.config.model}`;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    return mapWithConcurrency(texts, this.config.concurrency, async (text, index) => {
      try {
        return await this.embedWithRetry(text);
      } catch (error) {
        this.stats.degraded++;
        logger.error(
          `Embedding failed for text ${index + 1}/${texts.length}, using zero vector:`,
          errorMessage(error)
        );
        return zeroVector(this.dimension);
      }
    });
  }

  getStats(): RemoteEmbeddingStats {
    return { ...this.stats };
  }

  // ========================================================================
  // REQUESTS
  // ========================================================================

  private async embedWithRetry(text: string): Promise<number[]> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.requestEmbedding(text);
      } catch (error) {
        if (attempt >= attempts - 1) {
          throw error;
        }
        this.stats.retries++;
        logger.debug(`Retrying embedding request (attempt ${attempt + 2}/${attempts}):`, errorMessage(error));
        await sleep(Math.pow(2, attempt) * this.config.retryDelayMs);
      }
    }
  }

  private async requestEmbedding(text: string): Promise<number[]> {
    const { url, body } = this.prepareRequest(text);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);
    this.stats.requests++;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Embedding API error ${response.status}: ${errorText}`);
      }

      const vector = extractEmbedding(this.config.format, await response.json());
      if (vector.length !== this.dimension) {
        throw new Error(`Embedding API returned ${vector.length} dimensions (expected ${this.dimension})`);
      }
      return vector;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private prepareRequest(text: string): PreparedRequest {
    const { endpoint, model, accountId } = this.config;

    switch (this.config.format) {
      case 'openai':
        return { url: `${endpoint}/embeddings`, body: { model, input: text } };
      case 'cloudflare':
        return {
          url: `${endpoint}/accounts/${accountId ?? ''}/ai/run/${model}`,
          body: { text: [text] },
        };
      case 'ollama':
        return { url: `${endpoint}/api/embeddings`, body: { model, prompt: text } };
    }
  }
}

/**
 * Pull the vector out of a response body
 *
 * @throws Error when the body does not have the expected shape
 */
export function extractEmbedding(format: RemoteEmbeddingFormat, payload: unknown): number[] {
  if (!isRecord(payload)) {
    throw new Error('Invalid response format: expected a JSON object');
  }

  switch (format) {
    case 'openai': {
      const first = Array.isArray(payload.data) ? payload.data[0] : undefined;
      if (isRecord(first) && isNumberArray(first.embedding)) {
        return first.embedding;
      }
      throw new Error('Invalid response format: missing data[0].embedding');
    }
    case 'cloudflare': {
      if (payload.success === false) {
        const errors = Array.isArray(payload.errors) ? payload.errors : [];
        const firstError = errors[0];
        const message = isRecord(firstError) && typeof firstError.message === 'string'
          ? firstError.message
          : 'Unknown error';
        throw new Error(`Cloudflare API failure: ${message}`);
      }
      const result = payload.result;
      const first = isRecord(result) && Array.isArray(result.data) ? result.data[0] : undefined;
      if (isNumberArray(first)) {
        return first;
      }
      throw new Error('Invalid response format from Cloudflare');
    }
    case 'ollama': {
      if (isNumberArray(payload.embedding)) {
        return payload.embedding;
      }
      throw new Error('Invalid response format from Ollama');
    }
  }
}
