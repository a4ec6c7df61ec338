/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  applyEnvOverrides,
  expandTilde,
  loadConfig,
  parseConfig,
} from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/types.js';
import { ErrorCode } from '../../../src/core/errors.js';

function configError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('expandTilde', () => {
  it('should expand only a leading tilde', () => {
    expect(expandTilde('~')).toBe(os.homedir());
    expect(expandTilde('~/data/chunks.db')).toBe(path.join(os.homedir(), 'data/chunks.db'));
    expect(expandTilde('/tmp/~/x')).toBe('/tmp/~/x');
  });
});

describe('parseConfig', () => {
  it('should return the defaults for an empty document', () => {
    expect(parseConfig(undefined)).toEqual(DEFAULT_CONFIG);
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should override individual keys and keep the rest', () => {
    const config = parseConfig({
      chunking: { chunkSize: 500 },
      store: { backend: 'opensearch', opensearch: { indexPrefix: 'kb', refreshOnWrite: true } },
    });

    expect(config.chunking).toEqual({ ...DEFAULT_CONFIG.chunking, chunkSize: 500 });
    expect(config.store.backend).toBe('opensearch');
    expect(config.store.opensearch.indexPrefix).toBe('kb');
    expect(config.store.opensearch.refreshOnWrite).toBe(true);
    expect(config.store.opensearch.endpoint).toBe(DEFAULT_CONFIG.store.opensearch.endpoint);
  });

  it('should treat empty YAML sections as defaults', () => {
    expect(parseConfig({ embedding: null, store: { sqlite: null } })).toEqual(DEFAULT_CONFIG);
  });

  it('should reject values of the wrong type', () => {
    expect(configError(() => parseConfig({ chunking: { chunkSize: '500' } }))).toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: 'Invalid configuration: chunking.chunkSize: Expected number, received string',
    });
    expect(configError(() => parseConfig({ store: { backend: 'redis' } }))).toMatchObject({
      message: "Invalid configuration: store.backend: Invalid enum value. Expected 'sqlite' | 'opensearch', received 'redis'",
    });
    expect(configError(() => parseConfig({ retrieval: [] }))).toMatchObject({
      message: 'Invalid configuration: retrieval: Expected object, received array',
    });
    expect(configError(() => parseConfig('text'))).toMatchObject({
      message: 'Invalid configuration: Expected object, received string',
    });
  });

  it('should reject fractional and non-positive counts', () => {
    expect(configError(() => parseConfig({ retrieval: { evidenceTarget: 2.5 } }))).toMatchObject({
      message: 'Invalid configuration: retrieval.evidenceTarget: Expected integer, received float',
    });
    expect(configError(() => parseConfig({ ingestion: { documentConcurrency: 0 } }))).toMatchObject({
      message: 'Invalid configuration: ingestion.documentConcurrency: Number must be greater than 0',
    });
  });

  it('should require overlap below chunk size', () => {
    expect(configError(() => parseConfig({ chunking: { chunkSize: 100, chunkOverlap: 100 } }))).toMatchObject({
      message: 'Invalid configuration: chunking.chunkOverlap: must be smaller than chunking.chunkSize (100 >= 100)',
    });
  });

  it('should require an account id for cloudflare', () => {
    expect(
      configError(() => parseConfig({ embedding: { provider: 'remote', remote: { format: 'cloudflare' } } }))
    ).toMatchObject({
      message: 'Invalid configuration: embedding.remote.accountId: is required for the cloudflare format',
    });
    expect(parseConfig({ embedding: { remote: { format: 'cloudflare' } } }).embedding.remote.format).toBe('cloudflare');
  });

  it('should keep the result limit within the over-fetch limit', () => {
    expect(configError(() => parseConfig({ retrieval: { resultLimit: 20 } }))).toMatchObject({
      message: 'Invalid configuration: retrieval.resultLimit: must not exceed retrieval.overFetchLimit',
    });
  });

  it('should reject index prefixes OpenSearch would refuse', () => {
    expect(configError(() => parseConfig({ store: { opensearch: { indexPrefix: 'Rolerag' } } }))).toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: 'Invalid configuration: store.opensearch.indexPrefix: must be lowercase letters, digits, "-" or "_"',
    });
  });
});

describe('applyEnvOverrides', () => {
  it('should apply ROLERAG_* variables', () => {
    const config = parseConfig(
      applyEnvOverrides(
        { store: { sqlite: { path: '/data/chunks.db' } } },
        {
          ROLERAG_LOG_LEVEL: 'debug',
          ROLERAG_EMBEDDING_PROVIDER: 'remote',
          ROLERAG_STORE_BACKEND: 'opensearch',
          ROLERAG_EMBEDDING_API_KEY: 'test-secret',
          ROLERAG_OPENSEARCH_ENDPOINT: 'https://search.test',
          ROLERAG_SQLITE_PATH: '',
        }
      )
    );

    expect(config.logging.level).toBe('debug');
    expect(config.embedding.provider).toBe('remote');
    expect(config.store.backend).toBe('opensearch');
    expect(config.embedding.remote.apiKey).toBe('test-secret');
    expect(config.store.opensearch.endpoint).toBe('https://search.test');
    expect(config.store.sqlite.path).toBe('/data/chunks.db');
  });

  it('should not modify its input', () => {
    const raw = { logging: { level: 'warn' } };
    expect(applyEnvOverrides(raw, { ROLERAG_LOG_LEVEL: 'error' })).toEqual({ logging: { level: 'error' } });
    expect(raw.logging.level).toBe('warn');
  });

  it('should leave unknown choices for the schema to reject', () => {
    expect(
      configError(() => parseConfig(applyEnvOverrides(undefined, { ROLERAG_STORE_BACKEND: 'pinecone' })))
    ).toMatchObject({
      message: "Invalid configuration: store.backend: Invalid enum value. Expected 'sqlite' | 'opensearch', received 'pinecone'",
    });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rolerag-config-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should read YAML and then apply the environment', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.writeFile(
      file,
      ['retrieval:', '  resultLimit: 4', 'logging:', '  level: warn', 'store:', '  sqlite:', '    path: /data/chunks.db'].join('\n')
    );

    const config = await loadConfig({ env: { ROLERAG_CONFIG: file, ROLERAG_LOG_LEVEL: 'debug' } });

    expect(config.retrieval.resultLimit).toBe(4);
    expect(config.store.sqlite.path).toBe('/data/chunks.db');
    expect(config.logging.level).toBe('debug');
  });

  it('should prefer an explicit path over ROLERAG_CONFIG', async () => {
    const explicit = path.join(dir, 'explicit.yaml');
    await fs.writeFile(explicit, 'chunking:\n  chunkSize: 640\n');

    const config = await loadConfig({ path: explicit, env: { ROLERAG_CONFIG: path.join(dir, 'other.yaml') } });

    expect(config.chunking.chunkSize).toBe(640);
  });

  it('should fall back to defaults when the implicit file is missing', async () => {
    const config = await loadConfig({ env: { ROLERAG_CONFIG: path.join(dir, 'missing.yaml') } });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should fail for a missing explicit file', async () => {
    const missing = path.join(dir, 'missing.yaml');
    await expect(loadConfig({ path: missing, env: {} })).rejects.toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: `Config file not found: ${missing}`,
    });
  });

  it('should report malformed YAML', async () => {
    const file = path.join(dir, 'broken.yaml');
    await fs.writeFile(file, 'chunking: [unclosed\n');

    await expect(loadConfig({ path: file, env: {} })).rejects.toMatchObject({ code: ErrorCode.INVALID_CONFIG });
  });
});
