/**
 * Unit tests for CLI output and an end-to-end run of the command tree
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createProgram } from '../../../src/cli/program.js';
import { formatCLIError } from '../../../src/cli/errors.js';
import { formatIngestionSummary } from '../../../src/cli/commands/ingest.js';
import { formatStats } from '../../../src/cli/commands/stats.js';
import { redactConfig } from '../../../src/cli/commands/config.js';
import { DEFAULT_CONFIG } from '../../../src/config/types.js';
import { createRagError, ErrorCode } from '../../../src/core/errors.js';
import type { IngestionResult } from '../../../src/indexer/IngestionPipeline.js';
import { LogLevel, setLogLevel } from '../../../src/shared/utils.js';

const originalLevel = chalk.level;

beforeAll(() => {
  chalk.level = 0;
});

afterAll(() => {
  chalk.level = originalLevel;
});

describe('formatIngestionSummary', () => {
  it('should list counts, partitions and failures', () => {
    const result: IngestionResult = {
      processedDocuments: 3,
      skippedDocuments: 1,
      totalChunks: 7,
      errors: 1,
      degradedEmbeddings: 0,
      partitionWriteFailures: 0,
      staleChunksRemoved: 2,
      failures: [{ documentId: 'd1', code: ErrorCode.EMBEDDING_BACKEND_FAILURE, message: 'boom' }],
      partitionStats: { developer: 7, support: 0, manager: 0, general: 0 },
      duration: 1234,
    };

    expect(formatIngestionSummary(result).split('\n')).toEqual([
      '',
      'Ingestion complete',
      '  Documents processed: 3',
      '  Documents skipped:   1',
      '  Chunks written:      7',
      '  Errors:              1',
      '  Stale chunks pruned: 2',
      '  Partitions: developer=7 support=0 manager=0 general=0',
      '  Duration: 1.23s',
      '  ✖ d1: boom',
    ]);
  });
});

describe('formatStats', () => {
  it('should align partition counts and total them', () => {
    expect(formatStats('opensearch', { developer: 2, support: 1, manager: 0, general: 3 }, 'green').split('\n')).toEqual([
      '',
      'Chunk store (opensearch)',
      '  Backend health: green',
      '  developer  2',
      '  support    1',
      '  manager    0',
      '  general    3',
      '  total      6 (chunks are counted once per partition)',
    ]);
  });
});

describe('redactConfig', () => {
  it('should mask credentials and leave the input untouched', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.embedding.remote.apiKey = 'test-secret';
    config.store.opensearch.username = 'admin';
    config.store.opensearch.password = 'test-secret';

    const redacted = redactConfig(config);

    expect(redacted.embedding.remote.apiKey).toBe('********');
    expect(redacted.store.opensearch.password).toBe('********');
    expect(redacted.store.opensearch.apiKey).toBeUndefined();
    expect(redacted.store.opensearch.username).toBe('admin');
    expect(config.embedding.remote.apiKey).toBe('test-secret');
  });
});

describe('formatCLIError', () => {
  it('should show the code and suggestions for rag errors', () => {
    const error = createRagError(ErrorCode.INVALID_FILTER, 'Unknown filter field: author', { field: 'author' });

    expect(formatCLIError(error).split('\n')).toEqual([
      '',
      'Error: Unknown filter field: author',
      'Code: INVALID_FILTER',
      '  • Filterable fields: id, source, docType, roleTags, sourceDocumentId, documentKey, contentType',
    ]);
  });

  it('should add details and the stack when verbose', () => {
    const error = createRagError(ErrorCode.STORE_UNAVAILABLE, 'closed', { path: '/tmp/x.db' });
    const output = formatCLIError(error, true);

    expect(output).toContain(JSON.stringify({ path: '/tmp/x.db' }, null, 2));
    expect(output).toContain(String(error.stack));
  });

  it('should print plain errors without a code', () => {
    expect(formatCLIError(new Error('boom'))).toBe('\nError: boom');
  });
});

describe('rolerag program', () => {
  let dir: string;
  let configFile: string;
  let output: string[];

  async function run(...args: string[]): Promise<void> {
    await createProgram().parseAsync(['--config', configFile, ...args], { from: 'user' });
  }

  function lastJSON(): unknown {
    const text = output.at(-1) ?? '';
    return JSON.parse(text);
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rolerag-cli-'));
    configFile = path.join(dir, 'config.yaml');
    await fs.writeFile(
      configFile,
      [
        'embedding:',
        '  local:',
        '    dimension: 64',
        '  remote:',
        '    apiKey: test-secret',
        'store:',
        '  sqlite:',
        `    path: ${JSON.stringify(path.join(dir, 'chunks.db'))}`,
        'logging:',
        '  level: error',
      ].join('\n')
    );
    await fs.writeJson(path.join(dir, 'docs.json'), [
      {
        content: 'To reset a password, open the admin console and choose Reset for the user account.',
        source: 'wiki',
        doc_type: 'documentation',
        role_tags: ['support'],
        metadata: { page_id: 'P1' },
      },
      {
        content: 'The VPN client needs the corporate certificate installed before the first connection.',
        source: 'wiki',
        doc_type: 'documentation',
        role_tags: ['developer'],
        metadata: { page_id: 'P2' },
      },
    ]);

    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setLogLevel(LogLevel.INFO);
    await fs.remove(dir);
  });

  it('should ingest, count and search documents', async () => {
    await run('ingest', path.join(dir, 'docs.json'), '--format', 'json');
    expect(lastJSON()).toMatchObject({ processedDocuments: 2, totalChunks: 2, errors: 0 });

    await run('stats', '--format', 'json');
    expect(lastJSON()).toEqual({
      backend: 'sqlite',
      partitions: { developer: 1, support: 1, manager: 0, general: 0 },
    });

    await run('search', 'reset a password in the admin console', '--role', 'support', '--format', 'json');
    const search = lastJSON();
    expect(search).toMatchObject({
      query: 'reset a password in the admin console',
      role: 'support',
      count: 1,
      results: [{ partition: 'support', metadata: { page_id: 'P1' } }],
    });
  });

  it('should clear one partition and leave the others', async () => {
    await run('ingest', path.join(dir, 'docs.json'), '--format', 'json');

    await run('clear', 'support', '--format', 'json');
    expect(lastJSON()).toEqual({ backend: 'sqlite', partition: 'support', removed: 1 });

    await run('stats', '--format', 'json');
    expect(lastJSON()).toEqual({
      backend: 'sqlite',
      partitions: { developer: 1, support: 0, manager: 0, general: 0 },
    });
  });

  it('should reject an unknown partition before opening the store', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(run('clear', 'marketing')).rejects.toThrow('process.exit');

    expect(errors[0].split('\n').slice(0, 3)).toEqual([
      '',
      'Error: Unknown partition "marketing" (expected one of developer, support, manager, general)',
      'Code: INVALID_CONFIG',
    ]);
    expect(await fs.pathExists(path.join(dir, 'chunks.db'))).toBe(false);
  });

  it('should show the effective configuration with secrets masked', async () => {
    await run('config', 'show', '--format', 'json');

    expect(lastJSON()).toMatchObject({
      embedding: { local: { dimension: 64 }, remote: { apiKey: '********' } },
      logging: { level: 'error' },
    });
  });
});
