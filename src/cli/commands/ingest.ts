/**
 * ============================================================================
 * INGEST COMMAND - Batch Document Ingestion
 * ============================================================================
 *
 * Implements `rolerag ingest <file>`. The file holds a JSON document list
 * (or `{ "documents": [...] }`, or a single document):
 *
 * ```json
 * [
 *   {
 *     "content": "# Deploying\n...",
 *     "source": "wiki",
 *     "doc_type": "documentation",
 *     "role_tags": ["developer", "support"],
 *     "metadata": { "page_id": "123", "title": "Deploying" },
 *     "updated_at": "2024-05-01T10:00:00Z"
 *   }
 * ]
 * ```
 *
 * Every document is chunked, embedded and written to the partitions its
 * role tags name. Failing documents are reported, never fatal to the batch.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs-extra';
import { createContext, globalOptions } from '../context.js';
import { createSpinner } from '../progress.js';
import { handleCLIError } from '../errors.js';
import { expandTilde } from '../../config/loader.js';
import { createRagError, ErrorCode, errorMessage } from '../../core/errors.js';
import { PARTITIONS } from '../../core/types.js';
import { Chunker } from '../../indexer/Chunker.js';
import { parseDocuments } from '../../indexer/documents.js';
import { IngestionPipeline, type IngestionResult } from '../../indexer/IngestionPipeline.js';

interface IngestOptions {
  /** Set by `--no-prune` */
  prune: boolean;
  concurrency?: string;
  format: 'text' | 'json';
}

/**
 * Human-readable run summary
 */
export function formatIngestionSummary(result: IngestionResult): string {
  const lines = [
    chalk.bold('\nIngestion complete'),
    `  Documents processed: ${chalk.green(result.processedDocuments)}`,
    `  Documents skipped:   ${chalk.yellow(result.skippedDocuments)}`,
    `  Chunks written:      ${chalk.green(result.totalChunks)}`,
    `  Errors:              ${result.errors > 0 ? chalk.red(result.errors) : result.errors}`,
  ];

  if (result.degradedEmbeddings > 0) {
    lines.push(`  Zero embeddings:     ${chalk.yellow(result.degradedEmbeddings)}`);
  }
  if (result.partitionWriteFailures > 0) {
    lines.push(`  Partition failures:  ${chalk.red(result.partitionWriteFailures)}`);
  }
  if (result.staleChunksRemoved > 0) {
    lines.push(`  Stale chunks pruned: ${result.staleChunksRemoved}`);
  }

  lines.push(chalk.gray(`  Partitions: ${PARTITIONS.map((p) => `${p}=${result.partitionStats[p]}`).join(' ')}`));
  lines.push(chalk.gray(`  Duration: ${(result.duration / 1000).toFixed(2)}s`));

  for (const failure of result.failures) {
    lines.push(chalk.red(`  ✖ ${failure.documentId}: ${failure.message}`));
  }

  return lines.join('\n');
}

async function readDocumentFile(file: string): Promise<unknown> {
  const filePath = expandTilde(file);
  if (!(await fs.pathExists(filePath))) {
    throw createRagError(ErrorCode.INVALID_DOCUMENT, `Document file not found: ${filePath}`, { path: filePath });
  }
  try {
    const parsed: unknown = await fs.readJson(filePath);
    return parsed;
  } catch (error) {
    throw createRagError(ErrorCode.INVALID_DOCUMENT, `Failed to parse ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
    });
  }
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Chunk, embed and store documents from a JSON file')
    .argument('<file>', 'JSON file with documents')
    .option('--no-prune', 'Keep chunks of earlier document versions')
    .option('--concurrency <number>', 'Documents processed in parallel')
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (file: string, options: IngestOptions, command: Command) => {
      const globals = globalOptions(command);
      try {
        const spinner = createSpinner(globals.verbose);

        spinner.start(`Reading ${file}...`);
        const documents = parseDocuments(await readDocumentFile(file));
        spinner.succeed(`Read ${documents.length} documents`);

        const { config, embeddings, store, lexicon } = await createContext(globals);
        const chunker = new Chunker(config.chunking);
        const pipeline = new IngestionPipeline({ chunker, embeddings, store, lexicon });

        const concurrency =
          options.concurrency === undefined
            ? config.ingestion.documentConcurrency
            : Number.parseInt(options.concurrency, 10);
        if (!Number.isInteger(concurrency) || concurrency < 1) {
          throw createRagError(
            ErrorCode.INVALID_CONFIG,
            `--concurrency must be a positive integer (got ${options.concurrency})`
          );
        }

        spinner.start('Ingesting...');
        let result: IngestionResult;
        try {
          result = await pipeline.ingest(documents, {
            documentConcurrency: concurrency,
            pruneStale: options.prune && config.ingestion.pruneStale,
            onProgress: (processed, total) => spinner.start(`Ingested ${processed}/${total} documents`),
          });
        } finally {
          await store.close();
        }
        if (result.errors > 0) {
          spinner.fail(`${result.errors} of ${documents.length} documents failed`);
        } else {
          spinner.succeed('Ingestion finished');
        }

        if (options.format === 'json') {
          console.log(JSON.stringify(result, null, 2));
        } else {
          console.log(formatIngestionSummary(result));
        }

        if (result.errors > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        handleCLIError(error, globals.verbose);
      }
    });
}
