/**
 * ============================================================================
 * SEARCH COMMAND - Role-Aware Retrieval
 * ============================================================================
 *
 * Implements `rolerag search`: embeds the query, searches the general
 * partition plus the role's own, re-ranks for the role and prints the
 * results with the retrieval confidence.
 *
 * Usage:
 * ```bash
 * rolerag search "how do I rotate the api key"
 * rolerag search "deploy pipeline" --role developer --limit 5
 * rolerag search "login error" --filter source=ticket-tracker --format json
 * rolerag search "setup" --filter contentType=setup_instructions,troubleshooting
 * ```
 *
 * A filter value with commas is a set: the chunk must match one of them.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createContext, globalOptions } from '../context.js';
import { createSpinner } from '../progress.js';
import { handleCLIError } from '../errors.js';
import { Retriever, type RetrievalResult } from '../../retrieval/Retriever.js';
import { createRagError, ErrorCode } from '../../core/errors.js';
import { FILTERABLE_FIELDS, isFilterField, type SearchFilters } from '../../core/types.js';

// ============================================================================
// TYPES
// ============================================================================

interface SearchOptions {
  role: string;
  limit?: string;
  filter: string[];
  format: 'text' | 'json';
}

// ============================================================================
// OPTION PARSING
// ============================================================================

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `--filter key=value[,value...]` options
 *
 * @throws {RagError} INVALID_FILTER on a malformed entry or unknown field
 */
export function parseFilterOptions(entries: readonly string[]): SearchFilters {
  const filters: SearchFilters = {};

  for (const entry of entries) {
    const separator = entry.indexOf('=');
    const field = separator > 0 ? entry.slice(0, separator).trim() : '';
    const rawValue = separator > 0 ? entry.slice(separator + 1) : '';
    const values = rawValue
      .split(',')
      .map((value) => value.trim())
      .filter((value) => value.length > 0);

    if (!field || values.length === 0) {
      throw createRagError(ErrorCode.INVALID_FILTER, `Malformed filter "${entry}", expected key=value`, {
        entry,
      });
    }
    if (!isFilterField(field)) {
      throw createRagError(
        ErrorCode.INVALID_FILTER,
        `Unknown filter field "${field}" (expected one of ${FILTERABLE_FIELDS.join(', ')})`,
        { field }
      );
    }

    filters[field] = values.length === 1 ? values[0] : values;
  }

  return filters;
}

// ============================================================================
// RESULT FORMATTING
// ============================================================================

function metadataString(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Short location label for a result: file path, page, issue or chunk id
 */
export function resultLocation(metadata: Record<string, unknown>, fallback: string): string {
  const filePath = metadataString(metadata, 'file_path');
  const repository = metadataString(metadata, 'repository');
  if (filePath) {
    return repository ? `${repository}/${filePath}` : filePath;
  }
  return (
    metadataString(metadata, 'title') ??
    metadataString(metadata, 'issue_key') ??
    metadataString(metadata, 'page_id') ??
    fallback
  );
}

function formatResult(result: RetrievalResult['results'][number], index: number): string {
  const similarity = ((1 - result.distance) * 100).toFixed(1);
  const contentType = metadataString(result.metadata, 'contentType') ?? 'general';
  const preview = result.content.replace(/\s+/g, ' ').slice(0, 160);

  return [
    chalk.bold.cyan(`\n${index + 1}. `) +
      chalk.white(resultLocation(result.metadata, result.id)) +
      chalk.gray(` (${similarity}% similar, score ${result.combinedScore.toFixed(3)})`),
    chalk.gray(`   ${contentType} · ${result.partition} partition`),
    `   ${preview}${result.content.length > 160 ? chalk.gray('…') : ''}`,
  ].join('\n');
}

/**
 * Machine-readable output for `--format json`
 */
export function formatResultsJSON(retrieval: RetrievalResult): string {
  return JSON.stringify(
    {
      query: retrieval.query,
      role: retrieval.role,
      confidence: retrieval.confidence,
      count: retrieval.results.length,
      results: retrieval.results.map((result) => ({
        id: result.id,
        partition: result.partition,
        distance: result.distance,
        roleRelevanceScore: result.roleRelevanceScore,
        combinedScore: result.combinedScore,
        content: result.content,
        metadata: result.metadata,
      })),
    },
    null,
    2
  );
}

function displaySummary(retrieval: RetrievalResult, duration: number): void {
  const count = retrieval.results.length;
  console.log(chalk.gray('─'.repeat(70)));
  console.log(
    chalk.white(
      `Found ${chalk.bold.green(count)} result${count === 1 ? '' : 's'} for "${chalk.cyan(retrieval.query)}" ` +
        `as ${chalk.cyan(retrieval.role)}`
    )
  );
  console.log(chalk.gray(`Confidence: ${(retrieval.confidence * 100).toFixed(1)}%`));
  console.log(chalk.gray(`Search completed in ${duration.toFixed(0)}ms\n`));
}

// ============================================================================
// COMMAND REGISTRATION
// ============================================================================

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search ingested documents for a role')
    .argument('<query>', 'Search query')
    .option('-r, --role <role>', 'Audience role (developer, support, manager, general)', 'general')
    .option('-l, --limit <number>', 'Maximum number of results')
    .option('--filter <key=value>', 'Metadata filter, repeatable', collect, [])
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (query: string, options: SearchOptions, command: Command) => {
      const globals = globalOptions(command);
      try {
        const spinner = createSpinner(globals.verbose);
        const startTime = Date.now();
        const filters = parseFilterOptions(options.filter);

        spinner.start('Loading configuration...');
        const { config, embeddings, store, lexicon } = await createContext(globals);
        spinner.succeed(`Using ${embeddings.name} with ${store.backend} store`);

        const retrievalOptions = { ...config.retrieval };
        if (options.limit !== undefined) {
          const limit = Number.parseInt(options.limit, 10);
          if (!Number.isInteger(limit) || limit < 1) {
            throw createRagError(ErrorCode.INVALID_CONFIG, `--limit must be a positive integer (got ${options.limit})`);
          }
          retrievalOptions.resultLimit = limit;
          retrievalOptions.overFetchLimit = Math.max(retrievalOptions.overFetchLimit, limit);
        }

        const retriever = new Retriever({ embeddings, store, lexicon, options: retrievalOptions });

        spinner.start('Searching...');
        let retrieval: RetrievalResult;
        try {
          retrieval = await retriever.retrieve(query, options.role, filters);
        } finally {
          await store.close();
        }
        spinner.succeed(`Found ${retrieval.results.length} results`);

        if (options.format === 'json') {
          console.log(formatResultsJSON(retrieval));
          return;
        }

        if (retrieval.results.length === 0) {
          console.log(chalk.yellow('\nNo results found.\n'));
          console.log(chalk.gray('  • Check that documents have been ingested: rolerag stats'));
          console.log(chalk.gray('  • Try a different role or fewer filters'));
          return;
        }

        retrieval.results.forEach((result, index) => {
          console.log(formatResult(result, index));
        });
        displaySummary(retrieval, Date.now() - startTime);
      } catch (error) {
        handleCLIError(error, globals.verbose);
      }
    });
}
