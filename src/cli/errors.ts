/**
 * CLI error reporting
 */

import chalk from 'chalk';
import { ErrorCode, isRagError } from '../core/errors.js';

/** Hints printed under an error, keyed by code */
const SUGGESTIONS: Partial<Record<ErrorCode, string[]>> = {
  [ErrorCode.INVALID_CONFIG]: [
    'Check ~/.rolerag/config.yaml or the file named by ROLERAG_CONFIG',
    'Run: rolerag config show',
  ],
  [ErrorCode.INVALID_DOCUMENT]: [
    'Documents need content, source, doc_type and role_tags',
  ],
  [ErrorCode.INVALID_FILTER]: [
    'Filterable fields: id, source, docType, roleTags, sourceDocumentId, documentKey, contentType',
  ],
  [ErrorCode.STORE_UNAVAILABLE]: [
    'Check that the store backend is reachable',
    'For the sqlite backend, check that the database directory is writable',
  ],
  [ErrorCode.EMBEDDING_BACKEND_FAILURE]: [
    'Check the embedding endpoint and API key',
  ],
};

/**
 * Render an error for the terminal
 */
export function formatCLIError(error: Error, verbose = false): string {
  const lines = [chalk.red(`\nError: ${error.message}`)];

  if (isRagError(error)) {
    lines.push(chalk.gray(`Code: ${error.code}`));
    for (const suggestion of SUGGESTIONS[error.code] ?? []) {
      lines.push(chalk.yellow(`  • ${suggestion}`));
    }
    if (verbose && error.details) {
      lines.push(chalk.gray(JSON.stringify(error.details, null, 2)));
    }
  }

  if (verbose && error.stack) {
    lines.push(chalk.gray(error.stack));
  }

  return lines.join('\n');
}

/**
 * Print the error and exit with status 1
 */
export function handleCLIError(error: unknown, verbose = false): never {
  const normalized = error instanceof Error ? error : new Error(String(error));
  console.error(formatCLIError(normalized, verbose));
  process.exit(1);
}
