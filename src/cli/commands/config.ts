/**
 * ============================================================================
 * CONFIG COMMANDS
 * ============================================================================
 *
 * - `rolerag config show` - effective configuration (defaults, file and
 *   environment merged), secrets masked
 * - `rolerag config path` - configuration file that would be read
 *
 * **Environment Variables**:
 * - ROLERAG_CONFIG
 * - ROLERAG_LOG_LEVEL
 * - ROLERAG_EMBEDDING_PROVIDER, ROLERAG_EMBEDDING_ENDPOINT, ROLERAG_EMBEDDING_API_KEY
 * - ROLERAG_STORE_BACKEND, ROLERAG_SQLITE_PATH
 * - ROLERAG_OPENSEARCH_ENDPOINT, ROLERAG_OPENSEARCH_USERNAME, ROLERAG_OPENSEARCH_PASSWORD
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import yaml from 'js-yaml';
import { globalOptions, loadCLIConfig } from '../context.js';
import { handleCLIError } from '../errors.js';
import { DEFAULT_CONFIG_PATH, expandTilde } from '../../config/loader.js';
import type { RagConfig } from '../../config/types.js';

const MASK = '********';

interface ShowOptions {
  format: 'yaml' | 'json';
}

function mask(value: string | undefined): string | undefined {
  return value ? MASK : value;
}

/**
 * Copy of the configuration with credentials masked
 */
export function redactConfig(config: RagConfig): RagConfig {
  const redacted = structuredClone(config);
  redacted.embedding.remote.apiKey = mask(redacted.embedding.remote.apiKey);
  redacted.store.opensearch.password = mask(redacted.store.opensearch.password);
  redacted.store.opensearch.apiKey = mask(redacted.store.opensearch.apiKey);
  return redacted;
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Inspect configuration');

  config
    .command('show')
    .description('Print the effective configuration')
    .option('-f, --format <format>', 'Output format (yaml|json)', 'yaml')
    .action(async (options: ShowOptions, command: Command) => {
      const globals = globalOptions(command);
      try {
        const redacted = redactConfig(await loadCLIConfig(globals));
        if (options.format === 'json') {
          console.log(JSON.stringify(redacted, null, 2));
        } else {
          console.log(yaml.dump(redacted, { skipInvalid: true }));
        }
      } catch (error) {
        handleCLIError(error, globals.verbose);
      }
    });

  config
    .command('path')
    .description('Print the configuration file location')
    .action((_options: unknown, command: Command) => {
      const globals = globalOptions(command);
      const configPath = expandTilde(globals.config ?? process.env.ROLERAG_CONFIG ?? DEFAULT_CONFIG_PATH);
      console.log(chalk.cyan(configPath));
    });
}
