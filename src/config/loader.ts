/**
 * ============================================================================
 * CONFIGURATION LOADER
 * ============================================================================
 *
 * Resolution order, later wins:
 * 1. Schema defaults ({@link RagConfigSchema})
 * 2. YAML file (`ROLERAG_CONFIG` or `~/.rolerag/config.yaml`)
 * 3. Environment overrides (`ROLERAG_*`)
 *
 * The combined document is parsed once; any problem raises `INVALID_CONFIG`.
 */

import fs from 'fs-extra';
import yaml from 'js-yaml';
import os from 'os';
import path from 'path';
import { RagConfigSchema, type RagConfig } from './types.js';
import { createRagError, describeZodError, ErrorCode, errorMessage } from '../core/errors.js';
import { isRecord } from '../shared/utils.js';

export const DEFAULT_CONFIG_PATH = '~/.rolerag/config.yaml';

export interface LoadConfigOptions {
  /** Explicit config file; overrides `ROLERAG_CONFIG` */
  path?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandTilde(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Drop keys whose value is null; YAML writes `key:` with no value as null
 */
function dropNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(dropNulls);
  }
  if (!isRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== null) {
      result[key] = dropNulls(entry);
    }
  }
  return result;
}

/**
 * Parse a config document, filling in defaults
 *
 * @param raw - Parsed YAML (or any object of the same shape); nullish means defaults
 * @throws {RagError} INVALID_CONFIG
 */
export function parseConfig(raw: unknown): RagConfig {
  const result = RagConfigSchema.safeParse(dropNulls(raw ?? {}));
  if (!result.success) {
    throw createRagError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${describeZodError(result.error)}`,
      { issues: result.error.issues.length }
    );
  }
  return result.data;
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['ROLERAG_LOG_LEVEL', ['logging', 'level']],
  ['ROLERAG_EMBEDDING_PROVIDER', ['embedding', 'provider']],
  ['ROLERAG_STORE_BACKEND', ['store', 'backend']],
  ['ROLERAG_EMBEDDING_ENDPOINT', ['embedding', 'remote', 'endpoint']],
  ['ROLERAG_EMBEDDING_API_KEY', ['embedding', 'remote', 'apiKey']],
  ['ROLERAG_SQLITE_PATH', ['store', 'sqlite', 'path']],
  ['ROLERAG_OPENSEARCH_ENDPOINT', ['store', 'opensearch', 'endpoint']],
  ['ROLERAG_OPENSEARCH_USERNAME', ['store', 'opensearch', 'username']],
  ['ROLERAG_OPENSEARCH_PASSWORD', ['store', 'opensearch', 'password']],
];

function setPath(target: Record<string, unknown>, keys: readonly string[], value: string): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const child = node[key];
    if (child === undefined || child === null) {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    } else if (isRecord(child)) {
      node = child;
    } else {
      // Leave the malformed section for the schema to report
      return;
    }
  }
  const last = keys.at(-1);
  if (last !== undefined) {
    node[last] = value;
  }
}

/**
 * Apply `ROLERAG_*` environment overrides to a raw config document
 *
 * Empty variables are ignored. The input is not modified.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  const base = raw ?? {};
  if (!isRecord(base)) {
    return base;
  }

  const next = structuredClone(base);
  for (const [name, keys] of ENV_OVERRIDES) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      setPath(next, keys, value);
    }
  }
  return next;
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Load configuration from YAML, environment and defaults
 *
 * A missing implicit file is not an error: defaults plus environment apply.
 *
 * @throws {RagError} INVALID_CONFIG on unreadable YAML or invalid values
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RagConfig> {
  const env = options.env ?? process.env;
  const configPath = expandTilde(options.path ?? env.ROLERAG_CONFIG ?? DEFAULT_CONFIG_PATH);

  let raw: unknown;
  if (await fs.pathExists(configPath)) {
    try {
      raw = yaml.load(await fs.readFile(configPath, 'utf-8'));
    } catch (error) {
      throw createRagError(
        ErrorCode.INVALID_CONFIG,
        `Failed to parse ${configPath}: ${errorMessage(error)}`,
        { path: configPath }
      );
    }
  } else if (options.path !== undefined) {
    throw createRagError(ErrorCode.INVALID_CONFIG, `Config file not found: ${configPath}`, {
      path: configPath,
    });
  }

  return parseConfig(applyEnvOverrides(raw, env));
}
