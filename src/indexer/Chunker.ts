/**
 * ============================================================================
 * CHUNKER - Content-Type Aware Recursive Text Splitting
 * ============================================================================
 *
 * Splits cleaned document text into ordered, overlapping spans.
 *
 * **Strategy selection** (first match wins):
 * 1. `file_path` ends in .md/.markdown, or docType is `documentation` → markdown
 * 2. `file_path` ends in a python suffix → python
 * 3. `file_path` ends in a javascript/typescript suffix → javascript
 * 4. docType `code` with no usable suffix → content heuristics
 * 5. otherwise → generic (paragraph → line → sentence → word → character)
 *
 * **Recursive splitting**: the text is cut at the first separator of the
 * strategy that occurs in it, the separator staying at the start of the
 * following piece. Pieces still longer than `chunkSize` are cut again with
 * the remaining separators. Small pieces are then merged greedily into
 * chunks of at most `chunkSize` characters; when a chunk is emitted, its
 * trailing pieces (up to `chunkOverlap` characters) seed the next chunk.
 */

import type { Document } from '../core/types.js';
import { createRagError, ErrorCode } from '../core/errors.js';
import { CONFIG, createLogger } from '../shared/utils.js';

const logger = createLogger('Chunker');

export type SplitStrategy = 'markdown' | 'python' | 'javascript' | 'generic';

export interface ChunkerOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  minContentLength?: number;
}

/**
 * Separator hierarchies, coarsest first. `''` splits into characters.
 */
export const SEPARATORS: Record<SplitStrategy, readonly string[]> = {
  markdown: [
    '\n## ',
    '\n### ',
    '\n#### ',
    '\n##### ',
    '\n###### ',
    '```\n\n',
    '\n\n***\n\n',
    '\n\n---\n\n',
    '\n\n___\n\n',
    '\n\n',
    '\n',
    ' ',
    '',
  ],
  python: ['\nclass ', '\ndef ', '\n\tdef ', '\n\n', '\n', ' ', ''],
  javascript: [
    '\nfunction ',
    '\nconst ',
    '\nlet ',
    '\nvar ',
    '\nclass ',
    '\nif ',
    '\nfor ',
    '\nwhile ',
    '\nswitch ',
    '\ncase ',
    '\ndefault ',
    '\n\n',
    '\n',
    ' ',
    '',
  ],
  generic: ['\n\n', '\n', '.', '!', '?', ',', ' ', ''],
};

const MARKDOWN_SUFFIXES = ['.md', '.markdown'];
const PYTHON_SUFFIXES = ['.py', '.pyw'];
const JAVASCRIPT_SUFFIXES = ['.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs'];

/**
 * Normalize whitespace: strip trailing spaces per line, collapse runs of
 * blank lines to one, trim the result.
 */
export function cleanContent(text: string): string {
  const lines: string[] = [];
  let previousBlank = false;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trimEnd();
    const blank = line.length === 0;
    if (blank && previousBlank) {
      continue;
    }
    lines.push(line);
    previousBlank = blank;
  }

  return lines.join('\n').replace(/\n\s*\n\s*\n/g, '\n\n').trim();
}

function hasSuffix(filePath: string, suffixes: readonly string[]): boolean {
  const lower = filePath.toLowerCase();
  return suffixes.some((suffix) => lower.endsWith(suffix));
}

/**
 * Pick a splitting strategy from the document's path, type and content
 */
export function selectStrategy(
  document: Pick<Document, 'docType' | 'metadata'>,
  content: string
): SplitStrategy {
  const filePath = typeof document.metadata.file_path === 'string' ? document.metadata.file_path : '';

  if (hasSuffix(filePath, MARKDOWN_SUFFIXES) || document.docType === 'documentation') {
    return 'markdown';
  }
  if (hasSuffix(filePath, PYTHON_SUFFIXES)) {
    return 'python';
  }
  if (hasSuffix(filePath, JAVASCRIPT_SUFFIXES)) {
    return 'javascript';
  }
  if (document.docType === 'code') {
    if (content.includes('def ') || content.includes('import ')) {
      return 'python';
    }
    if (content.includes('function ') || content.includes('const ')) {
      return 'javascript';
    }
  }
  return 'generic';
}

/**
 * Recursive separator splitter
 */
export class RecursiveTextSplitter {
  constructor(
    private readonly chunkSize: number,
    private readonly chunkOverlap: number
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw createRagError(ErrorCode.INVALID_CONFIG, `chunkSize must be a positive integer (got ${chunkSize})`);
    }
    if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw createRagError(
        ErrorCode.INVALID_CONFIG,
        `chunkOverlap (${chunkOverlap}) must be in [0, chunkSize)`
      );
    }
  }

  splitText(text: string, separators: readonly string[]): string[] {
    const chunks: string[] = [];

    let separator = separators[separators.length - 1] ?? '';
    let remaining: readonly string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '' || text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    let pending: string[] = [];
    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length <= this.chunkSize) {
        pending.push(piece);
        continue;
      }
      if (pending.length > 0) {
        chunks.push(...this.mergeSplits(pending));
        pending = [];
      }
      if (remaining.length === 0) {
        chunks.push(piece);
      } else {
        chunks.push(...this.splitText(piece, remaining));
      }
    }
    if (pending.length > 0) {
      chunks.push(...this.mergeSplits(pending));
    }

    return chunks;
  }

  /**
   * Greedy merge of pieces no longer than chunkSize, carrying the tail of
   * each emitted chunk (at most chunkOverlap characters) into the next.
   */
  private mergeSplits(pieces: readonly string[]): string[] {
    const docs: string[] = [];
    let current: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (total + piece.length > this.chunkSize && current.length > 0) {
        const doc = current.join('').trim();
        if (doc.length > 0) {
          docs.push(doc);
        }
        while (total > this.chunkOverlap || (total + piece.length > this.chunkSize && total > 0)) {
          const dropped = current.shift();
          total -= dropped === undefined ? total : dropped.length;
        }
      }
      current.push(piece);
      total += piece.length;
    }

    const last = current.join('').trim();
    if (last.length > 0) {
      docs.push(last);
    }
    return docs;
  }
}

/**
 * Split on `separator`, keeping it at the start of each following piece
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') {
    return Array.from(text);
  }
  const parts = text.split(separator);
  const pieces = [parts[0], ...parts.slice(1).map((part) => separator + part)];
  return pieces.filter((piece) => piece.length > 0);
}

/**
 * Document-level chunker: cleaning, length policy, strategy choice
 */
export class Chunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly minContentLength: number;
  private readonly splitter: RecursiveTextSplitter;

  constructor(options: ChunkerOptions = {}) {
    this.chunkSize = options.chunkSize ?? CONFIG.DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = options.chunkOverlap ?? CONFIG.DEFAULT_CHUNK_OVERLAP;
    this.minContentLength = options.minContentLength ?? CONFIG.MIN_CONTENT_LENGTH;
    this.splitter = new RecursiveTextSplitter(this.chunkSize, this.chunkOverlap);
  }

  /**
   * Split a document into ordered text spans
   *
   * Returns `[]` when the cleaned content is shorter than
   * `minContentLength` or the splitter yields nothing; the caller skips
   * the document.
   */
  split(document: Pick<Document, 'content' | 'docType' | 'metadata'>): string[] {
    const content = cleanContent(document.content);

    if (content.length < this.minContentLength) {
      logger.debug(`Content too short (${content.length} < ${this.minContentLength}), skipping`);
      return [];
    }

    const strategy = selectStrategy(document, content);
    const chunks = this.splitter.splitText(content, SEPARATORS[strategy]);

    if (chunks.length === 0) {
      logger.warn(`Splitter (${strategy}) produced no chunks for ${content.length} characters`);
    }
    return chunks;
  }
}
