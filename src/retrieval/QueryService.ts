/**
 * Question answering boundary
 *
 * Runs retrieval and hands the ranked results to an opaque answer
 * generator. Empty or failed retrieval never reaches the generator and
 * never throws: the caller gets the minimum-confidence answer instead.
 *
 * Answers carry role-specific notes and suggested actions taken from the
 * lexicon's `roleGuidance` table.
 */

import { isPartition, type RankedResult, type SearchFilters } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { loadLexicon, type GuidanceNote, type Lexicon } from '../config/lexicon.js';
import type { Retriever } from './Retriever.js';
import { createLogger } from '../shared/utils.js';

const logger = createLogger('QueryService');

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I don't have enough information to answer your question. Please provide more specific details or check if the relevant documentation is available in the system.";

export interface GenerationRequest {
  query: string;
  role: string;
  results: RankedResult[];
  confidence: number;
}

/**
 * Language-model call, prompt included. Lives outside the core.
 */
export interface AnswerGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface SourceReference {
  /** Document source: code-host, wiki, ticket-tracker */
  type: string;
  contentType: string;
  similarity: number;
  title: string;
  repository?: string;
  filePath?: string;
  url?: string;
  issueKey?: string;
  lastUpdated?: string;
}

export interface AssistantAnswer {
  answer: string;
  sources: SourceReference[];
  confidence: number;
  /** True when no passage supported an answer */
  insufficientInformation: boolean;
  /** Observations about the sources that matter to the asking role */
  roleNotes: string[];
  suggestedActions: string[];
  processingTimeMs: number;
}

function stringField(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Source references for ranked results, in rank order
 */
export function formatSources(results: readonly RankedResult[]): SourceReference[] {
  return results.map(({ metadata, distance }) => {
    const source: SourceReference = {
      type: stringField(metadata, 'source') ?? 'unknown',
      contentType: stringField(metadata, 'contentType') ?? 'general',
      similarity: 1 - distance,
      title: stringField(metadata, 'title') ?? stringField(metadata, 'file_path') ?? 'Unknown',
    };

    const repository = stringField(metadata, 'repository');
    const filePath = stringField(metadata, 'file_path');
    const url = stringField(metadata, 'url');
    const issueKey = stringField(metadata, 'issue_key');
    const lastUpdated = stringField(metadata, 'updatedAt');
    if (repository) source.repository = repository;
    if (filePath) source.filePath = filePath;
    if (url) source.url = url;
    if (issueKey) source.issueKey = issueKey;
    if (lastUpdated) source.lastUpdated = lastUpdated;

    return source;
  });
}

export interface RoleGuidanceResult {
  notes: string[];
  actions: string[];
}

function noteApplies(note: GuidanceNote, results: readonly RankedResult[]): boolean {
  const { contentType, contentContains } = note;
  if (contentType !== undefined && !results.some((result) => stringField(result.metadata, 'contentType') === contentType)) {
    return false;
  }
  if (
    contentContains !== undefined &&
    !results.some((result) => result.content.toLowerCase().includes(contentContains))
  ) {
    return false;
  }
  return true;
}

/**
 * Notes and actions for `role` given the results an answer is based on
 *
 * Unknown roles get the `general` guidance. `{sourceCount}` in a note is
 * replaced by the number of distinct document sources among the results.
 */
export function roleGuidance(role: string, results: readonly RankedResult[], lexicon: Lexicon): RoleGuidanceResult {
  const guidance = lexicon.roleGuidance[isPartition(role) ? role : 'general'];
  const sourceCount = new Set(results.map((result) => stringField(result.metadata, 'source') ?? 'unknown')).size;

  return {
    notes: guidance.notes
      .filter((note) => noteApplies(note, results))
      .map((note) => note.text.replaceAll('{sourceCount}', String(sourceCount))),
    actions: [...guidance.actions],
  };
}

export class QueryService {
  constructor(
    private readonly retriever: Retriever,
    private readonly generator: AnswerGenerator,
    private readonly lexicon: Lexicon = loadLexicon()
  ) {}

  async ask(query: string, role: string, filters?: SearchFilters): Promise<AssistantAnswer> {
    const startTime = Date.now();

    let results: RankedResult[];
    let confidence: number;
    try {
      ({ results, confidence } = await this.retriever.retrieve(query, role, filters));
    } catch (error) {
      logger.error('Retrieval failed:', errorMessage(error));
      return this.insufficient(startTime);
    }

    if (results.length === 0) {
      return this.insufficient(startTime);
    }

    let answer: string;
    try {
      answer = await this.generator.generate({ query, role, results, confidence });
    } catch (error) {
      logger.error('Answer generation failed:', errorMessage(error));
      return this.insufficient(startTime);
    }

    const { notes, actions } = roleGuidance(role, results, this.lexicon);
    return {
      answer,
      sources: formatSources(results),
      confidence,
      insufficientInformation: false,
      roleNotes: notes,
      suggestedActions: actions,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private insufficient(startTime: number): AssistantAnswer {
    return {
      answer: INSUFFICIENT_INFORMATION_ANSWER,
      sources: [],
      confidence: 0,
      insufficientInformation: true,
      roleNotes: [],
      suggestedActions: ['Try rephrasing your question', 'Check if documentation exists for this topic'],
      processingTimeMs: Date.now() - startTime,
    };
  }
}
