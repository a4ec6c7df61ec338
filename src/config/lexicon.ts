/**
 * Ranking and classification lexicon
 *
 * Role keywords, role content-type bonuses, content-type signal rules,
 * keyword lists and per-role answer guidance are data, kept in
 * `config/lexicon.json`. The ranker, the content analyzer and the query
 * service stay generic over whatever lexicon they are given.
 *
 * @module config/lexicon
 */

import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createRagError, describeZodError, ErrorCode, errorMessage } from '../core/errors.js';

const StringListSchema = z.array(z.string());
const KeywordListSchema = z.array(z.string().transform((word) => word.toLowerCase()));

const roleTable = <T extends z.ZodTypeAny>(entry: T) =>
  z.object({
    developer: entry,
    support: entry,
    manager: entry,
    general: entry,
  });

const ContentTypeRuleSchema = z.object({
  type: z.string(),
  /** Match signals against the raw content instead of its lowercase form */
  caseSensitive: z.boolean().default(false),
  signals: StringListSchema,
});

const GuidanceNoteSchema = z.object({
  /** Note text; `{sourceCount}` becomes the number of distinct sources */
  text: z.string().min(1),
  /** Only when some result chunk has this content type */
  contentType: z.string().optional(),
  /** Only when some result chunk's lowercase content contains this term */
  contentContains: z
    .string()
    .transform((term) => term.toLowerCase())
    .optional(),
});

const RoleGuidanceSchema = z.object({
  notes: z.array(GuidanceNoteSchema).default([]),
  actions: StringListSchema.default([]),
});

export const LexiconSchema = z.object({
  roleKeywords: roleTable(KeywordListSchema.default([])),
  roleContentTypes: roleTable(StringListSchema.default([])),
  scoring: z
    .object({
      keywordPoints: z.number().default(1),
      roleTagPoints: z.number().default(3),
      contentTypePoints: z.number().default(2),
    })
    .default({}),
  /** Evaluated in order; the first rule with a signal present wins */
  contentTypes: z.array(ContentTypeRuleSchema),
  codeIndicators: StringListSchema.default([]),
  complexityTerms: StringListSchema.default([]),
  technicalKeywords: StringListSchema.default([]),
  roleGuidance: roleTable(RoleGuidanceSchema.default({})).default({}),
});

export type ContentTypeRule = z.infer<typeof ContentTypeRuleSchema>;
export type GuidanceNote = z.infer<typeof GuidanceNoteSchema>;
export type RoleGuidance = z.infer<typeof RoleGuidanceSchema>;
export type ScoringWeights = z.infer<typeof LexiconSchema>['scoring'];
export type Lexicon = z.infer<typeof LexiconSchema>;

export const DEFAULT_LEXICON_PATH = fileURLToPath(
  new URL('../../config/lexicon.json', import.meta.url)
);

/**
 * Validate a parsed lexicon document
 *
 * @param raw - Parsed JSON
 * @param path - Source path, for error messages
 */
export function parseLexicon(raw: unknown, path = '<inline>'): Lexicon {
  const result = LexiconSchema.safeParse(raw);
  if (!result.success) {
    throw createRagError(
      ErrorCode.INVALID_CONFIG,
      `Invalid lexicon (${path}): ${describeZodError(result.error)}`,
      { path }
    );
  }
  return result.data;
}

const cache = new Map<string, Lexicon>();

/**
 * Load and validate a lexicon file; results are cached per path
 *
 * @param path - Lexicon JSON path (default: bundled `config/lexicon.json`)
 */
export function loadLexicon(path: string = DEFAULT_LEXICON_PATH): Lexicon {
  const cached = cache.get(path);
  if (cached) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = fs.readJsonSync(path);
  } catch (error) {
    throw createRagError(
      ErrorCode.INVALID_CONFIG,
      `Failed to read lexicon ${path}: ${errorMessage(error)}`,
      { path }
    );
  }

  const lexicon = parseLexicon(raw, path);
  cache.set(path, lexicon);
  return lexicon;
}
