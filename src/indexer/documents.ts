/**
 * Document input parsing
 *
 * Accepts the JSON shape crawlers emit (snake_case keys) as well as the
 * in-process camelCase shape.
 */

import { z } from 'zod';
import { DOCUMENT_SOURCES, type Document } from '../core/types.js';
import { createRagError, describeZodError, ErrorCode } from '../core/errors.js';
import { isRecord } from '../shared/utils.js';

const KEY_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ['docType', 'doc_type'],
  ['roleTags', 'role_tags'],
  ['createdAt', 'created_at'],
  ['updatedAt', 'updated_at'],
];

/**
 * Map snake_case keys onto their camelCase names; null counts as absent
 */
function normalizeKeys(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== null) {
      normalized[key] = value;
    }
  }
  for (const [camel, snake] of KEY_ALIASES) {
    const value = normalized[camel] ?? normalized[snake];
    delete normalized[snake];
    if (value !== undefined) {
      normalized[camel] = value;
    }
  }
  return normalized;
}

const DateInputSchema = z
  .union([z.date(), z.string(), z.number()])
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
      return z.NEVER;
    }
    return date;
  });

export const DocumentSchema = z.preprocess(
  normalizeKeys,
  z.object({
    content: z.string(),
    source: z.enum(DOCUMENT_SOURCES),
    /** Free-form classification: documentation, configuration, code, issue, ... */
    docType: z.string().min(1),
    roleTags: z.array(z.string()).default([]),
    metadata: z.record(z.unknown()).default({}),
    createdAt: DateInputSchema.optional(),
    updatedAt: DateInputSchema.optional(),
  })
);

/**
 * Validate one raw document
 *
 * @throws {RagError} INVALID_DOCUMENT
 */
export function parseDocument(raw: unknown, index = 0): Document {
  const result = DocumentSchema.safeParse(raw);
  if (!result.success) {
    throw createRagError(
      ErrorCode.INVALID_DOCUMENT,
      `Document ${index}: ${describeZodError(result.error)}`,
      { index }
    );
  }
  return result.data;
}

/**
 * Validate a document list, or a single document object
 */
export function parseDocuments(raw: unknown): Document[] {
  if (Array.isArray(raw)) {
    return raw.map((item, index) => parseDocument(item, index));
  }
  if (isRecord(raw) && Array.isArray(raw.documents)) {
    return raw.documents.map((item, index) => parseDocument(item, index));
  }
  return [parseDocument(raw)];
}
