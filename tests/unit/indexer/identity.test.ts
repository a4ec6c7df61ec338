/**
 * Unit tests for document identity
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import type { Document } from '../../../src/core/types.js';
import { chunkId, documentId, documentKey, naturalKey } from '../../../src/indexer/identity.js';

function wikiPage(content: string, pageId = '42'): Document {
  return {
    content,
    source: 'wiki',
    docType: 'documentation',
    roleTags: ['support'],
    metadata: { page_id: pageId },
  };
}

describe('documentId', () => {
  it('should follow the documented digest recipe', () => {
    const doc = wikiPage('Reset your password from the account page.');
    const md5 = createHash('md5').update(doc.content).digest('hex').slice(0, 8);
    const expected = createHash('sha256')
      .update(`wiki_documentation_42_${md5}`)
      .digest('hex')
      .slice(0, 16);

    expect(documentId(doc)).toBe(expected);
  });

  it('should be deterministic', () => {
    const doc = wikiPage('Same content twice.');
    expect(documentId(doc)).toBe(documentId({ ...doc, metadata: { ...doc.metadata } }));
  });

  it('should be 16 lowercase hex characters', () => {
    expect(documentId(wikiPage('anything'))).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should change when the content changes', () => {
    expect(documentId(wikiPage('version one'))).not.toBe(documentId(wikiPage('version two')));
  });

  it('should differ across natural keys with equal content', () => {
    expect(documentId(wikiPage('shared', '1'))).not.toBe(documentId(wikiPage('shared', '2')));
  });

  it('should ignore role tags and timestamps', () => {
    const doc = wikiPage('content');
    const retagged: Document = { ...doc, roleTags: ['manager'], updatedAt: new Date('2024-01-01') };
    expect(documentId(retagged)).toBe(documentId(doc));
  });

  it('should treat missing natural-key fields as empty strings', () => {
    const doc: Document = {
      content: 'file body',
      source: 'code-host',
      docType: 'code',
      roleTags: [],
      metadata: { file_path: 'src/app.ts' },
    };
    const md5 = createHash('md5').update('file body').digest('hex').slice(0, 8);
    const expected = createHash('sha256')
      .update(`code-host_code__src/app.ts_${md5}`)
      .digest('hex')
      .slice(0, 16);

    expect(naturalKey(doc)).toEqual(['', 'src/app.ts']);
    expect(documentId(doc)).toBe(expected);
  });
});

describe('documentKey', () => {
  it('should stay constant across content versions', () => {
    expect(documentKey(wikiPage('old text'))).toBe(documentKey(wikiPage('new text')));
  });

  it('should differ between logical documents', () => {
    expect(documentKey(wikiPage('x', '1'))).not.toBe(documentKey(wikiPage('x', '2')));
  });

  it('should hash the natural key without the content hash', () => {
    const expected = createHash('sha256').update('wiki_documentation_42').digest('hex').slice(0, 16);
    expect(documentKey(wikiPage('whatever'))).toBe(expected);
  });
});

describe('chunkId', () => {
  it('should append the chunk index', () => {
    expect(chunkId('abcdef0123456789', 3)).toBe('abcdef0123456789_chunk_3');
  });
});
