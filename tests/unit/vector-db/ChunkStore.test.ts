/**
 * Unit tests for the shared chunk store helpers
 */

import { describe, it, expect } from 'vitest';
import { compareHits, mergeHits, normalizeFilters } from '../../../src/vector-db/ChunkStore.js';
import { ErrorCode } from '../../../src/core/errors.js';
import { makeHit } from '../../support/fixtures.js';

describe('normalizeFilters', () => {
  it('should turn scalars into one-element lists and dedupe lists', () => {
    expect(normalizeFilters({ source: 'wiki', contentType: ['faq', 'faq', 'troubleshooting'] })).toEqual([
      { field: 'source', values: ['wiki'] },
      { field: 'contentType', values: ['faq', 'troubleshooting'] },
    ]);
  });

  it('should skip undefined entries', () => {
    expect(normalizeFilters({ source: undefined })).toEqual([]);
    expect(normalizeFilters()).toEqual([]);
  });

  it('should reject unknown fields', () => {
    let error: unknown;
    try {
      normalizeFilters({ author: 'alice' });
    } catch (caught) {
      error = caught;
    }
    expect(error).toMatchObject({ code: ErrorCode.INVALID_FILTER, message: 'Unknown filter field: author' });
  });

  it('should reject empty lists and non-string values', () => {
    expect(() => normalizeFilters({ source: [] })).toThrow(/needs a string/);
    expect(() => normalizeFilters({ docType: 3 })).toThrow(/needs a string/);
    expect(() => normalizeFilters({ roleTags: ['support', 7] })).toThrow(/needs a string/);
  });
});

describe('compareHits', () => {
  it('should order by distance then id', () => {
    const hits = [makeHit('b', 0.2), makeHit('c', 0.1), makeHit('a', 0.2)];
    expect(hits.sort(compareHits).map((hit) => hit.id)).toEqual(['c', 'a', 'b']);
  });
});

describe('mergeHits', () => {
  it('should keep the closest copy of a duplicated id', () => {
    const general = [{ ...makeHit('x', 0.4), partition: 'general' as const }];
    const developer = [{ ...makeHit('x', 0.1), partition: 'developer' as const }];

    const merged = mergeHits([general, developer], 5);

    expect(merged).toHaveLength(1);
    expect(merged[0]).toMatchObject({ id: 'x', distance: 0.1, partition: 'developer' });
  });

  it('should sort across lists and truncate to the limit', () => {
    const merged = mergeHits(
      [
        [makeHit('a', 0.1), makeHit('c', 0.5), makeHit('e', 0.9)],
        [makeHit('b', 0.3), makeHit('d', 0.7)],
      ],
      3
    );

    expect(merged.map((hit) => hit.id)).toEqual(['a', 'b', 'c']);
  });

  it('should return nothing for empty input', () => {
    expect(mergeHits([[], []], 5)).toEqual([]);
  });
});
