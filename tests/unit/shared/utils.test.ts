/**
 * Unit tests for shared utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Logger,
  LogLevel,
  cosineDistance,
  cosineSimilarity,
  decodeFloat32Array,
  encodeFloat32Array,
  getLogLevel,
  mapWithConcurrency,
  normalizeVector,
  sanitizeQuery,
  setLogLevel,
  setLogLevelFromEnv,
  sleep,
  wordCount,
} from '../../../src/shared/utils.js';

describe('mapWithConcurrency', () => {
  it('should keep input order whatever the completion order', async () => {
    const delays = [30, 0, 10];
    const results = await mapWithConcurrency(delays, 3, async (delay, index) => {
      await sleep(delay);
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:0', '2:10']);
  });

  it('should never exceed the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 8 }, (_, i) => i), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(1);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should handle an empty list', async () => {
    const fn = vi.fn(async () => 1);
    expect(await mapWithConcurrency([], 4, fn)).toEqual([]);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should reject when a call rejects', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (item) => {
        if (item === 2) throw new Error('boom');
        return item;
      })
    ).rejects.toThrow('boom');
  });
});

describe('vector utilities', () => {
  it('should compute cosine similarity and distance', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineDistance([1, 1], [1, 0])).toBeCloseTo(1 - Math.SQRT1_2, 10);
  });

  it('should reject vectors of different widths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector dimensions must match: 1 != 2');
  });

  it('should normalize to unit length and leave zero vectors alone', () => {
    expect(normalizeVector([3, 4])).toEqual([0.6, 0.8]);
    expect(normalizeVector([0, 0])).toEqual([0, 0]);
  });

  it('should round-trip float32 blobs, including from an offset buffer', () => {
    const encoded = encodeFloat32Array([0.5, -1.25, 3]);
    const padded = Buffer.concat([Buffer.from([9]), encoded]).subarray(1);

    expect(encoded).toHaveLength(12);
    expect(decodeFloat32Array(encoded)).toEqual([0.5, -1.25, 3]);
    expect(decodeFloat32Array(padded)).toEqual([0.5, -1.25, 3]);
  });

  it('should reject blobs that are not whole floats', () => {
    expect(() => decodeFloat32Array(new Uint8Array(5))).toThrow(
      'Invalid blob length for float32: 5 (must be multiple of 4)'
    );
  });
});

describe('text utilities', () => {
  it('should trim and cap queries', () => {
    expect(sanitizeQuery('  hello  ')).toBe('hello');
    expect(sanitizeQuery('x'.repeat(1200))).toHaveLength(1000);
  });

  it('should count words', () => {
    expect(wordCount('  one two\nthree\t ')).toBe(3);
    expect(wordCount('')).toBe(0);
  });
});

describe('Logger', () => {
  afterEach(() => {
    setLogLevel(LogLevel.INFO);
    vi.restoreAllMocks();
  });

  it('should prefix messages with the context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Logger('Store').info('opened', 3);

    expect(log).toHaveBeenCalledWith('[Store]', 'opened', 3);
  });

  it('should drop messages below the level but always log errors', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('error');
    const logger = new Logger('Test');

    logger.debug('hidden');
    logger.warn('hidden');
    logger.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[Test]', 'shown');
  });

  it('should read levels by name and ignore an unset environment', () => {
    setLogLevelFromEnv('DEBUG');
    expect(getLogLevel()).toBe(LogLevel.DEBUG);

    setLogLevelFromEnv(undefined);
    expect(getLogLevel()).toBe(LogLevel.DEBUG);

    setLogLevel('verbose');
    expect(getLogLevel()).toBe(LogLevel.INFO);
  });
});
