/**
 * Tests for ETags, max-age, Expires and conditional requests
 */

import { describe, it, expect } from 'vitest';
import {
  buildFreshnessHeaders,
  computeETag,
  computeFreshness,
  evaluateConditional,
  formatHttpDate,
  isStale,
  lastModifiedOf,
} from '../src/freshness.mjs';
import type { CacheEntry } from '../src/types.mjs';

const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

function entry(ttl: number): CacheEntry {
  return { payload: '{"id":1}', etag: computeETag('{"id":1}'), createdAt: T0, ttl };
}

describe('computeETag', () => {
  it('should produce a weak validator over the SHA-1 digest', () => {
    expect(computeETag('abc')).toBe('W/"a9993e364706816aba3e25717850c26c9cd0d89d"');
  });

  it('should depend on content only', () => {
    expect(computeETag('{"id":1}')).toBe(computeETag('{"id":1}'));
    expect(computeETag('{"id":1}')).not.toBe(computeETag('{"id":2}'));
  });
});

describe('computeFreshness', () => {
  it('should report the full ttl when just written', () => {
    const freshness = computeFreshness(entry(30), T0);
    expect(freshness.maxAge).toBe(30);
    expect(freshness.expiresAt).toEqual(new Date(T0 + 30_000));
  });

  it('should count elapsed time in whole seconds', () => {
    expect(computeFreshness(entry(30), T0 + 29_000).maxAge).toBe(1);
    expect(computeFreshness(entry(30), T0 + 29_999).maxAge).toBe(1);
  });

  it('should become stale at ttl and stay at zero', () => {
    const atTtl = computeFreshness(entry(30), T0 + 30_000);
    const past = computeFreshness(entry(30), T0 + 31_000);
    expect(atTtl.maxAge).toBe(0);
    expect(past.maxAge).toBe(0);
    expect(isStale(atTtl)).toBe(true);
    expect(isStale(past)).toBe(true);
  });

  it('should keep expiresAt fixed at creation plus ttl', () => {
    expect(computeFreshness(entry(30), T0 + 12_000).expiresAt).toEqual(new Date(T0 + 30_000));
  });

  it('should treat a creation time in the future as just written', () => {
    expect(computeFreshness(entry(30), T0 - 5_000).maxAge).toBe(30);
  });

  it('should not be stale while max-age remains', () => {
    expect(isStale(computeFreshness(entry(30), T0 + 1_000))).toBe(false);
  });
});

describe('evaluateConditional', () => {
  const stored = 'W/"abc"';

  it('should deliver without validators', () => {
    expect(evaluateConditional(undefined, stored)).toBe('deliver');
    expect(evaluateConditional('', stored)).toBe('deliver');
  });

  it('should match the stored validator', () => {
    expect(evaluateConditional('W/"abc"', stored)).toBe('not-modified');
  });

  it('should compare weakly', () => {
    expect(evaluateConditional('"abc"', stored)).toBe('not-modified');
  });

  it('should match any validator in a list', () => {
    expect(evaluateConditional('W/"xyz", W/"abc"', stored)).toBe('not-modified');
    expect(evaluateConditional(['W/"xyz"', '"abc"'], stored)).toBe('not-modified');
  });

  it('should match the wildcard', () => {
    expect(evaluateConditional('*', stored)).toBe('not-modified');
  });

  it('should deliver on mismatch', () => {
    expect(evaluateConditional('W/"xyz"', stored)).toBe('deliver');
  });
});

describe('formatHttpDate', () => {
  it('should format an IMF-fixdate', () => {
    expect(formatHttpDate(new Date(Date.UTC(2015, 9, 21, 7, 28, 0)))).toBe('Wed, 21 Oct 2015 07:28:00 GMT');
  });
});

describe('buildFreshnessHeaders', () => {
  it('should describe the entry and its cache status', () => {
    const headers = buildFreshnessHeaders(
      { etag: 'W/"abc"', maxAge: 10, expiresAt: new Date(Date.UTC(2015, 9, 21, 7, 28, 0)) },
      'X-Cache',
      'Hit'
    );

    expect(headers).toEqual({
      'cache-control': 'max-age=10',
      expires: 'Wed, 21 Oct 2015 07:28:00 GMT',
      etag: 'W/"abc"',
      'X-Cache': 'Hit',
    });
  });
});

describe('lastModifiedOf', () => {
  it('should pass a string field through', () => {
    expect(lastModifiedOf({ id: 1, last_modified: 'Wed, 21 Oct 2015 07:28:00 GMT' })).toBe(
      'Wed, 21 Oct 2015 07:28:00 GMT'
    );
  });

  it('should format a date field', () => {
    expect(lastModifiedOf({ last_modified: new Date(Date.UTC(2015, 9, 21, 7, 28, 0)) })).toBe(
      'Wed, 21 Oct 2015 07:28:00 GMT'
    );
  });

  it('should ignore payloads without the field', () => {
    expect(lastModifiedOf({ id: 1 })).toBeUndefined();
    expect(lastModifiedOf([{ last_modified: 'x' }])).toBeUndefined();
    expect(lastModifiedOf('last_modified')).toBeUndefined();
    expect(lastModifiedOf(null)).toBeUndefined();
    expect(lastModifiedOf({ last_modified: 42 })).toBeUndefined();
  });
});

describe('buildFreshnessHeaders with Last-Modified', () => {
  it('should add the last-modified header when given', () => {
    const headers = buildFreshnessHeaders(
      { etag: 'W/"abc"', maxAge: 0, expiresAt: new Date(Date.UTC(2015, 9, 21, 7, 28, 0)) },
      'X-Cache',
      'Miss',
      'Tue, 20 Oct 2015 07:28:00 GMT'
    );

    expect(headers).toEqual({
      'cache-control': 'max-age=0',
      expires: 'Wed, 21 Oct 2015 07:28:00 GMT',
      etag: 'W/"abc"',
      'last-modified': 'Tue, 20 Oct 2015 07:28:00 GMT',
      'X-Cache': 'Miss',
    });
  });
});
