/**
 * Freshness negotiation: ETags, max-age, Expires and conditional requests
 */

import { createHash } from 'node:crypto';
import { parseIfNoneMatch } from './parser.mjs';
import type { CacheEntry, ConditionalResult, FreshnessDescriptor } from './types.mjs';

export type CacheStatusLabel = 'Hit' | 'Miss';

/**
 * Weak validator over the serialized payload. Identical content gives an
 * identical ETag no matter when or by whom it was written.
 */
export function computeETag(serialized: string): string {
  const digest = createHash('sha1').update(serialized, 'utf8').digest('hex');
  return `W/"${digest}"`;
}

/**
 * Compute the freshness of an entry at `now`
 *
 * Elapsed time is counted in whole seconds, so an entry with ttl=30 reports
 * maxAge=1 anywhere in its 30th second and becomes stale at exactly ttl.
 * A creation time in the future (clock skew) counts as zero elapsed.
 */
export function computeFreshness(entry: CacheEntry, now: number = Date.now()): FreshnessDescriptor {
  const elapsed = Math.max(0, Math.floor((now - entry.createdAt) / 1000));

  return {
    etag: entry.etag,
    maxAge: Math.max(0, entry.ttl - elapsed),
    expiresAt: new Date(entry.createdAt + entry.ttl * 1000),
  };
}

/**
 * An entry whose max-age has run out is stale even if the store still holds it
 */
export function isStale(freshness: FreshnessDescriptor): boolean {
  return freshness.maxAge <= 0;
}

function opaqueTag(tag: string): string {
  return tag.startsWith('W/') ? tag.slice(2) : tag;
}

/**
 * Compare If-None-Match validators against the stored ETag (weak comparison)
 *
 * @param requestETags - Raw If-None-Match header or an already split list
 */
export function evaluateConditional(
  requestETags: string | readonly string[] | undefined,
  storedETag: string
): ConditionalResult {
  const tags = typeof requestETags === 'string' ? parseIfNoneMatch(requestETags) : (requestETags ?? []);

  if (tags.length === 0) {
    return 'deliver';
  }
  if (tags.includes('*')) {
    return 'not-modified';
  }

  const stored = opaqueTag(storedETag);
  return tags.some((tag) => opaqueTag(tag) === stored) ? 'not-modified' : 'deliver';
}

/**
 * Format a timestamp as an HTTP-date (IMF-fixdate)
 */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * Value for `Last-Modified` taken from a payload's own `last_modified` field.
 * Dates are formatted as HTTP-dates, strings pass through as given.
 */
export function lastModifiedOf(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return undefined;
  }
  if (!Object.hasOwn(payload, 'last_modified')) {
    return undefined;
  }

  const value: unknown = Reflect.get(payload, 'last_modified');
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return formatHttpDate(value);
  }
  return undefined;
}

/**
 * Response headers describing a cached or freshly cached payload
 */
export function buildFreshnessHeaders(
  freshness: FreshnessDescriptor,
  statusHeader: string,
  status: CacheStatusLabel,
  lastModified?: string
): Record<string, string> {
  const headers: Record<string, string> = {
    'cache-control': `max-age=${freshness.maxAge}`,
    expires: formatHttpDate(freshness.expiresAt),
    etag: freshness.etag,
  };
  if (lastModified !== undefined) {
    headers['last-modified'] = lastModified;
  }
  headers[statusHeader] = status;
  return headers;
}
