/**
 * Cache-Control and request header parsing
 */

import type { CacheControlDirectives, HeaderValue, RequestClassification, RequestHeaders } from './types.mjs';

/**
 * Parse the request-side Cache-Control directives that govern caching
 */
export function parseCacheControl(header: string | undefined | null): CacheControlDirectives {
  const directives: CacheControlDirectives = {};

  if (!header) {
    return directives;
  }

  for (const part of header.toLowerCase().split(',')) {
    const [name] = part.split('=');
    switch (name?.trim()) {
      case 'no-store':
        directives.noStore = true;
        break;
      case 'no-cache':
        directives.noCache = true;
        break;
    }
  }

  return directives;
}

function joinHeaderValue(value: HeaderValue): string | undefined {
  return Array.isArray(value) ? value.join(', ') : value;
}

/**
 * Get header value case-insensitively; repeated headers are comma-joined
 */
export function getHeaderValue(headers: RequestHeaders | undefined, key: string): string | undefined {
  if (!headers) return undefined;
  const lowerKey = key.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() === lowerKey) {
      return joinHeaderValue(v);
    }
  }
  return undefined;
}

/**
 * Check if request method is cacheable
 */
export function isCacheableMethod(method: string, cacheableMethods: readonly string[] = ['GET']): boolean {
  return cacheableMethods.includes(method.toUpperCase());
}

/**
 * Decide whether a call may touch the cache at all.
 *
 * Methods outside the allow-list pass straight through; a request whose
 * Cache-Control carries `no-cache` or `no-store` bypasses both read and write.
 */
export function classifyRequest(
  method: string,
  headers: RequestHeaders | undefined,
  cacheableMethods: readonly string[] = ['GET']
): RequestClassification {
  if (!isCacheableMethod(method, cacheableMethods)) {
    return 'passthrough';
  }

  const directives = parseCacheControl(getHeaderValue(headers, 'cache-control'));
  if (directives.noCache || directives.noStore) {
    return 'bypass';
  }

  return 'cacheable';
}

/**
 * Split an If-None-Match header into its entity tags
 */
export function parseIfNoneMatch(header: string | undefined | null): string[] {
  if (!header) return [];
  return header
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}
