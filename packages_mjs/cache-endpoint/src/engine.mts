/**
 * Cache decision engine
 *
 * Per call: Start -> {Passthrough | Bypass | LookupStore};
 * LookupStore -> {Hit | Miss}; Hit -> {NotModified | DeliverCached};
 * Miss -> Execute -> StoreAndDeliver.
 *
 * Caching is best-effort relative to the primary response. Store, key and
 * serialization failures are logged and the call is served uncached; errors
 * thrown by the operation itself propagate unchanged.
 */

import { resolveConfig, type EndpointCacheConfig, type ResolvedCacheConfig } from './config.mjs';
import { ConnectionError, toError } from './errors.mjs';
import {
  buildFreshnessHeaders,
  computeETag,
  computeFreshness,
  evaluateConditional,
  isStale,
  lastModifiedOf,
} from './freshness.mjs';
import { buildKey } from './key-builder.mjs';
import { CacheLogEvent, createLogger, type CacheLogger } from './logger.mjs';
import { classifyRequest, getHeaderValue } from './parser.mjs';
import { decode, decodeEntry, encode, encodeEntry } from './serializer.mjs';
import { createStore } from './stores/index.mjs';
import type {
  CachedOperation,
  CacheEntry,
  CacheEvent,
  CacheEventListener,
  CacheEventType,
  CacheOutcome,
  CacheStatus,
  CacheStore,
  CallContext,
  FreshnessDescriptor,
  OutboundResponse,
  StoreStatus,
} from './types.mjs';

/**
 * Collaborators injected at construction
 */
export interface EndpointCacheDeps {
  /** Store instance; built from `config.url` when omitted */
  store?: CacheStore;
  /** Logger; a pino logger at `config.logLevel` when omitted */
  logger?: CacheLogger;
}

interface CachedHit {
  entry: CacheEntry;
  freshness: FreshnessDescriptor;
  payload: unknown;
}

function applyToResponse(response: OutboundResponse | undefined, headers: Record<string, string>, statusCode?: number): void {
  if (!response) return;
  for (const [name, value] of Object.entries(headers)) {
    response.setHeader(name, value);
  }
  if (statusCode !== undefined) {
    response.setStatus(statusCode);
  }
}

/**
 * EndpointCache - response caching in front of request handlers
 *
 * One instance per process: it owns the single store connection and the
 * immutable prefix and exclusion policy.
 *
 * @example
 * const cache = new EndpointCache({ url: 'memory://', prefix: 'myapi' });
 *
 * const getUser = cached(
 *   { namespace: 'api', name: 'get_user', params: [{ name: 'id' }], expire: 3600 },
 *   async ({ id }: { id: number }) => users.find(id)
 * );
 *
 * const outcome = await cache.handle(getUser, { args: { id: 1 }, headers: req.headers });
 * // outcome.status === 'miss', outcome.headers['X-FastAPI-Cache'] === 'Miss'
 */
export class EndpointCache {
  readonly config: ResolvedCacheConfig;
  private readonly store: CacheStore;
  private readonly logger: CacheLogger;
  private readonly listeners: Set<CacheEventListener> = new Set();

  /**
   * @throws ConfigurationError when the configuration is invalid
   */
  constructor(config: EndpointCacheConfig = {}, deps: EndpointCacheDeps = {}) {
    this.config = resolveConfig(config, { storeProvided: deps.store !== undefined });
    this.logger = deps.logger ?? createLogger({ level: this.config.logLevel });
    this.store = deps.store ?? createStore(this.config.url ?? '', { logger: this.logger });
  }

  /**
   * Open the store connection, for stores that need one
   */
  async connect(): Promise<StoreStatus> {
    return this.store.connect ? this.store.connect() : 'connected';
  }

  /**
   * Derive the cache key for an invocation
   *
   * @throws CacheKeyError when an argument has no content-based representation
   */
  getCacheKey<TArgs extends object, TResult>(operation: CachedOperation<TArgs, TResult>, args: TArgs): string {
    return buildKey(this.config.prefix, operation.identity, operation.params, args, this.config.excludedTypes);
  }

  /**
   * Handle one call of a cacheable operation
   */
  async handle<TArgs extends object, TResult>(
    operation: CachedOperation<TArgs, TResult>,
    context: CallContext<TArgs>
  ): Promise<CacheOutcome> {
    const method = context.method ?? operation.method;
    const classification = classifyRequest(method, context.headers, this.config.methods);

    if (classification === 'passthrough') {
      return this.executeUncached(operation, context, 'passthrough');
    }

    if (classification === 'bypass') {
      this.emit('cache:bypass', operation.identity, undefined, { reason: 'cache-control' });
      return this.executeUncached(operation, context, 'bypass');
    }

    let key: string;
    try {
      key = this.getCacheKey(operation, context.args);
    } catch (error) {
      const err = toError(error);
      this.logger.warn(
        { event: CacheLogEvent.UNKEYABLE_ARGUMENTS, identity: operation.identity, err },
        'Unable to derive cache key; serving uncached'
      );
      this.emit('cache:error', operation.identity, undefined, { reason: 'key', error: err.message });
      return this.executeUncached(operation, context, 'bypass');
    }

    const hit = await this.lookup(key, operation.identity);

    if (hit) {
      const headers = buildFreshnessHeaders(
        hit.freshness,
        this.config.responseHeader,
        'Hit',
        lastModifiedOf(hit.payload)
      );
      const ifNoneMatch = getHeaderValue(context.headers, 'if-none-match');

      if (evaluateConditional(ifNoneMatch, hit.entry.etag) === 'not-modified') {
        applyToResponse(context.response, headers, 304);
        this.emit('cache:not-modified', operation.identity, key, { etag: hit.entry.etag });
        return { status: 'not-modified', statusCode: 304, payload: undefined, headers, key, stored: false };
      }

      applyToResponse(context.response, headers);
      this.emit('cache:hit', operation.identity, key, { maxAge: hit.freshness.maxAge });
      return { status: 'hit', statusCode: 200, payload: hit.payload, headers, key, stored: false };
    }

    this.emit('cache:miss', operation.identity, key);

    const payload = await operation.execute(context.args);
    const entry = await this.write(key, operation, payload);

    const headers = entry
      ? buildFreshnessHeaders(
          computeFreshness(entry, entry.createdAt),
          this.config.responseHeader,
          'Miss',
          lastModifiedOf(payload)
        )
      : {};
    applyToResponse(context.response, headers);

    return { status: 'miss', statusCode: 200, payload, headers, key, stored: entry !== null };
  }

  private async executeUncached<TArgs extends object, TResult>(
    operation: CachedOperation<TArgs, TResult>,
    context: CallContext<TArgs>,
    status: CacheStatus
  ): Promise<CacheOutcome> {
    const payload = await operation.execute(context.args);
    return { status, statusCode: 200, payload, headers: {}, stored: false };
  }

  /**
   * Read an entry; unavailable store, corrupt or stale entries all count as a miss
   */
  private async lookup(key: string, identity: string): Promise<CachedHit | null> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      const err = toError(error);
      this.logger.warn({ event: CacheLogEvent.STORE_READ_FAILED, key, err }, 'Cache read failed; treating as miss');
      this.emit('cache:error', identity, key, {
        reason: err instanceof ConnectionError ? 'store-unavailable' : 'store-read',
        error: err.message,
      });
      return null;
    }

    if (raw === null) {
      return null;
    }

    let entry: CacheEntry;
    let payload: unknown;
    try {
      entry = decodeEntry(raw);
      payload = decode(entry.payload);
    } catch (error) {
      this.logger.warn({ event: CacheLogEvent.CORRUPT_ENTRY, key, err: toError(error) }, 'Ignoring corrupt cache entry');
      return null;
    }

    const freshness = computeFreshness(entry);
    if (isStale(freshness)) {
      this.logger.debug({ key, createdAt: entry.createdAt, ttl: entry.ttl }, 'Cached entry is stale');
      return null;
    }

    this.logger.info({ event: CacheLogEvent.KEY_FOUND_IN_CACHE, key }, 'Key found in cache');
    return { entry, freshness, payload };
  }

  /**
   * Serialize and store a fresh result; returns the entry, or null if nothing was stored
   */
  private async write<TArgs extends object, TResult>(
    key: string,
    operation: CachedOperation<TArgs, TResult>,
    payload: TResult
  ): Promise<CacheEntry | null> {
    let serialized: string;
    try {
      serialized = encode(payload);
    } catch (error) {
      const err = toError(error);
      this.logger.warn({ event: CacheLogEvent.NOT_CACHEABLE, key, err }, 'Response is not cacheable');
      this.emit('cache:error', operation.identity, key, { reason: 'serialization', error: err.message });
      return null;
    }

    const entry: CacheEntry = {
      payload: serialized,
      etag: computeETag(serialized),
      createdAt: Date.now(),
      ttl: operation.ttl,
    };

    try {
      await this.store.set(key, encodeEntry(entry), entry.ttl);
    } catch (error) {
      const err = toError(error);
      this.logger.error({ event: CacheLogEvent.FAILED_TO_CACHE_KEY, key, err }, 'Failed to write cache entry');
      this.emit('cache:error', operation.identity, key, { reason: 'store-write', error: err.message });
      return null;
    }

    this.logger.info({ event: CacheLogEvent.KEY_ADDED_TO_CACHE, key }, 'Key added to cache');
    this.emit('cache:store', operation.identity, key, { ttl: entry.ttl, etag: entry.etag });
    return entry;
  }

  /**
   * Add event listener
   */
  on(listener: CacheEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: CacheEventListener): void {
    this.listeners.delete(listener);
  }

  private emit(type: CacheEventType, identity: string, key?: string, metadata?: Record<string, unknown>): void {
    const event: CacheEvent = { type, identity, key, timestamp: Date.now(), metadata };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: toError(error), type }, 'Cache event listener threw');
      }
    }
  }

  /**
   * Close the store and release resources
   */
  async close(): Promise<void> {
    await this.store.close();
    this.listeners.clear();
  }
}

/**
 * Create an endpoint cache and open its store connection
 *
 * A store that cannot be reached does not fail startup: calls are then
 * served uncached until it comes back.
 */
export async function createEndpointCache(
  config: EndpointCacheConfig = {},
  deps: EndpointCacheDeps = {}
): Promise<EndpointCache> {
  const cache = new EndpointCache(config, deps);
  await cache.connect();
  return cache;
}
