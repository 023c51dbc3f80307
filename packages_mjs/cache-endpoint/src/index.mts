/**
 * @cache-endpoint/core
 *
 * Response caching in front of request-handling functions:
 * - Deterministic, content-based cache keys with a type-tag exclusion policy
 * - Weak content-hash ETags and If-None-Match (304) handling
 * - Cache-Control, Expires and Hit/Miss response headers
 * - Request-side `no-cache` / `no-store` bypass
 * - Pluggable stores (Redis, in-memory LRU)
 *
 * @example
 * ```typescript
 * import { cached, createEndpointCache, REQUEST_TYPE } from '@cache-endpoint/core';
 *
 * const cache = await createEndpointCache({ url: 'redis://localhost:6379', prefix: 'myapi' });
 *
 * const getUser = cached(
 *   {
 *     namespace: 'api',
 *     name: 'get_user',
 *     params: [{ name: 'id' }, { name: 'request', type: REQUEST_TYPE }],
 *     expire: { hours: 1 },
 *   },
 *   async ({ id }: { id: number; request: unknown }) => loadUser(id)
 * );
 *
 * const outcome = await cache.handle(getUser, {
 *   args: { id: 1, request },
 *   headers: request.headers,
 * });
 * // key: myapi:api.get_user(id=1)
 * ```
 */

// Types
export type {
  CacheControlDirectives,
  TypeTag,
  ParameterDeclaration,
  ContentKeyed,
  CacheEntry,
  FreshnessDescriptor,
  RequestClassification,
  ConditionalResult,
  HeaderValue,
  RequestHeaders,
  OutboundResponse,
  CachedOperation,
  CallContext,
  CacheStatus,
  CacheOutcome,
  StoreStatus,
  CacheStore,
  CacheEventType,
  CacheEvent,
  CacheEventListener,
} from './types.mjs';

// Errors
export {
  EndpointCacheError,
  ConnectionError,
  SerializationError,
  ConfigurationError,
  CacheKeyError,
  EntryTooLargeError,
  type EndpointCacheErrorCode,
} from './errors.mjs';

// Logging
export { CacheLogEvent, createLogger, type CacheLogger, type LoggerOptions } from './logger.mjs';

// Configuration
export {
  ONE_MINUTE,
  ONE_HOUR,
  ONE_DAY,
  ONE_WEEK,
  ONE_MONTH,
  ONE_YEAR,
  DEFAULT_RESPONSE_HEADER,
  DEFAULT_CACHE_METHODS,
  SUPPORTED_STORE_SCHEMES,
  resolveTtl,
  resolveConfig,
  loadConfigFromEnv,
  type Duration,
  type Expire,
  type EndpointCacheConfig,
  type ResolvedCacheConfig,
  type ResolveConfigOptions,
} from './config.mjs';

// Serializer
export { encode, decode, encodeEntry, decodeEntry } from './serializer.mjs';

// Key builder
export {
  REQUEST_TYPE,
  RESPONSE_TYPE,
  ALWAYS_EXCLUDED_TYPES,
  buildKey,
  canonicalString,
  isExcluded,
} from './key-builder.mjs';

// Parser utilities
export {
  parseCacheControl,
  getHeaderValue,
  isCacheableMethod,
  classifyRequest,
  parseIfNoneMatch,
} from './parser.mjs';

// Freshness
export {
  computeETag,
  computeFreshness,
  isStale,
  evaluateConditional,
  formatHttpDate,
  buildFreshnessHeaders,
  lastModifiedOf,
  type CacheStatusLabel,
} from './freshness.mjs';

// Operations
export {
  cached,
  operationIdentity,
  cacheOneMinute,
  cacheOneHour,
  cacheOneDay,
  cacheOneWeek,
  cacheOneMonth,
  cacheOneYear,
  type CacheOptions,
  type OperationFn,
} from './operation.mjs';

// Engine
export { EndpointCache, createEndpointCache, type EndpointCacheDeps } from './engine.mjs';

// Stores
export {
  createStore,
  MemoryCacheStore,
  createMemoryCacheStore,
  RedisCacheStore,
  createRedisClient,
  createRedisStore,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
  type RedisClient,
  type RedisCacheStoreOptions,
} from './stores/index.mjs';
