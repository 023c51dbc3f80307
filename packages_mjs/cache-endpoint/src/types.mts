/**
 * Types for endpoint response caching
 */

/**
 * Request Cache-Control directives that skip the cache
 */
export interface CacheControlDirectives {
  /** Response must not be stored */
  noStore?: boolean;
  /** Stored response must not be reused without revalidation */
  noCache?: boolean;
}

/**
 * Tag naming the declared static type of a parameter, e.g. `'Request'`
 */
export type TypeTag = string;

/**
 * A parameter as declared by the cached operation
 */
export interface ParameterDeclaration {
  readonly name: string;
  /** Declared type; parameters whose tag is excluded never reach the key */
  readonly type?: TypeTag;
}

/**
 * Capability required of domain types passed as cacheable arguments.
 * The returned string must depend on content only, never on identity.
 */
export interface ContentKeyed {
  contentKey(): string;
}

/**
 * A stored cache entry, owned by the store
 */
export interface CacheEntry {
  /** Serialized payload */
  payload: string;
  /** Weak validator derived from the serialized payload */
  etag: string;
  /** Creation time (Unix timestamp ms) */
  createdAt: number;
  /** Time to live in seconds */
  ttl: number;
}

/**
 * Freshness computed from an entry at read or write time; never stored
 */
export interface FreshnessDescriptor {
  etag: string;
  /** Remaining freshness in whole seconds; 0 means stale */
  maxAge: number;
  expiresAt: Date;
}

/**
 * How the engine treats an inbound call before touching the store
 */
export type RequestClassification = 'passthrough' | 'bypass' | 'cacheable';

/**
 * Outcome of comparing If-None-Match validators with a stored ETag
 */
export type ConditionalResult = 'not-modified' | 'deliver';

export type HeaderValue = string | string[] | undefined;

/**
 * Inbound request headers, as most Node frameworks expose them
 */
export type RequestHeaders = Readonly<Record<string, HeaderValue>>;

/**
 * Mutable outbound response the engine may annotate
 */
export interface OutboundResponse {
  setHeader(name: string, value: string): void;
  setStatus(code: number): void;
}

/**
 * Immutable record describing one cacheable call site
 */
export interface CachedOperation<TArgs extends object = Record<string, unknown>, TResult = unknown> {
  /** Stable identity, e.g. `api.get_user` */
  readonly identity: string;
  readonly params: readonly ParameterDeclaration[];
  /** Resolved TTL in seconds */
  readonly ttl: number;
  /** HTTP method the operation is served under */
  readonly method: string;
  readonly execute: (args: TArgs) => TResult | Promise<TResult>;
}

/**
 * Per-call input supplied by the host dispatch machinery
 */
export interface CallContext<TArgs extends object = Record<string, unknown>> {
  args: TArgs;
  /** Overrides the operation's declared method */
  method?: string;
  headers?: RequestHeaders;
  response?: OutboundResponse;
}

export type CacheStatus = 'passthrough' | 'bypass' | 'hit' | 'miss' | 'not-modified';

/**
 * Result of handling one call
 */
export interface CacheOutcome {
  status: CacheStatus;
  /** 200, or 304 for not-modified */
  statusCode: number;
  /** Operation result or decoded cached payload; undefined for not-modified */
  payload: unknown;
  /** Caching headers emitted for this call (empty for passthrough/bypass) */
  headers: Record<string, string>;
  key?: string;
  /** Whether this call wrote the entry to the store */
  stored: boolean;
}

/**
 * Connection state of a networked store
 */
export type StoreStatus = 'none' | 'connected' | 'auth-error' | 'connection-error';

/**
 * Key/value store consumed by the engine. Values are opaque strings.
 */
export interface CacheStore {
  /** Establish the connection, for stores that have one */
  connect?(): Promise<StoreStatus>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Event types for cache operations
 */
export type CacheEventType =
  | 'cache:hit'
  | 'cache:miss'
  | 'cache:store'
  | 'cache:bypass'
  | 'cache:not-modified'
  | 'cache:error';

/**
 * Cache event
 */
export interface CacheEvent {
  type: CacheEventType;
  identity: string;
  key?: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

/**
 * Event listener type
 */
export type CacheEventListener = (event: CacheEvent) => void;
