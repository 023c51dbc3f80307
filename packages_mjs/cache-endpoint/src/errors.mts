/**
 * Error taxonomy for endpoint caching
 *
 * Only ConfigurationError is allowed to escape to the caller, and only at
 * startup. Everything raised while serving a request is absorbed by the
 * engine and the call is served uncached.
 */

export type EndpointCacheErrorCode =
  | 'STORE_CONNECTION'
  | 'NOT_SERIALIZABLE'
  | 'INVALID_CONFIGURATION'
  | 'UNKEYABLE_ARGUMENT'
  | 'ENTRY_TOO_LARGE';

/**
 * Base class for all endpoint cache errors
 */
export class EndpointCacheError extends Error {
  readonly code: EndpointCacheErrorCode;

  constructor(code: EndpointCacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EndpointCacheError';
    this.code = code;
  }
}

/**
 * The store could not be reached or rejected a command
 */
export class ConnectionError extends EndpointCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_CONNECTION', message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A payload holds a value that has no structured-data representation
 */
export class SerializationError extends EndpointCacheError {
  /** Path to the offending value, e.g. `$.items[2].handle` */
  readonly path: string;

  constructor(message: string, path: string = '$') {
    super('NOT_SERIALIZABLE', `${message} at ${path}`);
    this.name = 'SerializationError';
    this.path = path;
  }
}

/**
 * A store refused an entry over its size limit
 */
export class EntryTooLargeError extends EndpointCacheError {
  readonly size: number;
  readonly limit: number;

  constructor(key: string, size: number, limit: number) {
    super('ENTRY_TOO_LARGE', `Entry for '${key}' is ${size} bytes, over the ${limit} byte limit`);
    this.name = 'EntryTooLargeError';
    this.size = size;
    this.limit = limit;
  }
}

/**
 * Invalid TTL, prefix, header name, store URL or exclusion registration
 */
export class ConfigurationError extends EndpointCacheError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIGURATION', `Invalid cache configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * An argument has no deterministic, content-based key representation.
 *
 * Raised for class instances that neither implement `contentKey()` nor are
 * excluded by type tag; the operation declaration needs fixing.
 */
export class CacheKeyError extends EndpointCacheError {
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('UNKEYABLE_ARGUMENT', `Parameter '${parameter}': ${message}`);
    this.name = 'CacheKeyError';
    this.parameter = parameter;
  }
}

/**
 * Narrow an unknown rejection to something loggable
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
