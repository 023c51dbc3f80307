/**
 * Cacheable operation definitions
 *
 * `cached()` plays the role of a decorator: it captures the per-operation
 * options once, as an immutable record the engine receives on every call.
 */

import { ConfigurationError } from './errors.mjs';
import { ONE_DAY, ONE_HOUR, ONE_MINUTE, ONE_MONTH, ONE_WEEK, ONE_YEAR, resolveTtl, type Expire } from './config.mjs';
import type { CachedOperation, ParameterDeclaration } from './types.mjs';

export interface CacheOptions {
  /** Module or router path, e.g. `api` or `users.routes` */
  namespace: string;
  /** Operation name within the namespace */
  name: string;
  /** Declared parameters, in declaration order */
  params?: ParameterDeclaration[];
  /** Seconds or Duration. Default: one year */
  expire?: Expire;
  /** HTTP method the operation is served under. Default: GET */
  method?: string;
}

export type OperationFn<TArgs extends object, TResult> = (args: TArgs) => TResult | Promise<TResult>;

/**
 * Stable identity for a call site
 */
export function operationIdentity(namespace: string, name: string): string {
  if (!namespace.trim() || !name.trim()) {
    throw new ConfigurationError(['operation namespace and name must be non-empty']);
  }
  return `${namespace}.${name}`;
}

/**
 * Declare a cacheable operation
 *
 * @throws ConfigurationError for an invalid TTL, empty identity or repeated parameter name
 */
export function cached<TArgs extends object, TResult>(
  options: CacheOptions,
  fn: OperationFn<TArgs, TResult>
): CachedOperation<TArgs, TResult> {
  const params = options.params ?? [];
  const names = new Set<string>();
  for (const param of params) {
    if (names.has(param.name)) {
      throw new ConfigurationError([`parameter '${param.name}' is declared more than once`]);
    }
    names.add(param.name);
  }

  return Object.freeze({
    identity: operationIdentity(options.namespace, options.name),
    params: Object.freeze(params.map((param) => Object.freeze({ ...param }))),
    ttl: resolveTtl(options.expire),
    method: (options.method ?? 'GET').toUpperCase(),
    execute: fn,
  });
}

type PresetOptions = Omit<CacheOptions, 'expire'>;

function preset(expire: number) {
  return <TArgs extends object, TResult>(
    options: PresetOptions,
    fn: OperationFn<TArgs, TResult>
  ): CachedOperation<TArgs, TResult> => cached({ ...options, expire }, fn);
}

export const cacheOneMinute = preset(ONE_MINUTE);
export const cacheOneHour = preset(ONE_HOUR);
export const cacheOneDay = preset(ONE_DAY);
export const cacheOneWeek = preset(ONE_WEEK);
export const cacheOneMonth = preset(ONE_MONTH);
export const cacheOneYear = preset(ONE_YEAR);
