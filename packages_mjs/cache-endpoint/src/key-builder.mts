/**
 * Cache key derivation
 *
 * A key is `[prefix:]identity(name=value,...)` over the declared parameters,
 * in declaration order, minus those whose declared type tag is excluded.
 * An absent argument contributes its bare `name`. Values are rendered from
 * their content only. Class instances must provide `contentKey()`; one that
 * does not is a declaration defect and raises CacheKeyError.
 */

import { CacheKeyError } from './errors.mjs';
import type { ContentKeyed, ParameterDeclaration, TypeTag } from './types.mjs';

export const REQUEST_TYPE: TypeTag = 'Request';
export const RESPONSE_TYPE: TypeTag = 'Response';

/**
 * Tags excluded from every key regardless of configuration
 */
export const ALWAYS_EXCLUDED_TYPES: readonly TypeTag[] = [REQUEST_TYPE, RESPONSE_TYPE];

/** Strings matching this render unquoted; anything else is JSON-quoted */
const BARE_STRING = /^[A-Za-z0-9_.\-:@]+$/;

function renderString(value: string): string {
  return BARE_STRING.test(value) ? value : JSON.stringify(value);
}

function isContentKeyed(value: object): value is ContentKeyed {
  return 'contentKey' in value && typeof value.contentKey === 'function';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function unkeyable(parameter: string, value: object): CacheKeyError {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  const name = typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  return new CacheKeyError(
    parameter,
    `${name} has no content-based key; implement contentKey() or exclude its type`
  );
}

function canonicalJson(value: unknown, parameter: string, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
    case 'undefined':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'function':
    case 'symbol':
      throw new CacheKeyError(parameter, `values of type ${typeof value} cannot be keyed`);
  }

  if (value === null) {
    return 'null';
  }
  if (value instanceof Date) {
    return JSON.stringify(dateKey(value, parameter));
  }
  if (isContentKeyed(value)) {
    return JSON.stringify(value.contentKey());
  }
  if (seen.has(value)) {
    throw new CacheKeyError(parameter, 'circular reference');
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item: unknown) => canonicalJson(item, parameter, seen)).join(',')}]`;
    }
    if (isPlainObject(value)) {
      const fields = Object.entries(value)
        .filter(([, item]) => item !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item, parameter, seen)}`);
      return `{${fields.join(',')}}`;
    }
  } finally {
    seen.delete(value);
  }

  throw unkeyable(parameter, value);
}

function dateKey(value: Date, parameter: string): string {
  if (Number.isNaN(value.getTime())) {
    throw new CacheKeyError(parameter, 'invalid Date');
  }
  return value.toISOString();
}

/**
 * Deterministic, content-based rendering of one argument value.
 *
 * Scalars render as their literal, structured values as canonical JSON with
 * sorted object keys. Strings holding only `[A-Za-z0-9_.-:@]` render bare, so
 * `id=1` stays readable; others are JSON-quoted and cannot forge a `,` or `=`
 * pair boundary.
 *
 * @throws CacheKeyError for functions, symbols, cycles and class instances
 * without `contentKey()`
 */
export function canonicalString(value: unknown, parameter: string): string {
  if (typeof value === 'string') {
    return renderString(value);
  }
  if (value instanceof Date) {
    return dateKey(value, parameter);
  }
  if (typeof value === 'object' && value !== null && isContentKeyed(value)) {
    return renderString(value.contentKey());
  }
  return canonicalJson(value, parameter, new Set());
}

/**
 * Whether a declared parameter is left out of the key
 */
export function isExcluded(param: ParameterDeclaration, excludedTypes: ReadonlySet<TypeTag>): boolean {
  return param.type !== undefined && excludedTypes.has(param.type);
}

function toArgumentMap(args: object): ReadonlyMap<string, unknown> {
  if (args instanceof Map) {
    return args;
  }
  return new Map(Object.entries(args));
}

/**
 * Build the cache key for one invocation
 *
 * @param prefix - Deployment prefix, prepended as `prefix:` when set
 * @param identity - Operation identity, e.g. `api.get_user`
 * @param declaredParams - Parameters in declaration order
 * @param suppliedArgs - Argument values by parameter name (object or Map)
 * @param excludedTypes - Type tags whose parameters are omitted
 */
export function buildKey(
  prefix: string | undefined,
  identity: string,
  declaredParams: readonly ParameterDeclaration[],
  suppliedArgs: object,
  excludedTypes: ReadonlySet<TypeTag>
): string {
  const values = toArgumentMap(suppliedArgs);
  const pairs = declaredParams
    .filter((param) => !isExcluded(param, excludedTypes))
    .map((param) => {
      const value = values.get(param.name);
      return value === undefined ? param.name : `${param.name}=${canonicalString(value, param.name)}`;
    });

  const key = `${identity}(${pairs.join(',')})`;
  return prefix ? `${prefix}:${key}` : key;
}
