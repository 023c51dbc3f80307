/**
 * Configuration for endpoint caching
 *
 * Everything here is validated once at startup. Invalid values raise
 * ConfigurationError, which is the only error allowed to abort the process.
 */

import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { ConfigurationError } from './errors.mjs';
import { ALWAYS_EXCLUDED_TYPES } from './key-builder.mjs';
import type { TypeTag } from './types.mjs';

export const ONE_MINUTE = 60;
export const ONE_HOUR = ONE_MINUTE * 60;
export const ONE_DAY = ONE_HOUR * 24;
export const ONE_WEEK = ONE_DAY * 7;
export const ONE_MONTH = ONE_DAY * 30;
export const ONE_YEAR = ONE_DAY * 365;

/** Kept for wire compatibility with existing clients of the header */
export const DEFAULT_RESPONSE_HEADER = 'X-FastAPI-Cache';
export const DEFAULT_CACHE_METHODS: readonly string[] = ['GET'];
export const SUPPORTED_STORE_SCHEMES: readonly string[] = ['redis:', 'rediss:', 'memory:'];

/**
 * A span of time; fields are summed
 */
export interface Duration {
  weeks?: number;
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
}

/**
 * TTL as whole seconds or as a Duration
 */
export type Expire = number | Duration;

/**
 * Configuration for endpoint caching
 */
export interface EndpointCacheConfig {
  /** Store connection URL (`redis://`, `rediss://` or `memory://`) */
  url?: string;
  /** Prefix prepended to every key as `prefix:` */
  prefix?: string;
  /** Name of the header reporting Hit/Miss. Default: X-FastAPI-Cache */
  responseHeader?: string;
  /** Type tags excluded from keys in addition to Request and Response */
  excludeArgTypes?: TypeTag[];
  /** Methods eligible for caching. Default: ['GET'] */
  methods?: string[];
  /** Log level for the default logger. Default: 'info' */
  logLevel?: LevelWithSilent;
}

/**
 * Validated, immutable process-wide configuration
 */
export interface ResolvedCacheConfig {
  readonly url?: string;
  readonly prefix?: string;
  readonly responseHeader: string;
  readonly excludedTypes: ReadonlySet<TypeTag>;
  readonly methods: readonly string[];
  readonly logLevel: LevelWithSilent;
}

const HTTP_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

function protocolOf(url: string): string | undefined {
  try {
    return new URL(url).protocol;
  } catch {
    return undefined;
  }
}

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const ConfigSchema = z.object({
  url: z
    .string()
    .url('must be a valid URL')
    .refine((url) => SUPPORTED_STORE_SCHEMES.includes(protocolOf(url) ?? ''), {
      message: `scheme must be one of ${SUPPORTED_STORE_SCHEMES.join(', ')}`,
    })
    .optional(),
  prefix: z
    .string()
    .regex(/^[^\s:]+$/, 'must be non-empty and contain no whitespace or ":"')
    .optional(),
  responseHeader: z.string().regex(HTTP_TOKEN, 'must be a valid HTTP header name').optional(),
  excludeArgTypes: z.array(z.string().min(1, 'type tags must be non-empty')).optional(),
  methods: z.array(z.string().min(1)).min(1, 'must list at least one method').optional(),
  logLevel: LogLevelSchema.optional(),
});

const DurationSchema = z
  .object({
    weeks: z.number().nonnegative().optional(),
    days: z.number().nonnegative().optional(),
    hours: z.number().nonnegative().optional(),
    minutes: z.number().nonnegative().optional(),
    seconds: z.number().nonnegative().optional(),
  })
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Resolve a TTL to whole seconds, capped at one year
 *
 * @throws ConfigurationError for zero, negative, fractional or malformed values
 */
export function resolveTtl(expire: Expire = ONE_YEAR): number {
  let seconds: number;

  if (typeof expire === 'number') {
    seconds = expire;
  } else {
    const parsed = DurationSchema.safeParse(expire);
    if (!parsed.success) {
      throw new ConfigurationError(formatIssues(parsed.error).map((issue) => `ttl ${issue}`));
    }
    const { weeks = 0, days = 0, hours = 0, minutes = 0, seconds: secs = 0 } = parsed.data;
    seconds = weeks * ONE_WEEK + days * ONE_DAY + hours * ONE_HOUR + minutes * ONE_MINUTE + secs;
  }

  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ConfigurationError([`ttl must be a positive whole number of seconds (got ${seconds})`]);
  }

  return Math.min(seconds, ONE_YEAR);
}

export interface ResolveConfigOptions {
  /** A store instance is supplied, so no URL is needed */
  storeProvided?: boolean;
}

/**
 * Validate user config and merge it with defaults
 *
 * @throws ConfigurationError listing every problem found
 */
export function resolveConfig(
  config: EndpointCacheConfig = {},
  options: ResolveConfigOptions = {}
): ResolvedCacheConfig {
  const parsed = ConfigSchema.safeParse(config);
  const issues = parsed.success ? [] : formatIssues(parsed.error);

  if (!options.storeProvided && !config.url) {
    issues.push('url: a store connection URL is required');
  }

  const excludedTypes = new Set<TypeTag>(ALWAYS_EXCLUDED_TYPES);
  for (const tag of config.excludeArgTypes ?? []) {
    if (excludedTypes.has(tag)) {
      issues.push(`excludeArgTypes: type tag '${tag}' is registered more than once`);
    }
    excludedTypes.add(tag);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    url: config.url,
    prefix: config.prefix,
    responseHeader: config.responseHeader ?? DEFAULT_RESPONSE_HEADER,
    excludedTypes,
    methods: Object.freeze((config.methods ?? DEFAULT_CACHE_METHODS).map((m) => m.toUpperCase())),
    logLevel: config.logLevel ?? 'info',
  });
}

/**
 * Read configuration from ENDPOINT_CACHE_* environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EndpointCacheConfig {
  const config: EndpointCacheConfig = {};

  if (env.ENDPOINT_CACHE_URL) config.url = env.ENDPOINT_CACHE_URL;
  if (env.ENDPOINT_CACHE_PREFIX) config.prefix = env.ENDPOINT_CACHE_PREFIX;
  if (env.ENDPOINT_CACHE_RESPONSE_HEADER) config.responseHeader = env.ENDPOINT_CACHE_RESPONSE_HEADER;

  if (env.ENDPOINT_CACHE_EXCLUDE_TYPES) {
    config.excludeArgTypes = env.ENDPOINT_CACHE_EXCLUDE_TYPES.split(',')
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);
  }

  if (env.ENDPOINT_CACHE_LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.ENDPOINT_CACHE_LOG_LEVEL.toLowerCase());
    if (!level.success) {
      throw new ConfigurationError([`ENDPOINT_CACHE_LOG_LEVEL: unknown level '${env.ENDPOINT_CACHE_LOG_LEVEL}'`]);
    }
    config.logLevel = level.data;
  }

  return config;
}
