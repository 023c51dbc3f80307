/**
 * Tests for configuration resolution
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RESPONSE_HEADER,
  ONE_DAY,
  ONE_HOUR,
  ONE_YEAR,
  loadConfigFromEnv,
  resolveConfig,
  resolveTtl,
} from '../src/config.mjs';
import { ConfigurationError } from '../src/errors.mjs';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('resolveTtl', () => {
  it('should default to one year', () => {
    expect(resolveTtl()).toBe(ONE_YEAR);
    expect(ONE_YEAR).toBe(31_536_000);
  });

  it('should accept whole seconds', () => {
    expect(resolveTtl(60)).toBe(60);
  });

  it('should sum duration fields', () => {
    expect(resolveTtl({ hours: 1 })).toBe(ONE_HOUR);
    expect(resolveTtl({ hours: 1, minutes: 30 })).toBe(5400);
    expect(resolveTtl({ weeks: 1, days: 1 })).toBe(8 * ONE_DAY);
  });

  it('should cap at one year', () => {
    expect(resolveTtl({ days: 400 })).toBe(ONE_YEAR);
    expect(resolveTtl(ONE_YEAR * 2)).toBe(ONE_YEAR);
  });

  it('should reject zero, negative and fractional values', () => {
    expect(issuesOf(() => resolveTtl(0))).toEqual(['ttl must be a positive whole number of seconds (got 0)']);
    expect(() => resolveTtl(-5)).toThrow(ConfigurationError);
    expect(() => resolveTtl(1.5)).toThrow(ConfigurationError);
    expect(() => resolveTtl({ seconds: 0.5 })).toThrow('(got 0.5)');
  });

  it('should reject negative duration fields', () => {
    expect(() => resolveTtl({ minutes: -1 })).toThrow(ConfigurationError);
  });

  it('should reject an empty duration', () => {
    expect(() => resolveTtl({})).toThrow(ConfigurationError);
  });
});

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const config = resolveConfig({ url: 'redis://localhost:6379' });

    expect(config.url).toBe('redis://localhost:6379');
    expect(config.prefix).toBeUndefined();
    expect(config.responseHeader).toBe(DEFAULT_RESPONSE_HEADER);
    expect(config.responseHeader).toBe('X-FastAPI-Cache');
    expect(config.methods).toEqual(['GET']);
    expect(config.logLevel).toBe('info');
    expect([...config.excludedTypes]).toEqual(['Request', 'Response']);
  });

  it('should be immutable', () => {
    const config = resolveConfig({ url: 'memory://' });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.methods)).toBe(true);
  });

  it('should require a url unless a store is supplied', () => {
    expect(issuesOf(() => resolveConfig({}))).toEqual(['url: a store connection URL is required']);
    expect(resolveConfig({}, { storeProvided: true }).url).toBeUndefined();
  });

  it('should accept every supported scheme', () => {
    expect(resolveConfig({ url: 'rediss://cache.internal:6380/1' }).url).toBe('rediss://cache.internal:6380/1');
    expect(resolveConfig({ url: 'memory://' }).url).toBe('memory://');
  });

  it('should reject unsupported schemes', () => {
    expect(issuesOf(() => resolveConfig({ url: 'http://localhost:6379' }))).toEqual([
      'url: scheme must be one of redis:, rediss:, memory:',
    ]);
  });

  it('should reject malformed urls', () => {
    expect(() => resolveConfig({ url: 'not a url' })).toThrow(ConfigurationError);
  });

  it('should validate the prefix', () => {
    expect(resolveConfig({ url: 'memory://', prefix: 'myapi' }).prefix).toBe('myapi');
    expect(() => resolveConfig({ url: 'memory://', prefix: 'my api' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ url: 'memory://', prefix: 'a:b' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ url: 'memory://', prefix: '' })).toThrow(ConfigurationError);
  });

  it('should validate the response header name', () => {
    expect(resolveConfig({ url: 'memory://', responseHeader: 'X-Cache' }).responseHeader).toBe('X-Cache');
    expect(() => resolveConfig({ url: 'memory://', responseHeader: 'X Cache' })).toThrow(ConfigurationError);
  });

  it('should add configured exclusions to the built-in ones', () => {
    const config = resolveConfig({ url: 'memory://', excludeArgTypes: ['Session'] });
    expect(config.excludedTypes.has('Session')).toBe(true);
    expect(config.excludedTypes.has('Request')).toBe(true);
  });

  it('should reject a type tag registered twice', () => {
    expect(issuesOf(() => resolveConfig({ url: 'memory://', excludeArgTypes: ['Session', 'Session'] }))).toEqual([
      "excludeArgTypes: type tag 'Session' is registered more than once",
    ]);
    expect(issuesOf(() => resolveConfig({ url: 'memory://', excludeArgTypes: ['Request'] }))).toEqual([
      "excludeArgTypes: type tag 'Request' is registered more than once",
    ]);
  });

  it('should upper-case methods', () => {
    expect(resolveConfig({ url: 'memory://', methods: ['get', 'head'] }).methods).toEqual(['GET', 'HEAD']);
  });

  it('should report every problem at once', () => {
    const issues = issuesOf(() => resolveConfig({ prefix: 'a b', responseHeader: 'bad header' }));
    expect(issues).toHaveLength(3);
    expect(issues[2]).toBe('url: a store connection URL is required');
  });
});

describe('loadConfigFromEnv', () => {
  it('should read ENDPOINT_CACHE_* variables', () => {
    const config = loadConfigFromEnv({
      ENDPOINT_CACHE_URL: 'redis://cache:6379',
      ENDPOINT_CACHE_PREFIX: 'svc',
      ENDPOINT_CACHE_RESPONSE_HEADER: 'X-Cache',
      ENDPOINT_CACHE_EXCLUDE_TYPES: 'Session, Db ,',
      ENDPOINT_CACHE_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      url: 'redis://cache:6379',
      prefix: 'svc',
      responseHeader: 'X-Cache',
      excludeArgTypes: ['Session', 'Db'],
      logLevel: 'debug',
    });
  });

  it('should return an empty config when nothing is set', () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it('should reject unknown log levels', () => {
    expect(() => loadConfigFromEnv({ ENDPOINT_CACHE_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});
