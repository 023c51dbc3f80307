/**
 * Cache store implementations
 */

import { ConfigurationError } from '../errors.mjs';
import type { CacheLogger } from '../logger.mjs';
import type { CacheStore } from '../types.mjs';
import { MemoryCacheStore } from './memory.mjs';
import { createRedisStore } from './redis.mjs';

export {
  MemoryCacheStore,
  createMemoryCacheStore,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './memory.mjs';

export {
  RedisCacheStore,
  createRedisClient,
  createRedisStore,
  type RedisClient,
  type RedisCacheStoreOptions,
} from './redis.mjs';

/**
 * Resolve a store from its connection URL
 *
 * `redis://` and `rediss://` give a RedisCacheStore (not yet connected),
 * `memory://` an in-process MemoryCacheStore.
 */
export function createStore(url: string, options: { logger?: CacheLogger } = {}): CacheStore {
  const { protocol } = new URL(url);

  switch (protocol) {
    case 'redis:':
    case 'rediss:':
      return createRedisStore(url, { logger: options.logger });
    case 'memory:':
      return new MemoryCacheStore();
    default:
      throw new ConfigurationError([`url: unsupported store scheme '${protocol}'`]);
  }
}
