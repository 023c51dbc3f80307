/**
 * Redis cache store implementation
 * Suitable for deployments where several processes share one cache
 */

import { Redis } from 'ioredis';
import { ConnectionError, toError } from '../errors.mjs';
import { CacheLogEvent, type CacheLogger } from '../logger.mjs';
import type { CacheStore, StoreStatus } from '../types.mjs';

/**
 * Redis client interface (the subset of ioredis the store relies on)
 */
export interface RedisClient {
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
  disconnect(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface RedisCacheStoreOptions {
  logger?: CacheLogger;
}

function isAuthError(error: Error): boolean {
  return /NOAUTH|WRONGPASS|invalid password/i.test(error.message);
}

/**
 * Redis implementation of CacheStore
 *
 * Every command failure is rethrown as ConnectionError.
 */
export class RedisCacheStore implements CacheStore {
  private readonly client: RedisClient;
  private readonly logger?: CacheLogger;
  private currentStatus: StoreStatus = 'none';

  /**
   * @param client - A lazily connecting client; `connect()` opens it
   */
  constructor(client: RedisClient, options: RedisCacheStoreOptions = {}) {
    this.client = client;
    this.logger = options.logger;

    // ioredis emits 'error' on every failed reconnect attempt
    this.client.on('error', (error) => {
      this.logger?.warn(
        { event: CacheLogEvent.CONNECT_FAIL, err: error, status: this.currentStatus },
        'Redis client error'
      );
    });
  }

  get status(): StoreStatus {
    return this.currentStatus;
  }

  /**
   * Connect and PING the server
   */
  async connect(): Promise<StoreStatus> {
    this.logger?.info({ event: CacheLogEvent.CONNECT_BEGIN }, 'Attempting to connect to Redis server...');

    try {
      await this.client.connect();
      const reply = await this.client.ping();
      this.currentStatus = reply === 'PONG' ? 'connected' : 'connection-error';
    } catch (error) {
      this.currentStatus = isAuthError(toError(error)) ? 'auth-error' : 'connection-error';
    }

    switch (this.currentStatus) {
      case 'connected':
        this.logger?.info({ event: CacheLogEvent.CONNECT_SUCCESS }, 'Redis client is connected to server.');
        break;
      case 'auth-error':
        this.logger?.error(
          { event: CacheLogEvent.CONNECT_FAIL },
          'Unable to connect to redis server due to authentication error.'
        );
        break;
      default:
        this.logger?.error({ event: CacheLogEvent.CONNECT_FAIL }, 'Redis server did not respond to PING message.');
    }

    return this.currentStatus;
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      throw new ConnectionError(`Redis GET failed: ${toError(error).message}`, { cause: error });
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } catch (error) {
      throw new ConnectionError(`Redis SET failed: ${toError(error).message}`, { cause: error });
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      return (await this.client.del(key)) > 0;
    } catch (error) {
      throw new ConnectionError(`Redis DEL failed: ${toError(error).message}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (this.currentStatus === 'connected') {
      await this.client.quit();
    } else {
      this.client.disconnect();
    }
    this.currentStatus = 'none';
  }
}

/**
 * Build a lazily connecting ioredis client for a `redis://` or `rediss://` URL.
 * Commands fail fast while disconnected instead of queueing.
 */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  });
}

export function createRedisStore(url: string, options?: RedisCacheStoreOptions): RedisCacheStore {
  return new RedisCacheStore(createRedisClient(url), options);
}
