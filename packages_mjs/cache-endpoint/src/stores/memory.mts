/**
 * In-memory cache store with LRU eviction and per-entry TTL
 */

import { EntryTooLargeError } from '../errors.mjs';
import type { CacheStore } from '../types.mjs';

/**
 * LRU cache entry
 */
interface LruEntry {
  value: string;
  expiresAt: number;
  size: number;
}

/**
 * In-memory cache store with LRU eviction
 */
export class MemoryCacheStore implements CacheStore {
  private cache: Map<string, LruEntry> = new Map();
  private currentSize: number = 0;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  private readonly maxSize: number;
  private readonly maxEntries: number;
  private readonly maxEntrySize: number;
  private readonly cleanupIntervalMs: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxSize = options.maxSize ?? 100 * 1024 * 1024; // 100MB default
    this.maxEntries = options.maxEntries ?? 1000;
    this.maxEntrySize = options.maxEntrySize ?? 5 * 1024 * 1024; // 5MB default
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60000; // 1 minute

    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupIntervalMs);

    // Unref to not prevent process exit
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    const keysToDelete: string[] = [];

    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiresAt <= now) {
        keysToDelete.push(key);
      }
    }

    for (const key of keysToDelete) {
      this.deleteEntry(key);
    }
  }

  private deleteEntry(key: string): boolean {
    const entry = this.cache.get(key);
    if (entry) {
      this.currentSize -= entry.size;
      this.cache.delete(key);
      return true;
    }
    return false;
  }

  private evictIfNeeded(requiredSize: number): void {
    // Evict by size
    while (this.currentSize + requiredSize > this.maxSize && this.cache.size > 0) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.deleteEntry(oldestKey);
      }
    }

    // Evict by entry count
    while (this.cache.size >= this.maxEntries) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) {
        this.deleteEntry(oldestKey);
      }
    }
  }

  private moveToEnd(key: string, entry: LruEntry): void {
    this.cache.delete(key);
    this.cache.set(key, entry);
  }

  async get(key: string): Promise<string | null> {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt <= Date.now()) {
      this.deleteEntry(key);
      return null;
    }

    this.moveToEnd(key, entry);
    return entry.value;
  }

  /**
   * @throws EntryTooLargeError when key and value exceed `maxEntrySize`
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const size = Buffer.byteLength(key, 'utf8') + Buffer.byteLength(value, 'utf8');

    if (size > this.maxEntrySize) {
      throw new EntryTooLargeError(key, size, this.maxEntrySize);
    }

    this.deleteEntry(key);
    this.evictIfNeeded(size);

    this.cache.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000, size });
    this.currentSize += size;
  }

  async delete(key: string): Promise<boolean> {
    return this.deleteEntry(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.currentSize = 0;
  }

  async size(): Promise<number> {
    this.cleanup();
    return this.cache.size;
  }

  async keys(): Promise<string[]> {
    this.cleanup();
    return Array.from(this.cache.keys());
  }

  async close(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
    this.currentSize = 0;
  }

  getStats(): MemoryCacheStats {
    return {
      entries: this.cache.size,
      sizeBytes: this.currentSize,
      maxSizeBytes: this.maxSize,
      maxEntries: this.maxEntries,
      utilizationPercent: (this.currentSize / this.maxSize) * 100,
    };
  }
}

/**
 * Options for memory cache store
 */
export interface MemoryCacheStoreOptions {
  /** Maximum total cache size in bytes. Default: 100MB */
  maxSize?: number;
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Maximum size per entry in bytes. Default: 5MB */
  maxEntrySize?: number;
  /** Cleanup interval in milliseconds. Default: 60000 */
  cleanupIntervalMs?: number;
}

/**
 * Memory cache statistics
 */
export interface MemoryCacheStats {
  entries: number;
  sizeBytes: number;
  maxSizeBytes: number;
  maxEntries: number;
  utilizationPercent: number;
}

export function createMemoryCacheStore(options?: MemoryCacheStoreOptions): MemoryCacheStore {
  return new MemoryCacheStore(options);
}
