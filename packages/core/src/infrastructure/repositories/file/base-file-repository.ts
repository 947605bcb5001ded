/**
 * BaseFileRepository - shared plumbing for file-backed repositories
 *
 * Atomic JSON I/O, the TTL/LRU entity cache and lazy initialization.
 */

import { DEFAULT_CACHE_OPTIONS, type CacheEntry, type CacheOptions } from './types.js';
import { atomicWriteJSON as sharedAtomicWriteJSON, loadJSON as sharedLoadJSON } from './file-utils.js';

export abstract class BaseFileRepository {
  protected readonly cacheOptions: CacheOptions;
  private initialized = false;
  private initializing?: Promise<void>;

  constructor(
    protected readonly baseDir: string,
    cacheOptions?: Partial<CacheOptions>
  ) {
    this.cacheOptions = { ...DEFAULT_CACHE_OPTIONS, ...cacheOptions };
  }

  /**
   * Set up directories and indexes. Called once through ensureInitialized().
   */
  protected abstract doInitialize(): Promise<void>;

  public async initialize(): Promise<void> {
    await this.ensureInitialized();
  }

  /**
   * Concurrent first calls share one initialization
   */
  protected async ensureInitialized(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (this.initializing === undefined) {
      this.initializing = this.doInitialize().then(
        () => {
          this.initialized = true;
        },
        (error: unknown) => {
          this.initializing = undefined;
          throw error;
        }
      );
    }
    await this.initializing;
  }

  protected async atomicWriteJSON(filePath: string, data: unknown): Promise<void> {
    return sharedAtomicWriteJSON(filePath, data);
  }

  protected async loadJSON<T>(filePath: string): Promise<T> {
    return sharedLoadJSON<T>(filePath);
  }

  // ============================================================================
  // LRU Cache Operations
  // ============================================================================

  /**
   * Cached value, or undefined when absent or older than the TTL
   */
  protected cacheGet<T>(cache: Map<string, CacheEntry<T>>, key: string): T | undefined {
    if (!this.cacheOptions.enabled) {
      return undefined;
    }
    const entry = cache.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (this.cacheOptions.ttl > 0 && Date.now() - entry.cachedAt > this.cacheOptions.ttl) {
      cache.delete(key);
      return undefined;
    }
    // Re-insert so the Map's insertion order tracks recency
    cache.delete(key);
    cache.set(key, entry);
    return entry.value;
  }

  protected cacheSet<T>(cache: Map<string, CacheEntry<T>>, key: string, value: T): void {
    if (!this.cacheOptions.enabled) {
      return;
    }
    cache.delete(key);
    if (cache.size >= this.cacheOptions.maxSize) {
      const oldestKey = cache.keys().next().value;
      if (oldestKey !== undefined) {
        cache.delete(oldestKey);
      }
    }
    cache.set(key, { value, cachedAt: Date.now() });
  }

  protected cacheInvalidate<T>(cache: Map<string, CacheEntry<T>>, key: string): void {
    cache.delete(key);
  }

  protected cacheClear<T>(cache: Map<string, CacheEntry<T>>): void {
    cache.clear();
  }
}
