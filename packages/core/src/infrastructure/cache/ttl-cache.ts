/**
 * TtlCache - in-process key/value cache with per-entry expiry
 *
 * Holds computed statistics, unread counters and online status. Expired
 * entries are evicted when read; the oldest entry goes when maxSize is hit.
 */

import type { CacheEntry } from '../repositories/file/types.js';

interface TimedEntry<V> extends CacheEntry<V> {
  expiresAt: number;
}

export interface TtlCacheOptions {
  /** Lifetime used when set() gets no explicit TTL */
  defaultTtlMs: number;
  maxSize?: number;
  now?: () => number;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, TimedEntry<V>>();
  private readonly pending = new Map<string, Promise<V>>();
  private readonly defaultTtlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.defaultTtlMs = options.defaultTtlMs;
    this.maxSize = options.maxSize ?? 10000;
    this.now = options.now ?? Date.now;
  }

  public get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  public set(key: string, value: V, ttlMs: number = this.defaultTtlMs): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }
    const cachedAt = this.now();
    this.entries.set(key, { value, cachedAt, expiresAt: cachedAt + ttlMs });
  }

  public delete(key: string): void {
    this.entries.delete(key);
  }

  /**
   * Cached value for `key`, computing and storing it when missing.
   * Concurrent misses share one producer call.
   */
  public async wrap(key: string, producer: () => Promise<V>, ttlMs: number = this.defaultTtlMs): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const inFlight = this.pending.get(key);
    if (inFlight !== undefined) {
      return inFlight;
    }
    const produced = producer();
    this.pending.set(key, produced);
    try {
      const value = await produced;
      this.set(key, value, ttlMs);
      return value;
    } finally {
      this.pending.delete(key);
    }
  }

  public clear(): void {
    this.entries.clear();
  }

  public get size(): number {
    return this.entries.size;
  }
}
