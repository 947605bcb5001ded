/**
 * File Storage Repository Types
 */

// ============================================================================
// Index Types
// ============================================================================

/**
 * Index entry: where an entity lives and which version is on disk
 */
export interface IndexMetadata {
  id: string;

  /** Collection the entity belongs to */
  collection: string;

  /** File name relative to the collection's entities directory */
  filePath: string;

  version: number;

  updatedAt: string;
}

/**
 * Index structure stored on disk
 */
export interface IndexFile<TMetadata = IndexMetadata> {
  /** Index format version */
  version: number;
  collection: string;
  lastUpdated: string;
  entries: TMetadata[];
  stats?: {
    totalEntries: number;
  };
}

// ============================================================================
// Cache Types
// ============================================================================

export interface CacheEntry<T> {
  value: T;
  cachedAt: number;
}

export interface CacheOptions {
  enabled: boolean;

  /** Entry lifetime in milliseconds (0 = no expiration) */
  ttl: number;

  /** Maximum cache entries before the oldest is evicted */
  maxSize: number;
}

/**
 * Entity cache defaults. The short TTL bounds how stale a reader gets when
 * another process (worker, CLI) writes the same collection.
 */
export const DEFAULT_CACHE_OPTIONS: CacheOptions = {
  enabled: true,
  ttl: 5000,
  maxSize: 1000,
};

// ============================================================================
// Storage Layout
// ============================================================================

export interface CollectionPaths {
  root: string;
  entities: string;
  index: string;
}

export const LOCKS_DIR_NAME = '.locks';
export const INDEX_FILE_NAME = 'index.json';
export const ENTITIES_DIR_NAME = 'entities';

/**
 * Ids become file names; anything outside this set is rejected
 */
export const SAFE_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
