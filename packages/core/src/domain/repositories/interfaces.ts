/**
 * Repository Pattern Interfaces
 *
 * Storage abstraction used by every domain service. The only backend
 * shipped is the file repository in infrastructure/repositories/file.
 */

import type { Entity } from '../entities/common.js';

// ============================================================================
// Query Types
// ============================================================================

/**
 * Filter operators for queries
 */
export type FilterOperator =
  | 'eq'         // Equal
  | 'ne'         // Not equal
  | 'gt'         // Greater than
  | 'gte'        // Greater than or equal
  | 'lt'         // Less than
  | 'lte'        // Less than or equal
  | 'in'         // In array
  | 'nin'        // Not in array
  | 'contains'   // String contains, or array includes
  | 'icontains'  // Case-insensitive string contains
  | 'startsWith' // String starts with
  | 'exists';    // Field is set (not undefined/null)

/**
 * Filter condition
 */
export interface FilterCondition<T> {
  field: keyof T & string;
  operator: FilterOperator;
  value: unknown;
}

/**
 * Logical operators for combining filter conditions
 */
export type LogicalOperator = 'and' | 'or';

/**
 * Filter with a logical operator over its conditions
 */
export interface Filter<T> {
  conditions: FilterCondition<T>[];
  operator?: LogicalOperator;
}

/**
 * Sort direction
 */
export type SortDirection = 'asc' | 'desc';

/**
 * Sort order for queries
 */
export interface SortSpec<T> {
  field: keyof T & string;
  direction: SortDirection;
  /** Orders string values by rank instead of alphabetically (e.g. priorities) */
  rank?: Readonly<Record<string, number>>;
}

/**
 * Pagination options
 */
export interface Pagination {
  offset: number;
  limit: number;
}

/**
 * Query options
 */
export interface QueryOptions<T> {
  filter?: Filter<T>;
  /** Applied after `filter` for conditions the DSL cannot express */
  where?: (entity: T) => boolean;
  sort?: SortSpec<T>[];
  pagination?: Partial<Pagination>;
}

/**
 * Query result with pagination metadata
 */
export interface QueryResult<T> {
  items: T[];
  total: number;
  offset: number;
  limit: number;
  hasMore: boolean;
}

/**
 * Fields a caller may not supply on create; the repository stamps them
 */
export type NewEntity<T extends Entity> = Omit<T, 'id' | 'createdAt' | 'updatedAt' | 'version'> & {
  id?: string;
  createdAt?: string;
};

/**
 * Fields accepted by update(); `version` enables the optimistic check
 */
export type EntityUpdate<T extends Entity> = Partial<Omit<T, 'id' | 'createdAt' | 'updatedAt' | 'version'>> & {
  version?: number;
};

// ============================================================================
// Repository Interfaces
// ============================================================================

/**
 * Base read-only repository interface
 */
export interface ReadRepository<T extends Entity> {
  /**
   * Find entity by ID
   * @throws NotFoundError if entity doesn't exist
   */
  findById(id: string): Promise<T>;

  findByIdOrNull(id: string): Promise<T | null>;

  exists(id: string): Promise<boolean>;

  /**
   * Find multiple entities by IDs
   * Missing entities are silently skipped
   */
  findByIds(ids: string[]): Promise<T[]>;

  findAll(): Promise<T[]>;

  findMany(predicate: (entity: T) => boolean): Promise<T[]>;

  findOne(predicate: (entity: T) => boolean): Promise<T | null>;

  count(predicate?: (entity: T) => boolean): Promise<number>;

  /**
   * Query entities with filters, sorting, and pagination
   */
  query(options: QueryOptions<T>): Promise<QueryResult<T>>;
}

/**
 * Read/write repository interface
 */
export interface Repository<T extends Entity> extends ReadRepository<T> {
  readonly collection: string;

  /**
   * Create entity; id and timestamps are generated when absent
   * @throws ConflictError if an entity with the same id exists
   */
  create(entity: NewEntity<T>): Promise<T>;

  /**
   * Update entity, incrementing its version. Fields set to undefined are left unchanged.
   * @throws NotFoundError if entity doesn't exist
   * @throws ConflictError on version mismatch
   */
  update(id: string, updates: EntityUpdate<T>): Promise<T>;

  /**
   * @throws NotFoundError if entity doesn't exist
   */
  delete(id: string): Promise<void>;

  /**
   * Delete the given ids, skipping missing ones
   * @returns number of deleted entities
   */
  deleteMany(ids: string[]): Promise<number>;

  /**
   * Run callback while holding a named cross-process lock.
   * Used for invariants spanning several entities (uniqueness checks).
   */
  withLock<R>(resource: string, callback: () => Promise<R>): Promise<R>;
}
