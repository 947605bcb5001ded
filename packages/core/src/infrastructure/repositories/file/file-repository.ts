/**
 * FileRepository<T> - JSON-file-per-entity repository
 *
 * Layout per collection:
 *   <baseDir>/<collection>/entities/<id>.json
 *   <baseDir>/<collection>/index.json
 *
 * Entity writes hold the `<collection>:<id>` lock; index membership changes
 * additionally hold `<collection>:index` so concurrent processes never drop
 * each other's entries.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  EntityUpdate,
  Filter,
  FilterCondition,
  NewEntity,
  QueryOptions,
  QueryResult,
  Repository,
  SortSpec,
} from '../../../domain/repositories/interfaces.js';
import type { Entity } from '../../../domain/entities/common.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../domain/repositories/errors.js';
import { IndexManager } from './index-manager.js';
import type { FileLockManager } from './file-lock-manager.js';
import { BaseFileRepository } from './base-file-repository.js';
import { isErrnoException, removeFileIfExists } from './file-utils.js';
import {
  ENTITIES_DIR_NAME,
  INDEX_FILE_NAME,
  SAFE_ID_PATTERN,
  type CacheEntry,
  type CacheOptions,
  type CollectionPaths,
  type IndexMetadata,
} from './types.js';

export class FileRepository<T extends Entity> extends BaseFileRepository implements Repository<T> {
  public readonly paths: CollectionPaths;

  private readonly indexManager: IndexManager;
  private readonly entityCache = new Map<string, CacheEntry<T>>();

  constructor(
    baseDir: string,
    public readonly collection: string,
    private readonly fileLockManager: FileLockManager,
    cacheOptions?: Partial<CacheOptions>
  ) {
    super(baseDir, cacheOptions);
    const root = path.join(baseDir, collection);
    this.paths = {
      root,
      entities: path.join(root, ENTITIES_DIR_NAME),
      index: path.join(root, INDEX_FILE_NAME),
    };
    this.indexManager = new IndexManager(this.paths.index, collection);
  }

  protected async doInitialize(): Promise<void> {
    await fs.mkdir(this.paths.entities, { recursive: true });
    await this.indexManager.initialize();
    if (!this.fileLockManager.isInitialized()) {
      await this.fileLockManager.initialize();
    }
  }

  // ============================================================================
  // Read Operations
  // ============================================================================

  public async findById(id: string): Promise<T> {
    const entity = await this.findByIdOrNull(id);
    if (entity === null) {
      throw new NotFoundError(this.collection, id);
    }
    return entity;
  }

  public async findByIdOrNull(id: string): Promise<T | null> {
    await this.ensureInitialized();
    const metadata = await this.indexManager.get(id);
    if (metadata === undefined) {
      return null;
    }
    return this.loadIndexed(metadata);
  }

  public async exists(id: string): Promise<boolean> {
    await this.ensureInitialized();
    return this.indexManager.has(id);
  }

  public async findByIds(ids: string[]): Promise<T[]> {
    const results: T[] = [];
    for (const id of ids) {
      const entity = await this.findByIdOrNull(id);
      if (entity !== null) {
        results.push(entity);
      }
    }
    return results;
  }

  public async findAll(): Promise<T[]> {
    await this.ensureInitialized();
    const allMetadata = await this.indexManager.getAll();
    const entities: T[] = [];
    for (const metadata of allMetadata) {
      const entity = await this.loadIndexed(metadata);
      if (entity !== null) {
        entities.push(entity);
      }
    }
    return entities;
  }

  public async findMany(predicate: (entity: T) => boolean): Promise<T[]> {
    const entities = await this.findAll();
    return entities.filter(predicate);
  }

  public async findOne(predicate: (entity: T) => boolean): Promise<T | null> {
    const entities = await this.findAll();
    return entities.find(predicate) ?? null;
  }

  public async count(predicate?: (entity: T) => boolean): Promise<number> {
    await this.ensureInitialized();
    if (predicate === undefined) {
      return this.indexManager.size();
    }
    const entities = await this.findMany(predicate);
    return entities.length;
  }

  public async query(options: QueryOptions<T>): Promise<QueryResult<T>> {
    let entities = await this.findAll();

    if (options.filter !== undefined) {
      entities = applyFilter(entities, options.filter);
    }
    if (options.where !== undefined) {
      entities = entities.filter(options.where);
    }

    const total = entities.length;

    if (options.sort !== undefined && options.sort.length > 0) {
      entities = applySort(entities, options.sort);
    }

    const offset = Math.max(options.pagination?.offset ?? 0, 0);
    const limit = Math.max(options.pagination?.limit ?? total, 0);

    return {
      items: entities.slice(offset, offset + limit),
      total,
      offset,
      limit,
      hasMore: offset + limit < total,
    };
  }

  // ============================================================================
  // Write Operations
  // ============================================================================

  public async create(input: NewEntity<T>): Promise<T> {
    await this.ensureInitialized();

    const id = input.id ?? uuidv4();
    this.assertSafeId(id);
    const now = new Date().toISOString();
    // Omit<T, K> & Pick<T, K> is T, which the compiler cannot see for a generic T
    const entity = { ...input, id, createdAt: input.createdAt ?? now, updatedAt: now, version: 1 } as T;

    return this.fileLockManager.withLock(`${this.collection}:${id}`, async () => {
      if (await this.indexManager.has(id)) {
        throw new ConflictError(`${this.collection} with ID '${id}' already exists`, 'duplicate', {
          collection: this.collection,
          entityId: id,
        });
      }

      const filePath = this.getEntityFileName(id);
      await this.atomicWriteJSON(path.join(this.paths.entities, filePath), entity);
      await this.withIndexLock(() =>
        this.indexManager.add({
          id,
          collection: this.collection,
          filePath,
          version: entity.version,
          updatedAt: entity.updatedAt,
        })
      );

      this.cacheSet(this.entityCache, id, entity);
      return structuredClone(entity);
    });
  }

  public async update(id: string, updates: EntityUpdate<T>): Promise<T> {
    await this.ensureInitialized();

    return this.fileLockManager.withLock(`${this.collection}:${id}`, async () => {
      const existing = await this.findById(id);

      const { version: expectedVersion, ...changes } = updates;
      if (expectedVersion !== undefined && expectedVersion !== existing.version) {
        throw new ConflictError(
          `Version mismatch for ${this.collection} '${id}': expected ${String(expectedVersion)}, found ${String(existing.version)}`,
          'version',
          { collection: this.collection, entityId: id, expectedVersion, actualVersion: existing.version }
        );
      }

      // undefined leaves a field as it is
      const defined = Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined));
      const updated: T = {
        ...existing,
        ...defined,
        id,
        createdAt: existing.createdAt,
        version: existing.version + 1,
        updatedAt: new Date().toISOString(),
      };

      const filePath = this.getEntityFileName(id);
      await this.atomicWriteJSON(path.join(this.paths.entities, filePath), updated);
      await this.withIndexLock(() =>
        this.indexManager.update({
          id,
          collection: this.collection,
          filePath,
          version: updated.version,
          updatedAt: updated.updatedAt,
        })
      );

      this.cacheSet(this.entityCache, id, updated);
      return structuredClone(updated);
    });
  }

  public async delete(id: string): Promise<void> {
    await this.ensureInitialized();

    await this.fileLockManager.withLock(`${this.collection}:${id}`, async () => {
      if (!(await this.indexManager.has(id))) {
        throw new NotFoundError(this.collection, id);
      }
      await removeFileIfExists(path.join(this.paths.entities, this.getEntityFileName(id)));
      await this.withIndexLock(() => this.indexManager.delete(id));
      this.cacheInvalidate(this.entityCache, id);
    });
  }

  public async deleteMany(ids: string[]): Promise<number> {
    let deleted = 0;
    for (const id of ids) {
      try {
        await this.delete(id);
        deleted++;
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
      }
    }
    return deleted;
  }

  public async withLock<R>(resource: string, callback: () => Promise<R>): Promise<R> {
    await this.ensureInitialized();
    return this.fileLockManager.withLock(`${this.collection}:${resource}`, callback);
  }

  /**
   * Remove every entity of the collection
   */
  public async clear(): Promise<void> {
    await this.ensureInitialized();
    await this.withIndexLock(async () => {
      await fs.rm(this.paths.entities, { recursive: true, force: true });
      await fs.mkdir(this.paths.entities, { recursive: true });
      await this.indexManager.clear();
    });
    this.cacheClear(this.entityCache);
  }

  public dispose(): void {
    this.cacheClear(this.entityCache);
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private getEntityFileName(id: string): string {
    return `${id}.json`;
  }

  private assertSafeId(id: string): void {
    if (!SAFE_ID_PATTERN.test(id)) {
      throw new ValidationError(`Invalid ${this.collection} ID '${id}'`, [
        { field: 'id', message: 'ID may only contain letters, digits, "-" and "_"', value: id },
      ]);
    }
  }

  private async withIndexLock<R>(callback: () => Promise<R>): Promise<R> {
    return this.fileLockManager.withLock(`${this.collection}:index`, callback);
  }

  /**
   * Cached copy when its version matches the index, otherwise read from disk
   */
  private async loadIndexed(metadata: IndexMetadata): Promise<T | null> {
    const cached = this.cacheGet(this.entityCache, metadata.id);
    if (cached !== undefined && cached.version === metadata.version) {
      return structuredClone(cached);
    }
    const entity = await this.loadEntityFile(metadata.filePath);
    if (entity === null) {
      return null;
    }
    this.cacheSet(this.entityCache, metadata.id, entity);
    return structuredClone(entity);
  }

  /**
   * null when the index points at a file that another process just removed
   */
  private async loadEntityFile(fileName: string): Promise<T | null> {
    try {
      return await this.loadJSON<T>(path.join(this.paths.entities, fileName));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}

// ============================================================================
// Filtering and sorting
// ============================================================================

function matchesCondition<T>(entity: T, condition: FilterCondition<T>): boolean {
  const value: unknown = entity[condition.field];
  const expected = condition.value;

  switch (condition.operator) {
    case 'eq':
      return value === expected;
    case 'ne':
      return value !== expected;
    case 'gt':
      return compareValues(value, expected) > 0 && isComparable(value, expected);
    case 'gte':
      return compareValues(value, expected) >= 0 && isComparable(value, expected);
    case 'lt':
      return compareValues(value, expected) < 0 && isComparable(value, expected);
    case 'lte':
      return compareValues(value, expected) <= 0 && isComparable(value, expected);
    case 'in':
      return Array.isArray(expected) && expected.includes(value);
    case 'nin':
      return Array.isArray(expected) && !expected.includes(value);
    case 'contains':
      if (Array.isArray(value)) {
        return value.includes(expected);
      }
      return typeof value === 'string' && value.includes(String(expected));
    case 'icontains':
      return typeof value === 'string' && value.toLowerCase().includes(String(expected).toLowerCase());
    case 'startsWith':
      return typeof value === 'string' && value.startsWith(String(expected));
    case 'exists': {
      const present = value !== undefined && value !== null;
      return expected === false ? !present : present;
    }
  }
}

function isComparable(a: unknown, b: unknown): boolean {
  return (typeof a === 'number' && typeof b === 'number') || (typeof a === 'string' && typeof b === 'string');
}

/**
 * Numbers and strings compare naturally; undefined/null sort first
 */
export function compareValues(a: unknown, b: unknown): number {
  const aMissing = a === undefined || a === null;
  const bMissing = b === undefined || b === null;
  if (aMissing || bMissing) {
    return aMissing === bMissing ? 0 : aMissing ? -1 : 1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  const aText = String(a);
  const bText = String(b);
  return aText < bText ? -1 : aText > bText ? 1 : 0;
}

export function applyFilter<T>(entities: T[], filter: Filter<T>): T[] {
  const operator = filter.operator ?? 'and';
  return entities.filter((entity) =>
    operator === 'and'
      ? filter.conditions.every((condition) => matchesCondition(entity, condition))
      : filter.conditions.some((condition) => matchesCondition(entity, condition))
  );
}

export function applySort<T>(entities: T[], sort: SortSpec<T>[]): T[] {
  return [...entities].sort((a, b) => {
    for (const { field, direction, rank } of sort) {
      const aVal: unknown = a[field];
      const bVal: unknown = b[field];
      const comparison =
        rank !== undefined ? (rank[String(aVal)] ?? 0) - (rank[String(bVal)] ?? 0) : compareValues(aVal, bVal);
      if (comparison !== 0) {
        return direction === 'asc' ? comparison : -comparison;
      }
    }
    return 0;
  });
}
