/**
 * FileRepositoryFactory - creates and caches collection repositories
 *
 * All repositories share one FileLockManager, so one storage directory has
 * one lock namespace per process.
 */

import * as fs from 'fs/promises';
import { Mutex } from 'async-mutex';
import type { Entity } from '../../domain/entities/common.js';
import type { Repository } from '../../domain/repositories/interfaces.js';
import type { CollectionMap, CollectionName, RepositoryProvider } from '../../domain/repositories/collections.js';
import { COLLECTION_NAMES } from '../../domain/repositories/collections.js';
import { FileRepository } from '../repositories/file/file-repository.js';
import { FileLockManager, type FileLockManagerOptions } from '../repositories/file/file-lock-manager.js';
import type { CacheOptions } from '../repositories/file/types.js';
import type { DomainLogger } from '../logging/domain-logger.js';

export interface RepositoryFactoryConfig {
  /** Root directory of every collection */
  baseDir: string;

  /** Shared lock manager; created (and owned) by the factory when omitted */
  lockManager?: FileLockManager;

  lockOptions?: FileLockManagerOptions;

  cacheOptions?: Partial<CacheOptions>;

  logger?: DomainLogger;
}

/**
 * @example
 * ```typescript
 * const factory = new FileRepositoryFactory({ baseDir: './data' });
 * await factory.initialize();
 * const users = factory.repository('users');
 * await users.create({ ... });
 * await factory.close();
 * ```
 */
export class FileRepositoryFactory implements RepositoryProvider {
  public readonly lockManager: FileLockManager;

  private readonly repositories = new Map<CollectionName, FileRepository<Entity>>();
  private readonly ownsLockManager: boolean;
  private readonly initMutex = new Mutex();
  private initialized = false;
  private closed = false;

  constructor(private readonly config: RepositoryFactoryConfig) {
    if (config.baseDir.trim() === '') {
      throw new Error('baseDir is required and must be a non-empty string');
    }
    this.ownsLockManager = config.lockManager === undefined;
    this.lockManager =
      config.lockManager ?? new FileLockManager(config.baseDir, { logger: config.logger, ...config.lockOptions });
  }

  public get baseDir(): string {
    return this.config.baseDir;
  }

  /**
   * Create the storage root and the lock directory. Idempotent.
   */
  public async initialize(): Promise<void> {
    await this.initMutex.runExclusive(async () => {
      if (this.initialized) {
        return;
      }
      await fs.mkdir(this.config.baseDir, { recursive: true });
      await this.lockManager.initialize();
      this.initialized = true;
    });
  }

  /**
   * Same instance for the same collection; repositories initialize lazily
   */
  public repository<K extends CollectionName>(collection: K): Repository<CollectionMap[K]> {
    return this.fileRepository(collection);
  }

  public fileRepository<K extends CollectionName>(collection: K): FileRepository<CollectionMap[K]> {
    if (this.closed) {
      throw new Error('FileRepositoryFactory has been closed');
    }
    const cached = this.repositories.get(collection);
    if (cached !== undefined) {
      // Entries are only ever written below under their own collection name
      return cached as FileRepository<CollectionMap[K]>;
    }
    const repository = new FileRepository<CollectionMap[K]>(
      this.config.baseDir,
      collection,
      this.lockManager,
      this.config.cacheOptions
    );
    this.repositories.set(collection, repository);
    return repository;
  }

  /**
   * Initialize every known collection (used by setup commands)
   */
  public async initializeAll(): Promise<CollectionName[]> {
    await this.initialize();
    for (const collection of COLLECTION_NAMES) {
      await this.fileRepository(collection).initialize();
    }
    return [...COLLECTION_NAMES];
  }

  /**
   * Dispose repositories, and the lock manager when the factory created it
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const repository of this.repositories.values()) {
      repository.dispose();
    }
    this.repositories.clear();
    if (this.ownsLockManager) {
      await this.lockManager.dispose();
    }
  }
}
