/**
 * Infrastructure exports
 *
 * File-based repositories, media storage, caching, logging and scheduling.
 */

// ============================================================================
// Factory
// ============================================================================
export { FileRepositoryFactory } from './factory/repository-factory.js';
export type { RepositoryFactoryConfig } from './factory/repository-factory.js';

// ============================================================================
// File Repositories
// ============================================================================
export { FileRepository } from './repositories/file/file-repository.js';
export { FileLockManager } from './repositories/file/file-lock-manager.js';
export type { FileLockManagerOptions } from './repositories/file/file-lock-manager.js';
export { DEFAULT_CACHE_OPTIONS, type CacheOptions } from './repositories/file/types.js';

// ============================================================================
// Media, cache and logging
// ============================================================================
export * from './media/media-storage.js';
export * from './cache/ttl-cache.js';
export * from './logging/domain-logger.js';

// ============================================================================
// Scheduler
// ============================================================================
export * from './scheduler/task-scheduler.js';
