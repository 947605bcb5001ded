/**
 * FileLockManager - Cross-process file locking using proper-lockfile
 *
 * The web server, the background worker and CLI commands share one storage
 * directory, so every entity write takes a lock file under <storage>/.locks.
 *
 * Locks are NOT reentrant: acquiring the same resource twice from one
 * process blocks until timeout.
 */

import lockfile from 'proper-lockfile';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import { LockError } from '../../../domain/repositories/errors.js';
import { createDomainLogger, errorMessage, type DomainLogger, type LogLevel } from '../../logging/domain-logger.js';
import { isErrnoException } from './file-utils.js';
import { LOCKS_DIR_NAME } from './types.js';

export interface FileLockManagerOptions {
  /**
   * How long to wait for lock acquisition (ms)
   * @default 10000
   */
  acquireTimeout?: number;

  /**
   * Time between lock acquisition retries (ms)
   * @default 50
   */
  retryInterval?: number;

  /**
   * Lock files older than this are considered stale (ms)
   * @default 30000
   */
  staleThreshold?: number;

  /**
   * @default '<baseDir>/.locks'
   */
  lockDir?: string;

  logger?: DomainLogger;

  /**
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Upper bound for dispose() waiting on lock releases (ms)
   * @default 5000
   */
  disposeTimeout?: number;

  /**
   * Invoked when a held lock turned out to be released externally
   * (stale detection by another process)
   */
  onLockCompromised?: (resource: string, heldForMs: number) => void;
}

export interface WithLockOptions {
  acquireTimeout?: number;
}

interface ActiveLock {
  resource: string;
  lockPath: string;
  release: () => Promise<void>;
  acquiredAt: number;
}

interface MutexEntry {
  promise: Promise<void>;
  release: () => void;
}

export class FileLockManager {
  private readonly lockDir: string;
  private readonly acquireTimeout: number;
  private readonly retryInterval: number;
  private readonly staleThreshold: number;
  private readonly disposeTimeout: number;
  private readonly logger: DomainLogger;
  private readonly onLockCompromised?: (resource: string, heldForMs: number) => void;

  private readonly activeLocks = new Map<string, ActiveLock>();

  /**
   * In-process holders per resource; local waiters queue on the promise
   * instead of polling the lock file
   */
  private readonly acquireMutexes = new Map<string, MutexEntry>();

  private disposed = false;
  private initialized = false;

  constructor(baseDir: string, options?: FileLockManagerOptions) {
    this.lockDir = options?.lockDir ?? path.join(baseDir, LOCKS_DIR_NAME);
    this.acquireTimeout = options?.acquireTimeout ?? 10000;
    this.retryInterval = options?.retryInterval ?? 50;
    this.staleThreshold = options?.staleThreshold ?? 30000;
    this.disposeTimeout = options?.disposeTimeout ?? 5000;
    this.logger = createDomainLogger(options?.logger, options?.logLevel ?? 'warn');
    this.onLockCompromised = options?.onLockCompromised;
  }

  /**
   * Create the lock directory. Idempotent.
   */
  public async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await fs.mkdir(this.lockDir, { recursive: true });
    this.initialized = true;
    this.logger.debug?.('FileLockManager initialized', { lockDir: this.lockDir });
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Acquire a lock; the returned function releases it and resolves to
   * false when the lock had been released externally
   */
  public async acquire(resource: string, options?: WithLockOptions): Promise<() => Promise<boolean>> {
    this.ensureUsable();

    const lockPath = this.getLockPath(resource);
    const acquireTimeout = options?.acquireTimeout ?? this.acquireTimeout;
    const started = Date.now();

    await this.acquireInProcessMutex(resource, acquireTimeout);

    try {
      await this.ensureLockFile(lockPath);
      const remaining = Math.max(acquireTimeout - (Date.now() - started), this.retryInterval);

      const release = await lockfile.lock(lockPath, {
        stale: this.staleThreshold,
        retries: {
          retries: Math.ceil(remaining / this.retryInterval),
          minTimeout: this.retryInterval,
          maxTimeout: this.retryInterval,
        },
      });

      if (this.disposed) {
        await release();
        throw this.disposedError();
      }

      this.activeLocks.set(resource, { resource, lockPath, release, acquiredAt: Date.now() });
      this.logger.debug?.('File lock acquired', { resource });

      return async (): Promise<boolean> => this.release(resource);
    } catch (error) {
      this.releaseInProcessMutex(resource);
      if (isErrnoException(error)) {
        if (error.code === 'ELOCKED') {
          throw this.timeoutError(resource, acquireTimeout);
        }
        if (error.code === 'EACCES' || error.code === 'EPERM') {
          throw new LockError(`Permission denied for lock file: ${lockPath}`, 'acquire', { resource });
        }
      }
      throw error;
    }
  }

  /**
   * Release a held lock. Safe to call after dispose().
   *
   * @returns false if the lock had been released externally
   */
  public async release(resource: string): Promise<boolean> {
    if (this.disposed) {
      return true;
    }

    const activeLock = this.activeLocks.get(resource);
    if (activeLock === undefined) {
      return true;
    }

    try {
      await activeLock.release();
      return true;
    } catch (error) {
      const compromised = isErrnoException(error) && (error.code === 'ERELEASED' || error.code === 'ENOTACQUIRED');
      if (!compromised) {
        throw error;
      }
      const heldFor = Date.now() - activeLock.acquiredAt;
      this.logger.warn?.('Lock was externally released', { resource, heldFor, error: errorMessage(error) });
      this.onLockCompromised?.(resource, heldFor);
      return false;
    } finally {
      this.activeLocks.delete(resource);
      this.releaseInProcessMutex(resource);
    }
  }

  /**
   * Execute callback with the lock held
   */
  public async withLock<T>(resource: string, callback: () => Promise<T>, options?: WithLockOptions): Promise<T> {
    const release = await this.acquire(resource, options);
    try {
      return await callback();
    } finally {
      await release();
    }
  }

  /**
   * Whether any process currently holds the lock
   */
  public async isLocked(resource: string): Promise<boolean> {
    this.ensureUsable();
    const lockPath = this.getLockPath(resource);
    await this.ensureLockFile(lockPath);
    return lockfile.check(lockPath, { stale: this.staleThreshold });
  }

  public isHeldByUs(resource: string): boolean {
    return this.activeLocks.has(resource);
  }

  public getActiveLocksCount(): number {
    return this.activeLocks.size;
  }

  public isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Release every held lock, then wake in-process waiters so they observe
   * the disposed flag and fail fast
   */
  public async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    const releases = Array.from(this.activeLocks.values()).map(async (activeLock) => {
      try {
        await activeLock.release();
      } catch (error) {
        this.logger.warn?.('Error releasing lock during dispose', {
          resource: activeLock.resource,
          error: errorMessage(error),
        });
      }
    });

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timeoutId = setTimeout(resolve, this.disposeTimeout);
    });
    await Promise.race([Promise.all(releases), timeout]);
    clearTimeout(timeoutId);
    this.activeLocks.clear();

    for (const mutex of this.acquireMutexes.values()) {
      mutex.release();
    }
    this.acquireMutexes.clear();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private ensureUsable(): void {
    if (!this.initialized) {
      throw new LockError('FileLockManager not initialized. Call initialize() first.', 'acquire');
    }
    if (this.disposed) {
      throw this.disposedError();
    }
  }

  private disposedError(): LockError {
    return new LockError('FileLockManager has been disposed', 'disposed');
  }

  /**
   * Wait for the in-process holder of `resource` (if any) to release it.
   * The mutex is held from acquire() until release().
   */
  private async acquireInProcessMutex(resource: string, acquireTimeout: number): Promise<void> {
    let releaseMutex: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
      releaseMutex = resolve;
    });
    const ours: MutexEntry = { promise, release: releaseMutex };
    const deadline = Date.now() + acquireTimeout;

    for (;;) {
      if (this.disposed) {
        throw this.disposedError();
      }
      const existing = this.acquireMutexes.get(resource);
      if (existing === undefined) {
        this.acquireMutexes.set(resource, ours);
        return;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitFor(existing.promise, remaining))) {
        throw this.timeoutError(resource, acquireTimeout);
      }
    }
  }

  /**
   * @returns false when `ms` elapsed first
   */
  private async waitFor(promise: Promise<void>, ms: number): Promise<boolean> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timeoutId = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([promise.then(() => true), timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private timeoutError(resource: string, timeout: number): LockError {
    this.logger.warn?.('File lock acquisition timeout', { resource, timeout });
    return new LockError(`Timeout acquiring file lock on '${resource}' after ${String(timeout)}ms`, 'timeout', {
      resource,
      timeout,
    });
  }

  private releaseInProcessMutex(resource: string): void {
    const mutex = this.acquireMutexes.get(resource);
    if (mutex !== undefined) {
      this.acquireMutexes.delete(resource);
      mutex.release();
    }
  }

  /**
   * Resource names are hashed so 'a:b', 'a_b' and 'a/b' never collide
   */
  private getLockPath(resource: string): string {
    const hash = createHash('sha256').update(resource).digest('hex').slice(0, 32);
    return path.join(this.lockDir, `${hash}.lock`);
  }

  /**
   * proper-lockfile locks an existing file; create it exclusively if missing
   */
  private async ensureLockFile(lockPath: string): Promise<void> {
    try {
      await fs.writeFile(lockPath, '', { flag: 'wx' });
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
    }
  }
}
