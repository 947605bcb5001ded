/**
 * FileLockManager tests
 *
 * Covers:
 * - acquire/release lifecycle and lock file location
 * - in-process serialization of the same resource
 * - timeouts on a held lock
 * - dispose semantics
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FileLockManager, LockError } from '@contractor-connect/core';
import { tempDir } from '../helpers/test-utils.js';

describe('FileLockManager', () => {
  let testDir: string;
  let lockManager: FileLockManager;

  beforeEach(async () => {
    testDir = tempDir('lock-manager');
    lockManager = new FileLockManager(testDir, { acquireTimeout: 1000, retryInterval: 20 });
    await lockManager.initialize();
  });

  afterEach(async () => {
    await lockManager.dispose();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  // ============================================================================
  // Initialization
  // ============================================================================

  describe('initialize', () => {
    it('should create the .locks directory', async () => {
      const stat = await fs.stat(path.join(testDir, '.locks'));

      expect(stat.isDirectory()).toBe(true);
      expect(lockManager.isInitialized()).toBe(true);
    });

    it('should refuse to lock before initialize', async () => {
      const fresh = new FileLockManager(tempDir('lock-uninit'));

      await expect(fresh.acquire('users:1')).rejects.toThrow('FileLockManager not initialized. Call initialize() first.');
      await fresh.dispose();
    });
  });

  // ============================================================================
  // Acquire and release
  // ============================================================================

  describe('acquire', () => {
    it('should track a held lock until released', async () => {
      const release = await lockManager.acquire('users:1');

      expect(lockManager.isHeldByUs('users:1')).toBe(true);
      expect(await lockManager.isLocked('users:1')).toBe(true);
      expect(lockManager.getActiveLocksCount()).toBe(1);

      expect(await release()).toBe(true);
      expect(lockManager.isHeldByUs('users:1')).toBe(false);
      expect(await lockManager.isLocked('users:1')).toBe(false);
    });

    it('should treat release of an unknown resource as a no-op', async () => {
      expect(await lockManager.release('never-held')).toBe(true);
    });

    it('should time out while another holder keeps the lock', async () => {
      const release = await lockManager.acquire('projects:42');

      await expect(lockManager.acquire('projects:42', { acquireTimeout: 100 })).rejects.toThrow(
        "Timeout acquiring file lock on 'projects:42' after 100ms"
      );
      await release();
    });

    it('should let different resources lock independently', async () => {
      const releaseA = await lockManager.acquire('a');
      const releaseB = await lockManager.acquire('b');

      expect(lockManager.getActiveLocksCount()).toBe(2);
      await releaseA();
      await releaseB();
    });
  });

  describe('withLock', () => {
    it('should run callbacks on one resource one at a time', async () => {
      const order: string[] = [];
      const task = (name: string) =>
        lockManager.withLock('shared', async () => {
          order.push(`${name}:start`);
          await new Promise((resolve) => setTimeout(resolve, 20));
          order.push(`${name}:end`);
        });

      await Promise.all([task('first'), task('second')]);

      expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    });

    it('should release the lock when the callback throws', async () => {
      await expect(
        lockManager.withLock('failing', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(lockManager.isHeldByUs('failing')).toBe(false);
    });

    it('should return the callback result', async () => {
      const result = await lockManager.withLock('value', async () => 42);

      expect(result).toBe(42);
    });
  });

  // ============================================================================
  // Dispose
  // ============================================================================

  describe('dispose', () => {
    it('should release held locks and reject new acquisitions', async () => {
      await lockManager.acquire('held');

      await lockManager.dispose();

      expect(lockManager.isDisposed()).toBe(true);
      expect(lockManager.getActiveLocksCount()).toBe(0);
      await expect(lockManager.acquire('other')).rejects.toThrow(LockError);
      await expect(lockManager.acquire('other')).rejects.toThrow('FileLockManager has been disposed');
    });
  });
});
