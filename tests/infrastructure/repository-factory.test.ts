/**
 * FileRepositoryFactory tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { COLLECTION_NAMES, FileLockManager, FileRepositoryFactory } from '@contractor-connect/core';
import { tempDir } from '../helpers/test-utils.js';

describe('FileRepositoryFactory', () => {
  let testDir: string;
  let factory: FileRepositoryFactory;

  beforeEach(async () => {
    testDir = tempDir('repository-factory');
    factory = new FileRepositoryFactory({ baseDir: testDir });
    await factory.initialize();
  });

  afterEach(async () => {
    await factory.close();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('rejects an empty base directory', () => {
    expect(() => new FileRepositoryFactory({ baseDir: '  ' })).toThrow(
      'baseDir is required and must be a non-empty string'
    );
  });

  it('returns the same repository for the same collection', () => {
    expect(factory.repository('users')).toBe(factory.repository('users'));
    expect(factory.repository('users')).not.toBe(factory.repository('categories'));
  });

  it('stores each collection in its own directory', async () => {
    const categories = factory.repository('categories');
    const created = await categories.create({
      name: 'Plumbing',
      slug: 'plumbing',
      icon: '',
      description: '',
      isActive: true,
    });

    const stored = await fs.readdir(path.join(testDir, 'categories', 'entities'));
    expect(stored).toEqual([`${created.id}.json`]);
  });

  it('initializes every collection', async () => {
    const initialized = await factory.initializeAll();

    expect(initialized).toEqual([...COLLECTION_NAMES]);
    const dirs = await fs.readdir(testDir);
    expect(dirs).toEqual(expect.arrayContaining(['users', 'advertisements', 'moderation-queue']));
  });

  it('refuses repositories after close', async () => {
    await factory.close();

    expect(() => factory.repository('users')).toThrow('FileRepositoryFactory has been closed');
  });

  it('leaves a shared lock manager open on close', async () => {
    const lockManager = new FileLockManager(testDir);
    const shared = new FileRepositoryFactory({ baseDir: testDir, lockManager });
    await shared.initialize();

    await shared.close();

    expect(shared.lockManager).toBe(lockManager);
    expect(lockManager.isDisposed()).toBe(false);
    await lockManager.dispose();
  });
});
