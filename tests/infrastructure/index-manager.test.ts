import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { IndexManager } from '../../packages/core/src/infrastructure/repositories/file/index-manager.js';
import type { IndexFile, IndexMetadata } from '../../packages/core/src/infrastructure/repositories/file/types.js';
import { tempDir } from '../helpers/test-utils.js';

function entry(id: string, version = 1): IndexMetadata {
  return { id, collection: 'users', filePath: `${id}.json`, version, updatedAt: '2026-01-01T00:00:00.000Z' };
}

describe('IndexManager', () => {
  let dir: string;
  let indexPath: string;
  let manager: IndexManager;

  beforeEach(async () => {
    dir = tempDir('index-manager');
    await fs.mkdir(dir, { recursive: true });
    indexPath = path.join(dir, 'index.json');
    manager = new IndexManager(indexPath, 'users');
    await manager.initialize();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates an empty index file on first use', async () => {
    const file = JSON.parse(await fs.readFile(indexPath, 'utf-8')) as IndexFile;

    expect(file.version).toBe(1);
    expect(file.collection).toBe('users');
    expect(file.entries).toEqual([]);
    expect(await manager.size()).toBe(0);
  });

  it('adds, updates and deletes entries', async () => {
    await manager.add(entry('u1'));
    await manager.add(entry('u2'));
    await manager.update(entry('u1', 2));
    await manager.delete('u2');

    expect(await manager.getAll()).toEqual([entry('u1', 2)]);
    expect(await manager.has('u2')).toBe(false);
    expect((await manager.get('u1'))?.version).toBe(2);
  });

  it('refuses to update an unknown entry', async () => {
    await expect(manager.update(entry('ghost'))).rejects.toThrow("Entry with ID 'ghost' not found");
  });

  it('persists entries for a new manager on the same file', async () => {
    await manager.add(entry('u1'));

    const reopened = new IndexManager(indexPath, 'users');
    await reopened.initialize();

    expect(await reopened.getAll()).toEqual([entry('u1')]);
  });

  it('picks up changes written by another manager', async () => {
    const other = new IndexManager(indexPath, 'users');
    await other.initialize();

    // mtime resolution can hide back-to-back writes
    await new Promise<void>((resolve) => setTimeout(resolve, 20));
    await other.add(entry('from-other'));

    expect(await manager.has('from-other')).toBe(true);
  });

  it('serializes concurrent adds', async () => {
    await Promise.all(Array.from({ length: 20 }, (_, i) => manager.add(entry(`u${String(i)}`))));

    expect(await manager.size()).toBe(20);
    const file = JSON.parse(await fs.readFile(indexPath, 'utf-8')) as IndexFile;
    expect(file.entries).toHaveLength(20);
    expect(file.stats).toEqual({ totalEntries: 20 });
  });

  it('clears every entry', async () => {
    await manager.add(entry('u1'));
    await manager.clear();

    expect(await manager.getAll()).toEqual([]);
  });
});
