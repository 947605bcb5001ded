/**
 * FileRepository tests
 *
 * Covers:
 * - create/read/update/delete of JSON entities
 * - optimistic version checks and duplicate ids
 * - query DSL (filter, where, sort with rank, pagination)
 * - isolation of returned copies
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ConflictError,
  FileLockManager,
  FileRepository,
  NotFoundError,
  ValidationError,
  type Entity,
} from '@contractor-connect/core';
import { tempDir } from '../helpers/test-utils.js';

interface Widget extends Entity {
  name: string;
  size: number;
  priority: string;
  tags: string[];
  note?: string;
}

describe('FileRepository', () => {
  let testDir: string;
  let lockManager: FileLockManager;
  let repository: FileRepository<Widget>;

  beforeEach(async () => {
    testDir = tempDir('file-repository');
    lockManager = new FileLockManager(testDir);
    repository = new FileRepository<Widget>(testDir, 'widgets', lockManager);
    await repository.initialize();
  });

  afterEach(async () => {
    repository.dispose();
    await lockManager.dispose();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  const widget = (name: string, size: number, priority = 'medium'): Omit<Widget, 'id' | 'createdAt' | 'updatedAt' | 'version'> => ({
    name,
    size,
    priority,
    tags: [],
  });

  // ============================================================================
  // Create and read
  // ============================================================================

  describe('create', () => {
    it('should stamp id, timestamps and version 1', async () => {
      const created = await repository.create(widget('bolt', 3));

      expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(created.version).toBe(1);
      expect(created.createdAt).toBe(created.updatedAt);
      expect(await repository.findById(created.id)).toEqual(created);
    });

    it('should write one file per entity and an index', async () => {
      const created = await repository.create({ ...widget('nut', 1), id: 'nut-1' });

      const raw = await fs.readFile(path.join(testDir, 'widgets', 'entities', 'nut-1.json'), 'utf-8');
      expect(JSON.parse(raw)).toEqual(created);
      const index = await fs.stat(path.join(testDir, 'widgets', 'index.json'));
      expect(index.isFile()).toBe(true);
    });

    it('should keep a supplied createdAt', async () => {
      const created = await repository.create({ ...widget('old', 1), createdAt: '2020-01-01T00:00:00.000Z' });

      expect(created.createdAt).toBe('2020-01-01T00:00:00.000Z');
    });

    it('should reject a duplicate id', async () => {
      await repository.create({ ...widget('a', 1), id: 'same' });

      await expect(repository.create({ ...widget('b', 2), id: 'same' })).rejects.toThrow(ConflictError);
      await expect(repository.create({ ...widget('b', 2), id: 'same' })).rejects.toThrow(
        "widgets with ID 'same' already exists"
      );
    });

    it('should reject ids that are not path safe', async () => {
      await expect(repository.create({ ...widget('x', 1), id: '../escape' })).rejects.toThrow(ValidationError);
      await expect(repository.create({ ...widget('x', 1), id: '../escape' })).rejects.toThrow(
        "Invalid widgets ID '../escape'"
      );
    });
  });

  describe('reads', () => {
    it('should throw NotFoundError for a missing id', async () => {
      await expect(repository.findById('missing')).rejects.toThrow(NotFoundError);
      await expect(repository.findById('missing')).rejects.toThrow("widgets with ID 'missing' not found");
    });

    it('should return null from findByIdOrNull for a missing id', async () => {
      expect(await repository.findByIdOrNull('missing')).toBeNull();
    });

    it('should skip missing ids in findByIds', async () => {
      const a = await repository.create(widget('a', 1));

      const found = await repository.findByIds([a.id, 'missing']);

      expect(found.map((w) => w.name)).toEqual(['a']);
    });

    it('should count with and without a predicate', async () => {
      await repository.create(widget('a', 1));
      await repository.create(widget('b', 5));
      await repository.create(widget('c', 9));

      expect(await repository.count()).toBe(3);
      expect(await repository.count((w) => w.size > 2)).toBe(2);
    });

    it('should hand out copies that do not leak into storage', async () => {
      const created = await repository.create(widget('a', 1));

      const first = await repository.findById(created.id);
      first.tags.push('mutated');

      const second = await repository.findById(created.id);
      expect(second.tags).toEqual([]);
    });

    it('should find one entity by predicate', async () => {
      await repository.create(widget('a', 1));
      await repository.create(widget('b', 2));

      const found = await repository.findOne((w) => w.name === 'b');

      expect(found?.size).toBe(2);
      expect(await repository.findOne((w) => w.name === 'z')).toBeNull();
    });
  });

  // ============================================================================
  // Update and delete
  // ============================================================================

  describe('update', () => {
    it('should merge fields and bump the version', async () => {
      const created = await repository.create(widget('a', 1));

      const updated = await repository.update(created.id, { size: 7 });

      expect(updated.size).toBe(7);
      expect(updated.name).toBe('a');
      expect(updated.version).toBe(2);
      expect(updated.createdAt).toBe(created.createdAt);
    });

    it('should leave fields passed as undefined unchanged', async () => {
      const created = await repository.create({ ...widget('a', 1), note: 'keep me' });

      const updated = await repository.update(created.id, { note: undefined, size: 2 });

      expect(updated.note).toBe('keep me');
    });

    it('should accept a matching expected version', async () => {
      const created = await repository.create(widget('a', 1));

      const updated = await repository.update(created.id, { size: 2, version: 1 });

      expect(updated.version).toBe(2);
    });

    it('should reject a stale expected version', async () => {
      const created = await repository.create(widget('a', 1));
      await repository.update(created.id, { size: 2 });

      await expect(repository.update(created.id, { size: 3, version: 1 })).rejects.toThrow(
        `Version mismatch for widgets '${created.id}': expected 1, found 2`
      );
    });

    it('should throw NotFoundError when updating a missing entity', async () => {
      await expect(repository.update('missing', { size: 1 })).rejects.toThrow(NotFoundError);
    });
  });

  describe('delete', () => {
    it('should remove the entity and its file', async () => {
      const created = await repository.create({ ...widget('a', 1), id: 'gone' });

      await repository.delete(created.id);

      expect(await repository.exists('gone')).toBe(false);
      await expect(fs.access(path.join(testDir, 'widgets', 'entities', 'gone.json'))).rejects.toThrow();
    });

    it('should throw NotFoundError when deleting a missing entity', async () => {
      await expect(repository.delete('missing')).rejects.toThrow(NotFoundError);
    });

    it('should count only existing ids in deleteMany', async () => {
      const a = await repository.create(widget('a', 1));
      const b = await repository.create(widget('b', 2));

      expect(await repository.deleteMany([a.id, b.id, 'missing'])).toBe(2);
      expect(await repository.count()).toBe(0);
    });

    it('should clear the whole collection', async () => {
      await repository.create(widget('a', 1));
      await repository.create(widget('b', 2));

      await repository.clear();

      expect(await repository.findAll()).toEqual([]);
    });
  });

  // ============================================================================
  // Query
  // ============================================================================

  describe('query', () => {
    beforeEach(async () => {
      await repository.create({ ...widget('alpha', 5, 'low'), tags: ['red'] });
      await repository.create({ ...widget('beta', 2, 'urgent'), tags: ['blue'] });
      await repository.create({ ...widget('Gamma', 8, 'high'), tags: ['red', 'blue'] });
      await repository.create({ ...widget('delta', 1, 'medium'), tags: [] });
    });

    it('should filter with AND conditions', async () => {
      const result = await repository.query({
        filter: {
          conditions: [
            { field: 'size', operator: 'gte', value: 2 },
            { field: 'tags', operator: 'contains', value: 'red' },
          ],
        },
        sort: [{ field: 'size', direction: 'asc' }],
      });

      expect(result.items.map((w) => w.name)).toEqual(['alpha', 'Gamma']);
      expect(result.total).toBe(2);
    });

    it('should filter with OR conditions', async () => {
      const result = await repository.query({
        filter: {
          operator: 'or',
          conditions: [
            { field: 'name', operator: 'eq', value: 'delta' },
            { field: 'name', operator: 'icontains', value: 'gam' },
          ],
        },
        sort: [{ field: 'size', direction: 'asc' }],
      });

      expect(result.items.map((w) => w.name)).toEqual(['delta', 'Gamma']);
    });

    it('should apply where after filter', async () => {
      const result = await repository.query({
        filter: { conditions: [{ field: 'size', operator: 'lt', value: 6 }] },
        where: (w) => w.name.startsWith('a') || w.name.startsWith('d'),
        sort: [{ field: 'name', direction: 'asc' }],
      });

      expect(result.items.map((w) => w.name)).toEqual(['alpha', 'delta']);
    });

    it('should sort by rank when given', async () => {
      const rank = { low: 1, medium: 2, high: 3, urgent: 4 };

      const result = await repository.query({ sort: [{ field: 'priority', direction: 'desc', rank }] });

      expect(result.items.map((w) => w.priority)).toEqual(['urgent', 'high', 'medium', 'low']);
    });

    it('should paginate and report hasMore', async () => {
      const first = await repository.query({
        sort: [{ field: 'size', direction: 'desc' }],
        pagination: { offset: 0, limit: 3 },
      });
      const second = await repository.query({
        sort: [{ field: 'size', direction: 'desc' }],
        pagination: { offset: 3, limit: 3 },
      });

      expect(first.items.map((w) => w.size)).toEqual([8, 5, 2]);
      expect(first.hasMore).toBe(true);
      expect(second.items.map((w) => w.size)).toEqual([1]);
      expect(second.hasMore).toBe(false);
      expect(second.total).toBe(4);
    });

    it('should match membership with in and nin', async () => {
      const inResult = await repository.query({ filter: { conditions: [{ field: 'size', operator: 'in', value: [1, 2] }] } });
      const ninResult = await repository.query({ filter: { conditions: [{ field: 'size', operator: 'nin', value: [1, 2] }] } });

      expect(inResult.total).toBe(2);
      expect(ninResult.total).toBe(2);
    });
  });

  // ============================================================================
  // Locking
  // ============================================================================

  describe('withLock', () => {
    it('should serialize concurrent read-modify-write cycles', async () => {
      const created = await repository.create(widget('counter', 0));

      await Promise.all(
        Array.from({ length: 5 }, () =>
          repository.withLock('counter', async () => {
            const current = await repository.findById(created.id);
            await repository.update(created.id, { size: current.size + 1 });
          })
        )
      );

      expect((await repository.findById(created.id)).size).toBe(5);
    });
  });
});
