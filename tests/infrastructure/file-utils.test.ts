/**
 * Tests for the shared JSON file helpers
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as vm from 'vm';
import { ValidationError } from '@contractor-connect/core';
import {
  atomicWriteJSON,
  isErrnoException,
  loadJSON,
  loadJSONOrNull,
  parseJSON,
  removeFileIfExists,
} from '../../packages/core/src/infrastructure/repositories/file/file-utils.js';
import { tempDir } from '../helpers/test-utils.js';

describe('file-utils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = tempDir('file-utils');
    await fs.mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('atomicWriteJSON()', () => {
    it('writes pretty printed JSON that loadJSON reads back', async () => {
      const file = path.join(dir, 'user.json');
      await atomicWriteJSON(file, { id: 'u1', tags: ['a'] });

      expect(await fs.readFile(file, 'utf-8')).toBe('{\n  "id": "u1",\n  "tags": [\n    "a"\n  ]\n}');
      expect(await loadJSON(file)).toEqual({ id: 'u1', tags: ['a'] });
    });

    it('keeps the last of concurrent writes intact', async () => {
      const file = path.join(dir, 'counter.json');
      await Promise.all(Array.from({ length: 10 }, (_, i) => atomicWriteJSON(file, { value: i })));

      const data = await loadJSON<{ value: number }>(file);
      expect(data.value).toBeGreaterThanOrEqual(0);
      expect(data.value).toBeLessThan(10);
    });

    it('leaves no temp files behind', async () => {
      await atomicWriteJSON(path.join(dir, 'one.json'), { ok: true });
      expect(await fs.readdir(dir)).toEqual(['one.json']);
    });
  });

  describe('loadJSONOrNull()', () => {
    it('returns null for a missing file', async () => {
      expect(await loadJSONOrNull(path.join(dir, 'missing.json'))).toBeNull();
    });

    it('still fails on broken content', async () => {
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '{"id":', 'utf-8');
      await expect(loadJSONOrNull(file)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('parseJSON()', () => {
    it('rejects empty content', () => {
      expect(() => parseJSON('  \n', 'empty.json')).toThrow(
        'Invalid JSON in empty.json: file is empty or contains only whitespace'
      );
    });

    it('names the source of a syntax error', () => {
      let caught: unknown;
      try {
        parseJSON('{"a": }', 'bad.json');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError ? caught.message : '').toMatch(/^Invalid JSON in bad\.json: /);
      expect(caught instanceof ValidationError ? caught.details?.filePath : undefined).toBe('bad.json');
    });
  });

  describe('removeFileIfExists()', () => {
    it('removes a file and ignores a missing one', async () => {
      const file = path.join(dir, 'gone.json');
      await fs.writeFile(file, '{}', 'utf-8');

      await removeFileIfExists(file);
      await removeFileIfExists(file);

      expect(await fs.readdir(dir)).toEqual([]);
    });
  });

  describe('isErrnoException()', () => {
    it('recognises errno errors created in another realm', () => {
      const foreign: unknown = vm.runInNewContext("Object.assign(new Error('gone'), { code: 'ENOENT' })");

      expect(foreign instanceof Error).toBe(false);
      expect(isErrnoException(foreign)).toBe(true);
    });

    it('rejects values without a string code', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException({ code: 2 })).toBe(false);
      expect(isErrnoException(null)).toBe(false);
    });
  });
});
