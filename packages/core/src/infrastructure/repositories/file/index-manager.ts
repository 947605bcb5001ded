/**
 * IndexManager - per-collection index of entity files
 *
 * Keeps the collection index in memory and mirrors it to index.json.
 * Every operation runs under one mutex. Before each one the manager checks
 * the index file's mtime and reloads when another process rewrote it.
 */

import * as fs from 'fs/promises';
import { Mutex } from 'async-mutex';
import type { IndexFile, IndexMetadata } from './types.js';
import { atomicWriteJSON, isErrnoException, loadJSON } from './file-utils.js';

export class IndexManager<TMetadata extends IndexMetadata = IndexMetadata> {
  private readonly inMemoryIndex = new Map<string, TMetadata>();
  private readonly mutex = new Mutex();
  private loadedMtimeMs = 0;

  constructor(
    private readonly indexPath: string,
    private readonly collection: string
  ) {}

  /**
   * Load index from disk, creating an empty one when absent
   */
  public async initialize(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        await this.reload();
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          await this.saveIndexFile();
        } else {
          throw error;
        }
      }
    });
  }

  public async add(entry: TMetadata): Promise<void> {
    await this.exclusive(async () => {
      this.inMemoryIndex.set(entry.id, entry);
      await this.saveIndexFile();
    });
  }

  public async get(id: string): Promise<TMetadata | undefined> {
    return this.exclusive(() => Promise.resolve(this.inMemoryIndex.get(id)));
  }

  public async update(entry: TMetadata): Promise<void> {
    await this.exclusive(async () => {
      if (!this.inMemoryIndex.has(entry.id)) {
        throw new Error(`Entry with ID '${entry.id}' not found`);
      }
      this.inMemoryIndex.set(entry.id, entry);
      await this.saveIndexFile();
    });
  }

  public async delete(id: string): Promise<void> {
    await this.exclusive(async () => {
      this.inMemoryIndex.delete(id);
      await this.saveIndexFile();
    });
  }

  public async getAll(): Promise<TMetadata[]> {
    return this.exclusive(() => Promise.resolve(Array.from(this.inMemoryIndex.values())));
  }

  public async has(id: string): Promise<boolean> {
    return this.exclusive(() => Promise.resolve(this.inMemoryIndex.has(id)));
  }

  public async size(): Promise<number> {
    return this.exclusive(() => Promise.resolve(this.inMemoryIndex.size));
  }

  public async clear(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.inMemoryIndex.clear();
      await this.saveIndexFile();
    });
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      await this.refreshIfChanged();
      return operation();
    });
  }

  private async reload(): Promise<void> {
    const stat = await fs.stat(this.indexPath);
    const indexFile = await loadJSON<IndexFile<TMetadata>>(this.indexPath);
    this.inMemoryIndex.clear();
    for (const entry of indexFile.entries) {
      this.inMemoryIndex.set(entry.id, entry);
    }
    this.loadedMtimeMs = stat.mtimeMs;
  }

  /**
   * Reload when the file on disk is newer than what we last read or wrote
   */
  private async refreshIfChanged(): Promise<void> {
    try {
      const stat = await fs.stat(this.indexPath);
      if (stat.mtimeMs !== this.loadedMtimeMs) {
        await this.reload();
      }
    } catch (error) {
      // Deleted underneath us: keep the in-memory view, next write recreates it
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }
  }

  private async saveIndexFile(): Promise<void> {
    const indexFile: IndexFile<TMetadata> = {
      version: 1,
      collection: this.collection,
      lastUpdated: new Date().toISOString(),
      entries: Array.from(this.inMemoryIndex.values()),
      stats: { totalEntries: this.inMemoryIndex.size },
    };
    await atomicWriteJSON(this.indexPath, indexFile);
    const stat = await fs.stat(this.indexPath);
    this.loadedMtimeMs = stat.mtimeMs;
  }
}
