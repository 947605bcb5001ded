/**
 * File Utilities - Shared file operations for repositories
 *
 * Atomic JSON writes go through write-file-atomic: every call writes to its
 * own temp file and renames it over the target.
 */

import * as fs from 'fs/promises';
import writeFileAtomic from 'write-file-atomic';
import { ValidationError } from '../../../domain/repositories/errors.js';

/**
 * Write JSON data to file atomically
 */
export async function atomicWriteJSON(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8' });
}

/**
 * Load JSON data from file
 *
 * @throws ValidationError if file is empty or JSON is invalid
 * @throws ENOENT if file doesn't exist (propagated from fs.readFile)
 */
export async function loadJSON<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseJSON<T>(content, filePath);
}

/**
 * Like loadJSON, but a missing file yields null
 */
export async function loadJSONOrNull<T>(filePath: string): Promise<T | null> {
  try {
    return await loadJSON<T>(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function parseJSON<T>(content: string, source: string): T {
  if (content.trim() === '') {
    throw new ValidationError(
      `Invalid JSON in ${source}: file is empty or contains only whitespace`,
      [{ field: 'content', message: 'File is empty or contains only whitespace' }],
      { filePath: source }
    );
  }

  try {
    return JSON.parse(content) as T;
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    // "Unexpected token } in JSON at position 42"
    const positionMatch = /at position (\d+)/i.exec(error.message);
    const position = positionMatch !== null ? positionMatch[1] : 'unknown';

    let lineInfo = '';
    if (positionMatch !== null) {
      const lines = content.substring(0, Number.parseInt(positionMatch[1], 10)).split('\n');
      const column = lines[lines.length - 1]?.length ?? 0;
      lineInfo = ` (line ${String(lines.length)}, column ${String(column)})`;
    }

    throw new ValidationError(
      `Invalid JSON in ${source}: ${error.message}${lineInfo}`,
      [{ field: 'content', message: `JSON parse error: ${error.message}`, value: position }],
      { filePath: source, parseError: error.message, position }
    );
  }
}

/**
 * fs errors may come from another realm (vm contexts, test sandboxes), so no instanceof
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * Remove a file, ignoring only "does not exist"
 */
export async function removeFileIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error;
    }
  }
}
