/**
 * MediaStorage - uploaded files under the media root
 *
 * Files land at <root>/<directory>/<uuid><ext> and are served by the web
 * server under /media/<directory>/<file>.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { UploadInput } from '../../domain/entities/common.js';
import { StorageError, ValidationError } from '../../domain/repositories/errors.js';
import { removeFileIfExists } from '../repositories/file/file-utils.js';

export const MEDIA_URL_PREFIX = '/media/';

export const IMAGE_MIME_TYPES: readonly string[] = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

/** Chat attachments may be any type up to this size */
export const MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;

const EXTENSION_BY_MIME: Readonly<Record<string, string>> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'application/pdf': '.pdf',
};

export interface StoredMedia {
  /** Absolute path on disk */
  path: string;
  /** Public URL, e.g. /media/avatars/<file> */
  url: string;
  fileName: string;
}

/**
 * @throws ValidationError for non-image types or files over `maxBytes`
 */
export function validateImage(upload: Pick<UploadInput, 'mimeType' | 'size'>, maxBytes: number = MAX_IMAGE_BYTES): void {
  if (!IMAGE_MIME_TYPES.includes(upload.mimeType)) {
    throw new ValidationError('Invalid file type. Only JPEG, PNG, GIF, and WebP are allowed.', [
      { field: 'file', message: 'Unsupported content type', value: upload.mimeType },
    ]);
  }
  if (upload.size > maxBytes) {
    throw new ValidationError(`File too large. Maximum size is ${String(Math.round(maxBytes / (1024 * 1024)))}MB.`, [
      { field: 'file', message: 'File too large', value: upload.size },
    ]);
  }
}

export class MediaStorage {
  constructor(public readonly rootDir: string) {}

  public async save(directory: string, upload: UploadInput): Promise<StoredMedia> {
    const safeDirectory = this.normalizeDirectory(directory);
    const targetDir = path.join(this.rootDir, safeDirectory);
    const fileName = `${uuidv4()}${this.extensionFor(upload)}`;
    const filePath = path.join(targetDir, fileName);
    try {
      await fs.mkdir(targetDir, { recursive: true });
      await fs.writeFile(filePath, upload.buffer);
    } catch (error) {
      throw new StorageError(`Failed to store ${upload.originalName}`, 'media', error instanceof Error ? error : undefined, {
        directory: safeDirectory,
      });
    }

    return { path: filePath, url: `${MEDIA_URL_PREFIX}${safeDirectory}/${fileName}`, fileName };
  }

  /**
   * Remove the file behind a /media URL; unknown or missing files are ignored
   */
  public async delete(url: string | undefined): Promise<void> {
    const filePath = this.resolveUrl(url);
    if (filePath !== null) {
      await removeFileIfExists(filePath);
    }
  }

  /**
   * Absolute path for a /media URL, or null when it points outside the root
   */
  public resolveUrl(url: string | undefined): string | null {
    if (url === undefined || !url.startsWith(MEDIA_URL_PREFIX)) {
      return null;
    }
    const resolved = path.resolve(this.rootDir, url.slice(MEDIA_URL_PREFIX.length));
    const root = path.resolve(this.rootDir);
    return resolved.startsWith(root + path.sep) ? resolved : null;
  }

  private normalizeDirectory(directory: string): string {
    const normalized = directory.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
    if (normalized === '' || normalized.split('/').some((segment) => segment === '..' || segment === '.')) {
      throw new ValidationError(`Invalid media directory '${directory}'`, [{ field: 'directory', message: 'Invalid path' }]);
    }
    return normalized;
  }

  private extensionFor(upload: UploadInput): string {
    const fromName = path.extname(upload.originalName).toLowerCase();
    if (/^\.[a-z0-9]{1,8}$/.test(fromName)) {
      return fromName;
    }
    return EXTENSION_BY_MIME[upload.mimeType] ?? '';
  }
}
