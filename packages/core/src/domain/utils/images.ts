/**
 * Image lists with a single primary image
 */

import { v4 as uuidv4 } from 'uuid';
import type { AttachedImage } from '../entities/common.js';

export interface AttachImageOptions {
  caption?: string;
  isPrimary?: boolean;
}

/**
 * Append an image. The first image, or one flagged primary, becomes the only primary.
 */
export function attachImage(images: readonly AttachedImage[], url: string, options: AttachImageOptions = {}): AttachedImage[] {
  const makePrimary = images.length === 0 || options.isPrimary === true;
  const image: AttachedImage = {
    id: uuidv4(),
    url,
    caption: options.caption ?? '',
    isPrimary: makePrimary,
    order: images.reduce((max, item) => Math.max(max, item.order + 1), 0),
    uploadedAt: new Date().toISOString(),
  };
  const existing = makePrimary ? images.map((item) => ({ ...item, isPrimary: false })) : [...images];
  return [...existing, image];
}
