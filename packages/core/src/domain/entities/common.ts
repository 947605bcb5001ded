/**
 * Shared entity building blocks
 */

/**
 * ISO-8601 timestamp string
 */
export type Timestamp = string;

/**
 * Base entity interface - every stored record carries these fields
 */
export interface Entity {
  id: string;
  createdAt: Timestamp;
  updatedAt: Timestamp;
  version: number;
}

/**
 * Uploaded file as handed over by the transport layer
 */
export interface UploadInput {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

/**
 * Image attached to a portfolio item, project or review
 */
export interface AttachedImage {
  id: string;
  url: string;
  caption: string;
  isPrimary: boolean;
  order: number;
  uploadedAt: Timestamp;
}

export interface PageRequest {
  limit?: number;
  offset?: number;
}
