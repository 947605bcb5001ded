import { BadRequestException } from '@nestjs/common';
import type { UploadInput } from '@contractor-connect/core';

/** Shape of a multer file held in memory */
export interface MemoryFile {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

/**
 * Core upload input for a multipart file, 400 when the part is missing
 */
export function toUploadInput(file: MemoryFile | undefined, field: string): UploadInput {
  if (file === undefined) {
    throw new BadRequestException({ code: 'VALIDATION_ERROR', message: `${field} is required` });
  }
  return {
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    buffer: file.buffer,
  };
}

export function toOptionalUploadInput(file: MemoryFile | undefined): UploadInput | undefined {
  return file === undefined ? undefined : toUploadInput(file, 'file');
}
