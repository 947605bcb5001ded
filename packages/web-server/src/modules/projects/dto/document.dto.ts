import { IsString, IsOptional, IsIn, IsBoolean } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { DOCUMENT_TYPES, type DocumentType } from '@contractor-connect/core';
import { ToBoolean } from '../../../common/index.js';

/**
 * Text fields sent next to a multipart document
 */
export class UploadDocumentDto {
  @ApiPropertyOptional({ description: 'Defaults to the file name' })
  @IsString()
  @IsOptional()
  public title?: string;

  @ApiPropertyOptional({ enum: DOCUMENT_TYPES, default: 'other' })
  @IsIn(DOCUMENT_TYPES)
  @IsOptional()
  public documentType?: DocumentType;

  @ApiPropertyOptional({ default: false })
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public isPrivate?: boolean;
}
