import { IsString, IsOptional, IsBoolean } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { ToBoolean } from './query-transforms.js';

/**
 * Text fields sent next to a multipart image
 */
export class ImageUploadDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public caption?: string;

  @ApiPropertyOptional({ description: 'Make this the primary image', default: false })
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public isPrimary?: boolean;
}
