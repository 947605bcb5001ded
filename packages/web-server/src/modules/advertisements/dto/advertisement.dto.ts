import { IsString, IsNotEmpty, IsOptional, IsIn, IsInt, IsBoolean, IsDateString, IsUrl, Matches, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  AD_AUDIENCES,
  AD_POSITIONS,
  AD_TYPES,
  type AdAudience,
  type AdPosition,
  type AdType,
} from '@contractor-connect/core';
import { ToBoolean } from '../../../common/index.js';

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export class ActiveAdsQueryDto {
  @ApiPropertyOptional({ enum: AD_POSITIONS })
  @IsIn(AD_POSITIONS)
  @IsOptional()
  public position?: AdPosition;
}

/**
 * Sent as multipart form fields when an image file accompanies it,
 * hence the conversions on the non-string fields.
 */
export class CreateAdvertisementDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public title!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public description?: string;

  @ApiPropertyOptional({ description: 'Used when no image file is uploaded' })
  @IsUrl({ require_tld: false })
  @IsOptional()
  public imageUrl?: string;

  @ApiPropertyOptional()
  @IsUrl({ require_tld: false })
  @IsOptional()
  public linkUrl?: string;

  @ApiPropertyOptional({ default: 'Learn More' })
  @IsString()
  @IsOptional()
  public buttonText?: string;

  @ApiPropertyOptional({ enum: AD_TYPES })
  @IsIn(AD_TYPES)
  @IsOptional()
  public adType?: AdType;

  @ApiProperty({ enum: AD_POSITIONS })
  @IsIn(AD_POSITIONS)
  public position!: AdPosition;

  @ApiPropertyOptional({ enum: AD_AUDIENCES })
  @IsIn(AD_AUDIENCES)
  @IsOptional()
  public targetAudience?: AdAudience;

  @ApiPropertyOptional({ example: '#ffffff' })
  @Matches(HEX_COLOR, { message: 'backgroundColor must be a hex color like #ffffff' })
  @IsOptional()
  public backgroundColor?: string;

  @ApiPropertyOptional({ example: '#000000' })
  @Matches(HEX_COLOR, { message: 'textColor must be a hex color like #ffffff' })
  @IsOptional()
  public textColor?: string;

  @ApiProperty()
  @IsDateString()
  public startDate!: string;

  @ApiProperty()
  @IsDateString()
  public endDate!: string;

  @ApiPropertyOptional({ default: 0 })
  @Type(() => Number)
  @IsInt()
  @IsOptional()
  public priority?: number;

  @ApiPropertyOptional({ default: true })
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public isActive?: boolean;
}

export class UpdateAdvertisementDto extends PartialType(CreateAdvertisementDto) {}
