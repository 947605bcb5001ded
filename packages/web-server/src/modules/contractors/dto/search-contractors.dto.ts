import { IsString, IsOptional, IsIn, IsNumber, IsInt, IsArray, IsBoolean, Min, Max } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  AVAILABILITY_STATUSES,
  EXPERIENCE_LEVELS,
  type AvailabilityStatus,
  type ExperienceLevel,
} from '@contractor-connect/core';
import { PaginationQueryDto, ToBoolean, ToStringArray } from '../../../common/index.js';

export class SearchContractorsQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ description: 'Business name, contractor name, category or skill' })
  @IsString()
  @IsOptional()
  public query?: string;

  @ApiPropertyOptional({ description: 'Category IDs', type: [String] })
  @ToStringArray()
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  public categories?: string[];

  @ApiPropertyOptional({ description: 'Skill IDs', type: [String] })
  @ToStringArray()
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  public skills?: string[];

  @ApiPropertyOptional({ minimum: 0, maximum: 5 })
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(5)
  @IsOptional()
  public minRating?: number;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  public minHourlyRate?: number;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  public maxHourlyRate?: number;

  @ApiPropertyOptional({ enum: AVAILABILITY_STATUSES })
  @IsIn(AVAILABILITY_STATUSES)
  @IsOptional()
  public availability?: AvailabilityStatus;

  @ApiPropertyOptional({ enum: EXPERIENCE_LEVELS })
  @IsIn(EXPERIENCE_LEVELS)
  @IsOptional()
  public experienceLevel?: ExperienceLevel;

  @ApiPropertyOptional({ description: 'Insurance verified only' })
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public verified?: boolean;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  @IsOptional()
  public latitude?: number;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  @IsOptional()
  public longitude?: number;

  @ApiPropertyOptional({ description: 'Miles; defaults to each contractor\'s service radius' })
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  public radius?: number;
}

export class ListSkillsQueryDto {
  @ApiPropertyOptional({ description: 'Category ID' })
  @IsString()
  @IsOptional()
  public category?: string;
}

export class RecommendedQueryDto {
  @ApiPropertyOptional({ default: 10, maximum: 50 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  @IsOptional()
  public limit?: number;
}
