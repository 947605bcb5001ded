import { IsString, IsOptional, IsIn, IsNumber, IsInt, IsArray, Min } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  AVAILABILITY_STATUSES,
  EXPERIENCE_LEVELS,
  type AvailabilityStatus,
  type ExperienceLevel,
} from '@contractor-connect/core';

export class UpdateContractorProfileDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public businessName?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public licenseNumber?: string;

  @ApiPropertyOptional({ enum: EXPERIENCE_LEVELS })
  @IsIn(EXPERIENCE_LEVELS)
  @IsOptional()
  public experienceLevel?: ExperienceLevel;

  @ApiPropertyOptional({ description: 'Must not exceed hourlyRateMax' })
  @IsNumber()
  @Min(0)
  @IsOptional()
  public hourlyRateMin?: number;

  @ApiPropertyOptional()
  @IsNumber()
  @Min(0)
  @IsOptional()
  public hourlyRateMax?: number;

  @ApiPropertyOptional({ enum: AVAILABILITY_STATUSES })
  @IsIn(AVAILABILITY_STATUSES)
  @IsOptional()
  public availabilityStatus?: AvailabilityStatus;

  @ApiPropertyOptional()
  @IsInt()
  @Min(0)
  @IsOptional()
  public responseTimeHours?: number;

  @ApiPropertyOptional({ description: 'Miles' })
  @IsInt()
  @Min(0)
  @IsOptional()
  public serviceRadius?: number;

  @ApiPropertyOptional({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  public categoryIds?: string[];

  @ApiPropertyOptional({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  public skillIds?: string[];
}
