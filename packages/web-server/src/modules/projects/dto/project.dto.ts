import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsIn,
  IsNumber,
  IsDateString,
  IsBoolean,
  Min,
  Max,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType, OmitType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  PROJECT_PRIORITIES,
  PROJECT_STATUSES,
  type ProjectPriority,
  type ProjectStatus,
} from '@contractor-connect/core';
import { PaginationQueryDto } from '../../../common/index.js';

const CREATE_STATUSES = ['draft', 'published'] as const;

export class SearchProjectsQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ description: 'Matches title and description' })
  @IsString()
  @IsOptional()
  public query?: string;

  @ApiPropertyOptional({ description: 'Category ID' })
  @IsString()
  @IsOptional()
  public category?: string;

  @ApiPropertyOptional({ enum: PROJECT_STATUSES, default: 'published' })
  @IsIn(PROJECT_STATUSES)
  @IsOptional()
  public status?: ProjectStatus;

  @ApiPropertyOptional({ enum: PROJECT_PRIORITIES })
  @IsIn(PROJECT_PRIORITIES)
  @IsOptional()
  public priority?: ProjectPriority;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  public minBudget?: number;

  @ApiPropertyOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  public maxBudget?: number;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public city?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public state?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public clientId?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public contractorId?: string;
}

export class CreateProjectDto {
  @ApiProperty({ example: 'Kitchen remodel' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public title!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public description!: string;

  @ApiProperty({ description: 'Category ID' })
  @IsString()
  @IsNotEmpty()
  public categoryId!: string;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  public budgetMin!: number;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  public budgetMax!: number;

  @ApiPropertyOptional({ enum: CREATE_STATUSES, default: 'published' })
  @IsIn(CREATE_STATUSES)
  @IsOptional()
  public status?: (typeof CREATE_STATUSES)[number];

  @ApiPropertyOptional({ enum: PROJECT_PRIORITIES, default: 'medium' })
  @IsIn(PROJECT_PRIORITIES)
  @IsOptional()
  public priority?: ProjectPriority;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public address?: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public city!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public state!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public postalCode?: string;

  @ApiPropertyOptional()
  @IsNumber()
  @Min(-90)
  @Max(90)
  @IsOptional()
  public latitude?: number;

  @ApiPropertyOptional()
  @IsNumber()
  @Min(-180)
  @Max(180)
  @IsOptional()
  public longitude?: number;

  @ApiPropertyOptional()
  @IsDateString()
  @IsOptional()
  public startDate?: string;

  @ApiPropertyOptional()
  @IsDateString()
  @IsOptional()
  public endDate?: string;

  @ApiPropertyOptional()
  @IsDateString()
  @IsOptional()
  public deadline?: string;
}

export class UpdateProjectDto extends PartialType(OmitType(CreateProjectDto, ['status'] as const)) {
  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public isFeatured?: boolean;
}

export class ChangeStatusDto {
  @ApiProperty({ enum: PROJECT_STATUSES })
  @IsIn(PROJECT_STATUSES)
  public status!: ProjectStatus;
}
