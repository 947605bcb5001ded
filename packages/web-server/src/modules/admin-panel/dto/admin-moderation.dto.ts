import { IsString, IsNotEmpty, IsOptional, IsIn } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  QUEUE_PRIORITIES,
  QUEUE_STATUSES,
  REPORT_STATUSES,
  type QueuePriority,
  type QueueStatus,
  type ReportStatus,
} from '@contractor-connect/core';
import { PaginationQueryDto } from '../../../common/index.js';

const RESOLUTION_STATUSES = ['resolved', 'rejected'] as const;

export class ComplaintQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: REPORT_STATUSES })
  @IsIn(REPORT_STATUSES)
  @IsOptional()
  public status?: ReportStatus;
}

export class ResolveComplaintDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public resolution!: string;

  @ApiProperty({ enum: RESOLUTION_STATUSES })
  @IsIn(RESOLUTION_STATUSES)
  public status!: (typeof RESOLUTION_STATUSES)[number];
}

export class QueueQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: QUEUE_STATUSES })
  @IsIn(QUEUE_STATUSES)
  @IsOptional()
  public status?: QueueStatus;

  @ApiPropertyOptional({ enum: QUEUE_PRIORITIES })
  @IsIn(QUEUE_PRIORITIES)
  @IsOptional()
  public priority?: QueuePriority;
}

export class QueueDecisionDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public notes?: string;
}
