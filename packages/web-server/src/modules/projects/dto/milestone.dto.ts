import { IsString, IsNotEmpty, IsOptional, IsIn, IsNumber, IsInt, IsDateString, Min, Max } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { MILESTONE_STATUSES, type MilestoneStatus } from '@contractor-connect/core';

export class CreateMilestoneDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public title!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public description?: string;

  @ApiProperty({ example: '2030-01-31' })
  @IsDateString()
  public dueDate!: string;

  @ApiPropertyOptional({ minimum: 0, maximum: 100 })
  @IsNumber()
  @Min(0)
  @Max(100)
  @IsOptional()
  public paymentPercentage?: number;

  @ApiPropertyOptional()
  @IsInt()
  @Min(0)
  @IsOptional()
  public order?: number;
}

export class UpdateMilestoneDto extends PartialType(CreateMilestoneDto) {
  @ApiPropertyOptional({ enum: MILESTONE_STATUSES })
  @IsIn(MILESTONE_STATUSES)
  @IsOptional()
  public status?: MilestoneStatus;
}
