import { IsString, IsNotEmpty, IsIn, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { REPORT_TYPES, type ReportType } from '@contractor-connect/core';

export class CreateReportDto {
  @ApiProperty({ example: 'project', description: 'Kind of content being reported' })
  @IsString()
  @IsNotEmpty()
  public contentType!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public objectId!: string;

  @ApiProperty({ enum: REPORT_TYPES })
  @IsIn(REPORT_TYPES)
  public reportType!: ReportType;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  public description!: string;
}

export class AnalyzeTextDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public text!: string;
}
