import { IsString, IsNotEmpty, IsOptional, IsDateString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';

export class CreateCertificationDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public name!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public issuingOrganization!: string;

  @ApiProperty({ example: '2023-01-15' })
  @IsDateString()
  public issueDate!: string;

  @ApiPropertyOptional({ example: '2026-01-15' })
  @IsDateString()
  @IsOptional()
  public expiryDate?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public certificateNumber?: string;
}

export class UpdateCertificationDto extends PartialType(CreateCertificationDto) {}
