import { IsString, IsOptional, IsArray, IsNumber, IsInt, Min, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdateProfileDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public firstName?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public lastName?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public phone?: string;

  @ApiPropertyOptional({ maxLength: 500 })
  @IsString()
  @MaxLength(500)
  @IsOptional()
  public bio?: string;

  @ApiPropertyOptional({ description: 'Free text or "lat,lng"' })
  @IsString()
  @IsOptional()
  public location?: string;

  @ApiPropertyOptional({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  public skills?: string[];

  @ApiPropertyOptional()
  @IsNumber()
  @Min(0)
  @IsOptional()
  public hourlyRate?: number;

  @ApiPropertyOptional()
  @IsInt()
  @Min(0)
  @IsOptional()
  public experienceYears?: number;
}
