import { IsString, IsNotEmpty, IsOptional, IsNumber, IsDateString, Min, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';

export class CreatePortfolioItemDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public title!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public description?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public categoryId?: string;

  @ApiPropertyOptional({ example: '2024-05-01' })
  @IsDateString()
  @IsOptional()
  public projectDate?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public clientName?: string;

  @ApiPropertyOptional()
  @IsNumber()
  @Min(0)
  @IsOptional()
  public projectValue?: number;
}

export class UpdatePortfolioItemDto extends PartialType(CreatePortfolioItemDto) {}
