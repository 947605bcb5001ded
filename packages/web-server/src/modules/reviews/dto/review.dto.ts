import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsInt,
  IsBoolean,
  Min,
  Max,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { PaginationQueryDto, ToBoolean } from '../../../common/index.js';

const MIN_RATING = 1;
const MAX_RATING = 5;

export class ListReviewsQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ description: 'Contractor profile ID' })
  @IsString()
  @IsOptional()
  public contractor?: string;

  @ApiPropertyOptional({ minimum: MIN_RATING, maximum: MAX_RATING })
  @Type(() => Number)
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  @IsOptional()
  public rating?: number;

  @ApiPropertyOptional()
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public verified?: boolean;
}

class CategoryRatingsDto {
  @ApiPropertyOptional({ minimum: MIN_RATING, maximum: MAX_RATING })
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  @IsOptional()
  public qualityRating?: number;

  @ApiPropertyOptional({ minimum: MIN_RATING, maximum: MAX_RATING })
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  @IsOptional()
  public communicationRating?: number;

  @ApiPropertyOptional({ minimum: MIN_RATING, maximum: MAX_RATING })
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  @IsOptional()
  public timelinessRating?: number;

  @ApiPropertyOptional({ minimum: MIN_RATING, maximum: MAX_RATING })
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  @IsOptional()
  public professionalismRating?: number;
}

export class CreateReviewDto extends CategoryRatingsDto {
  @ApiProperty({ description: 'Contractor profile ID' })
  @IsString()
  @IsNotEmpty()
  public contractorId!: string;

  @ApiPropertyOptional({ description: 'Project the work was done for' })
  @IsString()
  @IsOptional()
  public projectId?: string;

  @ApiProperty({ minimum: MIN_RATING, maximum: MAX_RATING })
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  public rating!: number;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public title!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public comment!: string;
}

export class UpdateReviewDto extends CategoryRatingsDto {
  @ApiPropertyOptional({ minimum: MIN_RATING, maximum: MAX_RATING })
  @IsInt()
  @Min(MIN_RATING)
  @Max(MAX_RATING)
  @IsOptional()
  public rating?: number;

  @ApiPropertyOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  @IsOptional()
  public title?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  public comment?: string;

  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public isPublic?: boolean;
}

export class ReviewResponseDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public content!: string;
}

export class HelpfulVoteDto {
  @ApiProperty()
  @IsBoolean()
  public isHelpful!: boolean;
}
