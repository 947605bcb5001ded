import { IsString, IsNotEmpty, IsNumber, IsInt, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class ApplyToProjectDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public coverLetter!: string;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  public proposedBudget!: number;

  @ApiProperty({ description: 'Days' })
  @IsInt()
  @Min(1)
  public proposedTimeline!: number;
}
