import { IsString, IsNotEmpty, IsOptional, IsNumber, IsBoolean, Min, Max } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';

export class CreateAddressDto {
  @ApiProperty({ example: 'Home' })
  @IsString()
  @IsNotEmpty()
  public title!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public streetAddress!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public city!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public state!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public postalCode!: string;

  @ApiPropertyOptional({ default: 'USA' })
  @IsString()
  @IsOptional()
  public country?: string;

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

  @ApiPropertyOptional({ default: false })
  @IsBoolean()
  @IsOptional()
  public isDefault?: boolean;
}

export class UpdateAddressDto extends PartialType(CreateAddressDto) {}
