import { IsString, IsNotEmpty, IsOptional, IsIn, IsBoolean } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { USER_TYPES, type UserType } from '@contractor-connect/core';
import { PaginationQueryDto, ToBoolean } from '../../../common/index.js';

export class AdminUserQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ description: 'Matches e-mail, username and names' })
  @IsString()
  @IsOptional()
  public q?: string;

  @ApiPropertyOptional({ enum: USER_TYPES })
  @IsIn(USER_TYPES)
  @IsOptional()
  public userType?: UserType;

  @ApiPropertyOptional()
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public isActive?: boolean;
}

export class BanUserDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public reason!: string;
}

export class DeleteUserDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public reason?: string;
}
