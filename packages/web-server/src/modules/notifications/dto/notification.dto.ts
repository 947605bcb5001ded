import { IsIn, IsOptional, IsBoolean, IsArray, IsString, ArrayNotEmpty, ValidateNested } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { NOTIFICATION_TYPES, type NotificationType } from '@contractor-connect/core';
import { PaginationQueryDto, ToBoolean } from '../../../common/index.js';

export class ListNotificationsQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ enum: NOTIFICATION_TYPES })
  @IsIn(NOTIFICATION_TYPES)
  @IsOptional()
  public type?: NotificationType;

  @ApiPropertyOptional()
  @ToBoolean()
  @IsBoolean()
  @IsOptional()
  public isRead?: boolean;
}

export class NotificationIdsDto {
  @ApiProperty({ type: [String] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  public ids!: string[];
}

export class ChannelPreferencesDto {
  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public projectUpdates?: boolean;

  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public newMessages?: boolean;

  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public applications?: boolean;

  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public reviews?: boolean;
}

export class UpdatePreferencesDto {
  @ApiPropertyOptional({ type: ChannelPreferencesDto })
  @ValidateNested()
  @Type(() => ChannelPreferencesDto)
  @IsOptional()
  public email?: ChannelPreferencesDto;

  @ApiPropertyOptional({ type: ChannelPreferencesDto })
  @ValidateNested()
  @Type(() => ChannelPreferencesDto)
  @IsOptional()
  public push?: ChannelPreferencesDto;

  @ApiPropertyOptional({ type: ChannelPreferencesDto })
  @ValidateNested()
  @Type(() => ChannelPreferencesDto)
  @IsOptional()
  public inapp?: ChannelPreferencesDto;

  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public emailMarketing?: boolean;
}
