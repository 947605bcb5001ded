import { IsString, IsNotEmpty, IsOptional, IsIn, IsArray, IsBoolean, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import {
  ADMIN_ACTION_TYPES,
  MESSAGE_TEMPLATE_CATEGORIES,
  type AdminActionType,
  type MessageTemplateCategory,
} from '@contractor-connect/core';
import { PaginationQueryDto } from '../../../common/index.js';

/**
 * Either the text or a message template to render
 */
export class SystemMessageDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public content?: string;

  @ApiPropertyOptional({ description: 'Message template ID' })
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  public templateId?: string;
}

export class CreateMessageTemplateDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  public name!: string;

  @ApiProperty({ enum: MESSAGE_TEMPLATE_CATEGORIES })
  @IsIn(MESSAGE_TEMPLATE_CATEGORIES)
  public category!: MessageTemplateCategory;

  @ApiProperty({ description: 'Text with {{admin_name}}, {{chat_id}}, {{current_date}} or {{current_time}}' })
  @IsString()
  @IsNotEmpty()
  public content!: string;

  @ApiPropertyOptional({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  public availableVariables?: string[];

  @ApiPropertyOptional()
  @IsBoolean()
  @IsOptional()
  public isActive?: boolean;
}

export class UpdateMessageTemplateDto extends PartialType(CreateMessageTemplateDto) {}

export class UpsertSettingDto {
  @ApiProperty()
  @IsString()
  public value!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public description?: string;
}

export class AuditQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public adminId?: string;

  @ApiPropertyOptional({ enum: ADMIN_ACTION_TYPES })
  @IsIn(ADMIN_ACTION_TYPES)
  @IsOptional()
  public action?: AdminActionType;
}
