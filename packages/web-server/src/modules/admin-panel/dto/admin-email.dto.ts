import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsIn,
  IsBoolean,
  IsEmail,
  IsDateString,
  IsArray,
  MaxLength,
  ValidateBy,
  buildMessage,
  type ValidationOptions,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import {
  AUDIENCE_TYPES,
  EMAIL_TEMPLATE_TYPES,
  PUSH_TEMPLATE_CATEGORIES,
  type AudienceType,
  type EmailTemplateType,
  type PushTemplateCategory,
} from '@contractor-connect/core';

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === 'string')
  );
}

function IsStringRecord(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isStringRecord',
      validator: {
        validate: (value: unknown): boolean => isStringRecord(value),
        defaultMessage: buildMessage((eachPrefix) => `${eachPrefix}$property must be an object of strings`, validationOptions),
      },
    },
    validationOptions
  );
}

export class CreateEmailTemplateDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public name!: string;

  @ApiProperty({ enum: EMAIL_TEMPLATE_TYPES })
  @IsIn(EMAIL_TEMPLATE_TYPES)
  public templateType!: EmailTemplateType;

  @ApiProperty({ example: 'Welcome to {{site_name}}' })
  @IsString()
  @IsNotEmpty()
  public subject!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public htmlContent!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public textContent?: string;

  @ApiPropertyOptional({ default: true })
  @IsBoolean()
  @IsOptional()
  public isActive?: boolean;
}

export class UpdateEmailTemplateDto extends PartialType(CreateEmailTemplateDto) {}

export class SendTemplateDto {
  @ApiProperty()
  @IsEmail()
  public recipientEmail!: string;

  @ApiPropertyOptional({ description: 'Placeholder values, overriding the defaults' })
  @IsStringRecord()
  @IsOptional()
  public context?: Record<string, string>;
}

export class CreateCampaignDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public name!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public subject!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public templateId!: string;

  @ApiPropertyOptional({ enum: AUDIENCE_TYPES, default: 'all' })
  @IsIn(AUDIENCE_TYPES)
  @IsOptional()
  public targetAudience?: AudienceType;

  @ApiPropertyOptional()
  @IsDateString()
  @IsOptional()
  public scheduledAt?: string;
}

export class CreatePushNotificationDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public title!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public message!: string;

  @ApiPropertyOptional({ enum: AUDIENCE_TYPES, default: 'all' })
  @IsIn(AUDIENCE_TYPES)
  @IsOptional()
  public targetAudience?: AudienceType;
}

export class SchedulePushDto {
  @ApiProperty()
  @IsDateString()
  public scheduledAt!: string;
}

export class CreatePushTemplateDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  public name!: string;

  @ApiPropertyOptional({ enum: PUSH_TEMPLATE_CATEGORIES, default: 'general' })
  @IsIn(PUSH_TEMPLATE_CATEGORIES)
  @IsOptional()
  public category?: PushTemplateCategory;

  @ApiProperty({ description: 'Title with {{variable}} placeholders' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  public titleTemplate!: string;

  @ApiProperty({ description: 'Message with {{variable}} placeholders' })
  @IsString()
  @IsNotEmpty()
  public messageTemplate!: string;

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

export class PushFromTemplateDto {
  @ApiPropertyOptional({ description: 'Placeholder values' })
  @IsStringRecord()
  @IsOptional()
  public context?: Record<string, string>;

  @ApiPropertyOptional({ enum: AUDIENCE_TYPES, default: 'all' })
  @IsIn(AUDIENCE_TYPES)
  @IsOptional()
  public targetAudience?: AudienceType;

  @ApiPropertyOptional()
  @IsDateString()
  @IsOptional()
  public scheduledAt?: string;
}
