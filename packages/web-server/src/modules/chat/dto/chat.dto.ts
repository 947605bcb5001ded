import { IsString, IsNotEmpty, IsOptional, IsIn, IsInt, IsArray, ArrayNotEmpty, Min, Max, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';

const MAX_MESSAGE_PAGE = 100;
const ATTACHMENT_KINDS = ['image', 'file'] as const;

export class CreateRoomDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  public name!: string;

  @ApiProperty({ type: [String], description: 'Users to add besides the creator' })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  public participantIds!: string[];
}

export class RoomMessagesQueryDto {
  @ApiPropertyOptional({ description: 'Return messages older than this message ID' })
  @IsString()
  @IsOptional()
  public before?: string;

  @ApiPropertyOptional({ default: 50, maximum: MAX_MESSAGE_PAGE })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_MESSAGE_PAGE)
  @IsOptional()
  public limit?: number;
}

export class SendMessageDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public content!: string;

  @ApiPropertyOptional({ description: 'ID of the message being replied to' })
  @IsString()
  @IsOptional()
  public replyTo?: string;
}

export class EditMessageDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public content!: string;
}

export class AttachmentDto {
  @ApiPropertyOptional({ enum: ATTACHMENT_KINDS, default: 'file' })
  @IsIn(ATTACHMENT_KINDS)
  @IsOptional()
  public kind?: (typeof ATTACHMENT_KINDS)[number];

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public caption?: string;
}

export class ParticipantDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public userId!: string;
}

export class SearchMessagesQueryDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public q!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public roomId?: string;
}
