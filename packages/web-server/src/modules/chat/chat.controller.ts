import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  Inject,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth, ApiConsumes } from '@nestjs/swagger';
import type {
  ChatRoom,
  ChatService,
  ChatStats,
  MessagePayload,
  ParticipantStatus,
  RoomSummary,
  User,
} from '@contractor-connect/core';
import { CHAT_SERVICE } from '../core/core.module.js';
import { toUploadInput, type MemoryFile } from '../../common/index.js';
import { CurrentUser } from '../auth/index.js';
import {
  CreateRoomDto,
  RoomMessagesQueryDto,
  SendMessageDto,
  EditMessageDto,
  AttachmentDto,
  ParticipantDto,
  SearchMessagesQueryDto,
} from './dto/index.js';

@ApiTags('chat')
@ApiBearerAuth()
@Controller('chat')
export class ChatController {
  constructor(@Inject(CHAT_SERVICE) private readonly chat: ChatService) {}

  // ==========================================================================
  // Rooms
  // ==========================================================================

  @Get('rooms')
  @ApiOperation({ summary: 'Rooms the caller belongs to, most recently active first' })
  public async listRooms(@CurrentUser() user: User): Promise<RoomSummary[]> {
    return this.chat.listRooms(user.id);
  }

  @Post('rooms')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a group room owned by the caller' })
  public async createRoom(@CurrentUser() user: User, @Body() dto: CreateRoomDto): Promise<ChatRoom> {
    return this.chat.createRoom(user.id, { ...dto });
  }

  @Post('direct/:userId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Direct room with another user, created on first use' })
  @ApiParam({ name: 'userId', description: 'The other user' })
  @ApiResponse({ status: 400, description: 'Cannot message yourself' })
  public async direct(@CurrentUser() user: User, @Param('userId') otherUserId: string): Promise<ChatRoom> {
    return this.chat.getOrCreateDirectRoom(user.id, otherUserId);
  }

  @Get('rooms/:id')
  @ApiParam({ name: 'id', description: 'Room ID' })
  @ApiResponse({ status: 403, description: 'Not a participant' })
  public async getRoom(@CurrentUser() user: User, @Param('id') id: string): Promise<RoomSummary> {
    return this.chat.getRoom(id, user.id);
  }

  @Get('rooms/:id/messages')
  @ApiOperation({ summary: 'A page of messages in chronological order; marks them read' })
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async messages(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Query() query: RoomMessagesQueryDto
  ): Promise<MessagePayload[]> {
    return this.chat.getRoomMessages(id, user.id, { ...query });
  }

  @Post('rooms/:id/messages')
  @HttpCode(HttpStatus.CREATED)
  @ApiParam({ name: 'id', description: 'Room ID' })
  @ApiResponse({ status: 403, description: 'Not a participant, or the room is blocked' })
  public async send(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: SendMessageDto
  ): Promise<MessagePayload> {
    return this.chat.sendMessage(id, user.id, dto.content, 'text', dto.replyTo);
  }

  @Post('rooms/:id/attachments')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('file'))
  @ApiConsumes('multipart/form-data')
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async attach(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: AttachmentDto
  ): Promise<MessagePayload> {
    return this.chat.sendAttachment(id, user.id, toUploadInput(file, 'file'), dto.kind ?? 'file', dto.caption);
  }

  @Get('rooms/:id/participants')
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async participants(@CurrentUser() user: User, @Param('id') id: string): Promise<ParticipantStatus[]> {
    return this.chat.listParticipants(id, user.id);
  }

  @Post('rooms/:id/add-participant')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async addParticipant(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: ParticipantDto
  ): Promise<ChatRoom> {
    return this.chat.addParticipant(id, dto.userId, user.id);
  }

  @Post('rooms/:id/remove-participant')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async removeParticipant(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: ParticipantDto
  ): Promise<ChatRoom> {
    return this.chat.removeParticipant(id, dto.userId, user.id);
  }

  // ==========================================================================
  // Messages
  // ==========================================================================

  @Get('messages/:id')
  @ApiParam({ name: 'id', description: 'Message ID' })
  public async getMessage(@CurrentUser() user: User, @Param('id') id: string): Promise<MessagePayload> {
    return this.chat.getMessage(id, user.id);
  }

  @Patch('messages/:id')
  @ApiParam({ name: 'id', description: 'Message ID' })
  @ApiResponse({ status: 403, description: 'Only the sender can edit' })
  public async editMessage(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: EditMessageDto
  ): Promise<MessagePayload> {
    return this.chat.editMessage(id, user.id, dto.content);
  }

  @Delete('messages/:id')
  @ApiParam({ name: 'id', description: 'Message ID' })
  public async deleteMessage(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.chat.deleteMessage(id, user.id);
  }

  @Post('messages/:id/read')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Message ID' })
  public async markRead(@CurrentUser() user: User, @Param('id') id: string): Promise<{ read: true }> {
    await this.chat.markMessageRead(id, user.id);
    return { read: true };
  }

  // ==========================================================================
  // Search and stats
  // ==========================================================================

  @Get('search')
  public async search(@CurrentUser() user: User, @Query() query: SearchMessagesQueryDto): Promise<MessagePayload[]> {
    return this.chat.searchMessages(user.id, query.q, query.roomId);
  }

  @Get('stats')
  public async stats(@CurrentUser() user: User): Promise<ChatStats> {
    return this.chat.stats(user.id);
  }
}
