import { Controller, Get, Post, Patch, Delete, Body, Param, Query, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth } from '@nestjs/swagger';
import type {
  Notification,
  NotificationPreferences,
  NotificationService,
  NotificationStats,
  Page,
  User,
} from '@contractor-connect/core';
import { NOTIFICATION_SERVICE } from '../core/core.module.js';
import { CurrentUser } from '../auth/index.js';
import { ListNotificationsQueryDto, NotificationIdsDto, UpdatePreferencesDto } from './dto/index.js';

/**
 * The caller's own notifications; every route is scoped to the authenticated user
 */
@ApiTags('notifications')
@ApiBearerAuth()
@Controller('notifications')
export class NotificationsController {
  constructor(@Inject(NOTIFICATION_SERVICE) private readonly notifications: NotificationService) {}

  @Get()
  @ApiOperation({ summary: 'List notifications, newest first' })
  public async list(@CurrentUser() user: User, @Query() query: ListNotificationsQueryDto): Promise<Page<Notification>> {
    return this.notifications.list(user.id, { ...query });
  }

  @Get('unread-count')
  public async unreadCount(@CurrentUser() user: User): Promise<{ count: number }> {
    return { count: await this.notifications.getUnreadCount(user.id) };
  }

  @Get('stats')
  public async stats(@CurrentUser() user: User): Promise<NotificationStats> {
    return this.notifications.stats(user.id);
  }

  @Post('mark-all-read')
  @HttpCode(HttpStatus.OK)
  public async markAllRead(@CurrentUser() user: User): Promise<{ updated: number }> {
    return { updated: await this.notifications.markAsRead(user.id) };
  }

  @Post('bulk-read')
  @HttpCode(HttpStatus.OK)
  public async bulkRead(@CurrentUser() user: User, @Body() dto: NotificationIdsDto): Promise<{ updated: number }> {
    return { updated: await this.notifications.markAsRead(user.id, dto.ids) };
  }

  @Post('bulk-delete')
  @HttpCode(HttpStatus.OK)
  public async bulkDelete(@CurrentUser() user: User, @Body() dto: NotificationIdsDto): Promise<{ deleted: number }> {
    return { deleted: await this.notifications.bulkDelete(user.id, dto.ids) };
  }

  // ==========================================================================
  // Preferences
  // ==========================================================================

  @Get('preferences')
  @ApiOperation({ summary: 'Delivery preferences, created with defaults on first read' })
  public async preferences(@CurrentUser() user: User): Promise<NotificationPreferences> {
    return this.notifications.getPreferences(user.id);
  }

  @Patch('preferences')
  public async updatePreferences(
    @CurrentUser() user: User,
    @Body() dto: UpdatePreferencesDto
  ): Promise<NotificationPreferences> {
    return this.notifications.updatePreferences(user.id, {
      email: dto.email === undefined ? undefined : { ...dto.email },
      push: dto.push === undefined ? undefined : { ...dto.push },
      inapp: dto.inapp === undefined ? undefined : { ...dto.inapp },
      emailMarketing: dto.emailMarketing,
    });
  }

  // ==========================================================================
  // Single notification
  // ==========================================================================

  @Get(':id')
  @ApiParam({ name: 'id', description: 'Notification ID' })
  @ApiResponse({ status: 404, description: 'Notification not found' })
  public async get(@CurrentUser() user: User, @Param('id') id: string): Promise<Notification> {
    return this.notifications.get(user.id, id);
  }

  @Post(':id/read')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Notification ID' })
  public async markRead(@CurrentUser() user: User, @Param('id') id: string): Promise<Notification> {
    return this.notifications.markOneRead(user.id, id);
  }

  @Post(':id/click')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Record that the user followed the notification; also marks it read' })
  @ApiParam({ name: 'id', description: 'Notification ID' })
  public async click(@CurrentUser() user: User, @Param('id') id: string): Promise<Notification> {
    return this.notifications.recordClick(user.id, id);
  }

  @Delete(':id')
  @ApiParam({ name: 'id', description: 'Notification ID' })
  public async delete(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.notifications.delete(user.id, id);
  }
}
