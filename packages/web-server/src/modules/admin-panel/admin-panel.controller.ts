import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  Inject,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth, ApiConsumes } from '@nestjs/swagger';
import {
  NotFoundError,
  type AdminActionLog,
  type AdminIdentity,
  type AdminLoginResult,
  type AdminService,
  type AdminUserView,
  type AdvertisementView,
  type ChatRoom,
  type ContentReport,
  type DashboardStats,
  type EmailCampaign,
  type EmailTemplate,
  type MessagePayload,
  type MessageTemplate,
  type MessageTemplateStats,
  type ModerationQueueItem,
  type Page,
  type PublicUser,
  type PushAnalytics,
  type PushNotification,
  type PushNotificationTemplate,
  type PushNotificationView,
  type SentEmail,
  type SystemSetting,
} from '@contractor-connect/core';
import { ADMIN_SERVICE } from '../core/core.module.js';
import { toOptionalUploadInput, type MemoryFile } from '../../common/index.js';
import { Public } from '../auth/index.js';
import { CreateAdvertisementDto, UpdateAdvertisementDto } from '../advertisements/index.js';
import { AdminPermissionGuard, CurrentAdmin, RequirePermission } from './admin-permission.guard.js';
import {
  AdminLoginDto,
  AdminLogoutDto,
  AdminUserQueryDto,
  BanUserDto,
  DeleteUserDto,
  ComplaintQueryDto,
  ResolveComplaintDto,
  QueueQueryDto,
  QueueDecisionDto,
  CreateEmailTemplateDto,
  UpdateEmailTemplateDto,
  SendTemplateDto,
  CreateCampaignDto,
  CreatePushNotificationDto,
  SchedulePushDto,
  CreatePushTemplateDto,
  PushFromTemplateDto,
  SystemMessageDto,
  CreateMessageTemplateDto,
  UpdateMessageTemplateDto,
  UpsertSettingDto,
  AuditQueryDto,
} from './dto/index.js';

/**
 * Staff back office. Every route but login needs an active admin role;
 * most also need a permission of that role.
 */
@ApiTags('admin-panel')
@ApiBearerAuth()
@UseGuards(AdminPermissionGuard)
@Controller('admin-panel')
export class AdminPanelController {
  constructor(@Inject(ADMIN_SERVICE) private readonly admin: AdminService) {}

  // ==========================================================================
  // Session
  // ==========================================================================

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Admin login; returns tokens with the role and its permissions' })
  @ApiResponse({ status: 400, description: 'Invalid credentials' })
  @ApiResponse({ status: 403, description: 'Access denied' })
  public async login(@Body() dto: AdminLoginDto): Promise<AdminLoginResult> {
    return this.admin.login(dto.email, dto.password);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  public async logout(@CurrentAdmin() admin: AdminIdentity, @Body() dto: AdminLogoutDto): Promise<{ message: string }> {
    await this.admin.logout(admin.user.id, dto.refresh);
    return { message: 'Logged out' };
  }

  @Get('dashboard')
  @RequirePermission('view_analytics')
  public async dashboard(): Promise<DashboardStats> {
    return this.admin.dashboard();
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  @Get('users')
  @RequirePermission('view_user')
  public async listUsers(@Query() query: AdminUserQueryDto): Promise<Page<PublicUser>> {
    return this.admin.listUsers({ ...query });
  }

  @Get('users/:id')
  @RequirePermission('view_user')
  @ApiParam({ name: 'id', description: 'User ID' })
  public async getUser(@Param('id') id: string): Promise<AdminUserView> {
    return this.admin.getUser(id);
  }

  @Post('users/:id/ban')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('ban_user')
  @ApiParam({ name: 'id', description: 'User ID' })
  @ApiResponse({ status: 400, description: 'Admins cannot ban themselves' })
  public async banUser(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: BanUserDto
  ): Promise<PublicUser> {
    return this.admin.banUser(admin.user.id, id, dto.reason);
  }

  @Post('users/:id/unban')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('unban_user')
  @ApiParam({ name: 'id', description: 'User ID' })
  public async unbanUser(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<PublicUser> {
    return this.admin.unbanUser(admin.user.id, id);
  }

  @Delete('users/:id')
  @RequirePermission('change_user')
  @ApiOperation({ summary: 'Deactivate the account and anonymise its e-mail' })
  @ApiParam({ name: 'id', description: 'User ID' })
  public async deleteUser(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: DeleteUserDto
  ): Promise<void> {
    await this.admin.deleteUser(admin.user.id, id, dto.reason);
  }

  // ==========================================================================
  // Complaints and moderation queue
  // ==========================================================================

  @Get('complaints')
  @RequirePermission('view_complaint')
  public async complaints(@Query() query: ComplaintQueryDto): Promise<Page<ContentReport>> {
    return this.admin.listComplaints({ ...query });
  }

  @Post('complaints/:id/resolve')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('resolve_complaint')
  @ApiParam({ name: 'id', description: 'Report ID' })
  public async resolveComplaint(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: ResolveComplaintDto
  ): Promise<ContentReport> {
    return this.admin.resolveComplaint(admin.user.id, id, dto.resolution, dto.status);
  }

  @Get('moderation')
  @RequirePermission('view_content')
  public async queue(@Query() query: QueueQueryDto): Promise<Page<ModerationQueueItem>> {
    return this.admin.listQueue({ ...query });
  }

  @Get('moderation/next')
  @RequirePermission('moderate_content')
  @ApiOperation({ summary: 'Highest priority pending item, or null' })
  public async nextQueueItem(@CurrentAdmin() admin: AdminIdentity): Promise<ModerationQueueItem | null> {
    return this.admin.nextQueueItem(admin.user.id);
  }

  @Post('moderation/:id/assign')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('moderate_content')
  @ApiParam({ name: 'id', description: 'Queue item ID' })
  public async assign(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<ModerationQueueItem> {
    return this.admin.assignQueueItem(admin.user.id, id);
  }

  @Post('moderation/:id/approve')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('approve_content')
  @ApiParam({ name: 'id', description: 'Queue item ID' })
  public async approve(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: QueueDecisionDto
  ): Promise<ModerationQueueItem> {
    return this.admin.decideQueueItem(admin.user.id, id, 'approved', dto.notes);
  }

  @Post('moderation/:id/reject')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('reject_content')
  @ApiParam({ name: 'id', description: 'Queue item ID' })
  public async reject(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: QueueDecisionDto
  ): Promise<ModerationQueueItem> {
    return this.admin.decideQueueItem(admin.user.id, id, 'rejected', dto.notes);
  }

  @Post('moderation/:id/needs-review')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('approve_content')
  @ApiParam({ name: 'id', description: 'Queue item ID' })
  public async needsReview(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: QueueDecisionDto
  ): Promise<ModerationQueueItem> {
    return this.admin.decideQueueItem(admin.user.id, id, 'needs_review', dto.notes);
  }

  // ==========================================================================
  // E-mail templates and campaigns
  // ==========================================================================

  @Get('email-templates')
  @RequirePermission('view_email_template')
  public async templates(): Promise<EmailTemplate[]> {
    return this.admin.listEmailTemplates();
  }

  @Post('email-templates')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('change_email_template')
  public async createTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Body() dto: CreateEmailTemplateDto
  ): Promise<EmailTemplate> {
    return this.admin.createEmailTemplate(admin.user.id, { ...dto });
  }

  @Get('email-templates/:id')
  @RequirePermission('view_email_template')
  @ApiParam({ name: 'id', description: 'Template ID' })
  public async template(@Param('id') id: string): Promise<EmailTemplate> {
    return this.admin.getEmailTemplate(id);
  }

  @Patch('email-templates/:id')
  @RequirePermission('change_email_template')
  @ApiParam({ name: 'id', description: 'Template ID' })
  public async updateTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: UpdateEmailTemplateDto
  ): Promise<EmailTemplate> {
    return this.admin.updateEmailTemplate(admin.user.id, id, { ...dto });
  }

  @Delete('email-templates/:id')
  @RequirePermission('change_email_template')
  @ApiParam({ name: 'id', description: 'Template ID' })
  @ApiResponse({ status: 409, description: 'Used by a campaign that has not been sent' })
  public async deleteTemplate(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<void> {
    await this.admin.deleteEmailTemplate(admin.user.id, id);
  }

  @Post('email-templates/:id/send')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('send_email')
  @ApiOperation({ summary: 'Render the template and send it to one address' })
  @ApiParam({ name: 'id', description: 'Template ID' })
  public async sendTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: SendTemplateDto
  ): Promise<SentEmail> {
    return this.admin.sendEmailTemplate(admin.user.id, id, dto.recipientEmail, dto.context);
  }

  @Get('campaigns')
  @RequirePermission('view_campaign')
  public async campaigns(): Promise<EmailCampaign[]> {
    return this.admin.listCampaigns();
  }

  @Post('campaigns')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('change_campaign')
  public async createCampaign(@CurrentAdmin() admin: AdminIdentity, @Body() dto: CreateCampaignDto): Promise<EmailCampaign> {
    return this.admin.createCampaign(admin.user.id, { ...dto });
  }

  @Get('campaigns/:id')
  @RequirePermission('view_campaign')
  @ApiParam({ name: 'id', description: 'Campaign ID' })
  public async campaign(@Param('id') id: string): Promise<EmailCampaign> {
    return this.admin.getCampaign(id);
  }

  @Post('campaigns/:id/send')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('send_email')
  @ApiParam({ name: 'id', description: 'Campaign ID' })
  public async sendCampaign(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<EmailCampaign> {
    return this.admin.sendCampaign(admin.user.id, id);
  }

  // ==========================================================================
  // Push notifications
  // ==========================================================================

  @Get('push-notifications')
  @RequirePermission('view_notification')
  public async pushNotifications(): Promise<PushNotificationView[]> {
    return this.admin.listPushNotifications();
  }

  @Post('push-notifications')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('send_notification')
  public async createPush(
    @CurrentAdmin() admin: AdminIdentity,
    @Body() dto: CreatePushNotificationDto
  ): Promise<PushNotification> {
    return this.admin.createPushNotification(admin.user.id, { ...dto });
  }

  @Get('push-notifications/analytics')
  @RequirePermission('view_notification')
  public async pushAnalytics(): Promise<PushAnalytics> {
    return this.admin.pushAnalytics();
  }

  @Get('push-notifications/:id')
  @RequirePermission('view_notification')
  @ApiParam({ name: 'id', description: 'Push notification ID' })
  public async pushNotification(@Param('id') id: string): Promise<PushNotification> {
    return this.admin.getPushNotification(id);
  }

  @Post('push-notifications/:id/send')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('send_notification')
  @ApiParam({ name: 'id', description: 'Push notification ID' })
  public async sendPush(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<PushNotification> {
    return this.admin.sendPushNotification(admin.user.id, id);
  }

  @Post('push-notifications/:id/schedule')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('send_notification')
  @ApiParam({ name: 'id', description: 'Push notification ID' })
  @ApiResponse({ status: 400, description: 'scheduledAt is not in the future' })
  public async schedulePush(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: SchedulePushDto
  ): Promise<PushNotification> {
    return this.admin.schedulePushNotification(admin.user.id, id, dto.scheduledAt);
  }

  // ==========================================================================
  // Push notification templates
  // ==========================================================================

  @Get('push-templates')
  @RequirePermission('view_notification')
  @ApiOperation({ summary: 'Active push templates by category and name' })
  public async pushTemplates(): Promise<PushNotificationTemplate[]> {
    return this.admin.listPushTemplates();
  }

  @Post('push-templates')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('send_notification')
  public async createPushTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Body() dto: CreatePushTemplateDto
  ): Promise<PushNotificationTemplate> {
    return this.admin.createPushTemplate(admin.user.id, { ...dto });
  }

  @Delete('push-templates/:id')
  @RequirePermission('send_notification')
  @ApiParam({ name: 'id', description: 'Push template ID' })
  public async deletePushTemplate(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<void> {
    await this.admin.deletePushTemplate(admin.user.id, id);
  }

  @Post('push-templates/:id/notifications')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('send_notification')
  @ApiOperation({ summary: 'Create a push notification from the template' })
  @ApiParam({ name: 'id', description: 'Push template ID' })
  public async pushFromTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: PushFromTemplateDto
  ): Promise<PushNotification> {
    return this.admin.createPushFromTemplate(admin.user.id, id, { ...dto });
  }

  // ==========================================================================
  // Chat message templates
  // ==========================================================================

  @Get('message-templates')
  @RequirePermission('view_chats')
  public async messageTemplates(): Promise<MessageTemplate[]> {
    return this.admin.listMessageTemplates(true);
  }

  @Get('message-templates/stats')
  @RequirePermission('view_chats')
  public async messageTemplateStats(): Promise<MessageTemplateStats> {
    return this.admin.messageTemplateStats();
  }

  @Post('message-templates')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('send_system_messages')
  public async createMessageTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Body() dto: CreateMessageTemplateDto
  ): Promise<MessageTemplate> {
    return this.admin.createMessageTemplate(admin.user.id, { ...dto });
  }

  @Get('message-templates/:id')
  @RequirePermission('view_chats')
  @ApiParam({ name: 'id', description: 'Message template ID' })
  public async messageTemplate(@Param('id') id: string): Promise<MessageTemplate> {
    return this.admin.getMessageTemplate(id);
  }

  @Patch('message-templates/:id')
  @RequirePermission('send_system_messages')
  @ApiParam({ name: 'id', description: 'Message template ID' })
  public async updateMessageTemplate(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: UpdateMessageTemplateDto
  ): Promise<MessageTemplate> {
    return this.admin.updateMessageTemplate(admin.user.id, id, { ...dto });
  }

  @Delete('message-templates/:id')
  @RequirePermission('send_system_messages')
  @ApiParam({ name: 'id', description: 'Message template ID' })
  public async deleteMessageTemplate(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<void> {
    await this.admin.deleteMessageTemplate(admin.user.id, id);
  }

  // ==========================================================================
  // Chats
  // ==========================================================================

  @Get('chats')
  @RequirePermission('view_chats')
  public async chats(): Promise<ChatRoom[]> {
    return this.admin.listChats();
  }

  @Post('chats/:id/block')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('moderate_chats')
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async blockChat(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<ChatRoom> {
    return this.admin.setChatBlocked(admin.user.id, id, true);
  }

  @Post('chats/:id/unblock')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('moderate_chats')
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async unblockChat(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<ChatRoom> {
    return this.admin.setChatBlocked(admin.user.id, id, false);
  }

  @Post('chats/:id/system-message')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('send_system_messages')
  @ApiParam({ name: 'id', description: 'Room ID' })
  public async systemMessage(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @Body() dto: SystemMessageDto
  ): Promise<MessagePayload> {
    if (dto.templateId !== undefined) {
      return this.admin.sendTemplatedSystemMessage(admin.user.id, id, dto.templateId);
    }
    return this.admin.sendSystemMessage(admin.user.id, id, dto.content ?? '');
  }

  // ==========================================================================
  // Advertisements
  // ==========================================================================

  @Get('advertisements')
  @RequirePermission('view_banner')
  public async advertisements(): Promise<AdvertisementView[]> {
    return this.admin.listAdvertisements();
  }

  @Post('advertisements')
  @HttpCode(HttpStatus.CREATED)
  @RequirePermission('change_banner')
  @UseInterceptors(FileInterceptor('image'))
  @ApiConsumes('multipart/form-data', 'application/json')
  @ApiOperation({ summary: 'Create an ad from an uploaded image or an imageUrl' })
  public async createAdvertisement(
    @CurrentAdmin() admin: AdminIdentity,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: CreateAdvertisementDto
  ): Promise<AdvertisementView> {
    return this.admin.createAdvertisement(admin.user.id, { ...dto }, toOptionalUploadInput(file));
  }

  @Patch('advertisements/:id')
  @RequirePermission('change_banner')
  @UseInterceptors(FileInterceptor('image'))
  @ApiConsumes('multipart/form-data', 'application/json')
  @ApiParam({ name: 'id', description: 'Advertisement ID' })
  public async updateAdvertisement(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('id') id: string,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: UpdateAdvertisementDto
  ): Promise<AdvertisementView> {
    return this.admin.updateAdvertisement(admin.user.id, id, { ...dto }, toOptionalUploadInput(file));
  }

  @Delete('advertisements/:id')
  @RequirePermission('change_banner')
  @ApiParam({ name: 'id', description: 'Advertisement ID' })
  public async deleteAdvertisement(@CurrentAdmin() admin: AdminIdentity, @Param('id') id: string): Promise<void> {
    await this.admin.deleteAdvertisement(admin.user.id, id);
  }

  // ==========================================================================
  // Settings and audit
  // ==========================================================================

  @Get('settings')
  @RequirePermission('view_settings')
  public async settings(): Promise<SystemSetting[]> {
    return this.admin.listSettings();
  }

  @Get('settings/:key')
  @RequirePermission('view_settings')
  @ApiParam({ name: 'key', description: 'Setting key' })
  public async setting(@Param('key') key: string): Promise<SystemSetting> {
    const setting = await this.admin.getSetting(key);
    if (setting === null) {
      throw new NotFoundError('SystemSetting', key, { message: 'Setting not found' });
    }
    return setting;
  }

  @Put('settings/:key')
  @RequirePermission('change_settings')
  @ApiParam({ name: 'key', description: 'Setting key' })
  public async upsertSetting(
    @CurrentAdmin() admin: AdminIdentity,
    @Param('key') key: string,
    @Body() dto: UpsertSettingDto
  ): Promise<SystemSetting> {
    return this.admin.upsertSetting(admin.user.id, key, dto.value, dto.description);
  }

  @Get('audit')
  @RequirePermission('view_audit')
  @ApiOperation({ summary: 'Admin action log, newest first' })
  public async audit(@Query() query: AuditQueryDto): Promise<Page<AdminActionLog>> {
    return this.admin.listAudit({ ...query });
  }
}
