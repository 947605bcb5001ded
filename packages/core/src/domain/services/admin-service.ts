/**
 * AdminService - staff back office: dashboard, user discipline, complaints,
 * e-mail templates and campaigns, push notifications, chat oversight,
 * advertisements, settings and the audit trail
 */

import type { AuthTokens, PublicUser, User, UserType } from '../entities/accounts.js';
import { deletedAccountEmail, toPublicUser } from '../entities/accounts.js';
import type {
  AdminActionLog,
  AdminActionType,
  AdminPermission,
  AdminRole,
  AdminRoleName,
  AudienceType,
  DeliveryRates,
  EmailCampaign,
  EmailTemplate,
  EmailTemplateType,
  MessageTemplate,
  MessageTemplateCategory,
  PushNotification,
  PushNotificationTemplate,
  PushTemplateCategory,
  SystemSetting,
} from '../entities/admin.js';
import {
  ADMIN_ROLE_NAMES,
  AUDIENCE_TYPES,
  EMAIL_TEMPLATE_TYPES,
  MESSAGE_TEMPLATE_CATEGORIES,
  PUSH_TEMPLATE_CATEGORIES,
  ROLE_PERMISSIONS,
  byCategoryAndName,
  deliveryRatesOf,
  hasPermission,
} from '../entities/admin.js';
import type { ChatRoom, MessagePayload } from '../entities/chat.js';
import type { ContentReport, ModerationQueueItem, ReportStatus } from '../entities/moderation.js';
import { PUSH_NOTIFICATION_OBJECT_TYPE } from '../entities/notifications.js';
import type { PageRequest, UploadInput } from '../entities/common.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { ConflictError, NotFoundError, PermissionDeniedError, ValidationError } from '../repositories/errors.js';
import { getRequestContext } from '../../context/request-context.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';
import { errorMessage } from '../../infrastructure/logging/domain-logger.js';
import { byNewest, daysAgo, isOnOrAfter, nowIso, roundTo, todayIso } from '../utils/dates.js';
import { paginate, type Page } from '../utils/pagination.js';
import { renderTemplate, type TemplateContext } from '../utils/template.js';
import type { AccountService } from './account-service.js';
import type { AdvertisementInput, AdvertisementService, AdvertisementUpdate, AdvertisementView } from './advertisement-service.js';
import type { ChatService } from './chat-service.js';
import type { ListQueueInput, ModerationService, QueueDecision } from './moderation-service.js';
import type { NotificationService } from './notification-service.js';
import type { PasswordHasher } from './password-hasher.js';
import type { SentEmail } from './email-service.js';
import type { TemplateMailer } from './template-mailer.js';
import type { TokenService } from './token-service.js';
import { validateEmail, validateEnum, validateRequiredString } from './validators.js';

const ACTIVE_AUDIENCE_DAYS = 30;

// ============================================================================
// Types
// ============================================================================

export interface AdminIdentity {
  user: User;
  role: AdminRoleName;
  permissions: readonly AdminPermission[] | '*';
}

export interface AdminLoginResult {
  user: PublicUser;
  tokens: AuthTokens;
  role: AdminRoleName;
  permissions: readonly AdminPermission[] | '*';
}

export interface DashboardStats {
  users: { total: number; active: number; newToday: number; newThisWeek: number; contractors: number; clients: number };
  projects: { total: number; published: number; inProgress: number; completed: number };
  reviews: { total: number; averageRating: number };
  moderation: { pendingQueue: number; pendingReports: number };
  email: { totalTemplates: number; activeTemplates: number; totalCampaigns: number; sentCampaigns: number };
}

export interface UserListInput extends PageRequest {
  q?: string;
  userType?: UserType;
  isActive?: boolean;
}

export interface AdminUserView extends PublicUser {
  adminRole: AdminRoleName | null;
}

export interface EmailTemplateInput {
  name: string;
  templateType: EmailTemplateType;
  subject: string;
  htmlContent: string;
  textContent?: string;
  isActive?: boolean;
}

export interface CampaignInput {
  name: string;
  subject: string;
  templateId: string;
  targetAudience?: AudienceType;
  scheduledAt?: string;
}

export interface PushNotificationInput {
  title: string;
  message: string;
  targetAudience?: AudienceType;
}

export interface PushTemplateInput {
  name: string;
  category?: PushTemplateCategory;
  titleTemplate: string;
  messageTemplate: string;
  availableVariables?: string[];
  isActive?: boolean;
}

export interface PushFromTemplateInput {
  context?: TemplateContext;
  targetAudience?: AudienceType;
  /** Schedules the notification instead of leaving it as a draft */
  scheduledAt?: string;
}

export interface MessageTemplateInput {
  name: string;
  category: MessageTemplateCategory;
  content: string;
  availableVariables?: string[];
  isActive?: boolean;
}

export interface MessageTemplateStats {
  totalTemplates: number;
  activeTemplates: number;
  mostUsed: MessageTemplate | null;
}

export interface PushAnalytics {
  totalNotifications: number;
  sentNotifications: number;
  scheduledNotifications: number;
  failedNotifications: number;
  avgDeliveryRate: number;
  avgOpenRate: number;
  avgClickRate: number;
}

export type PushNotificationView = PushNotification & DeliveryRates;

export interface AuditQuery extends PageRequest {
  adminId?: string;
  action?: AdminActionType;
}

export interface CreateAdminResult {
  user: User;
  userCreated: boolean;
  adminRole: AdminRole;
  roleCreated: boolean;
}

export interface AdminCheckReport {
  email: string;
  userExists: boolean;
  isActive?: boolean;
  isStaff?: boolean;
  role?: AdminRoleName;
  roleActive?: boolean;
  passwordMatches?: boolean;
  /** E-mails of the active admins, listed when the user is missing */
  activeAdmins: string[];
}

export interface AdminServiceOptions {
  accounts: AccountService;
  hasher: PasswordHasher;
  tokens: TokenService;
  mailer: TemplateMailer;
  notifications: NotificationService;
  moderation: ModerationService;
  chat: ChatService;
  advertisements: AdvertisementService;
  logger?: DomainLogger;
  clock?: () => Date;
}

// ============================================================================
// Service
// ============================================================================

export class AdminService {
  private readonly clock: () => Date;

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: AdminServiceOptions
  ) {
    this.clock = options.clock ?? ((): Date => new Date());
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  /**
   * @throws ValidationError for bad credentials, PermissionDeniedError without an active admin role
   */
  public async login(email: string, password: string): Promise<AdminLoginResult> {
    const user = await this.options.accounts.verifyCredentials(email, password);
    const identity = await this.authorize(user.id);
    const updated = await this.repositories.repository('users').update(user.id, { lastLoginAt: nowIso() });
    await this.log(user.id, 'login', 'user', user.id, `Admin ${user.email} logged in`);
    return {
      user: toPublicUser(updated),
      tokens: this.options.tokens.issueTokens(updated),
      role: identity.role,
      permissions: identity.permissions,
    };
  }

  public async logout(adminId: string, refreshToken?: string): Promise<void> {
    if (refreshToken !== undefined) {
      await this.options.accounts.logout(adminId, refreshToken);
    }
    await this.log(adminId, 'logout', 'user', adminId, 'Admin logged out');
  }

  /**
   * Resolve the caller's admin role, optionally requiring a permission
   * @throws PermissionDeniedError
   */
  public async authorize(userId: string, permission?: AdminPermission): Promise<AdminIdentity> {
    const [user, role] = await Promise.all([
      this.repositories.repository('users').findByIdOrNull(userId),
      this.findRole(userId),
    ]);
    if (user === null || !user.isActive || role === null || !role.isActive) {
      throw new PermissionDeniedError('Access denied');
    }
    if (permission !== undefined && !hasPermission(role.role, permission)) {
      throw new PermissionDeniedError('Permission denied', { permission });
    }
    return { user, role: role.role, permissions: ROLE_PERMISSIONS[role.role] };
  }

  public async findRole(userId: string): Promise<AdminRole | null> {
    return this.repositories.repository('admin-roles').findOne((role) => role.userId === userId);
  }

  // ==========================================================================
  // Dashboard
  // ==========================================================================

  public async dashboard(): Promise<DashboardStats> {
    const now = this.clock();
    const today = todayIso(now);
    const weekAgo = daysAgo(7, now);
    const [users, projects, reviews, queue, reports, templates, campaigns] = await Promise.all([
      this.repositories.repository('users').findAll(),
      this.repositories.repository('projects').findAll(),
      this.repositories.repository('reviews').findAll(),
      this.repositories.repository('moderation-queue').count((item) => item.status === 'pending'),
      this.repositories.repository('content-reports').count((report) => report.status === 'pending'),
      this.repositories.repository('email-templates').findAll(),
      this.repositories.repository('email-campaigns').findAll(),
    ]);
    return {
      users: {
        total: users.length,
        active: users.filter((u) => u.isActive).length,
        newToday: users.filter((u) => u.createdAt.slice(0, 10) === today).length,
        newThisWeek: users.filter((u) => isOnOrAfter(u.createdAt, weekAgo)).length,
        contractors: users.filter((u) => u.userType === 'contractor').length,
        clients: users.filter((u) => u.userType === 'client').length,
      },
      projects: {
        total: projects.length,
        published: projects.filter((p) => p.status === 'published').length,
        inProgress: projects.filter((p) => p.status === 'in_progress').length,
        completed: projects.filter((p) => p.status === 'completed').length,
      },
      reviews: {
        total: reviews.length,
        averageRating:
          reviews.length === 0 ? 0 : roundTo(reviews.reduce((sum, r) => sum + r.rating, 0) / reviews.length, 2),
      },
      moderation: { pendingQueue: queue, pendingReports: reports },
      email: {
        totalTemplates: templates.length,
        activeTemplates: templates.filter((t) => t.isActive).length,
        totalCampaigns: campaigns.length,
        sentCampaigns: campaigns.filter((c) => c.status === 'sent').length,
      },
    };
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  public async listUsers(input: UserListInput = {}): Promise<Page<PublicUser>> {
    const needle = input.q?.trim().toLowerCase() ?? '';
    const users = await this.repositories.repository('users').findMany(
      (user) =>
        (input.userType === undefined || user.userType === input.userType) &&
        (input.isActive === undefined || user.isActive === input.isActive) &&
        (needle === '' ||
          [user.email, user.username, user.firstName, user.lastName].some((value) => value.toLowerCase().includes(needle)))
    );
    const page = paginate(users.sort(byNewest), input);
    return { ...page, items: page.items.map(toPublicUser) };
  }

  public async getUser(userId: string): Promise<AdminUserView> {
    const user = await this.options.accounts.getUser(userId);
    const role = await this.findRole(userId);
    return { ...toPublicUser(user), adminRole: role !== null && role.isActive ? role.role : null };
  }

  public async banUser(adminId: string, userId: string, reason: string): Promise<PublicUser> {
    if (adminId === userId) {
      throw new ValidationError('You cannot ban yourself', [{ field: 'userId', message: 'Self-ban' }]);
    }
    const user = await this.options.accounts.getUser(userId);
    const updated = await this.repositories.repository('users').update(userId, { isActive: false, isOnline: false });
    await this.sendUserTemplate('user_banned', adminId, user, { reason });
    await this.log(adminId, 'ban', 'user', userId, `Banned ${user.email}`, { reason });
    return toPublicUser(updated);
  }

  public async unbanUser(adminId: string, userId: string): Promise<PublicUser> {
    const user = await this.options.accounts.getUser(userId);
    const updated = await this.repositories.repository('users').update(userId, { isActive: true });
    await this.sendUserTemplate('user_unbanned', adminId, user, {});
    await this.log(adminId, 'unban', 'user', userId, `Unbanned ${user.email}`);
    return toPublicUser(updated);
  }

  /**
   * Soft delete: the account is deactivated and its e-mail anonymised
   */
  public async deleteUser(adminId: string, userId: string, reason = ''): Promise<void> {
    if (adminId === userId) {
      throw new ValidationError('You cannot delete yourself', [{ field: 'userId', message: 'Self-delete' }]);
    }
    const user = await this.options.accounts.getUser(userId);
    await this.sendUserTemplate('user_deleted', adminId, user, { reason });
    await this.repositories.repository('users').update(userId, {
      isActive: false,
      isOnline: false,
      email: deletedAccountEmail(userId),
    });
    await this.log(adminId, 'delete', 'user', userId, `Deleted ${user.email}`, { reason });
  }

  // ==========================================================================
  // Complaints and moderation queue
  // ==========================================================================

  public async listComplaints(input: { status?: ReportStatus } & PageRequest = {}): Promise<Page<ContentReport>> {
    return this.options.moderation.listReports(input);
  }

  public async resolveComplaint(
    adminId: string,
    reportId: string,
    resolution: string,
    status: Extract<ReportStatus, 'resolved' | 'rejected'>
  ): Promise<ContentReport> {
    validateRequiredString(resolution, 'resolution');
    validateEnum(status, 'status', ['resolved', 'rejected'] as const);
    const report = await this.options.moderation.resolveReport(reportId, adminId, resolution, status);
    const reporter = await this.repositories.repository('users').findByIdOrNull(report.reporterId);
    if (reporter !== null) {
      await this.sendUserTemplate('complaint_resolved', adminId, reporter, { resolution, complaint_status: status });
    }
    await this.log(adminId, 'moderate', 'complaint', reportId, `Complaint ${status}`, { resolution });
    return report;
  }

  public async listQueue(input: ListQueueInput = {}): Promise<Page<ModerationQueueItem>> {
    return this.options.moderation.listQueue(input);
  }

  public async nextQueueItem(adminId: string): Promise<ModerationQueueItem | null> {
    return this.options.moderation.getNextQueueItem(adminId);
  }

  public async assignQueueItem(adminId: string, itemId: string): Promise<ModerationQueueItem> {
    const item = await this.options.moderation.assignQueueItem(itemId, adminId);
    await this.log(adminId, 'moderate', item.contentType, item.objectId, 'Took queue item for review', { itemId });
    return item;
  }

  public async decideQueueItem(
    adminId: string,
    itemId: string,
    decision: QueueDecision,
    notes?: string
  ): Promise<ModerationQueueItem> {
    const item = await this.options.moderation.completeQueueItem(itemId, adminId, decision, notes);
    const action: AdminActionType = decision === 'approved' ? 'approve' : decision === 'rejected' ? 'reject' : 'moderate';
    await this.log(adminId, action, item.contentType, item.objectId, `Queue item ${decision}`, { itemId, notes });
    return item;
  }

  // ==========================================================================
  // E-mail templates
  // ==========================================================================

  public async listEmailTemplates(): Promise<EmailTemplate[]> {
    const templates = await this.repositories.repository('email-templates').findAll();
    return templates.sort((a, b) => a.name.localeCompare(b.name));
  }

  public async getEmailTemplate(templateId: string): Promise<EmailTemplate> {
    const template = await this.repositories.repository('email-templates').findByIdOrNull(templateId);
    if (template === null) {
      throw new NotFoundError('EmailTemplate', templateId, { message: 'Email template not found' });
    }
    return template;
  }

  public async createEmailTemplate(adminId: string, input: EmailTemplateInput): Promise<EmailTemplate> {
    validateRequiredString(input.name, 'name');
    validateRequiredString(input.subject, 'subject');
    validateRequiredString(input.htmlContent, 'htmlContent');
    validateEnum(input.templateType, 'templateType', EMAIL_TEMPLATE_TYPES);
    const template = await this.repositories.repository('email-templates').create({
      name: input.name.trim(),
      templateType: input.templateType,
      subject: input.subject,
      htmlContent: input.htmlContent,
      textContent: input.textContent ?? '',
      isActive: input.isActive ?? true,
    });
    await this.log(adminId, 'create', 'email_template', template.id, `Created template ${template.name}`);
    return template;
  }

  public async updateEmailTemplate(adminId: string, templateId: string, input: Partial<EmailTemplateInput>): Promise<EmailTemplate> {
    await this.getEmailTemplate(templateId);
    if (input.templateType !== undefined) {
      validateEnum(input.templateType, 'templateType', EMAIL_TEMPLATE_TYPES);
    }
    const template = await this.repositories.repository('email-templates').update(templateId, input);
    await this.log(adminId, 'update', 'email_template', templateId, `Updated template ${template.name}`);
    return template;
  }

  public async deleteEmailTemplate(adminId: string, templateId: string): Promise<void> {
    const template = await this.getEmailTemplate(templateId);
    const inUse = await this.repositories
      .repository('email-campaigns')
      .count((campaign) => campaign.templateId === templateId && campaign.status !== 'sent' && campaign.status !== 'failed');
    if (inUse > 0) {
      throw new ConflictError('Template is used by a pending campaign', 'constraint', { templateId });
    }
    await this.repositories.repository('email-templates').delete(templateId);
    await this.log(adminId, 'delete', 'email_template', templateId, `Deleted template ${template.name}`);
  }

  /**
   * Render a template for one recipient. A registered recipient also gets the user_* placeholders.
   */
  public async sendEmailTemplate(
    adminId: string,
    templateId: string,
    recipientEmail: string,
    context: Record<string, string> = {}
  ): Promise<SentEmail> {
    validateEmail(recipientEmail, 'recipientEmail');
    const template = await this.getEmailTemplate(templateId);
    const [admin, recipient] = await Promise.all([
      this.options.accounts.getUser(adminId),
      this.options.accounts.findByEmail(recipientEmail),
    ]);
    const sent = await this.options.mailer.sendTemplate(template, {
      recipientEmail,
      context,
      admin,
      user: recipient ?? undefined,
    });
    await this.log(adminId, 'email_send', 'email_template', templateId, `Sent ${template.name} to ${recipientEmail}`);
    return sent;
  }

  // ==========================================================================
  // Campaigns
  // ==========================================================================

  public async listCampaigns(): Promise<EmailCampaign[]> {
    const campaigns = await this.repositories.repository('email-campaigns').findAll();
    return campaigns.sort(byNewest);
  }

  public async getCampaign(campaignId: string): Promise<EmailCampaign> {
    const campaign = await this.repositories.repository('email-campaigns').findByIdOrNull(campaignId);
    if (campaign === null) {
      throw new NotFoundError('EmailCampaign', campaignId, { message: 'Campaign not found' });
    }
    return campaign;
  }

  public async createCampaign(adminId: string, input: CampaignInput): Promise<EmailCampaign> {
    validateRequiredString(input.name, 'name');
    validateRequiredString(input.subject, 'subject');
    const audience = input.targetAudience ?? 'all';
    validateEnum(audience, 'targetAudience', AUDIENCE_TYPES);
    await this.getEmailTemplate(input.templateId);
    const campaign = await this.repositories.repository('email-campaigns').create({
      name: input.name.trim(),
      subject: input.subject,
      templateId: input.templateId,
      targetAudience: audience,
      status: input.scheduledAt !== undefined ? 'scheduled' : 'draft',
      scheduledAt: input.scheduledAt,
      totalRecipients: 0,
      deliveredCount: 0,
      createdById: adminId,
    });
    await this.log(adminId, 'create', 'email_campaign', campaign.id, `Created campaign ${campaign.name}`);
    return campaign;
  }

  /**
   * Mail every recipient of the audience. Individual failures only lower the delivered count.
   */
  public async sendCampaign(adminId: string, campaignId: string): Promise<EmailCampaign> {
    const campaigns = this.repositories.repository('email-campaigns');
    // Claiming the campaign is atomic; the mails go out after the lock is released
    const campaign = await campaigns.withLock(`send-${campaignId}`, async () => {
      const current = await this.getCampaign(campaignId);
      if (current.status === 'sending' || current.status === 'sent') {
        throw new ConflictError('Campaign has already been sent', 'state', { campaignId });
      }
      return campaigns.update(campaignId, { status: 'sending', sentAt: nowIso() });
    });

    let result: EmailCampaign;
    try {
      const [template, creator, recipients] = await Promise.all([
        this.getEmailTemplate(campaign.templateId),
        this.repositories.repository('users').findByIdOrNull(campaign.createdById),
        this.recipientsFor(campaign.targetAudience),
      ]);
      await campaigns.update(campaignId, { totalRecipients: recipients.length });
      let delivered = 0;
      for (const recipient of recipients) {
        try {
          await this.options.mailer.sendTemplate(
            { ...template, subject: campaign.subject },
            { recipientEmail: recipient.email, user: recipient, admin: creator ?? undefined }
          );
          delivered++;
        } catch (error) {
          this.options.logger?.warn?.(`Campaign mail to ${recipient.email} failed: ${errorMessage(error)}`, { campaignId });
        }
      }
      result = await campaigns.update(campaignId, { status: 'sent', deliveredCount: delivered });
    } catch (error) {
      await campaigns.update(campaignId, { status: 'failed' });
      throw error;
    }
    this.options.logger?.info?.(
      `Campaign ${campaign.name} sent: ${String(result.deliveredCount)}/${String(result.totalRecipients)}`
    );
    await this.log(adminId, 'email_send', 'email_campaign', campaignId, `Sent campaign ${campaign.name}`, {
      delivered: result.deliveredCount,
      total: result.totalRecipients,
    });
    return result;
  }

  // ==========================================================================
  // Push notifications (delivered in-app)
  // ==========================================================================

  public async listPushNotifications(): Promise<PushNotificationView[]> {
    const notifications = await this.repositories.repository('push-notifications').findAll();
    return notifications.sort(byNewest).map((n) => ({ ...n, ...deliveryRatesOf(n) }));
  }

  public async getPushNotification(notificationId: string): Promise<PushNotification> {
    const notification = await this.repositories.repository('push-notifications').findByIdOrNull(notificationId);
    if (notification === null) {
      throw new NotFoundError('PushNotification', notificationId, { message: 'Push notification not found' });
    }
    return notification;
  }

  public async createPushNotification(adminId: string, input: PushNotificationInput): Promise<PushNotification> {
    validateRequiredString(input.title, 'title');
    validateRequiredString(input.message, 'message');
    const audience = input.targetAudience ?? 'all';
    validateEnum(audience, 'targetAudience', AUDIENCE_TYPES);
    const notification = await this.repositories.repository('push-notifications').create({
      title: input.title.trim(),
      message: input.message,
      targetAudience: audience,
      status: 'draft',
      totalRecipients: 0,
      deliveredCount: 0,
      openedCount: 0,
      clickedCount: 0,
      createdById: adminId,
    });
    await this.log(adminId, 'create', 'push_notification', notification.id, `Created push notification ${notification.title}`);
    return notification;
  }

  public async sendPushNotification(adminId: string | undefined, notificationId: string): Promise<PushNotification> {
    const pushes = this.repositories.repository('push-notifications');
    const notification = await pushes.withLock(`send-${notificationId}`, async () => {
      const current = await this.getPushNotification(notificationId);
      if (current.status === 'sending' || current.status === 'sent') {
        throw new ConflictError('Notification has already been sent', 'state', { notificationId });
      }
      return pushes.update(notificationId, { status: 'sending', sentAt: nowIso() });
    });

    let result: PushNotification;
    try {
      const recipients = await this.recipientsFor(notification.targetAudience);
      await pushes.update(notificationId, { totalRecipients: recipients.length });
      const delivered = await this.options.notifications.bulkCreate(
        recipients.map((u) => u.id),
        {
          type: 'system',
          title: notification.title,
          message: notification.message,
          relatedObjectType: PUSH_NOTIFICATION_OBJECT_TYPE,
          relatedObjectId: notificationId,
        }
      );
      result = await pushes.update(notificationId, { status: 'sent', deliveredCount: delivered });
    } catch (error) {
      await pushes.update(notificationId, { status: 'failed' });
      throw error;
    }
    if (adminId !== undefined) {
      await this.log(adminId, 'create', 'push_notification', notificationId, `Sent push notification ${notification.title}`, {
        delivered: result.deliveredCount,
      });
    }
    return result;
  }

  public async schedulePushNotification(adminId: string, notificationId: string, scheduledAt: string): Promise<PushNotification> {
    const notification = await this.getPushNotification(notificationId);
    const time = Date.parse(scheduledAt);
    if (Number.isNaN(time) || time <= this.clock().getTime()) {
      throw new ValidationError('Scheduled time must be in the future', [
        { field: 'scheduledAt', message: 'Must be in the future', value: scheduledAt },
      ]);
    }
    if (notification.status !== 'draft' && notification.status !== 'scheduled') {
      throw new ConflictError('Only draft notifications can be scheduled', 'state', { notificationId });
    }
    const updated = await this.repositories
      .repository('push-notifications')
      .update(notificationId, { status: 'scheduled', scheduledAt: new Date(time).toISOString() });
    await this.log(adminId, 'update', 'push_notification', notificationId, `Scheduled for ${updated.scheduledAt ?? scheduledAt}`);
    return updated;
  }

  /**
   * Send the scheduled notifications that are due
   * @returns number sent
   */
  public async processScheduledPushNotifications(now: Date = this.clock()): Promise<number> {
    const due = await this.repositories
      .repository('push-notifications')
      .findMany((n) => n.status === 'scheduled' && n.scheduledAt !== undefined && Date.parse(n.scheduledAt) <= now.getTime());
    let sent = 0;
    for (const notification of due) {
      try {
        await this.sendPushNotification(undefined, notification.id);
        sent++;
      } catch (error) {
        this.options.logger?.error?.(`Scheduled push ${notification.id} failed: ${errorMessage(error)}`);
      }
    }
    if (due.length > 0) {
      this.options.logger?.info?.(`Processed scheduled push notifications: ${String(sent)}`);
    }
    return sent;
  }

  public async pushAnalytics(): Promise<PushAnalytics> {
    const notifications = await this.repositories.repository('push-notifications').findAll();
    const sent = notifications.filter((n) => n.status === 'sent' && n.totalRecipients > 0);
    const totals = sent.reduce(
      (acc, n) => ({
        totalRecipients: acc.totalRecipients + n.totalRecipients,
        deliveredCount: acc.deliveredCount + n.deliveredCount,
        openedCount: acc.openedCount + n.openedCount,
        clickedCount: acc.clickedCount + n.clickedCount,
      }),
      { totalRecipients: 0, deliveredCount: 0, openedCount: 0, clickedCount: 0 }
    );
    const rates = deliveryRatesOf(totals);
    return {
      totalNotifications: notifications.length,
      sentNotifications: notifications.filter((n) => n.status === 'sent').length,
      scheduledNotifications: notifications.filter((n) => n.status === 'scheduled').length,
      failedNotifications: notifications.filter((n) => n.status === 'failed').length,
      avgDeliveryRate: roundTo(rates.deliveryRate, 2),
      avgOpenRate: roundTo(rates.openRate, 2),
      avgClickRate: roundTo(rates.clickRate, 2),
    };
  }

  // ==========================================================================
  // Push notification templates
  // ==========================================================================

  public async listPushTemplates(includeInactive = false): Promise<PushNotificationTemplate[]> {
    const templates = await this.repositories
      .repository('push-templates')
      .findMany((t) => includeInactive || t.isActive);
    return templates.sort(byCategoryAndName);
  }

  public async getPushTemplate(templateId: string): Promise<PushNotificationTemplate> {
    const template = await this.repositories.repository('push-templates').findByIdOrNull(templateId);
    if (template === null) {
      throw new NotFoundError('PushNotificationTemplate', templateId, { message: 'Push template not found' });
    }
    return template;
  }

  public async createPushTemplate(adminId: string, input: PushTemplateInput): Promise<PushNotificationTemplate> {
    validateRequiredString(input.name, 'name');
    validateRequiredString(input.titleTemplate, 'titleTemplate');
    validateRequiredString(input.messageTemplate, 'messageTemplate');
    const category = input.category ?? 'general';
    validateEnum(category, 'category', PUSH_TEMPLATE_CATEGORIES);
    const template = await this.repositories.repository('push-templates').create({
      name: input.name.trim(),
      category,
      titleTemplate: input.titleTemplate,
      messageTemplate: input.messageTemplate,
      availableVariables: input.availableVariables ?? [],
      isActive: input.isActive ?? true,
      createdById: adminId,
      usageCount: 0,
    });
    await this.log(adminId, 'create', 'push_template', template.id, `Created push template ${template.name}`);
    return template;
  }

  public async deletePushTemplate(adminId: string, templateId: string): Promise<void> {
    const template = await this.getPushTemplate(templateId);
    await this.repositories.repository('push-templates').delete(templateId);
    await this.log(adminId, 'delete', 'push_template', templateId, `Deleted push template ${template.name}`);
  }

  /**
   * Render the template into a new push notification; a `scheduledAt`
   * schedules it right away
   */
  public async createPushFromTemplate(
    adminId: string,
    templateId: string,
    input: PushFromTemplateInput = {}
  ): Promise<PushNotification> {
    const template = await this.getPushTemplate(templateId);
    if (!template.isActive) {
      throw new ValidationError('Push template is inactive', [{ field: 'templateId', message: 'Inactive template' }]);
    }
    const context = input.context ?? {};
    const created = await this.createPushNotification(adminId, {
      title: renderTemplate(template.titleTemplate, context),
      message: renderTemplate(template.messageTemplate, context),
      targetAudience: input.targetAudience,
    });
    await this.bumpUsage('push-templates', templateId);
    if (input.scheduledAt === undefined) {
      return created;
    }
    return this.schedulePushNotification(adminId, created.id, input.scheduledAt);
  }

  // ==========================================================================
  // Chat message templates
  // ==========================================================================

  public async listMessageTemplates(includeInactive = false): Promise<MessageTemplate[]> {
    const templates = await this.repositories
      .repository('message-templates')
      .findMany((t) => includeInactive || t.isActive);
    return templates.sort(byCategoryAndName);
  }

  public async getMessageTemplate(templateId: string): Promise<MessageTemplate> {
    const template = await this.repositories.repository('message-templates').findByIdOrNull(templateId);
    if (template === null) {
      throw new NotFoundError('MessageTemplate', templateId, { message: 'Message template not found' });
    }
    return template;
  }

  public async createMessageTemplate(adminId: string, input: MessageTemplateInput): Promise<MessageTemplate> {
    validateRequiredString(input.name, 'name');
    validateRequiredString(input.content, 'content');
    validateEnum(input.category, 'category', MESSAGE_TEMPLATE_CATEGORIES);
    const template = await this.repositories.repository('message-templates').create({
      name: input.name.trim(),
      category: input.category,
      content: input.content,
      availableVariables: input.availableVariables ?? [],
      isActive: input.isActive ?? true,
      createdById: adminId,
      usageCount: 0,
    });
    await this.log(adminId, 'create', 'message_template', template.id, `Created message template ${template.name}`);
    return template;
  }

  public async updateMessageTemplate(
    adminId: string,
    templateId: string,
    input: Partial<MessageTemplateInput>
  ): Promise<MessageTemplate> {
    await this.getMessageTemplate(templateId);
    if (input.category !== undefined) {
      validateEnum(input.category, 'category', MESSAGE_TEMPLATE_CATEGORIES);
    }
    if (input.content !== undefined) {
      validateRequiredString(input.content, 'content');
    }
    const updated = await this.repositories.repository('message-templates').update(templateId, {
      name: input.name?.trim(),
      category: input.category,
      content: input.content,
      availableVariables: input.availableVariables,
      isActive: input.isActive,
    });
    await this.log(adminId, 'update', 'message_template', templateId, `Updated message template ${updated.name}`);
    return updated;
  }

  public async deleteMessageTemplate(adminId: string, templateId: string): Promise<void> {
    const template = await this.getMessageTemplate(templateId);
    await this.repositories.repository('message-templates').delete(templateId);
    await this.log(adminId, 'delete', 'message_template', templateId, `Deleted message template ${template.name}`);
  }

  public async messageTemplateStats(): Promise<MessageTemplateStats> {
    const templates = await this.repositories.repository('message-templates').findAll();
    const mostUsed = templates.reduce<MessageTemplate | null>(
      (best, t) => (best === null || t.usageCount > best.usageCount ? t : best),
      null
    );
    return {
      totalTemplates: templates.length,
      activeTemplates: templates.filter((t) => t.isActive).length,
      mostUsed,
    };
  }

  private async bumpUsage(collection: 'push-templates' | 'message-templates', templateId: string): Promise<void> {
    const templates = this.repositories.repository(collection);
    await templates.withLock(`usage-${templateId}`, async () => {
      const current = await templates.findById(templateId);
      await templates.update(templateId, { usageCount: current.usageCount + 1 });
    });
  }

  // ==========================================================================
  // Chats
  // ==========================================================================

  public async listChats(): Promise<ChatRoom[]> {
    return this.options.chat.listAllRooms();
  }

  public async setChatBlocked(adminId: string, roomId: string, blocked: boolean): Promise<ChatRoom> {
    const room = await this.options.chat.setRoomActive(roomId, !blocked);
    await this.log(adminId, 'moderate', 'chat_room', roomId, `${blocked ? 'Blocked' : 'Unblocked'} chat ${room.name}`);
    return room;
  }

  public async sendSystemMessage(adminId: string, roomId: string, content: string): Promise<MessagePayload> {
    validateRequiredString(content, 'content');
    const message = await this.options.chat.sendSystemMessage(roomId, content);
    await this.log(adminId, 'moderate', 'chat_room', roomId, 'Sent system message', { messageId: message.id });
    return message;
  }

  /**
   * System message from a message template, rendered with the admin's name,
   * the chat id and the current date and time
   */
  public async sendTemplatedSystemMessage(adminId: string, roomId: string, templateId: string): Promise<MessagePayload> {
    const template = await this.getMessageTemplate(templateId);
    if (!template.isActive) {
      throw new ValidationError('Message template is inactive', [{ field: 'templateId', message: 'Inactive template' }]);
    }
    const admin = await this.repositories.repository('users').findByIdOrNull(adminId);
    const context = this.options.mailer.buildContext({ admin: admin ?? undefined, context: { chat_id: roomId } });
    const message = await this.options.chat.sendSystemMessage(roomId, renderTemplate(template.content, context));
    await this.bumpUsage('message-templates', templateId);
    await this.log(adminId, 'moderate', 'chat_room', roomId, `Sent system message from template ${template.name}`, {
      messageId: message.id,
      templateId,
    });
    return message;
  }

  // ==========================================================================
  // Advertisements
  // ==========================================================================

  public async listAdvertisements(): Promise<AdvertisementView[]> {
    return this.options.advertisements.listAll();
  }

  public async createAdvertisement(adminId: string, input: AdvertisementInput, image?: UploadInput): Promise<AdvertisementView> {
    const ad = await this.options.advertisements.create(adminId, input, image);
    await this.log(adminId, 'create', 'advertisement', ad.id, `Created advertisement ${ad.title}`);
    return ad;
  }

  public async updateAdvertisement(
    adminId: string,
    adId: string,
    input: AdvertisementUpdate,
    image?: UploadInput
  ): Promise<AdvertisementView> {
    const ad = await this.options.advertisements.update(adId, input, image);
    await this.log(adminId, 'update', 'advertisement', adId, `Updated advertisement ${ad.title}`);
    return ad;
  }

  public async deleteAdvertisement(adminId: string, adId: string): Promise<void> {
    await this.options.advertisements.delete(adId);
    await this.log(adminId, 'delete', 'advertisement', adId, 'Deleted advertisement');
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  public async listSettings(): Promise<SystemSetting[]> {
    const settings = await this.repositories.repository('system-settings').findAll();
    return settings.sort((a, b) => a.key.localeCompare(b.key));
  }

  public async getSetting(key: string): Promise<SystemSetting | null> {
    return this.repositories.repository('system-settings').findOne((setting) => setting.key === key);
  }

  public async upsertSetting(adminId: string, key: string, value: string, description?: string): Promise<SystemSetting> {
    validateRequiredString(key, 'key');
    const settings = this.repositories.repository('system-settings');
    const setting = await settings.withLock(`key-${key}`, async () => {
      const existing = await this.getSetting(key);
      if (existing !== null) {
        return settings.update(existing.id, { value, description, updatedById: adminId });
      }
      return settings.create({ key, value, description: description ?? '', updatedById: adminId });
    });
    await this.log(adminId, 'settings_change', 'system_setting', setting.id, `Set ${key}`, { value });
    return setting;
  }

  // ==========================================================================
  // Audit
  // ==========================================================================

  public async listAudit(query: AuditQuery = {}): Promise<Page<AdminActionLog>> {
    const logs = await this.repositories.repository('admin-action-logs').findMany(
      (entry) =>
        (query.adminId === undefined || entry.adminId === query.adminId) &&
        (query.action === undefined || entry.action === query.action)
    );
    return paginate(logs.sort(byNewest), query);
  }

  /**
   * Append an audit entry; client address and user agent come from the request context
   */
  public async log(
    adminId: string,
    action: AdminActionType,
    targetType: string,
    targetId: string | undefined,
    description: string,
    metadata: Record<string, unknown> = {}
  ): Promise<AdminActionLog> {
    const context = getRequestContext();
    return this.repositories.repository('admin-action-logs').create({
      adminId,
      action,
      targetType,
      targetId,
      description,
      ipAddress: context?.ipAddress,
      userAgent: context?.userAgent,
      metadata,
    });
  }

  // ==========================================================================
  // Provisioning (CLI)
  // ==========================================================================

  public async createAdmin(email: string, password: string, role: AdminRoleName = 'superadmin'): Promise<CreateAdminResult> {
    validateEnum(role, 'role', ADMIN_ROLE_NAMES);
    const { user, created } = await this.options.accounts.ensureUser({
      email,
      password,
      firstName: 'Admin',
      lastName: 'User',
      isStaff: true,
    });
    const roles = this.repositories.repository('admin-roles');
    const { adminRole, roleCreated } = await roles.withLock(`user-${user.id}`, async () => {
      const existing = await this.findRole(user.id);
      if (existing !== null) {
        return { adminRole: await roles.update(existing.id, { role, isActive: true }), roleCreated: false };
      }
      return { adminRole: await roles.create({ userId: user.id, role, isActive: true }), roleCreated: true };
    });
    return { user, userCreated: created, adminRole, roleCreated };
  }

  public async checkAdmin(email: string, password: string): Promise<AdminCheckReport> {
    const user = await this.options.accounts.findByEmail(email);
    if (user === null) {
      const roles = await this.repositories.repository('admin-roles').findMany((role) => role.isActive);
      const admins = await this.repositories.repository('users').findByIds(roles.map((role) => role.userId));
      return {
        email,
        userExists: false,
        activeAdmins: admins.filter((admin) => admin.isActive).map((admin) => admin.email),
      };
    }
    const role = await this.findRole(user.id);
    return {
      email,
      userExists: true,
      isActive: user.isActive,
      isStaff: user.isStaff,
      role: role?.role,
      roleActive: role?.isActive,
      passwordMatches: await this.options.hasher.verify(password, user),
      activeAdmins: [],
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Active users of the audience; `active` means logged in within 30 days
   */
  private async recipientsFor(audience: AudienceType): Promise<User[]> {
    const since = daysAgo(ACTIVE_AUDIENCE_DAYS, this.clock());
    return this.repositories.repository('users').findMany((user) => {
      if (!user.isActive) {
        return false;
      }
      switch (audience) {
        case 'all':
          return true;
        case 'active':
          return isOnOrAfter(user.lastLoginAt, since);
        case 'contractors':
          return user.userType === 'contractor';
        case 'clients':
          return user.userType === 'client';
      }
    });
  }

  /**
   * Mail the user the active template of the type; a missing template or a failed send only warns
   */
  private async sendUserTemplate(
    templateType: EmailTemplateType,
    adminId: string,
    user: User,
    context: Record<string, string>
  ): Promise<void> {
    try {
      const admin = await this.repositories.repository('users').findByIdOrNull(adminId);
      const sent = await this.options.mailer.sendByType(templateType, {
        recipientEmail: user.email,
        user,
        admin: admin ?? undefined,
        context,
      });
      if (sent === null) {
        this.options.logger?.debug?.(`No active ${templateType} template`);
      }
    } catch (error) {
      this.options.logger?.warn?.(`Failed to send ${templateType} e-mail to ${user.email}: ${errorMessage(error)}`);
    }
  }
}
