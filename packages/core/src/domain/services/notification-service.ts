/**
 * NotificationService - in-app notifications with e-mail and real-time fan-out
 *
 * Delivery per channel follows the recipient's NotificationPreferences.
 * E-mail and real-time failures are logged and never fail the caller.
 */

import type { Notification, NotificationPreferences, NotificationType, ChannelPreferences } from '../entities/notifications.js';
import { PUSH_NOTIFICATION_OBJECT_TYPE, allowsDelivery, defaultChannelPreferences } from '../entities/notifications.js';
import type { PageRequest } from '../entities/common.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { ConflictError, NotFoundError } from '../repositories/errors.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';
import { errorMessage } from '../../infrastructure/logging/domain-logger.js';
import { TtlCache } from '../../infrastructure/cache/ttl-cache.js';
import { byNewest, daysAgo, nowIso } from '../utils/dates.js';
import { paginate, type Page } from '../utils/pagination.js';
import type { EmailService } from './email-service.js';

const UNREAD_CACHE_TTL_MS = 5 * 60 * 1000;
const DIGEST_ITEMS = 10;

// ============================================================================
// Types
// ============================================================================

/**
 * Event pushed to a user's live connections
 */
export interface RealtimeEvent {
  type: string;
  [key: string]: unknown;
}

/**
 * Real-time channel to connected users (implemented by the chat gateway)
 */
export interface RealtimePublisher {
  publishToUser(userId: string, event: RealtimeEvent): void;
}

export interface CreateNotificationInput {
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  relatedObjectType?: string;
  relatedObjectId?: string;
  extraData?: Record<string, unknown>;
}

export type BulkNotificationInput = Omit<CreateNotificationInput, 'userId'>;

export interface ListNotificationsInput extends PageRequest {
  type?: NotificationType;
  isRead?: boolean;
}

export interface PreferencesUpdate {
  email?: Partial<ChannelPreferences>;
  push?: Partial<ChannelPreferences>;
  inapp?: Partial<ChannelPreferences>;
  emailMarketing?: boolean;
}

export interface NotificationStats {
  total: number;
  unread: number;
  byType: Partial<Record<NotificationType, number>>;
}

export interface NotificationServiceOptions {
  email: EmailService;
  siteName: string;
  publisher?: RealtimePublisher;
  logger?: DomainLogger;
}

// ============================================================================
// Service
// ============================================================================

export class NotificationService {
  private publisher: RealtimePublisher | undefined;
  private readonly unreadCounts = new TtlCache<number>({ defaultTtlMs: UNREAD_CACHE_TTL_MS });

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: NotificationServiceOptions
  ) {
    this.publisher = options.publisher;
  }

  /**
   * Attach the real-time channel once the socket gateway is up
   */
  public setPublisher(publisher: RealtimePublisher | undefined): void {
    this.publisher = publisher;
  }

  /**
   * @returns the stored notification, or null when in-app delivery is switched off
   */
  public async createNotification(input: CreateNotificationInput): Promise<Notification | null> {
    const preferences = await this.getPreferences(input.userId);
    if (!allowsDelivery(preferences, 'inapp', input.type)) {
      return null;
    }

    const notification = await this.repositories.repository('notifications').create({
      userId: input.userId,
      type: input.type,
      title: input.title,
      message: input.message,
      relatedObjectType: input.relatedObjectType,
      relatedObjectId: input.relatedObjectId,
      isRead: false,
      extraData: input.extraData ?? {},
    });
    this.unreadCounts.delete(input.userId);

    this.publish(notification);
    if (allowsDelivery(preferences, 'email', input.type)) {
      await this.sendEmail(notification);
    }
    return notification;
  }

  /**
   * @returns number of notifications stored
   */
  public async bulkCreate(userIds: string[], input: BulkNotificationInput): Promise<number> {
    let created = 0;
    for (const userId of new Set(userIds)) {
      const notification = await this.createNotification({ ...input, userId });
      if (notification !== null) {
        created++;
      }
    }
    return created;
  }

  public async list(userId: string, input: ListNotificationsInput = {}): Promise<Page<Notification>> {
    const items = await this.repositories
      .repository('notifications')
      .findMany(
        (n) =>
          n.userId === userId &&
          (input.type === undefined || n.type === input.type) &&
          (input.isRead === undefined || n.isRead === input.isRead)
      );
    return paginate(items.sort(byNewest), input);
  }

  /**
   * @throws NotFoundError for missing notifications and those of other users
   */
  public async get(userId: string, notificationId: string): Promise<Notification> {
    const notification = await this.repositories.repository('notifications').findByIdOrNull(notificationId);
    if (notification === null || notification.userId !== userId) {
      throw new NotFoundError('Notification', notificationId, { message: 'Notification not found' });
    }
    return notification;
  }

  public async markOneRead(userId: string, notificationId: string): Promise<Notification> {
    const notification = await this.get(userId, notificationId);
    return this.markRead(notification);
  }

  /**
   * Mark all (or only the given) unread notifications of the user as read
   * @returns number of notifications changed
   */
  public async markAsRead(userId: string, ids?: string[]): Promise<number> {
    const wanted = ids !== undefined ? new Set(ids) : undefined;
    const unread = await this.repositories
      .repository('notifications')
      .findMany((n) => n.userId === userId && !n.isRead && (wanted === undefined || wanted.has(n.id)));
    for (const notification of unread) {
      await this.markRead(notification);
    }
    this.unreadCounts.delete(userId);
    return unread.length;
  }

  /**
   * The user followed the notification. Reads it as well, and the push
   * notification it came from counts one open and one click per recipient.
   */
  public async recordClick(userId: string, notificationId: string): Promise<Notification> {
    const notification = await this.markRead(await this.get(userId, notificationId));
    if (notification.clickedAt !== undefined) {
      return notification;
    }
    const repo = this.repositories.repository('notifications');
    const clicked = await repo.withLock(`engagement-${notification.id}`, async () => {
      const current = await repo.findById(notification.id);
      return current.clickedAt === undefined ? repo.update(current.id, { clickedAt: nowIso() }) : null;
    });
    if (clicked === null) {
      return repo.findById(notification.id);
    }
    await this.trackPushEngagement(clicked, 'clickedCount');
    return clicked;
  }

  public async delete(userId: string, notificationId: string): Promise<void> {
    const notification = await this.get(userId, notificationId);
    await this.repositories.repository('notifications').delete(notification.id);
    this.unreadCounts.delete(userId);
  }

  /**
   * Delete the user's notifications among `ids`; ids of other users are skipped
   */
  public async bulkDelete(userId: string, ids: string[]): Promise<number> {
    const repo = this.repositories.repository('notifications');
    const owned = (await repo.findByIds(ids)).filter((n) => n.userId === userId);
    const deleted = await repo.deleteMany(owned.map((n) => n.id));
    this.unreadCounts.delete(userId);
    return deleted;
  }

  public async getUnreadCount(userId: string): Promise<number> {
    return this.unreadCounts.wrap(userId, () =>
      this.repositories.repository('notifications').count((n) => n.userId === userId && !n.isRead)
    );
  }

  public async stats(userId: string): Promise<NotificationStats> {
    const items = await this.repositories.repository('notifications').findMany((n) => n.userId === userId);
    const byType: Partial<Record<NotificationType, number>> = {};
    for (const notification of items) {
      byType[notification.type] = (byType[notification.type] ?? 0) + 1;
    }
    return {
      total: items.length,
      unread: items.filter((n) => !n.isRead).length,
      byType,
    };
  }

  /**
   * Delete read notifications created before the cutoff
   */
  public async deleteOld(days = 30, now: Date = new Date()): Promise<number> {
    const cutoff = daysAgo(days, now).getTime();
    const repo = this.repositories.repository('notifications');
    const old = await repo.findMany((n) => n.isRead && Date.parse(n.createdAt) < cutoff);
    const deleted = await repo.deleteMany(old.map((n) => n.id));
    this.unreadCounts.clear();
    this.options.logger?.info?.(`Deleted ${String(deleted)} old notifications`);
    return deleted;
  }

  /**
   * One e-mail per active user with unread notifications from the last 24 hours
   * @returns number of e-mails sent
   */
  public async sendDailyDigest(now: Date = new Date()): Promise<number> {
    const since = daysAgo(1, now).getTime();
    const recent = await this.repositories
      .repository('notifications')
      .findMany((n) => !n.isRead && Date.parse(n.createdAt) >= since);

    const byUser = new Map<string, Notification[]>();
    for (const notification of recent) {
      const list = byUser.get(notification.userId) ?? [];
      list.push(notification);
      byUser.set(notification.userId, list);
    }

    let sent = 0;
    for (const [userId, notifications] of byUser) {
      const user = await this.repositories.repository('users').findByIdOrNull(userId);
      if (user === null || !user.isActive) {
        continue;
      }
      const preferences = await this.getPreferences(userId);
      if (!Object.values(preferences.email).some(Boolean)) {
        continue;
      }
      const top = notifications.sort(byNewest).slice(0, DIGEST_ITEMS);
      const lines = top.map((n) => `- ${n.title}: ${n.message}`);
      try {
        await this.options.email.send({
          to: user.email,
          subject: `[${this.options.siteName}] You have ${String(notifications.length)} unread notifications`,
          text: [`Hi ${user.firstName || user.username},`, '', 'Here is what you missed:', ...lines].join('\n'),
        });
        sent++;
      } catch (error) {
        this.options.logger?.warn?.(`Daily digest to ${user.email} failed: ${errorMessage(error)}`);
      }
    }
    return sent;
  }

  // ==========================================================================
  // Preferences
  // ==========================================================================

  /**
   * Preferences share the user's id, so a concurrent create surfaces as a duplicate
   */
  public async getPreferences(userId: string): Promise<NotificationPreferences> {
    const repo = this.repositories.repository('notification-preferences');
    const existing = await repo.findByIdOrNull(userId);
    if (existing !== null) {
      return existing;
    }
    try {
      return await repo.create({
        id: userId,
        userId,
        email: defaultChannelPreferences(),
        push: defaultChannelPreferences(),
        inapp: defaultChannelPreferences(),
        emailMarketing: false,
      });
    } catch (error) {
      if (error instanceof ConflictError) {
        return repo.findById(userId);
      }
      throw error;
    }
  }

  public async updatePreferences(userId: string, update: PreferencesUpdate): Promise<NotificationPreferences> {
    const current = await this.getPreferences(userId);
    return this.repositories.repository('notification-preferences').update(current.id, {
      email: { ...current.email, ...update.email },
      push: { ...current.push, ...update.push },
      inapp: { ...current.inapp, ...update.inapp },
      emailMarketing: update.emailMarketing ?? current.emailMarketing,
    });
  }

  // ==========================================================================
  // Delivery
  // ==========================================================================

  private publish(notification: Notification): void {
    if (this.publisher === undefined) {
      return;
    }
    try {
      this.publisher.publishToUser(notification.userId, { type: 'notification', notification });
    } catch (error) {
      this.options.logger?.warn?.(`Real-time delivery failed: ${errorMessage(error)}`, { notificationId: notification.id });
    }
  }

  private async sendEmail(notification: Notification): Promise<void> {
    try {
      const user = await this.repositories.repository('users').findByIdOrNull(notification.userId);
      if (user === null) {
        return;
      }
      await this.options.email.send({
        to: user.email,
        subject: `[${this.options.siteName}] ${notification.title}`,
        text: notification.message,
      });
    } catch (error) {
      this.options.logger?.warn?.(`Notification e-mail failed: ${errorMessage(error)}`, { notificationId: notification.id });
    }
  }

  private async markRead(notification: Notification): Promise<Notification> {
    if (notification.isRead) {
      return notification;
    }
    const repo = this.repositories.repository('notifications');
    const read = await repo.withLock(`engagement-${notification.id}`, async () => {
      const current = await repo.findById(notification.id);
      return current.isRead ? null : repo.update(current.id, { isRead: true, readAt: nowIso() });
    });
    if (read === null) {
      return repo.findById(notification.id);
    }
    this.unreadCounts.delete(notification.userId);
    await this.trackPushEngagement(read, 'openedCount');
    return read;
  }

  private async trackPushEngagement(notification: Notification, counter: 'openedCount' | 'clickedCount'): Promise<void> {
    const pushId = notification.relatedObjectId;
    if (notification.relatedObjectType !== PUSH_NOTIFICATION_OBJECT_TYPE || pushId === undefined) {
      return;
    }
    const pushes = this.repositories.repository('push-notifications');
    await pushes.withLock(`counter-${pushId}`, async () => {
      const push = await pushes.findByIdOrNull(pushId);
      // The push notification may have been deleted since
      if (push === null) {
        return;
      }
      await pushes.update(pushId, counter === 'openedCount' ? { openedCount: push.openedCount + 1 } : { clickedCount: push.clickedCount + 1 });
    });
  }
}
