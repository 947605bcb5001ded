import type { Entity, Timestamp } from './common.js';

export type NotificationType =
  | 'project_application'
  | 'application_accepted'
  | 'application_rejected'
  | 'project_completed'
  | 'project_update'
  | 'new_message'
  | 'review_received'
  | 'payment_reminder'
  | 'system';

export const NOTIFICATION_TYPES: readonly NotificationType[] = [
  'project_application',
  'application_accepted',
  'application_rejected',
  'project_completed',
  'project_update',
  'new_message',
  'review_received',
  'payment_reminder',
  'system',
];

export interface Notification extends Entity {
  userId: string;
  type: NotificationType;
  title: string;
  message: string;
  relatedObjectType?: string;
  relatedObjectId?: string;
  isRead: boolean;
  readAt?: Timestamp;
  /** Set the first time the user follows the notification */
  clickedAt?: Timestamp;
  extraData: Record<string, unknown>;
}

/** relatedObjectType of in-app copies of an admin push notification */
export const PUSH_NOTIFICATION_OBJECT_TYPE = 'push_notification';

export type PreferenceCategory = 'projectUpdates' | 'newMessages' | 'applications' | 'reviews';
export type DeliveryChannel = 'email' | 'push' | 'inapp';

export type ChannelPreferences = Record<PreferenceCategory, boolean>;

export interface NotificationPreferences extends Entity {
  userId: string;
  email: ChannelPreferences;
  push: ChannelPreferences;
  inapp: ChannelPreferences;
  emailMarketing: boolean;
}

/**
 * Preference bucket per notification type; absent types are always delivered
 */
export const NOTIFICATION_PREFERENCE_CATEGORY: Readonly<Partial<Record<NotificationType, PreferenceCategory>>> = {
  project_update: 'projectUpdates',
  project_completed: 'projectUpdates',
  new_message: 'newMessages',
  project_application: 'applications',
  application_accepted: 'applications',
  application_rejected: 'applications',
  review_received: 'reviews',
};

export function defaultChannelPreferences(): ChannelPreferences {
  return { projectUpdates: true, newMessages: true, applications: true, reviews: true };
}

export function allowsDelivery(
  preferences: Pick<NotificationPreferences, DeliveryChannel>,
  channel: DeliveryChannel,
  type: NotificationType
): boolean {
  const category = NOTIFICATION_PREFERENCE_CATEGORY[type];
  return category === undefined ? true : preferences[channel][category];
}
