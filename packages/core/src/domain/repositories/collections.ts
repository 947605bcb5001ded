/**
 * Collection name → entity type. Collection names double as storage
 * directory names.
 */

import type { Address, RevokedToken, User } from '../entities/accounts.js';
import type {
  AdminActionLog,
  AdminRole,
  EmailCampaign,
  EmailTemplate,
  MessageTemplate,
  PushNotification,
  PushNotificationTemplate,
  SystemSetting,
} from '../entities/admin.js';
import type { Advertisement } from '../entities/advertisements.js';
import type { ChatMembership, ChatRoom, Message } from '../entities/chat.js';
import type { Category, Certification, ContractorProfile, PortfolioItem, Skill } from '../entities/contractors.js';
import type {
  ContentReport,
  ModerationAction,
  ModerationQueueItem,
  ModerationRecord,
  ModerationRule,
  UserWarning,
} from '../entities/moderation.js';
import type { Notification, NotificationPreferences } from '../entities/notifications.js';
import type {
  Project,
  ProjectApplication,
  ProjectDocument,
  ProjectMilestone,
  ProjectUpdate,
} from '../entities/projects.js';
import type { Review, ReviewHelpful } from '../entities/reviews.js';
import type { Repository } from './interfaces.js';

export interface CollectionMap {
  users: User;
  addresses: Address;
  'revoked-tokens': RevokedToken;
  categories: Category;
  skills: Skill;
  'contractor-profiles': ContractorProfile;
  'portfolio-items': PortfolioItem;
  certifications: Certification;
  projects: Project;
  'project-applications': ProjectApplication;
  'project-milestones': ProjectMilestone;
  'project-updates': ProjectUpdate;
  'project-documents': ProjectDocument;
  reviews: Review;
  'review-helpful': ReviewHelpful;
  'chat-rooms': ChatRoom;
  messages: Message;
  'chat-memberships': ChatMembership;
  notifications: Notification;
  'notification-preferences': NotificationPreferences;
  'moderation-rules': ModerationRule;
  'moderation-records': ModerationRecord;
  'moderation-actions': ModerationAction;
  'moderation-queue': ModerationQueueItem;
  'content-reports': ContentReport;
  'user-warnings': UserWarning;
  'admin-roles': AdminRole;
  'admin-action-logs': AdminActionLog;
  'system-settings': SystemSetting;
  'email-templates': EmailTemplate;
  'email-campaigns': EmailCampaign;
  'push-notifications': PushNotification;
  'push-templates': PushNotificationTemplate;
  'message-templates': MessageTemplate;
  advertisements: Advertisement;
}

export type CollectionName = keyof CollectionMap;

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'users',
  'addresses',
  'revoked-tokens',
  'categories',
  'skills',
  'contractor-profiles',
  'portfolio-items',
  'certifications',
  'projects',
  'project-applications',
  'project-milestones',
  'project-updates',
  'project-documents',
  'reviews',
  'review-helpful',
  'chat-rooms',
  'messages',
  'chat-memberships',
  'notifications',
  'notification-preferences',
  'moderation-rules',
  'moderation-records',
  'moderation-actions',
  'moderation-queue',
  'content-reports',
  'user-warnings',
  'admin-roles',
  'admin-action-logs',
  'system-settings',
  'email-templates',
  'email-campaigns',
  'push-notifications',
  'push-templates',
  'message-templates',
  'advertisements',
];

/**
 * Anything that can hand out typed repositories
 */
export interface RepositoryProvider {
  repository<K extends CollectionName>(collection: K): Repository<CollectionMap[K]>;
}
