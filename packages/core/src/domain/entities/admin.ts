import type { Entity, Timestamp } from './common.js';

export type AdminRoleName = 'superadmin' | 'admin' | 'moderator' | 'support' | 'readonly';

export const ADMIN_ROLE_NAMES: readonly AdminRoleName[] = ['superadmin', 'admin', 'moderator', 'support', 'readonly'];

export type AdminPermission =
  | 'view_user'
  | 'change_user'
  | 'ban_user'
  | 'unban_user'
  | 'view_content'
  | 'moderate_content'
  | 'approve_content'
  | 'reject_content'
  | 'view_complaint'
  | 'resolve_complaint'
  | 'view_email_template'
  | 'change_email_template'
  | 'send_email'
  | 'view_campaign'
  | 'change_campaign'
  | 'view_notification'
  | 'send_notification'
  | 'view_banner'
  | 'change_banner'
  | 'view_analytics'
  | 'view_chats'
  | 'send_system_messages'
  | 'moderate_chats'
  | 'view_settings'
  | 'change_settings'
  | 'view_audit';

export const ROLE_PERMISSIONS: Readonly<Record<AdminRoleName, readonly AdminPermission[] | '*'>> = {
  superadmin: '*',
  admin: [
    'view_user',
    'change_user',
    'ban_user',
    'unban_user',
    'view_content',
    'moderate_content',
    'approve_content',
    'reject_content',
    'view_complaint',
    'resolve_complaint',
    'view_email_template',
    'change_email_template',
    'send_email',
    'view_campaign',
    'change_campaign',
    'view_notification',
    'send_notification',
    'view_banner',
    'change_banner',
    'view_analytics',
    'view_chats',
    'send_system_messages',
    'moderate_chats',
    'view_settings',
    'view_audit',
  ],
  moderator: [
    'view_user',
    'view_content',
    'moderate_content',
    'approve_content',
    'reject_content',
    'view_complaint',
    'resolve_complaint',
    'view_analytics',
    'view_chats',
    'send_system_messages',
    'moderate_chats',
  ],
  support: ['view_user', 'view_complaint', 'view_analytics', 'view_chats'],
  readonly: ['view_user', 'view_content', 'view_complaint', 'view_analytics', 'view_chats'],
};

export function hasPermission(role: AdminRoleName, permission: AdminPermission): boolean {
  const granted = ROLE_PERMISSIONS[role];
  return granted === '*' || granted.includes(permission);
}

export interface AdminRole extends Entity {
  userId: string;
  role: AdminRoleName;
  isActive: boolean;
  createdById?: string;
}

export type AdminActionType =
  | 'create'
  | 'update'
  | 'delete'
  | 'ban'
  | 'unban'
  | 'approve'
  | 'reject'
  | 'moderate'
  | 'email_send'
  | 'settings_change'
  | 'login'
  | 'logout';

export const ADMIN_ACTION_TYPES: readonly AdminActionType[] = [
  'create',
  'update',
  'delete',
  'ban',
  'unban',
  'approve',
  'reject',
  'moderate',
  'email_send',
  'settings_change',
  'login',
  'logout',
];

export interface AdminActionLog extends Entity {
  adminId: string;
  action: AdminActionType;
  targetType: string;
  targetId?: string;
  description: string;
  ipAddress?: string;
  userAgent?: string;
  metadata: Record<string, unknown>;
}

export interface SystemSetting extends Entity {
  key: string;
  value: string;
  description: string;
  updatedById?: string;
}

export type EmailTemplateType =
  | 'welcome'
  | 'project_approved'
  | 'project_rejected'
  | 'user_banned'
  | 'user_unbanned'
  | 'user_deleted'
  | 'complaint_resolved'
  | 'newsletter'
  | 'system_notification';

export const EMAIL_TEMPLATE_TYPES: readonly EmailTemplateType[] = [
  'welcome',
  'project_approved',
  'project_rejected',
  'user_banned',
  'user_unbanned',
  'user_deleted',
  'complaint_resolved',
  'newsletter',
  'system_notification',
];

export interface EmailTemplate extends Entity {
  name: string;
  templateType: EmailTemplateType;
  subject: string;
  htmlContent: string;
  textContent: string;
  isActive: boolean;
}

export type AudienceType = 'all' | 'active' | 'contractors' | 'clients';
export type DispatchStatus = 'draft' | 'scheduled' | 'sending' | 'sent' | 'failed';

export const AUDIENCE_TYPES: readonly AudienceType[] = ['all', 'active', 'contractors', 'clients'];

export interface EmailCampaign extends Entity {
  name: string;
  subject: string;
  templateId: string;
  targetAudience: AudienceType;
  status: DispatchStatus;
  scheduledAt?: Timestamp;
  sentAt?: Timestamp;
  totalRecipients: number;
  deliveredCount: number;
  createdById: string;
}

export interface PushNotification extends Entity {
  title: string;
  message: string;
  targetAudience: AudienceType;
  status: DispatchStatus;
  scheduledAt?: Timestamp;
  sentAt?: Timestamp;
  totalRecipients: number;
  deliveredCount: number;
  openedCount: number;
  clickedCount: number;
  createdById: string;
}

export type MessageTemplateCategory = 'warning' | 'info' | 'moderation' | 'support' | 'announcement';

export const MESSAGE_TEMPLATE_CATEGORIES: readonly MessageTemplateCategory[] = [
  'warning',
  'info',
  'moderation',
  'support',
  'announcement',
];

/**
 * Canned system message for chats. `{{admin_name}}`, `{{chat_id}}`,
 * `{{current_date}}` and `{{current_time}}` are filled in when sent.
 */
export interface MessageTemplate extends Entity {
  name: string;
  category: MessageTemplateCategory;
  content: string;
  availableVariables: string[];
  isActive: boolean;
  createdById: string;
  usageCount: number;
}

export type PushTemplateCategory = 'general' | 'marketing' | 'system' | 'reminder' | 'announcement';

export const PUSH_TEMPLATE_CATEGORIES: readonly PushTemplateCategory[] = [
  'general',
  'marketing',
  'system',
  'reminder',
  'announcement',
];

export interface PushNotificationTemplate extends Entity {
  name: string;
  category: PushTemplateCategory;
  titleTemplate: string;
  messageTemplate: string;
  availableVariables: string[];
  isActive: boolean;
  createdById: string;
  usageCount: number;
}

/** Template lists are ordered by category, then name */
export function byCategoryAndName<T extends { category: string; name: string }>(a: T, b: T): number {
  return a.category.localeCompare(b.category) || a.name.localeCompare(b.name);
}

export interface DeliveryRates {
  deliveryRate: number;
  openRate: number;
  clickRate: number;
}

function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

export function deliveryRatesOf(
  notification: Pick<PushNotification, 'totalRecipients' | 'deliveredCount' | 'openedCount' | 'clickedCount'>
): DeliveryRates {
  return {
    deliveryRate: percentage(notification.deliveredCount, notification.totalRecipients),
    openRate: percentage(notification.openedCount, notification.deliveredCount),
    clickRate: percentage(notification.clickedCount, notification.openedCount),
  };
}
