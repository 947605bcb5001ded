/**
 * Recurring jobs run by the worker
 */

import type { CoreServices } from './container.js';
import type { TaskDefinition } from './infrastructure/scheduler/task-scheduler.js';

export type DefaultTaskServices = Pick<CoreServices, 'notifications' | 'projects' | 'admin' | 'moderation' | 'tokens'>;

export function createDefaultTasks(services: DefaultTaskServices): TaskDefinition[] {
  return [
    {
      id: 'cleanup-old-notifications',
      name: 'Delete read notifications older than 30 days',
      cronExpression: '0 3 * * *',
      handler: () => services.notifications.deleteOld(30),
      enabled: true,
    },
    {
      id: 'daily-digest',
      name: 'Send the daily unread digest',
      cronExpression: '0 8 * * *',
      handler: () => services.notifications.sendDailyDigest(),
      enabled: true,
    },
    {
      id: 'overdue-milestones',
      name: 'Mark overdue milestones',
      cronExpression: '0 * * * *',
      handler: () => services.projects.markOverdueMilestones(),
      enabled: true,
    },
    {
      id: 'scheduled-push-notifications',
      name: 'Send due push notifications',
      cronExpression: '*/5 * * * *',
      handler: () => services.admin.processScheduledPushNotifications(),
      enabled: true,
    },
    {
      id: 'lift-suspensions',
      name: 'Reactivate users whose suspension expired',
      cronExpression: '30 * * * *',
      handler: () => services.moderation.liftExpiredSuspensions(),
      enabled: true,
    },
    {
      id: 'purge-revoked-tokens',
      name: 'Purge expired token revocations',
      cronExpression: '15 4 * * *',
      handler: () => services.tokens.purgeExpiredRevocations(),
      enabled: true,
    },
  ];
}
