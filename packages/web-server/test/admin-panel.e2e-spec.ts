/**
 * Admin Panel API E2E Tests
 */

import request from 'supertest';
import { HttpStatus } from '@nestjs/common';
import type {
  AdminActionLog,
  AdminLoginResult,
  AdminUserView,
  AdvertisementView,
  ChatRoom,
  ContentReport,
  DashboardStats,
  EmailCampaign,
  EmailTemplate,
  MessagePayload,
  MessageTemplate,
  ModerationQueueItem,
  Page,
  PublicUser,
  PushAnalytics,
  PushNotification,
  PushNotificationTemplate,
  SentEmail,
  SystemSetting,
} from '@contractor-connect/core';
import {
  createTestApp,
  cleanupTestApp,
  createAdminUser,
  registerUser,
  bearer,
  TEST_PASSWORD,
  type TestContext,
  type TestServer,
  type TestUser,
  type SuccessResponse,
  type ErrorResponse,
} from './setup.js';

describe('Admin Panel API (e2e)', () => {
  let context: TestContext;
  let superadmin: TestUser;

  beforeAll(async () => {
    context = await createTestApp();
    superadmin = await createAdminUser(context, 'root@example.com');
  });

  afterAll(async () => {
    await cleanupTestApp(context);
  });

  function getServer(): TestServer {
    return context.app.getHttpServer();
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  describe('access', () => {
    it('returns the role and permissions on login', async () => {
      const response = await request(getServer())
        .post('/api/admin-panel/login')
        .send({ email: 'root@example.com', password: TEST_PASSWORD })
        .expect(HttpStatus.OK);

      const result = (response.body as SuccessResponse<AdminLoginResult>).data;
      expect(result.role).toBe('superadmin');
      expect(result.permissions).toBe('*');
      expect(typeof result.tokens.access).toBe('string');
    });

    it('rejects bad credentials with 400', async () => {
      const response = await request(getServer())
        .post('/api/admin-panel/login')
        .send({ email: 'root@example.com', password: 'wrong-password' })
        .expect(HttpStatus.BAD_REQUEST);

      expect((response.body as ErrorResponse).error.message).toBe('Invalid credentials.');
    });

    it('refuses users without an admin role', async () => {
      const plain = await registerUser(getServer(), 'plain-user');

      const login = await request(getServer())
        .post('/api/admin-panel/login')
        .send({ email: 'plain-user@example.com', password: TEST_PASSWORD })
        .expect(HttpStatus.FORBIDDEN);
      expect((login.body as ErrorResponse).error.message).toBe('Access denied');

      await request(getServer())
        .get('/api/admin-panel/dashboard')
        .set('Authorization', bearer(plain))
        .expect(HttpStatus.FORBIDDEN);
    });

    it('requires a token', async () => {
      await request(getServer()).get('/api/admin-panel/dashboard').expect(HttpStatus.UNAUTHORIZED);
    });

    it('enforces role permissions', async () => {
      const support = await createAdminUser(context, 'support@example.com', 'support');

      await request(getServer())
        .get('/api/admin-panel/users')
        .set('Authorization', bearer(support))
        .expect(HttpStatus.OK);

      const response = await request(getServer())
        .get('/api/admin-panel/settings')
        .set('Authorization', bearer(support))
        .expect(HttpStatus.FORBIDDEN);
      const body = response.body as ErrorResponse;
      expect(body.error.code).toBe('PERMISSION_DENIED');
      expect(body.error.message).toBe('Permission denied');
    });

    it('serves the dashboard', async () => {
      const response = await request(getServer())
        .get('/api/admin-panel/dashboard')
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);

      const stats = (response.body as SuccessResponse<DashboardStats>).data;
      expect(stats.users.total).toBe(stats.users.contractors + stats.users.clients);
      expect(stats.projects.total).toBe(0);
      expect(stats.reviews.averageRating).toBe(0);
    });
  });

  // ==========================================================================
  // Users
  // ==========================================================================

  describe('users', () => {
    let target: TestUser;

    beforeAll(async () => {
      target = await registerUser(getServer(), 'ban-target');
    });

    it('searches users', async () => {
      const response = await request(getServer())
        .get('/api/admin-panel/users')
        .query({ q: 'BAN-TARGET' })
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);

      const page = (response.body as SuccessResponse<Page<PublicUser>>).data;
      expect(page.items.map((u) => u.username)).toEqual(['ban-target']);
    });

    it('shows the admin role on the user detail', async () => {
      const response = await request(getServer())
        .get(`/api/admin-panel/users/${superadmin.user.id}`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);

      expect((response.body as SuccessResponse<AdminUserView>).data.adminRole).toBe('superadmin');
    });

    it('bans and unbans a user', async () => {
      const banned = await request(getServer())
        .post(`/api/admin-panel/users/${target.user.id}/ban`)
        .set('Authorization', bearer(superadmin))
        .send({ reason: 'Spamming' })
        .expect(HttpStatus.OK);
      expect((banned.body as SuccessResponse<PublicUser>).data.isActive).toBe(false);

      const login = await request(getServer())
        .post('/api/auth/login')
        .send({ email: 'ban-target@example.com', password: TEST_PASSWORD })
        .expect(HttpStatus.BAD_REQUEST);
      expect((login.body as ErrorResponse).error.message).toBe('User account is disabled.');

      const unbanned = await request(getServer())
        .post(`/api/admin-panel/users/${target.user.id}/unban`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      expect((unbanned.body as SuccessResponse<PublicUser>).data.isActive).toBe(true);
    });

    it('refuses to ban yourself', async () => {
      const response = await request(getServer())
        .post(`/api/admin-panel/users/${superadmin.user.id}/ban`)
        .set('Authorization', bearer(superadmin))
        .send({ reason: 'Testing' })
        .expect(HttpStatus.BAD_REQUEST);

      expect((response.body as ErrorResponse).error.message).toBe('You cannot ban yourself');
    });

    it('soft deletes a user by anonymising the e-mail', async () => {
      const doomed = await registerUser(getServer(), 'doomed');

      await request(getServer())
        .delete(`/api/admin-panel/users/${doomed.user.id}`)
        .set('Authorization', bearer(superadmin))
        .send({ reason: 'Requested' })
        .expect(HttpStatus.OK);

      const user = await context.core.accounts.getUser(doomed.user.id);
      expect(user.isActive).toBe(false);
      expect(user.email).toBe(`deleted-${doomed.user.id}@deleted.local`);
    });
  });

  // ==========================================================================
  // Complaints and moderation queue
  // ==========================================================================

  describe('complaints and queue', () => {
    let reporter: TestUser;

    beforeAll(async () => {
      reporter = await registerUser(getServer(), 'complainer');
    });

    it('resolves a complaint once and closes its queue item', async () => {
      const report = await context.core.moderation.createReport({
        reporterId: reporter.user.id,
        contentType: 'review',
        objectId: 'review-1',
        reportType: 'harassment',
        description: 'Insulting review',
      });

      const pending = await request(getServer())
        .get('/api/admin-panel/complaints')
        .query({ status: 'pending' })
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      expect((pending.body as SuccessResponse<Page<ContentReport>>).data.items.map((r) => r.id)).toContain(report.id);

      const resolved = await request(getServer())
        .post(`/api/admin-panel/complaints/${report.id}/resolve`)
        .set('Authorization', bearer(superadmin))
        .send({ resolution: 'Review removed', status: 'resolved' })
        .expect(HttpStatus.OK);
      const body = (resolved.body as SuccessResponse<ContentReport>).data;
      expect(body.status).toBe('resolved');
      expect(body.resolvedBy).toBe(superadmin.user.id);

      const queue = await context.core.moderation.listQueue();
      expect(queue.items.find((item) => item.reportId === report.id)?.status).toBe('approved');

      const again = await request(getServer())
        .post(`/api/admin-panel/complaints/${report.id}/resolve`)
        .set('Authorization', bearer(superadmin))
        .send({ resolution: 'Twice', status: 'rejected' })
        .expect(HttpStatus.CONFLICT);
      expect((again.body as ErrorResponse).error.message).toBe('This complaint has already been processed');
    });

    it('assigns and decides queue items', async () => {
      const report = await context.core.moderation.createReport({
        reporterId: reporter.user.id,
        contentType: 'project',
        objectId: 'project-9',
        reportType: 'scam',
        description: 'Asks for upfront payment',
      });
      const queue = await context.core.moderation.listQueue({ status: 'pending' });
      const item = queue.items.find((i) => i.reportId === report.id);
      if (item === undefined) {
        throw new Error('Queue item missing');
      }

      const assigned = await request(getServer())
        .post(`/api/admin-panel/moderation/${item.id}/assign`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      expect((assigned.body as SuccessResponse<ModerationQueueItem>).data.status).toBe('in_review');

      const rejected = await request(getServer())
        .post(`/api/admin-panel/moderation/${item.id}/reject`)
        .set('Authorization', bearer(superadmin))
        .send({ notes: 'Confirmed scam' })
        .expect(HttpStatus.OK);
      expect((rejected.body as SuccessResponse<ModerationQueueItem>).data.notes).toBe('Confirmed scam');

      const reports = await context.core.moderation.listReports({ status: 'rejected' });
      expect(reports.items.map((r) => r.id)).toEqual([report.id]);

      const again = await request(getServer())
        .post(`/api/admin-panel/moderation/${item.id}/approve`)
        .set('Authorization', bearer(superadmin))
        .send({})
        .expect(HttpStatus.CONFLICT);
      expect((again.body as ErrorResponse).error.message).toBe('This item has already been reviewed');
    });
  });

  // ==========================================================================
  // E-mail templates and campaigns
  // ==========================================================================

  describe('e-mail', () => {
    let template: EmailTemplate;

    beforeAll(async () => {
      await registerUser(getServer(), 'campaign-pro', 'contractor');
    });

    it('creates a template and sends it rendered', async () => {
      const created = await request(getServer())
        .post('/api/admin-panel/email-templates')
        .set('Authorization', bearer(superadmin))
        .send({
          name: 'Greeting',
          templateType: 'welcome',
          subject: 'Hello {{user_first_name}}',
          htmlContent: '<p>{{custom}}</p>',
          textContent: '{{custom}} from {{admin_name}}',
        })
        .expect(HttpStatus.CREATED);
      template = (created.body as SuccessResponse<EmailTemplate>).data;
      expect(template.isActive).toBe(true);

      const sent = await request(getServer())
        .post(`/api/admin-panel/email-templates/${template.id}/send`)
        .set('Authorization', bearer(superadmin))
        .send({ recipientEmail: 'campaign-pro@example.com', context: { custom: 'Thanks' } })
        .expect(HttpStatus.OK);
      expect(typeof (sent.body as SuccessResponse<SentEmail>).data.messageId).toBe('string');

      const last = context.core.email.outbox[context.core.email.outbox.length - 1];
      expect(last?.to).toBe('campaign-pro@example.com');
      expect(last?.subject).toBe('Hello campaign-pro');
      expect(last?.html).toBe('<p>Thanks</p>');
      expect(last?.text).toBe('Thanks from Admin User');
    });

    it('returns 404 for an unknown template', async () => {
      const response = await request(getServer())
        .get('/api/admin-panel/email-templates/missing')
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.NOT_FOUND);
      expect((response.body as ErrorResponse).error.message).toBe('Email template not found');
    });

    it('blocks deleting a template used by a pending campaign, then sends the campaign', async () => {
      const created = await request(getServer())
        .post('/api/admin-panel/campaigns')
        .set('Authorization', bearer(superadmin))
        .send({ name: 'Pros only', subject: 'News for {{user_first_name}}', templateId: template.id, targetAudience: 'contractors' })
        .expect(HttpStatus.CREATED);
      const campaign = (created.body as SuccessResponse<EmailCampaign>).data;
      expect(campaign.status).toBe('draft');

      const blocked = await request(getServer())
        .delete(`/api/admin-panel/email-templates/${template.id}`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.CONFLICT);
      expect((blocked.body as ErrorResponse).error.message).toBe('Template is used by a pending campaign');

      const sent = await request(getServer())
        .post(`/api/admin-panel/campaigns/${campaign.id}/send`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      const result = (sent.body as SuccessResponse<EmailCampaign>).data;
      expect(result.status).toBe('sent');
      expect(result.totalRecipients).toBe(1);
      expect(result.deliveredCount).toBe(1);
      expect(context.core.email.outbox[context.core.email.outbox.length - 1]?.subject).toBe('News for campaign-pro');

      const again = await request(getServer())
        .post(`/api/admin-panel/campaigns/${campaign.id}/send`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.CONFLICT);
      expect((again.body as ErrorResponse).error.message).toBe('Campaign has already been sent');

      await request(getServer())
        .delete(`/api/admin-panel/email-templates/${template.id}`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
    });
  });

  // ==========================================================================
  // Push notifications
  // ==========================================================================

  describe('push notifications', () => {
    let pro: TestUser;

    beforeAll(async () => {
      pro = await registerUser(getServer(), 'push-pro', 'contractor');
    });

    it('delivers in-app to the audience and reports analytics', async () => {
      const contractors = (await context.core.accounts.searchUsers('', 'contractor')).length;

      const created = await request(getServer())
        .post('/api/admin-panel/push-notifications')
        .set('Authorization', bearer(superadmin))
        .send({ title: 'New feature', message: 'Portfolio videos are live', targetAudience: 'contractors' })
        .expect(HttpStatus.CREATED);
      const push = (created.body as SuccessResponse<PushNotification>).data;
      expect(push.status).toBe('draft');

      const sent = await request(getServer())
        .post(`/api/admin-panel/push-notifications/${push.id}/send`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      const result = (sent.body as SuccessResponse<PushNotification>).data;
      expect(result.status).toBe('sent');
      expect(result.totalRecipients).toBe(contractors);
      expect(result.deliveredCount).toBe(contractors);

      const inbox = await context.core.notifications.list(pro.user.id);
      expect(inbox.items.map((n) => [n.type, n.title, n.relatedObjectId])).toEqual([['system', 'New feature', push.id]]);

      const analytics = await request(getServer())
        .get('/api/admin-panel/push-notifications/analytics')
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      const stats = (analytics.body as SuccessResponse<PushAnalytics>).data;
      expect(stats.sentNotifications).toBe(1);
      expect(stats.avgDeliveryRate).toBe(100);
      expect(stats.avgOpenRate).toBe(0);

      const reschedule = await request(getServer())
        .post(`/api/admin-panel/push-notifications/${push.id}/schedule`)
        .set('Authorization', bearer(superadmin))
        .send({ scheduledAt: '2999-01-01T00:00:00.000Z' })
        .expect(HttpStatus.CONFLICT);
      expect((reschedule.body as ErrorResponse).error.message).toBe('Only draft notifications can be scheduled');
    });

    it('only schedules in the future', async () => {
      const created = await request(getServer())
        .post('/api/admin-panel/push-notifications')
        .set('Authorization', bearer(superadmin))
        .send({ title: 'Later', message: 'Sent later' })
        .expect(HttpStatus.CREATED);
      const push = (created.body as SuccessResponse<PushNotification>).data;

      const past = await request(getServer())
        .post(`/api/admin-panel/push-notifications/${push.id}/schedule`)
        .set('Authorization', bearer(superadmin))
        .send({ scheduledAt: '2020-01-01T00:00:00.000Z' })
        .expect(HttpStatus.BAD_REQUEST);
      expect((past.body as ErrorResponse).error.message).toBe('Scheduled time must be in the future');

      const scheduled = await request(getServer())
        .post(`/api/admin-panel/push-notifications/${push.id}/schedule`)
        .set('Authorization', bearer(superadmin))
        .send({ scheduledAt: '2999-01-01T00:00:00.000Z' })
        .expect(HttpStatus.OK);
      const body = (scheduled.body as SuccessResponse<PushNotification>).data;
      expect(body.status).toBe('scheduled');
      expect(body.scheduledAt).toBe('2999-01-01T00:00:00.000Z');
    });

    it('creates pushes from templates', async () => {
      const created = await request(getServer())
        .post('/api/admin-panel/push-templates')
        .set('Authorization', bearer(superadmin))
        .send({ name: 'Reminder', category: 'reminder', titleTemplate: 'Hi {{name}}', messageTemplate: 'Finish {{task}}' })
        .expect(HttpStatus.CREATED);
      const pushTemplate = (created.body as SuccessResponse<PushNotificationTemplate>).data;

      const response = await request(getServer())
        .post(`/api/admin-panel/push-templates/${pushTemplate.id}/notifications`)
        .set('Authorization', bearer(superadmin))
        .send({ context: { name: 'team', task: 'your profile' }, targetAudience: 'clients' })
        .expect(HttpStatus.CREATED);

      const push = (response.body as SuccessResponse<PushNotification>).data;
      expect([push.title, push.message, push.targetAudience, push.status]).toEqual([
        'Hi team',
        'Finish your profile',
        'clients',
        'draft',
      ]);
    });
  });

  // ==========================================================================
  // Chats
  // ==========================================================================

  describe('chats', () => {
    it('blocks a room and posts system messages into it', async () => {
      const alice = await registerUser(getServer(), 'blocked-alice');
      const bob = await registerUser(getServer(), 'blocked-bob');
      const room = await context.core.chat.getOrCreateDirectRoom(alice.user.id, bob.user.id);

      const blocked = await request(getServer())
        .post(`/api/admin-panel/chats/${room.id}/block`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      expect((blocked.body as SuccessResponse<ChatRoom>).data.isActive).toBe(false);

      await expect(context.core.chat.sendMessage(room.id, alice.user.id, 'Hello?')).rejects.toThrow(
        'This chat room has been blocked'
      );

      const system = await request(getServer())
        .post(`/api/admin-panel/chats/${room.id}/system-message`)
        .set('Authorization', bearer(superadmin))
        .send({ content: 'This chat is under review' })
        .expect(HttpStatus.CREATED);
      const message = (system.body as SuccessResponse<MessagePayload>).data;
      expect(message.messageType).toBe('system');
      expect(message.sender).toBeNull();

      await request(getServer())
        .post(`/api/admin-panel/chats/${room.id}/unblock`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      const sent = await context.core.chat.sendMessage(room.id, alice.user.id, 'Back again');
      expect(sent.content).toBe('Back again');
    });

    it('posts system messages from message templates', async () => {
      const alice = await registerUser(getServer(), 'templated-alice');
      const bob = await registerUser(getServer(), 'templated-bob');
      const room = await context.core.chat.getOrCreateDirectRoom(alice.user.id, bob.user.id);
      const created = await request(getServer())
        .post('/api/admin-panel/message-templates')
        .set('Authorization', bearer(superadmin))
        .send({ name: 'Under review', category: 'moderation', content: '{{admin_name}} is reviewing this chat' })
        .expect(HttpStatus.CREATED);
      const messageTemplate = (created.body as SuccessResponse<MessageTemplate>).data;

      const response = await request(getServer())
        .post(`/api/admin-panel/chats/${room.id}/system-message`)
        .set('Authorization', bearer(superadmin))
        .send({ templateId: messageTemplate.id })
        .expect(HttpStatus.CREATED);

      expect((response.body as SuccessResponse<MessagePayload>).data.content).toBe('Admin User is reviewing this chat');
      const stored = await request(getServer())
        .get(`/api/admin-panel/message-templates/${messageTemplate.id}`)
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      expect((stored.body as SuccessResponse<MessageTemplate>).data.usageCount).toBe(1);
    });
  });

  // ==========================================================================
  // Advertisements
  // ==========================================================================

  describe('advertisements', () => {
    const ad = {
      title: 'Spring sale',
      imageUrl: 'https://cdn.example.com/spring.png',
      position: 'home_banner',
      startDate: '2020-01-01T00:00:00.000Z',
      endDate: '2999-01-01T00:00:00.000Z',
    };

    it('creates ads from a URL with defaults', async () => {
      const response = await request(getServer())
        .post('/api/admin-panel/advertisements')
        .set('Authorization', bearer(superadmin))
        .send(ad)
        .expect(HttpStatus.CREATED);

      const created = (response.body as SuccessResponse<AdvertisementView>).data;
      expect(created.buttonText).toBe('Learn More');
      expect(created.backgroundColor).toBe('#f97316');
      expect(created.priority).toBe(1);
      expect(created.isCurrentlyActive).toBe(true);
      expect(created.clickThroughRate).toBe(0);
    });

    it('creates ads from an uploaded image', async () => {
      const png = Buffer.from('89504e470d0a1a0a0000000d4948445200000001000000010806000000', 'hex');
      const response = await request(getServer())
        .post('/api/admin-panel/advertisements')
        .set('Authorization', bearer(superadmin))
        .field('title', 'Uploaded')
        .field('position', 'home_slider')
        .field('startDate', ad.startDate)
        .field('endDate', ad.endDate)
        .field('priority', '3')
        .attach('image', png, { filename: 'banner.png', contentType: 'image/png' })
        .expect(HttpStatus.CREATED);

      const created = (response.body as SuccessResponse<AdvertisementView>).data;
      expect(created.imageUrl).toMatch(/^\/media\/advertisements\/.+\.png$/);
      expect(created.priority).toBe(3);
    });

    it('requires an image', async () => {
      const response = await request(getServer())
        .post('/api/admin-panel/advertisements')
        .set('Authorization', bearer(superadmin))
        .send({ ...ad, imageUrl: undefined })
        .expect(HttpStatus.BAD_REQUEST);
      expect((response.body as ErrorResponse).error.message).toBe('An image is required');
    });

    it('rejects an end date before the start date', async () => {
      const response = await request(getServer())
        .post('/api/admin-panel/advertisements')
        .set('Authorization', bearer(superadmin))
        .send({ ...ad, startDate: '2030-01-01T00:00:00.000Z', endDate: '2029-01-01T00:00:00.000Z' })
        .expect(HttpStatus.BAD_REQUEST);
      expect((response.body as ErrorResponse).error.message).toBe('End date must be after start date');
    });
  });

  // ==========================================================================
  // Settings and audit
  // ==========================================================================

  describe('settings and audit', () => {
    it('upserts settings by key', async () => {
      await request(getServer())
        .put('/api/admin-panel/settings/maintenance_mode')
        .set('Authorization', bearer(superadmin))
        .send({ value: 'off', description: 'Maintenance switch' })
        .expect(HttpStatus.OK);

      const updated = await request(getServer())
        .put('/api/admin-panel/settings/maintenance_mode')
        .set('Authorization', bearer(superadmin))
        .set('X-Forwarded-For', '198.51.100.23')
        .send({ value: 'on' })
        .expect(HttpStatus.OK);
      const setting = (updated.body as SuccessResponse<SystemSetting>).data;
      expect(setting.value).toBe('on');
      expect(setting.description).toBe('Maintenance switch');

      const list = await request(getServer())
        .get('/api/admin-panel/settings')
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);
      expect((list.body as SuccessResponse<SystemSetting[]>).data.map((s) => s.key)).toEqual(['maintenance_mode']);
    });

    it('returns 404 for an unknown setting', async () => {
      const response = await request(getServer())
        .get('/api/admin-panel/settings/missing')
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.NOT_FOUND);
      expect((response.body as ErrorResponse).error.message).toBe('Setting not found');
    });

    it('records the client address in the audit log', async () => {
      const response = await request(getServer())
        .get('/api/admin-panel/audit')
        .query({ action: 'settings_change' })
        .set('Authorization', bearer(superadmin))
        .expect(HttpStatus.OK);

      const entries = (response.body as SuccessResponse<Page<AdminActionLog>>).data.items;
      expect(entries).toHaveLength(2);
      const withAddress = entries.filter((entry) => entry.ipAddress === '198.51.100.23');
      expect(withAddress).toHaveLength(1);
      expect(withAddress[0]?.adminId).toBe(superadmin.user.id);
      expect(withAddress[0]?.metadata).toEqual({ value: 'on' });
    });
  });
});
