/**
 * Notifications API E2E Tests
 */

import request from 'supertest';
import { HttpStatus } from '@nestjs/common';
import type { Notification, NotificationPreferences, NotificationStats, Page } from '@contractor-connect/core';
import {
  createTestApp,
  cleanupTestApp,
  registerUser,
  bearer,
  type TestContext,
  type TestServer,
  type TestUser,
  type SuccessResponse,
  type ErrorResponse,
} from './setup.js';

describe('Notifications API (e2e)', () => {
  let context: TestContext;

  beforeAll(async () => {
    context = await createTestApp();
  });

  afterAll(async () => {
    await cleanupTestApp(context);
  });

  function getServer(): TestServer {
    return context.app.getHttpServer();
  }

  async function notify(user: TestUser, type: Notification['type'], title: string): Promise<Notification> {
    const notification = await context.core.notifications.createNotification({
      userId: user.user.id,
      type,
      title,
      message: `${title} message`,
    });
    if (notification === null) {
      throw new Error('Notification was not delivered in-app');
    }
    return notification;
  }

  it('requires authentication', async () => {
    await request(getServer()).get('/api/notifications').expect(HttpStatus.UNAUTHORIZED);
  });

  describe('reading', () => {
    let user: TestUser;
    let update: Notification;
    let system: Notification;

    beforeAll(async () => {
      user = await registerUser(getServer(), 'notified');
      update = await notify(user, 'project_update', 'Project moved');
      system = await notify(user, 'system', 'Maintenance tonight');
    });

    it('lists the caller notifications and filters by type', async () => {
      const all = await request(getServer())
        .get('/api/notifications')
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);
      const page = (all.body as SuccessResponse<Page<Notification>>).data;
      expect(page.total).toBe(2);
      expect(page.items.map((n) => n.id).sort()).toEqual([update.id, system.id].sort());

      const filtered = await request(getServer())
        .get('/api/notifications')
        .query({ type: 'system' })
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);
      expect((filtered.body as SuccessResponse<Page<Notification>>).data.items.map((n) => n.id)).toEqual([system.id]);
    });

    it('marks one notification read and updates the unread count', async () => {
      const read = await request(getServer())
        .post(`/api/notifications/${update.id}/read`)
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);
      const notification = (read.body as SuccessResponse<Notification>).data;
      expect(notification.isRead).toBe(true);
      expect(typeof notification.readAt).toBe('string');

      const count = await request(getServer())
        .get('/api/notifications/unread-count')
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);
      expect((count.body as SuccessResponse<{ count: number }>).data.count).toBe(1);

      const unread = await request(getServer())
        .get('/api/notifications')
        .query({ isRead: 'false' })
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);
      expect((unread.body as SuccessResponse<Page<Notification>>).data.items.map((n) => n.id)).toEqual([system.id]);
    });

    it('reports stats per type', async () => {
      const response = await request(getServer())
        .get('/api/notifications/stats')
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);

      expect((response.body as SuccessResponse<NotificationStats>).data).toEqual({
        total: 2,
        unread: 1,
        byType: { project_update: 1, system: 1 },
      });
    });

    it('marks everything read', async () => {
      const response = await request(getServer())
        .post('/api/notifications/mark-all-read')
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);
      expect((response.body as SuccessResponse<{ updated: number }>).data.updated).toBe(1);
    });

    it('hides notifications of other users', async () => {
      const other = await registerUser(getServer(), 'nosy');

      const response = await request(getServer())
        .get(`/api/notifications/${system.id}`)
        .set('Authorization', bearer(other))
        .expect(HttpStatus.NOT_FOUND);
      expect((response.body as ErrorResponse).error.message).toBe('Notification not found');

      await request(getServer())
        .delete(`/api/notifications/${system.id}`)
        .set('Authorization', bearer(other))
        .expect(HttpStatus.NOT_FOUND);
    });
  });

  describe('clicks', () => {
    it('records the click and reads the notification', async () => {
      const user = await registerUser(getServer(), 'clicker');
      const offer = await notify(user, 'system', 'Spring offer');

      const res = await request(getServer())
        .post(`/api/notifications/${offer.id}/click`)
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);

      const clicked = (res.body as SuccessResponse<Notification>).data;
      expect([clicked.id, clicked.isRead, typeof clicked.clickedAt]).toEqual([offer.id, true, 'string']);
    });
  });

  describe('bulk operations', () => {
    it('only touches the caller notifications', async () => {
      const owner = await registerUser(getServer(), 'bulk-owner');
      const stranger = await registerUser(getServer(), 'bulk-stranger');
      const first = await notify(owner, 'system', 'First');
      const second = await notify(owner, 'system', 'Second');
      const foreign = await notify(stranger, 'system', 'Foreign');

      const read = await request(getServer())
        .post('/api/notifications/bulk-read')
        .set('Authorization', bearer(owner))
        .send({ ids: [first.id, foreign.id] })
        .expect(HttpStatus.OK);
      expect((read.body as SuccessResponse<{ updated: number }>).data.updated).toBe(1);

      const deleted = await request(getServer())
        .post('/api/notifications/bulk-delete')
        .set('Authorization', bearer(owner))
        .send({ ids: [first.id, second.id, foreign.id] })
        .expect(HttpStatus.OK);
      expect((deleted.body as SuccessResponse<{ deleted: number }>).data.deleted).toBe(2);

      const remaining = await context.core.notifications.list(stranger.user.id);
      expect(remaining.items.map((n) => n.id)).toEqual([foreign.id]);
    });

    it('rejects an empty id list', async () => {
      const user = await registerUser(getServer(), 'bulk-empty');
      await request(getServer())
        .post('/api/notifications/bulk-read')
        .set('Authorization', bearer(user))
        .send({ ids: [] })
        .expect(HttpStatus.BAD_REQUEST);
    });
  });

  describe('preferences', () => {
    it('creates defaults on first read', async () => {
      const user = await registerUser(getServer(), 'pref-default');

      const response = await request(getServer())
        .get('/api/notifications/preferences')
        .set('Authorization', bearer(user))
        .expect(HttpStatus.OK);

      const preferences = (response.body as SuccessResponse<NotificationPreferences>).data;
      expect(preferences.inapp).toEqual({ projectUpdates: true, newMessages: true, applications: true, reviews: true });
      expect(preferences.emailMarketing).toBe(false);
    });

    it('merges partial updates and stops in-app delivery for switched off categories', async () => {
      const user = await registerUser(getServer(), 'pref-quiet');

      const response = await request(getServer())
        .patch('/api/notifications/preferences')
        .set('Authorization', bearer(user))
        .send({ inapp: { projectUpdates: false }, emailMarketing: true })
        .expect(HttpStatus.OK);

      const preferences = (response.body as SuccessResponse<NotificationPreferences>).data;
      expect(preferences.inapp).toEqual({ projectUpdates: false, newMessages: true, applications: true, reviews: true });
      expect(preferences.email.projectUpdates).toBe(true);
      expect(preferences.emailMarketing).toBe(true);

      const skipped = await context.core.notifications.createNotification({
        userId: user.user.id,
        type: 'project_completed',
        title: 'Done',
        message: 'Project done',
      });
      expect(skipped).toBeNull();

      const delivered = await context.core.notifications.createNotification({
        userId: user.user.id,
        type: 'system',
        title: 'Always',
        message: 'System messages ignore preferences',
      });
      expect(delivered?.type).toBe('system');
    });
  });
});
