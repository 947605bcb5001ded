/**
 * AccountService tests
 *
 * Covers:
 * - registration validation and side effects
 * - login, logout, refresh and authentication
 * - profile updates, password changes and avatars
 * - addresses with a single default
 * - admin provisioning through ensureUser
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { AuthenticationError, ConflictError, NotFoundError, ValidationError } from '@contractor-connect/core';
import {
  TEST_PASSWORD,
  cleanupTestContext,
  createTestContext,
  pngUpload,
  registerUser,
  type TestContext,
} from '../helpers/test-utils.js';

describe('AccountService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext('account-service');
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  const registration = (overrides: Partial<{ email: string; username: string; password: string; passwordConfirm: string }> = {}) => ({
    email: overrides.email ?? 'Alice@Example.com',
    username: overrides.username ?? 'alice',
    password: overrides.password ?? TEST_PASSWORD,
    passwordConfirm: overrides.passwordConfirm ?? overrides.password ?? TEST_PASSWORD,
    firstName: 'Alice',
    lastName: 'Smith',
  });

  // ============================================================================
  // Registration
  // ============================================================================

  describe('register', () => {
    it('should create a client with normalized e-mail and a token pair', async () => {
      const { user, tokens } = await ctx.services.accounts.register(registration());

      expect(user.email).toBe('alice@example.com');
      expect(user.userType).toBe('client');
      expect(user.fullName).toBe('Alice Smith');
      expect(user.isActive).toBe(true);
      expect(user).not.toHaveProperty('passwordHash');
      expect(ctx.services.tokens.verifyAccessToken(tokens.access).sub).toBe(user.id);
    });

    it('should create notification preferences for the new user', async () => {
      const { user } = await ctx.services.accounts.register(registration());

      const preferences = await ctx.services.repositories.repository('notification-preferences').findByIdOrNull(user.id);

      expect(preferences?.email.newMessages).toBe(true);
      expect(preferences?.inapp.reviews).toBe(true);
    });

    it('should send the welcome e-mail once templates exist', async () => {
      await ctx.services.initialData.setupEmailTemplates();

      await ctx.services.accounts.register(registration());

      expect(ctx.services.email.outbox).toHaveLength(1);
      expect(ctx.services.email.outbox[0]?.to).toBe('alice@example.com');
      expect(ctx.services.email.outbox[0]?.subject).toBe('Welcome to Contractor Connect');
      expect(ctx.services.email.outbox[0]?.text).toContain('Hi Alice,');
    });

    it('should not send anything without a welcome template', async () => {
      await ctx.services.accounts.register(registration());

      expect(ctx.services.email.outbox).toHaveLength(0);
    });

    it('should reject a short password', async () => {
      await expect(ctx.services.accounts.register(registration({ password: 'short' }))).rejects.toThrow(
        'This password is too short. It must contain at least 8 characters.'
      );
    });

    it('should reject mismatched passwords', async () => {
      await expect(
        ctx.services.accounts.register(registration({ passwordConfirm: 'different-password' }))
      ).rejects.toThrow("Passwords don't match");
    });

    it('should reject an invalid username', async () => {
      await expect(ctx.services.accounts.register(registration({ username: 'has space' }))).rejects.toThrow(ValidationError);
    });

    it('should reject a taken e-mail regardless of case', async () => {
      await ctx.services.accounts.register(registration());

      await expect(
        ctx.services.accounts.register(registration({ email: 'ALICE@example.com', username: 'alice2' }))
      ).rejects.toThrow('A user with this email already exists');
    });

    it('should reject a taken username', async () => {
      await ctx.services.accounts.register(registration());

      await expect(
        ctx.services.accounts.register(registration({ email: 'other@example.com' }))
      ).rejects.toThrow(ConflictError);
    });
  });

  // ============================================================================
  // Sessions
  // ============================================================================

  describe('login and tokens', () => {
    beforeEach(async () => {
      await ctx.services.accounts.register(registration());
    });

    it('should mark the user online on login', async () => {
      const { user } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);

      expect(user.isOnline).toBe(true);
      expect(user.lastLoginAt).toBeDefined();
      expect(await ctx.services.accounts.isUserOnline(user.id)).toBe(true);
    });

    it('should reject a wrong password', async () => {
      await expect(ctx.services.accounts.login('alice@example.com', 'wrong-password')).rejects.toThrow('Invalid credentials.');
    });

    it('should reject a disabled account', async () => {
      const user = await ctx.services.accounts.findByEmail('alice@example.com');
      await ctx.services.repositories.repository('users').update(user?.id ?? '', { isActive: false });

      await expect(ctx.services.accounts.login('alice@example.com', TEST_PASSWORD)).rejects.toThrow('User account is disabled.');
    });

    it('should revoke the refresh token and go offline on logout', async () => {
      const { user, tokens } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);

      await ctx.services.accounts.logout(user.id, tokens.refresh);

      expect(await ctx.services.accounts.isUserOnline(user.id)).toBe(false);
      await expect(ctx.services.accounts.refresh(tokens.refresh)).rejects.toThrow('Token is blacklisted');
    });

    it('should answer logout with a bad token as a validation error', async () => {
      const { user } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);

      await expect(ctx.services.accounts.logout(user.id, 'garbage')).rejects.toThrow(ValidationError);
      await expect(ctx.services.accounts.logout(user.id, 'garbage')).rejects.toThrow('Invalid token');
    });

    it('should rotate tokens on refresh', async () => {
      const { tokens } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);

      const rotated = await ctx.services.accounts.refresh(tokens.refresh);

      expect(rotated.access).not.toBe(tokens.access);
    });

    it('should rotate a replayed refresh token only once', async () => {
      const { tokens } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);

      const results = await Promise.allSettled(
        Array.from({ length: 6 }, () => ctx.services.accounts.refresh(tokens.refresh))
      );

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(failures).toHaveLength(5);
      for (const failure of failures) {
        expect(failure.reason).toBeInstanceOf(AuthenticationError);
        expect((failure.reason as AuthenticationError).message).toBe('Token is blacklisted');
      }
    });

    it('should authenticate an access token', async () => {
      const { user, tokens } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);

      const authenticated = await ctx.services.accounts.authenticate(tokens.access);

      expect(authenticated.user.id).toBe(user.id);
      expect(authenticated.claims.userType).toBe('client');
    });

    it('should refuse tokens of deactivated users', async () => {
      const { user, tokens } = await ctx.services.accounts.login('alice@example.com', TEST_PASSWORD);
      await ctx.services.repositories.repository('users').update(user.id, { isActive: false });

      await expect(ctx.services.accounts.authenticate(tokens.access)).rejects.toThrow(AuthenticationError);
      await expect(ctx.services.accounts.authenticate(tokens.access)).rejects.toThrow('User is inactive');
    });
  });

  // ============================================================================
  // Profile
  // ============================================================================

  describe('profile', () => {
    it('should update profile fields', async () => {
      const user = await registerUser(ctx, 'carol');

      const updated = await ctx.services.accounts.updateProfile(user.id, {
        firstName: '  Caroline ',
        location: '40.7128,-74.0060',
        skills: ['tiling'],
      });

      expect(updated.firstName).toBe('Caroline');
      expect(updated.fullName).toBe('Caroline Tester');
      expect(updated.location).toBe('40.7128,-74.0060');
      expect(updated.skills).toEqual(['tiling']);
    });

    it('should reject a negative hourly rate', async () => {
      const user = await registerUser(ctx, 'carol');

      await expect(ctx.services.accounts.updateProfile(user.id, { hourlyRate: -1 })).rejects.toThrow(ValidationError);
    });

    it('should report client statistics', async () => {
      const user = await registerUser(ctx, 'carol');

      const stats = await ctx.services.accounts.profileStats(user.id);

      expect(stats).toEqual({
        memberSince: new Date(user.createdAt).getUTCFullYear(),
        isVerified: false,
        totalProjects: 0,
        activeProjects: 0,
        completedProjects: 0,
      });
    });

    it('should store an avatar under the media root', async () => {
      const user = await registerUser(ctx, 'carol');

      const { avatar } = await ctx.services.accounts.uploadAvatar(user.id, pngUpload('face.png'));

      expect(avatar).toMatch(/^\/media\/avatars\/.+\.png$/);
      expect((await ctx.services.accounts.getProfile(user.id)).avatar).toBe(avatar);
    });

    it('should reject avatars that are not images', async () => {
      const user = await registerUser(ctx, 'carol');

      await expect(
        ctx.services.accounts.uploadAvatar(user.id, { ...pngUpload('notes.txt'), mimeType: 'text/plain' })
      ).rejects.toThrow('Invalid file type. Only JPEG, PNG, GIF, and WebP are allowed.');
    });

    it('should change the password after checking the old one', async () => {
      const user = await registerUser(ctx, 'carol');

      await expect(
        ctx.services.accounts.changePassword(user.id, {
          oldPassword: 'not-my-password',
          newPassword: 'another-password',
          newPasswordConfirm: 'another-password',
        })
      ).rejects.toThrow('Old password is incorrect');

      await ctx.services.accounts.changePassword(user.id, {
        oldPassword: TEST_PASSWORD,
        newPassword: 'another-password',
        newPasswordConfirm: 'another-password',
      });

      await expect(ctx.services.accounts.login('carol@example.com', 'another-password')).resolves.toBeDefined();
    });

    it('should throw NotFoundError for an unknown user', async () => {
      await expect(ctx.services.accounts.getUser('missing')).rejects.toThrow(NotFoundError);
      await expect(ctx.services.accounts.getUser('missing')).rejects.toThrow('User not found');
    });

    it('should search active users by name', async () => {
      await registerUser(ctx, 'zoe');
      await registerUser(ctx, 'zack', 'contractor');
      const hidden = await registerUser(ctx, 'zelda');
      await ctx.services.repositories.repository('users').update(hidden.id, { isActive: false });

      expect((await ctx.services.accounts.searchUsers('Z')).map((u) => u.username)).toEqual(['zack', 'zoe']);
      expect((await ctx.services.accounts.searchUsers('z', 'contractor')).map((u) => u.username)).toEqual(['zack']);
    });
  });

  // ============================================================================
  // Addresses
  // ============================================================================

  describe('addresses', () => {
    const address = (title: string, isDefault?: boolean) => ({
      title,
      streetAddress: '1 Main St',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62701',
      isDefault,
    });

    it('should make the first address the default', async () => {
      const user = await registerUser(ctx, 'dave');

      const created = await ctx.services.accounts.createAddress(user.id, address('Home'));

      expect(created.isDefault).toBe(true);
      expect(created.country).toBe('USA');
    });

    it('should keep a single default', async () => {
      const user = await registerUser(ctx, 'dave');
      const home = await ctx.services.accounts.createAddress(user.id, address('Home'));
      const office = await ctx.services.accounts.createAddress(user.id, address('Office', true));

      const listed = await ctx.services.accounts.listAddresses(user.id);

      expect(listed.map((a) => [a.title, a.isDefault])).toEqual([
        ['Office', true],
        ['Home', false],
      ]);

      await ctx.services.accounts.updateAddress(user.id, home.id, { isDefault: true });
      expect((await ctx.services.accounts.getAddress(user.id, office.id)).isDefault).toBe(false);
    });

    it("should hide other users' addresses", async () => {
      const owner = await registerUser(ctx, 'dave');
      const other = await registerUser(ctx, 'erin');
      const created = await ctx.services.accounts.createAddress(owner.id, address('Home'));

      await expect(ctx.services.accounts.getAddress(other.id, created.id)).rejects.toThrow('Address not found');
      await expect(ctx.services.accounts.deleteAddress(other.id, created.id)).rejects.toThrow(NotFoundError);
    });
  });

  // ============================================================================
  // Provisioning
  // ============================================================================

  describe('ensureUser', () => {
    it('should create a verified user and reuse it afterwards', async () => {
      const first = await ctx.services.accounts.ensureUser({
        email: 'admin@example.com',
        password: 'test-secret',
        firstName: 'Admin',
        lastName: 'User',
        isStaff: true,
      });
      const second = await ctx.services.accounts.ensureUser({
        email: 'admin@example.com',
        password: 'test-secret-2',
        firstName: 'Admin',
        lastName: 'User',
      });

      expect(first.created).toBe(true);
      expect(first.user.username).toBe('admin');
      expect(first.user.isVerified).toBe(true);
      expect(second.created).toBe(false);
      expect(second.user.id).toBe(first.user.id);
      expect(second.user.isStaff).toBe(true);
      await expect(ctx.services.accounts.verifyCredentials('admin@example.com', 'test-secret-2')).resolves.toBeDefined();
    });

    it('should pick a free username', async () => {
      await registerUser(ctx, 'admin');

      const { user } = await ctx.services.accounts.ensureUser({
        email: 'admin@corp.example.com',
        password: 'test-secret',
        firstName: 'Admin',
        lastName: 'User',
      });

      expect(user.username).toBe('admin1');
    });
  });
});
