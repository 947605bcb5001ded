/**
 * Auth API E2E Tests
 */

import request from 'supertest';
import { HttpStatus } from '@nestjs/common';
import type { Address, AuthTokens, PublicUser } from '@contractor-connect/core';
import {
  createTestApp,
  cleanupTestApp,
  registerUser,
  bearer,
  TEST_PASSWORD,
  type TestContext,
  type TestServer,
  type SuccessResponse,
  type ErrorResponse,
} from './setup.js';

describe('Auth API (e2e)', () => {
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

  // ==========================================================================
  // Registration
  // ==========================================================================

  describe('POST /api/auth/register', () => {
    it('creates a client by default and hides credentials', async () => {
      const response = await request(getServer())
        .post('/api/auth/register')
        .send({
          email: 'Alice@Example.com',
          username: 'alice',
          password: TEST_PASSWORD,
          passwordConfirm: TEST_PASSWORD,
          firstName: 'Alice',
          lastName: 'Smith',
        })
        .expect(HttpStatus.CREATED);

      const body = response.body as SuccessResponse<{ user: PublicUser & Record<string, unknown>; tokens: AuthTokens }>;
      expect(body.success).toBe(true);
      expect(body.data.user.email).toBe('alice@example.com');
      expect(body.data.user.userType).toBe('client');
      expect(body.data.user.fullName).toBe('Alice Smith');
      expect(body.data.user.passwordHash).toBeUndefined();
      expect(typeof body.data.tokens.access).toBe('string');
      expect(typeof body.data.tokens.refresh).toBe('string');
    });

    it('rejects a duplicate e-mail with 409', async () => {
      await registerUser(getServer(), 'dupe');

      const response = await request(getServer())
        .post('/api/auth/register')
        .send({
          email: 'dupe@example.com',
          username: 'dupe2',
          password: TEST_PASSWORD,
          passwordConfirm: TEST_PASSWORD,
        })
        .expect(HttpStatus.CONFLICT);

      const body = response.body as ErrorResponse;
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('CONFLICT');
      expect(body.error.message).toBe('A user with this email already exists');
    });

    it('rejects mismatched passwords', async () => {
      const response = await request(getServer())
        .post('/api/auth/register')
        .send({
          email: 'mismatch@example.com',
          username: 'mismatch',
          password: TEST_PASSWORD,
          passwordConfirm: 'another-password',
        })
        .expect(HttpStatus.BAD_REQUEST);

      const body = response.body as ErrorResponse;
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe("Passwords don't match");
    });

    it('rejects unknown fields through the validation pipe', async () => {
      const response = await request(getServer())
        .post('/api/auth/register')
        .send({
          email: 'extra@example.com',
          username: 'extra',
          password: TEST_PASSWORD,
          passwordConfirm: TEST_PASSWORD,
          isStaff: true,
        })
        .expect(HttpStatus.BAD_REQUEST);

      const body = response.body as ErrorResponse;
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe('Validation failed');
    });
  });

  // ==========================================================================
  // Login, refresh and logout
  // ==========================================================================

  describe('sessions', () => {
    it('logs in with valid credentials', async () => {
      await registerUser(getServer(), 'bob', 'contractor');

      const response = await request(getServer())
        .post('/api/auth/login')
        .send({ email: 'bob@example.com', password: TEST_PASSWORD })
        .expect(HttpStatus.OK);

      const body = response.body as SuccessResponse<{ user: PublicUser; tokens: AuthTokens }>;
      expect(body.data.user.username).toBe('bob');
      expect(body.data.user.isOnline).toBe(true);
    });

    it('rejects a wrong password with 400', async () => {
      const response = await request(getServer())
        .post('/api/auth/login')
        .send({ email: 'bob@example.com', password: 'wrong-password' })
        .expect(HttpStatus.BAD_REQUEST);

      const body = response.body as ErrorResponse;
      expect(body.error.message).toBe('Invalid credentials.');
    });

    it('rotates refresh tokens and refuses the old one', async () => {
      const carol = await registerUser(getServer(), 'carol');

      const rotated = await request(getServer())
        .post('/api/auth/token/refresh')
        .send({ refresh: carol.refresh })
        .expect(HttpStatus.OK);
      const tokens = (rotated.body as SuccessResponse<AuthTokens>).data;
      expect(tokens.refresh).not.toBe(carol.refresh);

      const reused = await request(getServer())
        .post('/api/auth/token/refresh')
        .send({ refresh: carol.refresh })
        .expect(HttpStatus.UNAUTHORIZED);
      const body = reused.body as ErrorResponse;
      expect(body.error.code).toBe('AUTHENTICATION_FAILED');
      expect(body.error.message).toBe('Token is blacklisted');
    });

    it('refuses a malformed refresh token', async () => {
      const response = await request(getServer())
        .post('/api/auth/token/refresh')
        .send({ refresh: 'not-a-token' })
        .expect(HttpStatus.UNAUTHORIZED);

      expect((response.body as ErrorResponse).error.message).toBe('Token is invalid or expired');
    });

    it('logs out and revokes the refresh token', async () => {
      const dave = await registerUser(getServer(), 'dave');

      const response = await request(getServer())
        .post('/api/auth/logout')
        .set('Authorization', bearer(dave))
        .send({ refresh: dave.refresh })
        .expect(HttpStatus.OK);
      expect((response.body as SuccessResponse<{ message: string }>).data.message).toBe('Successfully logged out');

      await request(getServer())
        .post('/api/auth/token/refresh')
        .send({ refresh: dave.refresh })
        .expect(HttpStatus.UNAUTHORIZED);
    });

    it('refuses to log out with another user refresh token', async () => {
      const erin = await registerUser(getServer(), 'erin');
      const frank = await registerUser(getServer(), 'frank');

      const response = await request(getServer())
        .post('/api/auth/logout')
        .set('Authorization', bearer(erin))
        .send({ refresh: frank.refresh })
        .expect(HttpStatus.BAD_REQUEST);
      expect((response.body as ErrorResponse).error.message).toBe('Invalid token');
    });
  });

  // ==========================================================================
  // Profile
  // ==========================================================================

  describe('profile', () => {
    it('requires a bearer token', async () => {
      const response = await request(getServer()).get('/api/auth/profile').expect(HttpStatus.UNAUTHORIZED);

      const body = response.body as ErrorResponse;
      expect(body.error.code).toBe('AUTHENTICATION_FAILED');
      expect(body.error.message).toBe('Authentication credentials were not provided.');
    });

    it('rejects a forged bearer token', async () => {
      await request(getServer())
        .get('/api/auth/profile')
        .set('Authorization', 'Bearer forged')
        .expect(HttpStatus.UNAUTHORIZED);
    });

    it('updates and returns the own profile', async () => {
      const grace = await registerUser(getServer(), 'grace', 'contractor');

      await request(getServer())
        .patch('/api/auth/profile')
        .set('Authorization', bearer(grace))
        .send({ firstName: '  Grace ', location: 'Austin, TX', hourlyRate: 75 })
        .expect(HttpStatus.OK);

      const response = await request(getServer())
        .get('/api/auth/profile')
        .set('Authorization', bearer(grace))
        .expect(HttpStatus.OK);
      const profile = (response.body as SuccessResponse<PublicUser>).data;
      expect(profile.firstName).toBe('Grace');
      expect(profile.location).toBe('Austin, TX');
      expect(profile.fullName).toBe('Grace Tester');
    });

    it('changes the password', async () => {
      const heidi = await registerUser(getServer(), 'heidi');

      await request(getServer())
        .post('/api/auth/change-password')
        .set('Authorization', bearer(heidi))
        .send({ oldPassword: 'wrong-password', newPassword: 'brand-new-pass', newPasswordConfirm: 'brand-new-pass' })
        .expect(HttpStatus.BAD_REQUEST);

      await request(getServer())
        .post('/api/auth/change-password')
        .set('Authorization', bearer(heidi))
        .send({ oldPassword: TEST_PASSWORD, newPassword: 'brand-new-pass', newPasswordConfirm: 'brand-new-pass' })
        .expect(HttpStatus.OK);

      await request(getServer())
        .post('/api/auth/login')
        .send({ email: 'heidi@example.com', password: 'brand-new-pass' })
        .expect(HttpStatus.OK);
    });
  });

  // ==========================================================================
  // Addresses
  // ==========================================================================

  describe('addresses', () => {
    const address = {
      title: 'Home',
      streetAddress: '1 Main St',
      city: 'Springfield',
      state: 'IL',
      postalCode: '62701',
    };

    it('makes the first address the default and moves the default on request', async () => {
      const ivan = await registerUser(getServer(), 'ivan');

      const first = await request(getServer())
        .post('/api/auth/addresses')
        .set('Authorization', bearer(ivan))
        .send(address)
        .expect(HttpStatus.CREATED);
      const home = (first.body as SuccessResponse<Address>).data;
      expect(home.isDefault).toBe(true);
      expect(home.country).toBe('USA');

      const second = await request(getServer())
        .post('/api/auth/addresses')
        .set('Authorization', bearer(ivan))
        .send({ ...address, title: 'Office', isDefault: true })
        .expect(HttpStatus.CREATED);
      const office = (second.body as SuccessResponse<Address>).data;

      const list = await request(getServer())
        .get('/api/auth/addresses')
        .set('Authorization', bearer(ivan))
        .expect(HttpStatus.OK);
      const addresses = (list.body as SuccessResponse<Address[]>).data;
      expect(addresses.map((a) => [a.id, a.isDefault])).toEqual([
        [office.id, true],
        [home.id, false],
      ]);
    });

    it('hides addresses of other users', async () => {
      const judy = await registerUser(getServer(), 'judy');
      const mallory = await registerUser(getServer(), 'mallory');

      const created = await request(getServer())
        .post('/api/auth/addresses')
        .set('Authorization', bearer(judy))
        .send(address)
        .expect(HttpStatus.CREATED);
      const id = (created.body as SuccessResponse<Address>).data.id;

      const response = await request(getServer())
        .get(`/api/auth/addresses/${id}`)
        .set('Authorization', bearer(mallory))
        .expect(HttpStatus.NOT_FOUND);
      expect((response.body as ErrorResponse).error.message).toBe('Address not found');

      await request(getServer())
        .delete(`/api/auth/addresses/${id}`)
        .set('Authorization', bearer(judy))
        .expect(HttpStatus.OK);
    });
  });

  // ==========================================================================
  // Directory
  // ==========================================================================

  describe('GET /api/auth/users/search', () => {
    it('filters by name and user type, sorted by username', async () => {
      const searcher = await registerUser(getServer(), 'searcher');
      await registerUser(getServer(), 'plumber-zed', 'contractor');
      await registerUser(getServer(), 'plumber-amy', 'contractor');
      await registerUser(getServer(), 'plumber-client');

      const response = await request(getServer())
        .get('/api/auth/users/search')
        .query({ q: 'PLUMBER', userType: 'contractor' })
        .set('Authorization', bearer(searcher))
        .expect(HttpStatus.OK);

      const users = (response.body as SuccessResponse<PublicUser[]>).data;
      expect(users.map((u) => u.username)).toEqual(['plumber-amy', 'plumber-zed']);
    });
  });
});
