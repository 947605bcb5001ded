/**
 * E2E Test Setup for web-server
 * Provides utilities for creating test applications and managing test storage
 */

import 'reflect-metadata';
import { Test, type TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import request from 'supertest';
import type { AdminRoleName, CoreServices, PublicUser, UserType } from '@contractor-connect/core';
import { AppModule } from '../src/app.module.js';
import { configureApp } from '../src/app.setup.js';
import { readAppConfig } from '../src/config/index.js';
import { CORE_SERVICES } from '../src/modules/core/index.js';

export const TEST_PASSWORD = 'test-password-1';

export interface TestContext {
  app: NestExpressApplication;
  core: CoreServices;
  rootPath: string;
}

export type TestServer = ReturnType<NestExpressApplication['getHttpServer']>;

/**
 * Creates the full application against a unique temporary storage directory
 */
export async function createTestApp(): Promise<TestContext> {
  const rootPath = fs.mkdtempSync(path.join(os.tmpdir(), 'contractor-connect-test-'));
  process.env.STORAGE_PATH = path.join(rootPath, 'data');
  process.env.MEDIA_PATH = path.join(rootPath, 'media');

  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication<NestExpressApplication>({ logger: false });

  // Apply same global configuration as production
  configureApp(app, readAppConfig(app.get(ConfigService)));

  await app.init();

  return { app, core: app.get<CoreServices>(CORE_SERVICES), rootPath };
}

/**
 * Cleans up test resources after tests complete
 */
export async function cleanupTestApp(context: TestContext): Promise<void> {
  await context.app.close();

  if (fs.existsSync(context.rootPath)) {
    fs.rmSync(context.rootPath, { recursive: true, force: true });
  }
}

/**
 * Response wrapper type matching TransformInterceptor output
 */
export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
  };
  path: string;
}

export interface TestUser {
  user: PublicUser;
  token: string;
  refresh: string;
}

/**
 * Registers through the API and returns the issued tokens
 */
export async function registerUser(
  server: TestServer,
  username: string,
  userType: UserType = 'client'
): Promise<TestUser> {
  const response = await request(server)
    .post('/api/auth/register')
    .send({
      email: `${username}@example.com`,
      username,
      password: TEST_PASSWORD,
      passwordConfirm: TEST_PASSWORD,
      firstName: username,
      lastName: 'Tester',
      userType,
    })
    .expect(201);
  const body = response.body as SuccessResponse<{ user: PublicUser; tokens: { access: string; refresh: string } }>;
  return { user: body.data.user, token: body.data.tokens.access, refresh: body.data.tokens.refresh };
}

/**
 * Creates an admin through the core service, then logs in through the admin panel
 */
export async function createAdminUser(
  context: TestContext,
  email: string,
  role: AdminRoleName = 'superadmin'
): Promise<TestUser> {
  await context.core.admin.createAdmin(email, TEST_PASSWORD, role);
  const response = await request(context.app.getHttpServer())
    .post('/api/admin-panel/login')
    .send({ email, password: TEST_PASSWORD })
    .expect(200);
  const body = response.body as SuccessResponse<{ user: PublicUser; tokens: { access: string; refresh: string } }>;
  return { user: body.data.user, token: body.data.tokens.access, refresh: body.data.tokens.refresh };
}

export function bearer(user: TestUser): string {
  return `Bearer ${user.token}`;
}
