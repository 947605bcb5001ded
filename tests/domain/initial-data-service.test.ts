/**
 * InitialDataService tests
 *
 * Covers:
 * - seeding categories and skills from the bundled fixtures
 * - idempotent re-runs
 * - e-mail template upserts
 * - media directory creation during system setup
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { InitialDataService, loadCategoryFixtures, loadEmailTemplateFixtures } from '@contractor-connect/core';
import { cleanupTestContext, createTestContext, type TestContext } from '../helpers/test-utils.js';

describe('InitialDataService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext('initial-data');
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  describe('loadInitialData', () => {
    it('should create every bundled category and skill once', async () => {
      const fixtures = loadCategoryFixtures();
      const skillCount = fixtures.reduce((sum, category) => sum + category.skills.length, 0);

      const first = await ctx.services.initialData.loadInitialData();
      const second = await ctx.services.initialData.loadInitialData();

      expect(first).toEqual({
        categoriesCreated: fixtures.length,
        skillsCreated: skillCount,
        totalCategories: fixtures.length,
        totalSkills: skillCount,
      });
      expect(second).toMatchObject({ categoriesCreated: 0, skillsCreated: 0, totalCategories: fixtures.length });
    });

    it('should add only missing skills to an existing category', async () => {
      const service = new InitialDataService(
        ctx.services.repositories,
        undefined,
        [{ name: 'Plumbing', slug: 'plumbing', icon: 'wrench', description: 'Pipes', skills: ['Leak repair'] }],
        []
      );
      await service.loadInitialData();

      const extended = new InitialDataService(
        ctx.services.repositories,
        undefined,
        [{ name: 'Plumbing', slug: 'plumbing', icon: 'wrench', description: 'Pipes', skills: ['Leak repair', 'Drain cleaning'] }],
        []
      );
      const result = await extended.loadInitialData();

      expect(result).toEqual({ categoriesCreated: 0, skillsCreated: 1, totalCategories: 1, totalSkills: 2 });
    });
  });

  describe('setupEmailTemplates', () => {
    it('should create templates, then refresh them in place', async () => {
      const count = loadEmailTemplateFixtures().length;

      const created = await ctx.services.initialData.setupEmailTemplates();
      const refreshed = await ctx.services.initialData.setupEmailTemplates();

      expect(created).toEqual({ created: count, updated: 0 });
      expect(refreshed).toEqual({ created: 0, updated: count });
      const welcome = await ctx.services.mailer.findActiveTemplate('welcome');
      expect(welcome?.isActive).toBe(true);
    });
  });

  describe('setupSystem', () => {
    it('should create the media directories before seeding', async () => {
      const result = await ctx.services.initialData.setupSystem(ctx.mediaDir, ['avatars', 'chat_files']);

      expect(result.directories).toEqual([path.join(ctx.mediaDir, 'avatars'), path.join(ctx.mediaDir, 'chat_files')]);
      const stat = await fs.stat(path.join(ctx.mediaDir, 'chat_files'));
      expect(stat.isDirectory()).toBe(true);
      expect(result.initialData.totalCategories).toBeGreaterThan(0);
    });
  });
});
