/**
 * InitialDataService - idempotent seeding of categories, skills and e-mail templates
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { RepositoryProvider } from '../repositories/collections.js';
import { loadCategoryFixtures, loadEmailTemplateFixtures, type CategoryFixture, type EmailTemplateFixture } from '../fixtures.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';

export interface InitialDataResult {
  categoriesCreated: number;
  skillsCreated: number;
  totalCategories: number;
  totalSkills: number;
}

export interface EmailTemplateSetupResult {
  created: number;
  updated: number;
}

export interface SystemSetupResult {
  directories: string[];
  initialData: InitialDataResult;
  emailTemplates: EmailTemplateSetupResult;
}

export class InitialDataService {
  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly logger?: DomainLogger,
    private readonly categories: CategoryFixture[] = loadCategoryFixtures(),
    private readonly templates: EmailTemplateFixture[] = loadEmailTemplateFixtures()
  ) {}

  /**
   * Categories match by slug, skills by name within their category
   */
  public async loadInitialData(): Promise<InitialDataResult> {
    const categories = this.repositories.repository('categories');
    const skills = this.repositories.repository('skills');
    let categoriesCreated = 0;
    let skillsCreated = 0;

    await categories.withLock('seed', async () => {
      for (const fixture of this.categories) {
        let category = await categories.findOne((c) => c.slug === fixture.slug);
        if (category === null) {
          category = await categories.create({
            name: fixture.name,
            slug: fixture.slug,
            icon: fixture.icon,
            description: fixture.description,
            isActive: true,
          });
          categoriesCreated++;
        }
        const categoryId = category.id;
        for (const skillName of fixture.skills) {
          const existing = await skills.findOne((s) => s.categoryId === categoryId && s.name === skillName);
          if (existing === null) {
            await skills.create({ name: skillName, categoryId, isActive: true });
            skillsCreated++;
          }
        }
      }
    });

    const result = {
      categoriesCreated,
      skillsCreated,
      totalCategories: await categories.count(),
      totalSkills: await skills.count(),
    };
    this.logger?.info?.(`Initial data: ${String(categoriesCreated)} categories and ${String(skillsCreated)} skills created`);
    return result;
  }

  /**
   * Upsert the bundled templates by type; existing ones take the bundled content
   */
  public async setupEmailTemplates(): Promise<EmailTemplateSetupResult> {
    const templates = this.repositories.repository('email-templates');
    let created = 0;
    let updated = 0;
    await templates.withLock('seed', async () => {
      for (const fixture of this.templates) {
        const existing = await templates.findOne((t) => t.templateType === fixture.templateType);
        if (existing === null) {
          await templates.create({ ...fixture, isActive: true });
          created++;
        } else {
          await templates.update(existing.id, { ...fixture, isActive: true });
          updated++;
        }
      }
    });
    return { created, updated };
  }

  /**
   * Create the media directories, then seed data and templates
   */
  public async setupSystem(mediaRoot: string, mediaDirectories: readonly string[]): Promise<SystemSetupResult> {
    const directories: string[] = [];
    for (const directory of mediaDirectories) {
      const target = path.join(mediaRoot, directory);
      await fs.mkdir(target, { recursive: true });
      directories.push(target);
    }
    return {
      directories,
      initialData: await this.loadInitialData(),
      emailTemplates: await this.setupEmailTemplates(),
    };
  }
}
