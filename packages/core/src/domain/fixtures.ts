/**
 * Bundled seed data: categories and skills, the moderation lexicon and the
 * default e-mail templates. Validated with zod when first read.
 */

import { z } from 'zod';
import categoriesData from '../../data/categories.json';
import lexiconData from '../../data/moderation-lexicon.json';
import emailTemplatesData from '../../data/email-templates.json';
import { EMAIL_TEMPLATE_TYPES } from './entities/admin.js';

const categoryFixtureSchema = z
  .object({
    name: z.string().min(1),
    slug: z.string().regex(/^[a-z0-9-]+$/),
    icon: z.string(),
    description: z.string(),
    skills: z.array(z.string().min(1)),
  })
  .strict();

const categoriesFileSchema = z.object({ categories: z.array(categoryFixtureSchema) }).strict();

const lexiconSchema = z
  .object({
    profanity: z.array(z.string()),
    toxic: z.array(z.string()),
    positive: z.array(z.string()),
    negative: z.array(z.string()),
    spamPatterns: z.array(z.string()),
  })
  .strict();

const [firstTemplateType, ...otherTemplateTypes] = EMAIL_TEMPLATE_TYPES;

const emailTemplateFixtureSchema = z
  .object({
    name: z.string().min(1),
    templateType: z.enum([firstTemplateType, ...otherTemplateTypes]),
    subject: z.string().min(1),
    htmlContent: z.string(),
    textContent: z.string(),
  })
  .strict();

const emailTemplatesFileSchema = z.object({ templates: z.array(emailTemplateFixtureSchema) }).strict();

export type CategoryFixture = z.infer<typeof categoryFixtureSchema>;
export type ModerationLexicon = z.infer<typeof lexiconSchema>;
export type EmailTemplateFixture = z.infer<typeof emailTemplateFixtureSchema>;

export function loadCategoryFixtures(): CategoryFixture[] {
  return categoriesFileSchema.parse(categoriesData).categories;
}

export function loadModerationLexicon(): ModerationLexicon {
  return lexiconSchema.parse(lexiconData);
}

export function loadEmailTemplateFixtures(): EmailTemplateFixture[] {
  return emailTemplatesFileSchema.parse(emailTemplatesData).templates;
}
