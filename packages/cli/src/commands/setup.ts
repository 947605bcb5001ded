/**
 * setup-system, setup-initial-data and setup-email-templates
 */

import { MEDIA_DIRECTORIES } from '@contractor-connect/config';
import type { InitialDataResult } from '@contractor-connect/core';
import type { CliOutput } from '../output.js';
import { withServices, type CliContext } from '../context.js';

function printInitialData(output: CliOutput, result: InitialDataResult): void {
  output.success(
    `Categories: ${String(result.categoriesCreated)} created, ${String(result.totalCategories)} total`
  );
  output.success(`Skills: ${String(result.skillsCreated)} created, ${String(result.totalSkills)} total`);
}

export function setupSystem(ctx: CliContext): Promise<number> {
  return withServices(ctx, async (services, settings) => {
    const { output } = ctx;
    output.line('Setting up the system...');

    const collections = await services.repositories.initializeAll();
    output.success(`Storage ready at ${settings.storagePath} (${String(collections.length)} collections)`);

    const result = await services.initialData.setupSystem(settings.mediaPath, MEDIA_DIRECTORIES);
    output.success(`Media directories ready under ${settings.mediaPath}: ${MEDIA_DIRECTORIES.join(', ')}`);
    printInitialData(output, result.initialData);
    output.success(
      `E-mail templates: ${String(result.emailTemplates.created)} created, ${String(result.emailTemplates.updated)} updated`
    );

    output.line('System setup complete');
    return 0;
  });
}

export function setupInitialData(ctx: CliContext): Promise<number> {
  return withServices(ctx, async (services) => {
    printInitialData(ctx.output, await services.initialData.loadInitialData());
    return 0;
  });
}

export function setupEmailTemplates(ctx: CliContext): Promise<number> {
  return withServices(ctx, async (services) => {
    const result = await services.initialData.setupEmailTemplates();
    ctx.output.success(
      `E-mail templates: ${String(result.created)} created, ${String(result.updated)} updated`
    );
    return 0;
  });
}
