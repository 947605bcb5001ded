import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { MEDIA_DIRECTORIES } from '@contractor-connect/config';
import { COLLECTION_NAMES } from '@contractor-connect/core';
import { cleanupCliTestContext, createCliTestContext, runCli, type CliTestContext } from './helpers.js';

describe('setup commands', () => {
  let context: CliTestContext;

  beforeEach(async () => {
    context = await createCliTestContext();
  });

  afterEach(async () => {
    await cleanupCliTestContext(context);
  });

  it('loads categories and skills once', async () => {
    expect(await runCli(context, ['setup-initial-data'])).toBe(0);
    expect(context.lines).toEqual(['✔ Categories: 10 created, 10 total', '✔ Skills: 46 created, 46 total']);

    context.lines.length = 0;
    expect(await runCli(context, ['setup-initial-data'])).toBe(0);
    expect(context.lines).toEqual(['✔ Categories: 0 created, 10 total', '✔ Skills: 0 created, 46 total']);
  });

  it('upserts the default e-mail templates', async () => {
    await runCli(context, ['setup-email-templates']);
    await runCli(context, ['setup-email-templates']);

    expect(context.lines).toEqual([
      '✔ E-mail templates: 6 created, 0 updated',
      '✔ E-mail templates: 0 created, 6 updated',
    ]);
  });

  it('prepares storage, media directories and seed data', async () => {
    expect(await runCli(context, ['setup-system'])).toBe(0);

    expect(context.lines).toEqual([
      'Setting up the system...',
      `✔ Storage ready at ${context.storagePath} (${String(COLLECTION_NAMES.length)} collections)`,
      `✔ Media directories ready under ${context.mediaPath}: ${MEDIA_DIRECTORIES.join(', ')}`,
      '✔ Categories: 10 created, 10 total',
      '✔ Skills: 46 created, 46 total',
      '✔ E-mail templates: 6 created, 0 updated',
      'System setup complete',
    ]);
    const mediaDirs = await fs.readdir(context.mediaPath);
    expect(mediaDirs.sort()).toEqual([...MEDIA_DIRECTORIES].sort());
    await expect(fs.stat(path.join(context.storagePath, 'users'))).resolves.toBeDefined();
  });

  it('exits 1 without SECRET_KEY', async () => {
    context.ctx.env.SECRET_KEY = undefined;

    expect(await runCli(context, ['setup-initial-data'])).toBe(1);
    expect(context.lines).toEqual(['✖ SECRET_KEY is not set. Add it to .env or the environment.']);
  });
});
