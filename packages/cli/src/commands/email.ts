/**
 * test-email and diagnose-email
 *
 * Both only need the e-mail settings, so they run without SECRET_KEY.
 */

import { getEmailSettings, getSiteName, type EmailSettings } from '@contractor-connect/config';
import { EmailService, errorMessage } from '@contractor-connect/core';
import type { CliOutput } from '../output.js';
import { createCliLogger } from '../output.js';
import type { CliContext } from '../context.js';

export interface TestEmailOptions {
  to: string;
}

export function maskSecret(value: string | undefined): string {
  return value === undefined ? 'NOT SET' : '***';
}

export function describeEmailSettings(settings: EmailSettings): string[] {
  return [
    `Transport: ${settings.transport}`,
    `Host: ${settings.smtp.host}`,
    `Port: ${String(settings.smtp.port)}`,
    `Secure: ${settings.smtp.secure ? 'yes' : 'no'}`,
    `User: ${settings.smtp.user ?? 'NOT SET'}`,
    `Password: ${maskSecret(settings.smtp.pass)}`,
    `From: ${settings.from}`,
  ];
}

/**
 * SMTP authentication failures (nodemailer reports them as EAUTH)
 */
export function isAuthFailure(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'EAUTH') {
    return true;
  }
  return /auth/i.test(errorMessage(error));
}

function printSettings(output: CliOutput, settings: EmailSettings): void {
  output.line('E-mail configuration:');
  for (const line of describeEmailSettings(settings)) {
    output.line(`  ${line}`);
  }
}

export async function testEmail(ctx: CliContext, options: TestEmailOptions): Promise<number> {
  const settings = getEmailSettings(ctx.env);
  printSettings(ctx.output, settings);

  const siteName = getSiteName(ctx.env);
  const email = new EmailService({ ...settings, logger: createCliLogger(false) });
  try {
    await email.send({
      to: options.to,
      subject: `${siteName} test e-mail`,
      text: `This is a test message from ${siteName}.`,
    });
    ctx.output.success(`Test e-mail sent to ${options.to}`);
    return 0;
  } catch (error) {
    ctx.output.error(`Failed to send test e-mail: ${errorMessage(error)}`);
    return 1;
  } finally {
    email.close();
  }
}

export async function diagnoseEmail(ctx: CliContext): Promise<number> {
  const { output } = ctx;
  const settings = getEmailSettings(ctx.env);
  printSettings(output, settings);

  if (settings.transport === 'json') {
    output.line('The json transport renders messages locally; set EMAIL_TRANSPORT=smtp to send them.');
  }

  const email = new EmailService(settings);
  try {
    await email.verify();
    output.success(settings.transport === 'smtp' ? 'SMTP connection verified' : 'Transport ready');
    return 0;
  } catch (error) {
    output.error(`SMTP connection failed: ${errorMessage(error)}`);
    if (isAuthFailure(error)) {
      output.line('Tips:');
      output.line('  - Check SMTP_USER and SMTP_PASS');
      output.line('  - Providers with two-factor sign-in usually need an app password');
      output.line('  - Port 587 expects SMTP_SECURE=false, port 465 expects SMTP_SECURE=true');
    }
    return 1;
  } finally {
    email.close();
  }
}
