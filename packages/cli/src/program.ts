/**
 * contractor-connect command line
 */

import { Command } from 'commander';
import { APP_NAME } from '@contractor-connect/config';
import { errorMessage } from '@contractor-connect/core';
import type { CliContext } from './context.js';
import { checkAdmin, createAdmin, type CheckAdminOptions, type CreateAdminOptions } from './commands/admin.js';
import { runDev } from './commands/dev.js';
import { diagnoseEmail, testEmail, type TestEmailOptions } from './commands/email.js';
import { setupEmailTemplates, setupInitialData, setupSystem } from './commands/setup.js';
import { runTask, runWorker } from './commands/worker.js';

export type ExitHandler = (code: number) => void;

/**
 * Every command resolves to an exit code; thrown errors print as ✖ lines and exit 1
 */
export function buildProgram(ctx: CliContext, onExit: ExitHandler): Command {
  const run = async (command: () => Promise<number>): Promise<void> => {
    let code: number;
    try {
      code = await command();
    } catch (error) {
      ctx.output.error(errorMessage(error));
      code = 1;
    }
    onExit(code);
  };

  const program = new Command();
  program.name('contractor-connect').description(`${APP_NAME} administration`).version('1.0.0');

  program
    .command('setup-system')
    .description('Create storage and media directories, load initial data and e-mail templates')
    .action(() => run(() => setupSystem(ctx)));

  program
    .command('setup-initial-data')
    .description('Load categories and skills')
    .action(() => run(() => setupInitialData(ctx)));

  program
    .command('setup-email-templates')
    .description('Create or update the default e-mail templates')
    .action(() => run(() => setupEmailTemplates(ctx)));

  program
    .command('create-admin')
    .description('Create or update an admin user')
    .requiredOption('--email <email>', 'admin e-mail')
    .requiredOption('--password <password>', 'admin password')
    .option('--role <role>', 'admin role', 'superadmin')
    .action((options: CreateAdminOptions) => run(() => createAdmin(ctx, options)));

  program
    .command('check-admin')
    .description('Check an admin account and its password')
    .requiredOption('--email <email>', 'admin e-mail')
    .requiredOption('--password <password>', 'password to check')
    .action((options: CheckAdminOptions) => run(() => checkAdmin(ctx, options)));

  program
    .command('test-email')
    .description('Send a test e-mail')
    .requiredOption('--to <address>', 'recipient')
    .action((options: TestEmailOptions) => run(() => testEmail(ctx, options)));

  program
    .command('diagnose-email')
    .description('Print the e-mail configuration and verify the SMTP connection')
    .action(() => run(() => diagnoseEmail(ctx)));

  program
    .command('worker')
    .description('Run the scheduled background tasks')
    .action(() => run(() => runWorker(ctx)));

  program
    .command('run-task')
    .description('Run one scheduled task once')
    .argument('<id>', 'task id')
    .action((id: string) => run(() => runTask(ctx, id)));

  program
    .command('dev')
    .description('Start the web server and the worker for development')
    .action(() => run(() => runDev(ctx)));

  return program;
}
