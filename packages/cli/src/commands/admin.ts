import { ADMIN_ROLE_NAMES } from '@contractor-connect/core';
import { withServices, type CliContext } from '../context.js';

export interface CreateAdminOptions {
  email: string;
  password: string;
  role: string;
}

export interface CheckAdminOptions {
  email: string;
  password: string;
}

const yesNo = (value: boolean | undefined): string => (value === true ? 'yes' : 'no');

export function createAdmin(ctx: CliContext, options: CreateAdminOptions): Promise<number> {
  const role = ADMIN_ROLE_NAMES.find((name) => name === options.role);
  if (role === undefined) {
    ctx.output.error(`Unknown role "${options.role}". Use one of: ${ADMIN_ROLE_NAMES.join(', ')}`);
    return Promise.resolve(1);
  }

  return withServices(ctx, async (services) => {
    const result = await services.admin.createAdmin(options.email, options.password, role);
    ctx.output.success(`${result.userCreated ? 'Created' : 'Updated'} user ${result.user.email}`);
    ctx.output.success(`${result.roleCreated ? 'Created' : 'Updated'} admin role ${result.adminRole.role}`);
    return 0;
  });
}

export function checkAdmin(ctx: CliContext, options: CheckAdminOptions): Promise<number> {
  return withServices(ctx, async (services) => {
    const { output } = ctx;
    const report = await services.admin.checkAdmin(options.email, options.password);

    if (!report.userExists) {
      output.error(`No user with e-mail ${options.email}`);
      if (report.activeAdmins.length === 0) {
        output.line('No active admins found');
      } else {
        output.line('Active admins:');
        for (const email of report.activeAdmins) {
          output.line(`  - ${email}`);
        }
      }
      return 1;
    }

    output.line(`User: ${report.email}`);
    output.line(`Active: ${yesNo(report.isActive)}`);
    output.line(`Staff: ${yesNo(report.isStaff)}`);
    output.line(`Admin role: ${report.role ?? 'none'}${report.roleActive === false ? ' (inactive)' : ''}`);
    if (report.passwordMatches === true) {
      output.success('Password matches');
    } else {
      output.error('Password does not match');
    }

    const usable =
      report.isActive === true && report.role !== undefined && report.roleActive === true && report.passwordMatches === true;
    return usable ? 0 : 1;
  });
}
