import {
  Injectable,
  Inject,
  SetMetadata,
  createParamDecorator,
  type CanActivate,
  type CustomDecorator,
  type ExecutionContext,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthenticationError, type AdminIdentity, type AdminPermission, type AdminService } from '@contractor-connect/core';
import { ADMIN_SERVICE } from '../core/core.module.js';
import { IS_PUBLIC_KEY, type AuthenticatedRequest } from '../auth/index.js';

export const ADMIN_PERMISSION_KEY = 'adminPermission';

export interface AdminRequest extends AuthenticatedRequest {
  admin?: AdminIdentity;
}

/**
 * Permission the route needs on top of an active admin role
 */
export const RequirePermission = (permission: AdminPermission): CustomDecorator =>
  SetMetadata(ADMIN_PERMISSION_KEY, permission);

export const CurrentAdmin = createParamDecorator((_data: unknown, ctx: ExecutionContext): AdminIdentity => {
  const request = ctx.switchToHttp().getRequest<AdminRequest>();
  if (request.admin === undefined) {
    throw new AuthenticationError('Authentication credentials were not provided.');
  }
  return request.admin;
});

/**
 * Runs after the global JWT guard: the caller needs an active admin role
 * and the route's permission, if it names one.
 */
@Injectable()
export class AdminPermissionGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    @Inject(ADMIN_SERVICE) private readonly admin: AdminService
  ) {}

  public async canActivate(context: ExecutionContext): Promise<boolean> {
    const targets = [context.getHandler(), context.getClass()];
    if (this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, targets) === true) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AdminRequest>();
    if (request.user === undefined) {
      throw new AuthenticationError('Authentication credentials were not provided.');
    }
    const permission = this.reflector.getAllAndOverride<AdminPermission | undefined>(ADMIN_PERMISSION_KEY, targets);
    request.admin = await this.admin.authorize(request.user.id, permission);
    return true;
  }
}
