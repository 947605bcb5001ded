import { Injectable, Inject, type CanActivate, type ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthenticationError, setContextUser, type AccountService } from '@contractor-connect/core';
import { ACCOUNT_SERVICE } from '../core/core.module.js';
import { IS_PUBLIC_KEY, type AuthenticatedRequest } from './decorators.js';

export function bearerToken(header: string | undefined): string | undefined {
  if (header === undefined) {
    return undefined;
  }
  const [scheme, token] = header.trim().split(/\s+/);
  return scheme?.toLowerCase() === 'bearer' && token !== undefined && token !== '' ? token : undefined;
}

/**
 * Global guard: every HTTP route needs a valid access token of an active
 * user unless it is marked @Public().
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    @Inject(ACCOUNT_SERVICE) private readonly accounts: AccountService
  ) {}

  public async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') {
      return true;
    }
    const isPublic =
      this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [context.getHandler(), context.getClass()]) ?? false;
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = bearerToken(request.headers.authorization);

    if (token === undefined) {
      if (isPublic) {
        return true;
      }
      throw new AuthenticationError('Authentication credentials were not provided.');
    }

    try {
      const { user } = await this.accounts.authenticate(token);
      request.user = user;
      setContextUser(user.id);
      return true;
    } catch (error: unknown) {
      // A stale token on a public route just means an anonymous caller
      if (isPublic && error instanceof AuthenticationError) {
        return true;
      }
      throw error;
    }
  }
}
