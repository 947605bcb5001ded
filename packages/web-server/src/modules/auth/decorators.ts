import { SetMetadata, createParamDecorator, type ExecutionContext, type CustomDecorator } from '@nestjs/common';
import { AuthenticationError, type User } from '@contractor-connect/core';
import type { Request } from 'express';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * Request as seen after the JWT guard ran
 */
export interface AuthenticatedRequest extends Request {
  user?: User;
}

/**
 * Route reachable without a token. A valid token is still resolved.
 */
export const Public = (): CustomDecorator => SetMetadata(IS_PUBLIC_KEY, true);

/**
 * The authenticated user; 401 when the route ran anonymously
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): User => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  if (request.user === undefined) {
    throw new AuthenticationError('Authentication credentials were not provided.');
  }
  return request.user;
});

/**
 * The authenticated user on public routes, if any
 */
export const OptionalUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): User | undefined => {
  return ctx.switchToHttp().getRequest<AuthenticatedRequest>().user;
});
