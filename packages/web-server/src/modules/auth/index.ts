export { AuthModule } from './auth.module.js';
export { JwtAuthGuard, bearerToken } from './jwt-auth.guard.js';
export { Public, CurrentUser, OptionalUser, IS_PUBLIC_KEY, type AuthenticatedRequest } from './decorators.js';
