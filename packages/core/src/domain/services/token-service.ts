/**
 * TokenService - HS256 access/refresh JWTs with refresh rotation
 *
 * Revocation is tracked by jti in the `revoked-tokens` collection (the jti
 * doubles as the record id). Only refresh tokens are ever revoked.
 */

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { AuthTokens, User, UserType } from '../entities/accounts.js';
import { USER_TYPES } from '../entities/accounts.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { AuthenticationError, ConflictError } from '../repositories/errors.js';

export interface TokenServiceOptions {
  secretKey: string;
  /** seconds */
  accessTokenTtl: number;
  /** seconds */
  refreshTokenTtl: number;
}

const userTypeSchema = z.custom<UserType>((value) => USER_TYPES.some((type) => type === value));

const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.literal('access'),
  userType: userTypeSchema,
  jti: z.string().min(1),
  exp: z.number(),
});

const refreshClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.literal('refresh'),
  jti: z.string().min(1),
  exp: z.number(),
});

export type AccessClaims = z.infer<typeof accessClaimsSchema>;
export type RefreshClaims = z.infer<typeof refreshClaimsSchema>;

export class TokenService {
  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: TokenServiceOptions
  ) {
    if (options.secretKey === '') {
      throw new Error('A secret key is required to sign tokens');
    }
  }

  public issueTokens(user: Pick<User, 'id' | 'userType'>): AuthTokens {
    const access = jwt.sign({ sub: user.id, type: 'access', userType: user.userType, jti: uuidv4() }, this.options.secretKey, {
      algorithm: 'HS256',
      expiresIn: this.options.accessTokenTtl,
    });
    const refresh = jwt.sign({ sub: user.id, type: 'refresh', jti: uuidv4() }, this.options.secretKey, {
      algorithm: 'HS256',
      expiresIn: this.options.refreshTokenTtl,
    });
    return { access, refresh };
  }

  /**
   * @throws AuthenticationError for malformed, expired or non-access tokens
   */
  public verifyAccessToken(token: string): AccessClaims {
    const parsed = accessClaimsSchema.safeParse(this.decode(token));
    if (!parsed.success) {
      throw new AuthenticationError('Given token not valid for any token type', { tokenType: 'access' });
    }
    return parsed.data;
  }

  /**
   * @throws AuthenticationError for malformed, expired, revoked or non-refresh tokens
   */
  public async verifyRefreshToken(token: string): Promise<RefreshClaims> {
    const parsed = refreshClaimsSchema.safeParse(this.decode(token));
    if (!parsed.success) {
      throw new AuthenticationError('Token is invalid or expired', { tokenType: 'refresh' });
    }
    if (await this.isRevoked(parsed.data.jti)) {
      throw new AuthenticationError('Token is blacklisted', { tokenType: 'refresh' });
    }
    return parsed.data;
  }

  /**
   * Revoke the refresh token and issue a fresh pair
   */
  public async rotate(refreshToken: string, loadUser: (userId: string) => Promise<User>): Promise<AuthTokens> {
    const claims = await this.verifyRefreshToken(refreshToken);
    const user = await loadUser(claims.sub);
    if (!user.isActive) {
      throw new AuthenticationError('User is inactive', { userId: user.id });
    }
    // Concurrent replays all pass the check above; only one of them gets to revoke
    if (!(await this.revoke(claims))) {
      throw new AuthenticationError('Token is blacklisted', { tokenType: 'refresh' });
    }
    return this.issueTokens(user);
  }

  /**
   * @returns false when the token had already been revoked
   */
  public async revoke(claims: RefreshClaims): Promise<boolean> {
    try {
      await this.repositories.repository('revoked-tokens').create({
        id: claims.jti,
        jti: claims.jti,
        userId: claims.sub,
        expiresAt: new Date(claims.exp * 1000).toISOString(),
      });
      return true;
    } catch (error) {
      if (error instanceof ConflictError && error.conflictType === 'duplicate') {
        return false;
      }
      throw error;
    }
  }

  public async isRevoked(jti: string): Promise<boolean> {
    return this.repositories.repository('revoked-tokens').exists(jti);
  }

  /**
   * Drop revocation records whose token has expired anyway
   */
  public async purgeExpiredRevocations(now: Date = new Date()): Promise<number> {
    const revoked = this.repositories.repository('revoked-tokens');
    const expired = await revoked.findMany((record) => Date.parse(record.expiresAt) < now.getTime());
    return revoked.deleteMany(expired.map((record) => record.id));
  }

  private decode(token: string): unknown {
    try {
      return jwt.verify(token, this.options.secretKey, { algorithms: ['HS256'] });
    } catch (error) {
      if (error instanceof jwt.JsonWebTokenError) {
        throw new AuthenticationError('Token is invalid or expired', { reason: error.message });
      }
      throw error;
    }
  }
}
