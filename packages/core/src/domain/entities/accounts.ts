import type { Entity, Timestamp } from './common.js';

export type UserType = 'client' | 'contractor';

export const USER_TYPES: readonly UserType[] = ['client', 'contractor'];

export interface User extends Entity {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  phone?: string;
  userType: UserType;
  avatar?: string;
  bio: string;
  location: string;
  skills: string[];
  hourlyRate?: number;
  experienceYears?: number;
  isVerified: boolean;
  isOnline: boolean;
  lastSeen?: Timestamp;
  lastLoginAt?: Timestamp;
  isActive: boolean;
  isStaff: boolean;
  passwordHash: string;
  passwordSalt: string;
}

/**
 * User as returned to API callers (no credentials)
 */
export type PublicUser = Omit<User, 'passwordHash' | 'passwordSalt' | 'version'> & {
  fullName: string;
};

/**
 * Compact author/participant info embedded in other payloads
 */
export interface UserSummary {
  id: string;
  username: string;
  fullName: string;
  avatar: string | null;
  userType: UserType;
}

export interface Address extends Entity {
  userId: string;
  title: string;
  streetAddress: string;
  city: string;
  state: string;
  postalCode: string;
  country: string;
  latitude?: number;
  longitude?: number;
  isDefault: boolean;
}

/**
 * Revoked refresh token (logout / rotation)
 */
export interface RevokedToken extends Entity {
  jti: string;
  userId: string;
  expiresAt: Timestamp;
}

export interface AuthTokens {
  access: string;
  refresh: string;
}

export function fullNameOf(user: Pick<User, 'firstName' | 'lastName'>): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

/**
 * Display name used in system messages and e-mails
 */
export function displayNameOf(user: Pick<User, 'firstName' | 'lastName' | 'email'>): string {
  const fullName = fullNameOf(user);
  return fullName !== '' ? fullName : user.email;
}

const DELETED_ACCOUNT_DOMAIN = '@deleted.local';

/** Soft-deleted accounts keep their row with an anonymised e-mail */
export function deletedAccountEmail(userId: string): string {
  return `deleted-${userId}${DELETED_ACCOUNT_DOMAIN}`;
}

export function isDeletedAccount(user: Pick<User, 'email'>): boolean {
  return user.email.startsWith('deleted-') && user.email.endsWith(DELETED_ACCOUNT_DOMAIN);
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _hash, passwordSalt: _salt, version: _version, ...rest } = user;
  return { ...rest, fullName: fullNameOf(user) };
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    fullName: fullNameOf(user),
    avatar: user.avatar ?? null,
    userType: user.userType,
  };
}
