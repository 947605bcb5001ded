/**
 * AccountService - registration, login, tokens, profiles, addresses and presence
 */

import type { Address, AuthTokens, PublicUser, User, UserType } from '../entities/accounts.js';
import { USER_TYPES, toPublicUser } from '../entities/accounts.js';
import type { UploadInput } from '../entities/common.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import type { EntityUpdate } from '../repositories/interfaces.js';
import { AuthenticationError, ConflictError, NotFoundError, ValidationError } from '../repositories/errors.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';
import { errorMessage } from '../../infrastructure/logging/domain-logger.js';
import { TtlCache } from '../../infrastructure/cache/ttl-cache.js';
import { MAX_IMAGE_BYTES, validateImage, type MediaStorage } from '../../infrastructure/media/media-storage.js';
import { nowIso } from '../utils/dates.js';
import type { PasswordHasher } from './password-hasher.js';
import type { AccessClaims, TokenService } from './token-service.js';
import type { TemplateMailer } from './template-mailer.js';
import type { NotificationService } from './notification-service.js';
import type { ModerationService } from './moderation-service.js';
import {
  validateEmail,
  validateEnum,
  validateNonNegative,
  validatePhone,
  validateRequiredString,
  validateTextLength,
} from './validators.js';

const ONLINE_CACHE_TTL_MS = 300 * 1000;
const MIN_PASSWORD_LENGTH = 8;
const BIO_MAX_LENGTH = 500;
const USERNAME_PATTERN = /^[\w.@+-]{1,150}$/;
const SEARCH_LIMIT = 20;

// ============================================================================
// Input / Result types
// ============================================================================

export interface RegisterInput {
  email: string;
  username: string;
  password: string;
  passwordConfirm: string;
  firstName?: string;
  lastName?: string;
  phone?: string;
  userType?: UserType;
  bio?: string;
}

export interface AuthResult {
  user: PublicUser;
  tokens: AuthTokens;
}

export interface UpdateProfileInput {
  firstName?: string;
  lastName?: string;
  phone?: string;
  bio?: string;
  location?: string;
  skills?: string[];
  hourlyRate?: number;
  experienceYears?: number;
}

export interface ChangePasswordInput {
  oldPassword: string;
  newPassword: string;
  newPasswordConfirm: string;
}

export interface AddressInput {
  title: string;
  streetAddress: string;
  city: string;
  state: string;
  postalCode: string;
  country?: string;
  latitude?: number;
  longitude?: number;
  isDefault?: boolean;
}

export interface ProfileStats {
  memberSince: number;
  totalProjects: number;
  isVerified: boolean;
  completedProjects?: number;
  totalReviews?: number;
  averageRating?: number;
  activeProjects?: number;
}

export interface EnsureUserInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  isStaff?: boolean;
}

export interface AccountServiceOptions {
  hasher: PasswordHasher;
  tokens: TokenService;
  mailer: TemplateMailer;
  notifications: NotificationService;
  moderation: ModerationService;
  media: MediaStorage;
  logger?: DomainLogger;
}

// ============================================================================
// Service
// ============================================================================

export class AccountService {
  private readonly presence = new TtlCache<boolean>({ defaultTtlMs: ONLINE_CACHE_TTL_MS });

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: AccountServiceOptions
  ) {}

  // ==========================================================================
  // Registration and authentication
  // ==========================================================================

  public async register(input: RegisterInput): Promise<AuthResult> {
    validateEmail(input.email);
    validateRequiredString(input.username, 'username');
    if (!USERNAME_PATTERN.test(input.username)) {
      throw new ValidationError('Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.', [
        { field: 'username', message: 'Invalid username', value: input.username },
      ]);
    }
    validatePassword(input.password, 'password');
    if (input.password !== input.passwordConfirm) {
      throw new ValidationError("Passwords don't match", [{ field: 'passwordConfirm', message: "Passwords don't match" }]);
    }
    validatePhone(input.phone);
    validateTextLength(input.bio, 'bio', BIO_MAX_LENGTH);
    const userType = input.userType ?? 'client';
    validateEnum(userType, 'userType', USER_TYPES);

    const users = this.repositories.repository('users');
    const credentials = await this.options.hasher.hash(input.password);
    const user = await users.withLock('identity', async () => {
      await this.assertIdentityAvailable(input.email, input.username);
      return users.create({
        email: input.email.trim().toLowerCase(),
        username: input.username,
        firstName: input.firstName?.trim() ?? '',
        lastName: input.lastName?.trim() ?? '',
        phone: input.phone,
        userType,
        bio: input.bio ?? '',
        location: '',
        skills: [],
        isVerified: false,
        isOnline: false,
        isActive: true,
        isStaff: false,
        ...credentials,
      });
    });

    await this.options.notifications.getPreferences(user.id);
    await this.sendWelcome(user);
    await this.options.moderation.runHook('user_profile', user.id, user.bio, user.id);
    this.options.logger?.info?.(`Registered ${user.userType} ${user.username}`, { userId: user.id });

    return { user: toPublicUser(user), tokens: this.options.tokens.issueTokens(user) };
  }

  public async login(email: string, password: string): Promise<AuthResult> {
    const user = await this.verifyCredentials(email, password);
    const now = nowIso();
    const updated = await this.repositories
      .repository('users')
      .update(user.id, { isOnline: true, lastSeen: now, lastLoginAt: now });
    this.presence.set(user.id, true);
    return { user: toPublicUser(updated), tokens: this.options.tokens.issueTokens(updated) };
  }

  /**
   * Check e-mail and password without side effects
   * @throws ValidationError for unknown e-mail, wrong password or disabled account
   */
  public async verifyCredentials(email: string, password: string): Promise<User> {
    const user = await this.findByEmail(email);
    if (user === null || !(await this.options.hasher.verify(password, user))) {
      throw new ValidationError('Invalid credentials.', [{ field: 'nonFieldErrors', message: 'Invalid credentials.' }]);
    }
    if (!user.isActive) {
      throw new ValidationError('User account is disabled.', [{ field: 'nonFieldErrors', message: 'User account is disabled.' }]);
    }
    return user;
  }

  public async logout(userId: string, refreshToken: string): Promise<void> {
    const claims = await this.options.tokens.verifyRefreshToken(refreshToken).catch((error: unknown) => {
      if (error instanceof AuthenticationError) {
        throw new ValidationError('Invalid token', [{ field: 'refresh', message: error.message }]);
      }
      throw error;
    });
    if (claims.sub !== userId) {
      throw new ValidationError('Invalid token', [{ field: 'refresh', message: 'Token belongs to another user' }]);
    }
    await this.options.tokens.revoke(claims);
    await this.setOnline(userId, false);
  }

  public async refresh(refreshToken: string): Promise<AuthTokens> {
    return this.options.tokens.rotate(refreshToken, (userId) => this.getUser(userId));
  }

  /**
   * Resolve the user behind an access token
   * @throws AuthenticationError for bad tokens, unknown or inactive users
   */
  public async authenticate(accessToken: string): Promise<{ user: User; claims: AccessClaims }> {
    const claims = this.options.tokens.verifyAccessToken(accessToken);
    const user = await this.repositories.repository('users').findByIdOrNull(claims.sub);
    if (user === null) {
      throw new AuthenticationError('User not found', { userId: claims.sub });
    }
    if (!user.isActive) {
      throw new AuthenticationError('User is inactive', { userId: user.id });
    }
    return { user, claims };
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  public async getUser(userId: string): Promise<User> {
    const user = await this.repositories.repository('users').findByIdOrNull(userId);
    if (user === null) {
      throw new NotFoundError('User', userId, { message: 'User not found' });
    }
    return user;
  }

  public async findByEmail(email: string): Promise<User | null> {
    const normalized = email.trim().toLowerCase();
    return this.repositories.repository('users').findOne((user) => user.email.toLowerCase() === normalized);
  }

  /**
   * Create the user or reset the existing one (used for admin provisioning)
   */
  public async ensureUser(input: EnsureUserInput): Promise<{ user: User; created: boolean }> {
    validateEmail(input.email);
    validatePassword(input.password, 'password');
    const credentials = await this.options.hasher.hash(input.password);
    const users = this.repositories.repository('users');
    return users.withLock('identity', async () => {
      const existing = await this.findByEmail(input.email);
      if (existing !== null) {
        const user = await users.update(existing.id, {
          firstName: input.firstName,
          lastName: input.lastName,
          isActive: true,
          isStaff: input.isStaff ?? existing.isStaff,
          ...credentials,
        });
        return { user, created: false };
      }
      const email = input.email.trim().toLowerCase();
      const user = await users.create({
        email,
        username: await this.freeUsername(email.split('@')[0] ?? 'user'),
        firstName: input.firstName,
        lastName: input.lastName,
        userType: 'client',
        bio: '',
        location: '',
        skills: [],
        isVerified: true,
        isOnline: false,
        isActive: true,
        isStaff: input.isStaff ?? false,
        ...credentials,
      });
      await this.options.notifications.getPreferences(user.id);
      return { user, created: true };
    });
  }

  public async searchUsers(query: string, userType?: UserType): Promise<PublicUser[]> {
    const needle = query.trim().toLowerCase();
    const matches = await this.repositories.repository('users').findMany(
      (user) =>
        user.isActive &&
        (userType === undefined || user.userType === userType) &&
        [user.username, user.firstName, user.lastName, user.email].some((value) => value.toLowerCase().includes(needle))
    );
    return matches
      .sort((a, b) => a.username.localeCompare(b.username))
      .slice(0, SEARCH_LIMIT)
      .map(toPublicUser);
  }

  // ==========================================================================
  // Profile
  // ==========================================================================

  public async getProfile(userId: string): Promise<PublicUser> {
    return toPublicUser(await this.getUser(userId));
  }

  public async updateProfile(userId: string, input: UpdateProfileInput): Promise<PublicUser> {
    validatePhone(input.phone);
    validateTextLength(input.bio, 'bio', BIO_MAX_LENGTH);
    validateNonNegative(input.hourlyRate, 'hourlyRate');
    validateNonNegative(input.experienceYears, 'experienceYears');

    const current = await this.getUser(userId);
    const updates: EntityUpdate<User> = {
      ...input,
      firstName: input.firstName?.trim(),
      lastName: input.lastName?.trim(),
      location: input.location?.trim(),
    };
    const user = await this.repositories.repository('users').update(userId, updates);
    if (input.bio !== undefined && input.bio !== current.bio) {
      await this.options.moderation.runHook('user_profile', user.id, input.bio, user.id);
    }
    return toPublicUser(user);
  }

  public async profileStats(userId: string): Promise<ProfileStats> {
    const user = await this.getUser(userId);
    const projects = this.repositories.repository('projects');
    const base = {
      memberSince: new Date(user.createdAt).getUTCFullYear(),
      isVerified: user.isVerified,
    };

    if (user.userType === 'contractor') {
      const assigned = await projects.findMany((p) => p.contractorId === user.id);
      const profile = await this.repositories.repository('contractor-profiles').findOne((p) => p.userId === user.id);
      return {
        ...base,
        totalProjects: assigned.length,
        completedProjects: assigned.filter((p) => p.status === 'completed').length,
        totalReviews: profile?.ratingCount ?? 0,
        averageRating: profile?.ratingAverage ?? 0,
      };
    }

    const owned = await projects.findMany((p) => p.clientId === user.id);
    return {
      ...base,
      totalProjects: owned.length,
      activeProjects: owned.filter((p) => p.status === 'published' || p.status === 'in_progress').length,
      completedProjects: owned.filter((p) => p.status === 'completed').length,
    };
  }

  public async uploadAvatar(userId: string, upload: UploadInput): Promise<{ avatar: string }> {
    validateImage(upload, MAX_IMAGE_BYTES);
    const user = await this.getUser(userId);
    const stored = await this.options.media.save('avatars', upload);
    await this.repositories.repository('users').update(userId, { avatar: stored.url });
    await this.options.media.delete(user.avatar);
    return { avatar: stored.url };
  }

  public async changePassword(userId: string, input: ChangePasswordInput): Promise<void> {
    const user = await this.getUser(userId);
    if (!(await this.options.hasher.verify(input.oldPassword, user))) {
      throw new ValidationError('Old password is incorrect', [{ field: 'oldPassword', message: 'Old password is incorrect' }]);
    }
    if (input.newPassword !== input.newPasswordConfirm) {
      throw new ValidationError("New passwords don't match", [
        { field: 'newPasswordConfirm', message: "New passwords don't match" },
      ]);
    }
    validatePassword(input.newPassword, 'newPassword');
    await this.setPassword(userId, input.newPassword);
  }

  public async setPassword(userId: string, password: string): Promise<void> {
    const credentials = await this.options.hasher.hash(password);
    await this.repositories.repository('users').update(userId, credentials);
  }

  // ==========================================================================
  // Presence
  // ==========================================================================

  public async setOnline(userId: string, isOnline: boolean): Promise<void> {
    await this.repositories.repository('users').update(userId, { isOnline, lastSeen: nowIso() });
    this.presence.set(userId, isOnline);
  }

  public async isUserOnline(userId: string): Promise<boolean> {
    const cached = this.presence.get(userId);
    if (cached !== undefined) {
      return cached;
    }
    const user = await this.repositories.repository('users').findByIdOrNull(userId);
    return user?.isOnline ?? false;
  }

  // ==========================================================================
  // Addresses
  // ==========================================================================

  public async listAddresses(userId: string): Promise<Address[]> {
    const addresses = await this.repositories.repository('addresses').findMany((a) => a.userId === userId);
    return addresses.sort((a, b) => Number(b.isDefault) - Number(a.isDefault) || a.createdAt.localeCompare(b.createdAt));
  }

  /**
   * @throws NotFoundError when the address is missing or belongs to another user
   */
  public async getAddress(userId: string, addressId: string): Promise<Address> {
    const address = await this.repositories.repository('addresses').findByIdOrNull(addressId);
    if (address === null || address.userId !== userId) {
      throw new NotFoundError('Address', addressId, { message: 'Address not found' });
    }
    return address;
  }

  public async createAddress(userId: string, input: AddressInput): Promise<Address> {
    for (const field of ['title', 'streetAddress', 'city', 'state', 'postalCode'] as const) {
      validateRequiredString(input[field], field);
    }
    const addresses = this.repositories.repository('addresses');
    return addresses.withLock(`default-${userId}`, async () => {
      const existing = await addresses.findMany((a) => a.userId === userId);
      const isDefault = input.isDefault ?? existing.length === 0;
      if (isDefault) {
        await this.clearDefault(userId);
      }
      return addresses.create({
        userId,
        title: input.title,
        streetAddress: input.streetAddress,
        city: input.city,
        state: input.state,
        postalCode: input.postalCode,
        country: input.country ?? 'USA',
        latitude: input.latitude,
        longitude: input.longitude,
        isDefault,
      });
    });
  }

  public async updateAddress(userId: string, addressId: string, input: Partial<AddressInput>): Promise<Address> {
    await this.getAddress(userId, addressId);
    const addresses = this.repositories.repository('addresses');
    return addresses.withLock(`default-${userId}`, async () => {
      if (input.isDefault === true) {
        await this.clearDefault(userId, addressId);
      }
      return addresses.update(addressId, input);
    });
  }

  public async deleteAddress(userId: string, addressId: string): Promise<void> {
    await this.getAddress(userId, addressId);
    await this.repositories.repository('addresses').delete(addressId);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async clearDefault(userId: string, exceptId?: string): Promise<void> {
    const addresses = this.repositories.repository('addresses');
    const defaults = await addresses.findMany((a) => a.userId === userId && a.isDefault && a.id !== exceptId);
    for (const address of defaults) {
      await addresses.update(address.id, { isDefault: false });
    }
  }

  private async assertIdentityAvailable(email: string, username: string): Promise<void> {
    if ((await this.findByEmail(email)) !== null) {
      throw new ConflictError('A user with this email already exists', 'duplicate', { field: 'email' });
    }
    const taken = await this.repositories.repository('users').findOne((user) => user.username === username);
    if (taken !== null) {
      throw new ConflictError('A user with this username already exists', 'duplicate', { field: 'username' });
    }
  }

  private async freeUsername(base: string): Promise<string> {
    const users = this.repositories.repository('users');
    const stem = base.replace(/[^\w.@+-]/g, '') || 'user';
    let candidate = stem;
    for (let suffix = 1; (await users.findOne((user) => user.username === candidate)) !== null; suffix++) {
      candidate = `${stem}${String(suffix)}`;
    }
    return candidate;
  }

  private async sendWelcome(user: User): Promise<void> {
    try {
      await this.options.mailer.sendByType('welcome', { recipientEmail: user.email, user });
    } catch (error) {
      this.options.logger?.warn?.(`Welcome e-mail to ${user.email} failed: ${errorMessage(error)}`);
    }
  }
}

function validatePassword(password: string, field: string): void {
  if (typeof password !== 'string' || password.length < MIN_PASSWORD_LENGTH) {
    const message = `This password is too short. It must contain at least ${String(MIN_PASSWORD_LENGTH)} characters.`;
    throw new ValidationError(message, [{ field, message }]);
  }
}
