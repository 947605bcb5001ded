/**
 * Core service graph
 *
 * Both hosts (web server, CLI/worker) build their services here so the
 * wiring between services exists in one place.
 */

import { FileRepositoryFactory } from './infrastructure/factory/repository-factory.js';
import type { DomainLogger } from './infrastructure/logging/domain-logger.js';
import { MediaStorage } from './infrastructure/media/media-storage.js';
import type { CacheOptions } from './infrastructure/repositories/file/types.js';
import { AccountService } from './domain/services/account-service.js';
import { AdminService } from './domain/services/admin-service.js';
import { AdvertisementService } from './domain/services/advertisement-service.js';
import { ChatService } from './domain/services/chat-service.js';
import { ContractorService } from './domain/services/contractor-service.js';
import { EmailService, type EmailServiceOptions } from './domain/services/email-service.js';
import { InitialDataService } from './domain/services/initial-data-service.js';
import { ModerationService } from './domain/services/moderation-service.js';
import { NotificationService } from './domain/services/notification-service.js';
import { PasswordHasher } from './domain/services/password-hasher.js';
import { ProjectService } from './domain/services/project-service.js';
import { ReviewService } from './domain/services/review-service.js';
import { TemplateMailer, type SiteInfo } from './domain/services/template-mailer.js';
import { TokenService } from './domain/services/token-service.js';

export interface CoreServicesOptions {
  storagePath: string;
  mediaPath: string;
  secretKey: string;
  /** seconds */
  accessTokenTtl: number;
  /** seconds */
  refreshTokenTtl: number;
  email: Omit<EmailServiceOptions, 'logger'>;
  site: SiteInfo;
  passwordIterations?: number;
  cacheOptions?: Partial<CacheOptions>;
  logger?: DomainLogger;
}

export interface CoreServices {
  repositories: FileRepositoryFactory;
  media: MediaStorage;
  hasher: PasswordHasher;
  tokens: TokenService;
  email: EmailService;
  mailer: TemplateMailer;
  notifications: NotificationService;
  moderation: ModerationService;
  accounts: AccountService;
  contractors: ContractorService;
  chat: ChatService;
  projects: ProjectService;
  reviews: ReviewService;
  advertisements: AdvertisementService;
  admin: AdminService;
  initialData: InitialDataService;
  /** Release locks and transports */
  close(): Promise<void>;
}

export async function createCoreServices(options: CoreServicesOptions): Promise<CoreServices> {
  const { logger } = options;
  const repositories = new FileRepositoryFactory({
    baseDir: options.storagePath,
    cacheOptions: options.cacheOptions,
    logger,
  });
  await repositories.initialize();

  const media = new MediaStorage(options.mediaPath);
  const hasher = new PasswordHasher(options.passwordIterations);
  const tokens = new TokenService(repositories, {
    secretKey: options.secretKey,
    accessTokenTtl: options.accessTokenTtl,
    refreshTokenTtl: options.refreshTokenTtl,
  });
  const email = new EmailService({ ...options.email, logger });
  const mailer = new TemplateMailer(repositories, email, options.site);
  const notifications = new NotificationService(repositories, { email, siteName: options.site.siteName, logger });
  const moderation = new ModerationService(repositories, { notifications, logger });
  const accounts = new AccountService(repositories, { hasher, tokens, mailer, notifications, moderation, media, logger });
  const contractors = new ContractorService(repositories, media);
  const chat = new ChatService(repositories, { notifications, moderation, media, logger });
  const projects = new ProjectService(repositories, { notifications, chat, contractors, moderation, media, logger });
  const reviews = new ReviewService(repositories, { contractors, notifications, moderation, media });
  const advertisements = new AdvertisementService(repositories, media);
  const admin = new AdminService(repositories, {
    accounts,
    hasher,
    tokens,
    mailer,
    notifications,
    moderation,
    chat,
    advertisements,
    logger,
  });
  const initialData = new InitialDataService(repositories, logger);

  return {
    repositories,
    media,
    hasher,
    tokens,
    email,
    mailer,
    notifications,
    moderation,
    accounts,
    contractors,
    chat,
    projects,
    reviews,
    advertisements,
    admin,
    initialData,
    close: async () => {
      email.close();
      await repositories.close();
    },
  };
}
