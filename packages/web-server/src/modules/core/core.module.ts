import { Module, type OnModuleDestroy, type OnApplicationBootstrap, Logger, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  TaskScheduler,
  createCoreServices,
  createDefaultTasks,
  type CoreServices,
} from '@contractor-connect/core';
import type { AppConfig } from '../../config/index.js';
import { createNestDomainLogger } from '../../common/index.js';

// String tokens for DI
export const CORE_SERVICES = 'CORE_SERVICES';
export const TASK_SCHEDULER = 'TASK_SCHEDULER';
export const ACCOUNT_SERVICE = 'ACCOUNT_SERVICE';
export const CONTRACTOR_SERVICE = 'CONTRACTOR_SERVICE';
export const PROJECT_SERVICE = 'PROJECT_SERVICE';
export const REVIEW_SERVICE = 'REVIEW_SERVICE';
export const CHAT_SERVICE = 'CHAT_SERVICE';
export const NOTIFICATION_SERVICE = 'NOTIFICATION_SERVICE';
export const MODERATION_SERVICE = 'MODERATION_SERVICE';
export const ADMIN_SERVICE = 'ADMIN_SERVICE';
export const ADVERTISEMENT_SERVICE = 'ADVERTISEMENT_SERVICE';

type ServiceKey = Exclude<keyof CoreServices, 'close'>;

function fromCore(token: string, key: ServiceKey): { provide: string; useFactory: (core: CoreServices) => unknown; inject: string[] } {
  return {
    provide: token,
    useFactory: (core: CoreServices) => core[key],
    inject: [CORE_SERVICES],
  };
}

@Module({
  providers: [
    {
      provide: CORE_SERVICES,
      useFactory: async (configService: ConfigService): Promise<CoreServices> => {
        const debug = configService.get<boolean>('debug') ?? false;
        return createCoreServices({
          storagePath: configService.getOrThrow<string>('storagePath'),
          mediaPath: configService.getOrThrow<string>('mediaPath'),
          secretKey: configService.getOrThrow<string>('secretKey'),
          accessTokenTtl: configService.getOrThrow<number>('accessTokenTtl'),
          refreshTokenTtl: configService.getOrThrow<number>('refreshTokenTtl'),
          email: configService.getOrThrow<AppConfig['email']>('email'),
          site: {
            siteName: configService.getOrThrow<string>('siteName'),
            siteUrl: configService.getOrThrow<string>('siteUrl'),
          },
          passwordIterations: configService.get<number>('passwordIterations'),
          logger: createNestDomainLogger('Core', debug),
        });
      },
      inject: [ConfigService],
    },
    {
      provide: TASK_SCHEDULER,
      useFactory: (core: CoreServices, configService: ConfigService): TaskScheduler => {
        const scheduler = new TaskScheduler({
          logger: createNestDomainLogger(TaskScheduler.name, configService.get<boolean>('debug') ?? false),
        });
        for (const task of createDefaultTasks(core)) {
          scheduler.register(task);
        }
        return scheduler;
      },
      inject: [CORE_SERVICES, ConfigService],
    },
    fromCore(ACCOUNT_SERVICE, 'accounts'),
    fromCore(CONTRACTOR_SERVICE, 'contractors'),
    fromCore(PROJECT_SERVICE, 'projects'),
    fromCore(REVIEW_SERVICE, 'reviews'),
    fromCore(CHAT_SERVICE, 'chat'),
    fromCore(NOTIFICATION_SERVICE, 'notifications'),
    fromCore(MODERATION_SERVICE, 'moderation'),
    fromCore(ADMIN_SERVICE, 'admin'),
    fromCore(ADVERTISEMENT_SERVICE, 'advertisements'),
  ],
  exports: [
    CORE_SERVICES,
    TASK_SCHEDULER,
    ACCOUNT_SERVICE,
    CONTRACTOR_SERVICE,
    PROJECT_SERVICE,
    REVIEW_SERVICE,
    CHAT_SERVICE,
    NOTIFICATION_SERVICE,
    MODERATION_SERVICE,
    ADMIN_SERVICE,
    ADVERTISEMENT_SERVICE,
  ],
})
export class CoreModule implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(CoreModule.name);

  constructor(
    @Inject(CORE_SERVICES) private readonly core: CoreServices,
    @Inject(TASK_SCHEDULER) private readonly scheduler: TaskScheduler,
    private readonly configService: ConfigService
  ) {}

  public onApplicationBootstrap(): void {
    if (this.configService.get<boolean>('schedulerEnabled') === true) {
      this.scheduler.start();
      this.logger.log('Periodic tasks running in the web server process');
    }
  }

  public async onModuleDestroy(): Promise<void> {
    this.logger.log('Shutting down CoreModule...');

    try {
      this.scheduler.stop();
      await this.core.close();
      this.logger.log('Core services closed');
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Error during shutdown: ${errorMessage}`);
    }
  }
}
