import { Module, type MiddlewareConsumer, type NestModule } from '@nestjs/common';
import { AppConfigModule } from './config/index.js';
import { CoreModule } from './modules/core/index.js';
import { AuthModule } from './modules/auth/index.js';
import { ContractorsModule } from './modules/contractors/index.js';
import { ProjectsModule } from './modules/projects/index.js';
import { ReviewsModule } from './modules/reviews/index.js';
import { ChatModule } from './modules/chat/index.js';
import { NotificationsModule } from './modules/notifications/index.js';
import { ModerationModule } from './modules/moderation/index.js';
import { AdvertisementsModule } from './modules/advertisements/index.js';
import { AdminPanelModule } from './modules/admin-panel/index.js';
import { AllowedHostsMiddleware, RequestContextMiddleware } from './middleware/index.js';

@Module({
  imports: [
    AppConfigModule,
    CoreModule,
    AuthModule,
    ContractorsModule,
    ProjectsModule,
    ReviewsModule,
    ChatModule,
    NotificationsModule,
    ModerationModule,
    AdvertisementsModule,
    AdminPanelModule,
  ],
})
export class AppModule implements NestModule {
  public configure(consumer: MiddlewareConsumer): void {
    consumer.apply(AllowedHostsMiddleware, RequestContextMiddleware).forRoutes('*');
  }
}
