import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { NotificationsController } from './notifications.controller.js';

@Module({
  imports: [CoreModule],
  controllers: [NotificationsController],
})
export class NotificationsModule {}
