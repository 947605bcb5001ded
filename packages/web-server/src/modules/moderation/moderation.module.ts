import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { ModerationController } from './moderation.controller.js';

@Module({
  imports: [CoreModule],
  controllers: [ModerationController],
})
export class ModerationModule {}
