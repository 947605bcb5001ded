import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { AdvertisementsController } from './advertisements.controller.js';

@Module({
  imports: [CoreModule],
  controllers: [AdvertisementsController],
})
export class AdvertisementsModule {}
