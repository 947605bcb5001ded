import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { ReviewsController } from './reviews.controller.js';

@Module({
  imports: [CoreModule],
  controllers: [ReviewsController],
})
export class ReviewsModule {}
