import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { ProjectsController } from './projects.controller.js';

@Module({
  imports: [CoreModule],
  controllers: [ProjectsController],
})
export class ProjectsModule {}
