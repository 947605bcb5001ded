import { Module } from '@nestjs/common';
import { CoreModule } from '../core/index.js';
import { AdminPanelController } from './admin-panel.controller.js';
import { AdminPermissionGuard } from './admin-permission.guard.js';

@Module({
  imports: [CoreModule],
  controllers: [AdminPanelController],
  providers: [AdminPermissionGuard],
})
export class AdminPanelModule {}
