export { AdminPanelModule } from './admin-panel.module.js';
export { AdminPermissionGuard, RequirePermission, CurrentAdmin, type AdminRequest } from './admin-permission.guard.js';
