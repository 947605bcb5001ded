export * from './admin-auth.dto.js';
export * from './admin-users.dto.js';
export * from './admin-moderation.dto.js';
export * from './admin-email.dto.js';
export * from './admin-system.dto.js';
