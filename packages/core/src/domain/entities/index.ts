export * from './common.js';
export * from './accounts.js';
export * from './contractors.js';
export * from './projects.js';
export * from './reviews.js';
export * from './chat.js';
export * from './notifications.js';
export * from './moderation.js';
export * from './admin.js';
export * from './advertisements.js';
