export * from './moderation.dto.js';
