export * from './project.dto.js';
export * from './application.dto.js';
export * from './milestone.dto.js';
export * from './progress-update.dto.js';
export * from './document.dto.js';
