export * from './chat.dto.js';
