export * from './advertisement.dto.js';
