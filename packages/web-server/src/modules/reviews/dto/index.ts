export * from './review.dto.js';
