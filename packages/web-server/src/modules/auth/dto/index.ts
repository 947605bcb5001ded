export * from './auth.dto.js';
export * from './profile.dto.js';
export * from './address.dto.js';
