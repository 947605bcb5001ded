/**
 * Shared configuration constants for the Contractor Connect monorepo
 * SINGLE SOURCE OF TRUTH - all other files import from here
 */

export const APP_NAME = 'Contractor Connect';

/**
 * Port configuration
 */
export const WEB_SERVER_PORT = 8000;

/**
 * API configuration
 */
export const API_PREFIX = 'api';
export const ADMIN_PANEL_PATH = 'admin-panel';
export const CHAT_SOCKET_PATH = '/ws/chat';

/**
 * Storage defaults (relative to the working directory)
 */
export const DEFAULT_STORAGE_PATH = './data';
export const DEFAULT_MEDIA_PATH = './media';

/**
 * Media sub-directories created by setup-system
 */
export const MEDIA_DIRECTORIES = [
  'avatars',
  'portfolio',
  'certifications',
  'projects',
  'project_documents',
  'chat_files',
  'chat_images',
  'review_images',
  'advertisements',
] as const;

export type MediaDirectory = (typeof MEDIA_DIRECTORIES)[number];

/**
 * Token lifetimes (seconds)
 */
export const DEFAULT_ACCESS_TOKEN_TTL = 60 * 60;
export const DEFAULT_REFRESH_TOKEN_TTL = 7 * 24 * 60 * 60;

/**
 * Environment variable names
 */
export const ENV_VAR_NAMES = {
  PORT: 'PORT',
  NODE_ENV: 'NODE_ENV',
  DEBUG: 'DEBUG',
  SECRET_KEY: 'SECRET_KEY',
  ACCESS_TOKEN_TTL: 'ACCESS_TOKEN_TTL',
  REFRESH_TOKEN_TTL: 'REFRESH_TOKEN_TTL',
  ALLOWED_HOSTS: 'ALLOWED_HOSTS',
  CORS_ORIGINS: 'CORS_ORIGINS',
  STORAGE_PATH: 'STORAGE_PATH',
  MEDIA_PATH: 'MEDIA_PATH',
  SITE_NAME: 'SITE_NAME',
  SITE_URL: 'SITE_URL',
  EMAIL_TRANSPORT: 'EMAIL_TRANSPORT',
  SMTP_HOST: 'SMTP_HOST',
  SMTP_PORT: 'SMTP_PORT',
  SMTP_SECURE: 'SMTP_SECURE',
  SMTP_USER: 'SMTP_USER',
  SMTP_PASS: 'SMTP_PASS',
  DEFAULT_FROM_EMAIL: 'DEFAULT_FROM_EMAIL',
  SCHEDULER_ENABLED: 'SCHEDULER_ENABLED',
  PASSWORD_HASH_ITERATIONS: 'PASSWORD_HASH_ITERATIONS',
} as const;

/**
 * CORS origins for development
 */
export const CORS_ORIGINS = ['http://localhost:3000'];
