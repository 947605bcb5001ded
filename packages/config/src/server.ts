/**
 * Server-side configuration with environment variable support
 * USE IN: web-server, cli (Node.js only)
 */

import {
  WEB_SERVER_PORT,
  ENV_VAR_NAMES,
  API_PREFIX,
  CORS_ORIGINS,
  APP_NAME,
  DEFAULT_STORAGE_PATH,
  DEFAULT_MEDIA_PATH,
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
} from './constants.js';

export type EmailTransportKind = 'smtp' | 'json';

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
}

export interface EmailSettings {
  transport: EmailTransportKind;
  from: string;
  smtp: SmtpSettings;
}

/**
 * Server configuration interface
 */
export interface ServerConfig {
  readonly port: number;
  readonly apiPrefix: string;
  corsOrigins: string[];
  allowedHosts: string[];
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function readInt(env: Env, name: string, fallback: number): number {
  const value = readString(env, name);
  if (value === undefined) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse a boolean flag ("true", "1", "yes", "on" are truthy)
 */
export function readBoolean(env: Env, name: string, fallback = false): boolean {
  const value = readString(env, name);
  if (value === undefined) {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Split a comma separated list, dropping blanks
 */
export function readList(env: Env, name: string, fallback: string[]): string[] {
  const value = readString(env, name);
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Get web server port with environment override
 */
export function getWebServerPort(env: Env = process.env): number {
  return readInt(env, ENV_VAR_NAMES.PORT, WEB_SERVER_PORT);
}

export function getStoragePath(env: Env = process.env): string {
  return readString(env, ENV_VAR_NAMES.STORAGE_PATH) ?? DEFAULT_STORAGE_PATH;
}

export function getMediaPath(env: Env = process.env): string {
  return readString(env, ENV_VAR_NAMES.MEDIA_PATH) ?? DEFAULT_MEDIA_PATH;
}

export function getSiteName(env: Env = process.env): string {
  return readString(env, ENV_VAR_NAMES.SITE_NAME) ?? APP_NAME;
}

export function getSiteUrl(env: Env = process.env): string {
  return readString(env, ENV_VAR_NAMES.SITE_URL) ?? 'http://localhost:3000';
}

export function getSecretKey(env: Env = process.env): string | undefined {
  return readString(env, ENV_VAR_NAMES.SECRET_KEY);
}

/**
 * PBKDF2 cost override; undefined keeps the hasher's default
 */
export function getPasswordIterations(env: Env = process.env): number | undefined {
  const iterations = readInt(env, ENV_VAR_NAMES.PASSWORD_HASH_ITERATIONS, 0);
  return iterations > 0 ? iterations : undefined;
}

export function getTokenLifetimes(env: Env = process.env): { access: number; refresh: number } {
  return {
    access: readInt(env, ENV_VAR_NAMES.ACCESS_TOKEN_TTL, DEFAULT_ACCESS_TOKEN_TTL),
    refresh: readInt(env, ENV_VAR_NAMES.REFRESH_TOKEN_TTL, DEFAULT_REFRESH_TOKEN_TTL),
  };
}

/**
 * E-mail settings. The json transport renders messages in process instead of sending them.
 */
export function getEmailSettings(env: Env = process.env): EmailSettings {
  const transport = readString(env, ENV_VAR_NAMES.EMAIL_TRANSPORT) === 'smtp' ? 'smtp' : 'json';
  return {
    transport,
    from: readString(env, ENV_VAR_NAMES.DEFAULT_FROM_EMAIL) ?? 'noreply@contractor-connect.local',
    smtp: {
      host: readString(env, ENV_VAR_NAMES.SMTP_HOST) ?? 'localhost',
      port: readInt(env, ENV_VAR_NAMES.SMTP_PORT, 587),
      secure: readBoolean(env, ENV_VAR_NAMES.SMTP_SECURE),
      user: readString(env, ENV_VAR_NAMES.SMTP_USER),
      pass: readString(env, ENV_VAR_NAMES.SMTP_PASS),
    },
  };
}

/**
 * Get complete server configuration
 * Use this in NestJS ConfigModule
 */
export function getServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: getWebServerPort(env),
    apiPrefix: API_PREFIX,
    corsOrigins: readList(env, ENV_VAR_NAMES.CORS_ORIGINS, CORS_ORIGINS),
    allowedHosts: readList(env, ENV_VAR_NAMES.ALLOWED_HOSTS, ['*']),
  };
}
