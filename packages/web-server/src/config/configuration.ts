import {
  ENV_VAR_NAMES,
  WEB_SERVER_PORT,
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
  getEmailSettings,
  getMediaPath,
  getPasswordIterations,
  getServerConfig,
  getSiteName,
  getSiteUrl,
  getStoragePath,
  getTokenLifetimes,
  readBoolean,
  type EmailSettings,
} from '@contractor-connect/config';
import type { ConfigService } from '@nestjs/config';
import Joi from 'joi';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  debug: boolean;
  apiPrefix: string;
  corsOrigins: string[];
  allowedHosts: string[];
  storagePath: string;
  mediaPath: string;
  secretKey: string;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  siteName: string;
  siteUrl: string;
  email: EmailSettings;
  schedulerEnabled: boolean;
  passwordIterations?: number;
}

export const configValidationSchema = Joi.object({
  [ENV_VAR_NAMES.PORT]: Joi.number().default(WEB_SERVER_PORT),
  [ENV_VAR_NAMES.NODE_ENV]: Joi.string().valid('development', 'production', 'test').default('development'),
  [ENV_VAR_NAMES.DEBUG]: Joi.boolean().truthy('1', 'yes', 'on').falsy('0', 'no', 'off').default(false),
  [ENV_VAR_NAMES.SECRET_KEY]: Joi.string().required(),
  [ENV_VAR_NAMES.ACCESS_TOKEN_TTL]: Joi.number().integer().positive().default(DEFAULT_ACCESS_TOKEN_TTL),
  [ENV_VAR_NAMES.REFRESH_TOKEN_TTL]: Joi.number().integer().positive().default(DEFAULT_REFRESH_TOKEN_TTL),
  [ENV_VAR_NAMES.EMAIL_TRANSPORT]: Joi.string().valid('smtp', 'json').default('json'),
  [ENV_VAR_NAMES.PASSWORD_HASH_ITERATIONS]: Joi.number().integer().positive(),
  [ENV_VAR_NAMES.SMTP_PORT]: Joi.number().integer().positive(),
  [ENV_VAR_NAMES.DEFAULT_FROM_EMAIL]: Joi.string().email({ tlds: { allow: false } }),
});

export function configuration(): AppConfig {
  const server = getServerConfig();
  const lifetimes = getTokenLifetimes();
  return {
    port: server.port,
    nodeEnv: process.env[ENV_VAR_NAMES.NODE_ENV] ?? 'development',
    debug: readBoolean(process.env, ENV_VAR_NAMES.DEBUG),
    apiPrefix: server.apiPrefix,
    corsOrigins: server.corsOrigins,
    allowedHosts: server.allowedHosts,
    storagePath: getStoragePath(),
    mediaPath: getMediaPath(),
    secretKey: process.env[ENV_VAR_NAMES.SECRET_KEY] ?? '',
    accessTokenTtl: lifetimes.access,
    refreshTokenTtl: lifetimes.refresh,
    siteName: getSiteName(),
    siteUrl: getSiteUrl(),
    email: getEmailSettings(),
    schedulerEnabled: readBoolean(process.env, ENV_VAR_NAMES.SCHEDULER_ENABLED),
    passwordIterations: getPasswordIterations(),
  };
}

/**
 * Typed view of the loaded configuration
 */
export function readAppConfig(configService: ConfigService): AppConfig {
  return {
    port: configService.getOrThrow<number>('port'),
    nodeEnv: configService.getOrThrow<string>('nodeEnv'),
    debug: configService.getOrThrow<boolean>('debug'),
    apiPrefix: configService.getOrThrow<string>('apiPrefix'),
    corsOrigins: configService.getOrThrow<string[]>('corsOrigins'),
    allowedHosts: configService.getOrThrow<string[]>('allowedHosts'),
    storagePath: configService.getOrThrow<string>('storagePath'),
    mediaPath: configService.getOrThrow<string>('mediaPath'),
    secretKey: configService.getOrThrow<string>('secretKey'),
    accessTokenTtl: configService.getOrThrow<number>('accessTokenTtl'),
    refreshTokenTtl: configService.getOrThrow<number>('refreshTokenTtl'),
    siteName: configService.getOrThrow<string>('siteName'),
    siteUrl: configService.getOrThrow<string>('siteUrl'),
    email: configService.getOrThrow<AppConfig['email']>('email'),
    schedulerEnabled: configService.getOrThrow<boolean>('schedulerEnabled'),
    passwordIterations: configService.get<number>('passwordIterations'),
  };
}
