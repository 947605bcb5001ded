/**
 * CLI configuration
 *
 * Reads the same variables as the web server. A missing .env is fine,
 * a missing SECRET_KEY is not.
 */

import * as path from 'path';
import dotenv from 'dotenv';
import {
  ENV_VAR_NAMES,
  getEmailSettings,
  getMediaPath,
  getPasswordIterations,
  getSecretKey,
  getSiteName,
  getSiteUrl,
  getStoragePath,
  getTokenLifetimes,
  readBoolean,
  type EmailSettings,
} from '@contractor-connect/config';
import type { CoreServicesOptions, DomainLogger, SiteInfo } from '@contractor-connect/core';

export type Env = Record<string, string | undefined>;

export interface CliSettings {
  storagePath: string;
  mediaPath: string;
  secretKey: string;
  accessTokenTtl: number;
  refreshTokenTtl: number;
  email: EmailSettings;
  site: SiteInfo;
  passwordIterations?: number;
  debug: boolean;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Load `<cwd>/.env` into process.env
 * @returns whether a file was loaded
 */
export function loadEnvFile(cwd: string = process.cwd()): boolean {
  const result = dotenv.config({ path: path.join(cwd, '.env') });
  if (result.error === undefined) {
    return true;
  }
  if ('code' in result.error && result.error.code === 'ENOENT') {
    return false;
  }
  throw result.error;
}

/**
 * @throws ConfigurationError when SECRET_KEY is missing
 */
export function readCliSettings(env: Env): CliSettings {
  const secretKey = getSecretKey(env);
  if (secretKey === undefined) {
    throw new ConfigurationError(`${ENV_VAR_NAMES.SECRET_KEY} is not set. Add it to .env or the environment.`);
  }
  const lifetimes = getTokenLifetimes(env);
  return {
    storagePath: getStoragePath(env),
    mediaPath: getMediaPath(env),
    secretKey,
    accessTokenTtl: lifetimes.access,
    refreshTokenTtl: lifetimes.refresh,
    email: getEmailSettings(env),
    site: { siteName: getSiteName(env), siteUrl: getSiteUrl(env) },
    passwordIterations: getPasswordIterations(env),
    debug: readBoolean(env, ENV_VAR_NAMES.DEBUG),
  };
}

export function toCoreOptions(settings: CliSettings, logger?: DomainLogger): CoreServicesOptions {
  return {
    storagePath: settings.storagePath,
    mediaPath: settings.mediaPath,
    secretKey: settings.secretKey,
    accessTokenTtl: settings.accessTokenTtl,
    refreshTokenTtl: settings.refreshTokenTtl,
    email: settings.email,
    site: settings.site,
    passwordIterations: settings.passwordIterations,
    logger,
  };
}
