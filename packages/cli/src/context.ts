import { createCoreServices, type CoreServices } from '@contractor-connect/core';
import type { CliOutput } from './output.js';
import { createCliLogger } from './output.js';
import { readCliSettings, toCoreOptions, type CliSettings, type Env } from './settings.js';

export interface CliContext {
  env: Env;
  cwd: string;
  output: CliOutput;
  /** Resolves with the signal that asked the process to stop */
  waitForShutdown(): Promise<string>;
}

/**
 * Resolve on the first SIGINT or SIGTERM
 */
export function waitForProcessSignal(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/**
 * Open the core services for one command and close them afterwards
 */
export async function withServices(
  ctx: CliContext,
  run: (services: CoreServices, settings: CliSettings) => Promise<number>
): Promise<number> {
  const settings = readCliSettings(ctx.env);
  const services = await createCoreServices(toCoreOptions(settings, createCliLogger(settings.debug)));
  try {
    return await run(services, settings);
  } finally {
    await services.close();
  }
}
