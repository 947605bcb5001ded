import { createDomainLogger, type DomainLogger } from '@contractor-connect/core';

/**
 * Where commands print. Success lines get a ✔, errors a ✖.
 */
export interface CliOutput {
  line(message?: string): void;
  success(message: string): void;
  error(message: string): void;
}

export const consoleOutput: CliOutput = {
  line: (message = '') => {
    console.log(message);
  },
  success: (message) => {
    console.log(`✔ ${message}`);
  },
  error: (message) => {
    console.error(`✖ ${message}`);
  },
};

/**
 * Core log lines go to stderr; below warn only with DEBUG
 */
export function createCliLogger(debug: boolean): DomainLogger {
  return createDomainLogger(
    {
      debug: (message) => {
        console.error(`[debug] ${message}`);
      },
      info: (message) => {
        console.error(`[info] ${message}`);
      },
      warn: (message) => {
        console.error(`[warn] ${message}`);
      },
      error: (message) => {
        console.error(`[error] ${message}`);
      },
    },
    debug ? 'debug' : 'warn'
  );
}
