import { Logger } from '@nestjs/common';
import { createDomainLogger, type DomainLogger } from '@contractor-connect/core';

function format(message: string, context?: Record<string, unknown>): string {
  return context === undefined || Object.keys(context).length === 0 ? message : `${message} ${JSON.stringify(context)}`;
}

/**
 * DomainLogger for core services, written through a Nest Logger
 */
export function createNestDomainLogger(name: string, debug: boolean): DomainLogger {
  const logger = new Logger(name);
  return createDomainLogger(
    {
      debug: (message, context) => {
        logger.debug(format(message, context));
      },
      info: (message, context) => {
        logger.log(format(message, context));
      },
      warn: (message, context) => {
        logger.warn(format(message, context));
      },
      error: (message, context) => {
        logger.error(format(message, context));
      },
    },
    debug ? 'debug' : 'info'
  );
}
