/**
 * Pluggable logger contract for core services and storage
 *
 * Hosts plug in their own logger (Nest Logger in the web server,
 * console in the CLI). Core code never writes to stdout directly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface DomainLogger {
  debug?(message: string, context?: Record<string, unknown>): void;
  info?(message: string, context?: Record<string, unknown>): void;
  warn?(message: string, context?: Record<string, unknown>): void;
  error?(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Logger that drops messages below `minLevel` before delegating
 */
export class LevelFilteredLogger implements DomainLogger {
  constructor(
    private readonly target: DomainLogger | undefined,
    private readonly minLevel: LogLevel = 'info'
  ) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: Exclude<LogLevel, 'none'>, message: string, context?: Record<string, unknown>): void {
    if (this.target === undefined || this.minLevel === 'none') {
      return;
    }
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }
    this.target[level]?.(message, context);
  }
}

export function createDomainLogger(target?: DomainLogger, minLevel: LogLevel = 'info'): DomainLogger {
  return new LevelFilteredLogger(target, minLevel);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
