import type { LogMeta, Logger } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Console logger that drops entries below `minLevel`. */
export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) console.debug(message, meta ?? {});
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) console.info(message, meta ?? {});
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) console.warn(message, meta ?? {});
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled('error')) console.error(message, meta ?? {});
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

/**
 * Creates a console logger whose level comes from `LOG_LEVEL`, falling back to
 * `info` when unset or unrecognised.
 */
export function createConsoleLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): ConsoleLogger {
  const level = env.LOG_LEVEL?.toLowerCase();
  return new ConsoleLogger(level && isLogLevel(level) ? level : 'info');
}
