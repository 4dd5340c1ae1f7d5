/**
 * Leveled console logger.
 *
 * Messages are prefixed with a scope, e.g. `[runner] Installing packages`,
 * and filtered by the `LOG_LEVEL` environment variable.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARNING]: 2,
  [LogLevel.ERROR]: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

let minLevel: LogLevel = levelFromEnv(process.env.LOG_LEVEL);

function levelFromEnv(raw: string | undefined): LogLevel {
  const value = (raw ?? '').toUpperCase();
  return isLogLevel(value) ? value : LogLevel.INFO;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warning(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown): void;
}

class ScopedLogger implements Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARNING, message, ...args);
  }

  /**
   * Appends the error's message to `message`; the stack goes out as an extra argument.
   */
  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.log(LogLevel.ERROR, message);
      return;
    }
    const details = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error && error.stack ? [error.stack] : [];
    this.log(LogLevel.ERROR, `${message}: ${details}`, ...stack);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }
    const prefix = `[${this.scope}]`;
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(prefix, message, ...args);
        break;
      case LogLevel.INFO:
        console.log(prefix, message, ...args);
        break;
      case LogLevel.WARNING:
        console.warn(prefix, message, ...args);
        break;
      case LogLevel.ERROR:
        console.error(prefix, message, ...args);
        break;
    }
  }
}

export function createLogger(scope: string): Logger {
  return new ScopedLogger(scope);
}
