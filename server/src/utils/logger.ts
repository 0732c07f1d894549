export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly scope?: string,
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format('DEBUG', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info(this.format('INFO', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format('WARN', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format('ERROR', message), ...args);
    }
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(tag: string, message: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${message}` : `[${tag}] ${message}`;
  }
}

export function createLogger(level: LogLevel, scope?: string): Logger {
  return new ConsoleLogger(level, scope);
}

/** Discards everything; for callers that opt out of logging. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
