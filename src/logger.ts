/**
 * Logger
 *
 * Small logging seam shared by every component. The console logger prefixes
 * each line with its level and component scope, e.g. `[WARN] [Orchestrator] ...`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
  child(scope: string): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// ============================================================================
// Console Logger
// ============================================================================

export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;

  constructor(options: { level?: LogLevel; scope?: string } = {}) {
    this.minLevel = options.level ?? 'info';
    this.scope = options.scope;
  }

  debug(message: string, context?: object): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: object): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: object): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: object): void {
    this.log('error', message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({ level: this.minLevel, scope });
  }

  private log(level: LogLevel, message: string, context?: object): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const prefix = this.scope ? `[${level.toUpperCase()}] [${this.scope}]` : `[${level.toUpperCase()}]`;
    const write = console[level];

    if (context && Object.keys(context).length > 0) {
      write(`${prefix} ${message}`, context);
    } else {
      write(`${prefix} ${message}`);
    }
  }
}

// ============================================================================
// Null Logger
// ============================================================================

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(): Logger {
    return this;
  }
}

export function createLogger(level: LogLevel = 'info'): Logger {
  return new ConsoleLogger({ level });
}
