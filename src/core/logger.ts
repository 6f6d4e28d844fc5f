// src/core/logger.ts
import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
}

class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.log(chalk.gray(this.format(message)));
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.log(this.format(message));
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.error(chalk.yellow(this.format(message)));
    }
  }

  error(message: string): void {
    if (this.enabled('error')) {
      console.error(chalk.red(this.format(message)));
    }
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
