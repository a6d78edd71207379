/**
 * Logger Utility
 *
 * Leveled console logger shared by the API and services.
 * Level comes from LOG_LEVEL; tests run silent unless LOG_LEVEL is set.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(levelPriority, value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export class Logger {
  private level: LogLevel;
  private context: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? defaultLevel();
    this.context = options.context ?? '';
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private prefix(level: string): string {
    const ctx = this.context ? ` (${this.context})` : '';
    return `${new Date().toISOString()} [${level}]${ctx}`;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Create a child logger sharing this logger's level
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
    });
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(this.prefix('debug'), message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.info(this.prefix('info'), message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(this.prefix('warn'), message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(this.prefix('error'), message, ...args);
  }
}

export const logger = new Logger();
