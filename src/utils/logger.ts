import { LogLevel } from '../types/config';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Levelled logger for diagnostics.
 * Everything goes to stderr; stdout is reserved for the per-file confirmation lines.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  public debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (this.levels[level] >= this.levels[this.level]) {
      const timestamp = new Date().toISOString();
      const levelStr = level.toUpperCase().padEnd(5);
      const logMessage = `[${timestamp}] ${levelStr} ${message}`;

      if (args.length > 0) {
        console.error(logMessage, ...args);
      } else {
        console.error(logMessage);
      }
    }
  }

  public isDebugEnabled(): boolean {
    return this.levels.debug >= this.levels[this.level];
  }
}
