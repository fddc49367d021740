/**
 * Structured logging with levels and module prefixes.
 *
 * Usage:
 *   import { createLogger } from './logger';
 *   const log = createLogger('RendererBuilder');
 *   log.debug('Built renderer', { handles });
 *   log.warn('Deletion failed', error);
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// Global floor consulted on every call, so module loggers created at import
// time still follow setLogLevel().
let rootThreshold = LogLevel.DEBUG;

interface LoggerConfig {
  level: LogLevel;
  prefix: string;
}

export class Logger {
  private config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      // Everything in a Vite dev build, warnings and errors otherwise
      level: import.meta.env?.DEV ? LogLevel.DEBUG : LogLevel.WARN,
      prefix: "",
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= rootThreshold && level >= this.config.level;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /** Child logger whose prefix is appended to this one's. */
  child(prefix: string): Logger {
    return new Logger({
      ...this.config,
      prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix,
    });
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

const logger = new Logger();

/** Raises or lowers the threshold for every logger at once. */
export function setLogLevel(level: LogLevel): void {
  rootThreshold = level;
}

/**
 * Factory for module-specific loggers
 *
 * @example
 * const log = createLogger('AnimationDriver');
 * log.debug('Started');
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
