import process from 'node:process';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

function isLogLevelName(name: string): name is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, name);
}

export function parseLogLevel(name: string | undefined, fallback = LogLevel.INFO): LogLevel {
  const key = name?.toLowerCase();
  return key !== undefined && isLogLevelName(key) ? LEVEL_NAMES[key] : fallback;
}

const SECRET_KEY_PATTERN = /token|password|secret|key/i;

/**
 * Logger bound to a component name. Every message is prefixed with `[scope]`.
 */
export interface ScopedLogger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;
  private colorsEnabled: boolean = true;

  private constructor() {
    if (process.env.NO_COLOR || process.env.CI === 'true' || !process.stdout.isTTY) {
      this.colorsEnabled = false;
    }
    this.logLevel = parseLogLevel(process.env.AGENTSYNC_LOG_LEVEL);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public setColors(enabled: boolean): void {
    this.colorsEnabled = enabled;
  }

  public scoped(scope: string): ScopedLogger {
    const prefix = `[${scope}] `;
    return {
      debug: (message, ...args) => this.debug(prefix + message, ...args),
      info: (message, ...args) => this.info(prefix + message, ...args),
      warn: (message, ...args) => this.warn(prefix + message, ...args),
      error: (message, ...args) => this.error(prefix + message, ...args),
    };
  }

  private colorize(text: string, colorFn: typeof chalk.blue): string {
    return this.colorsEnabled ? colorFn(text) : text;
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.log(this.colorize(`[DEBUG] ${message}`, chalk.gray), ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(this.colorize(`[INFO] ${message}`, chalk.blue), ...args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.warn(this.colorize(`[WARN] ${message}`, chalk.yellow), ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.ERROR) {
      const sanitizedArgs = args.map(arg => this.sanitizeForLogging(arg));
      console.error(this.colorize(`[ERROR] ${message}`, chalk.red), ...sanitizedArgs);
    }
  }

  public success(message: string, ...args: unknown[]): void {
    console.log(this.colorize(`✔ ${message}`, chalk.green), ...args);
  }

  private sanitizeForLogging(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(/Bearer\s+[\w-]+|Basic\s+[\w=+/]+|token=[\w-]+/gi, '[REDACTED]');
    }
    if (value instanceof Error) {
      return value;
    }
    if (typeof value === 'object' && value !== null) {
      const sanitized: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        sanitized[key] = SECRET_KEY_PATTERN.test(key) ? '[REDACTED]' : this.sanitizeForLogging(entry);
      }
      return sanitized;
    }
    return value;
  }
}

export const logger = Logger.getInstance();
