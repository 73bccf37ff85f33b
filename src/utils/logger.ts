/**
 * Structured Logger
 *
 * Provides consistent, structured logging with context and metadata support.
 * Outputs JSON-formatted logs in production and a single readable line
 * otherwise. The detached bootstrap worker has its stdout redirected to the
 * setup log, so everything logged here ends up in that file on the instance.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export interface LogContext {
  service?: string;
  operation?: string;
  step?: string;
  environment?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

interface ErrorWithCode extends Error {
  code?: string;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  const match = LEVEL_ORDER.find((level) => level === value.toLowerCase());
  return match ?? fallback;
}

export class Logger {
  private service: string;
  private minLevel: LogLevel;

  constructor(service: string = 'provisioner', minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.service = service;
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private formatLog(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        service: this.service,
        ...context,
      },
    };

    if (error) {
      const errorWithCode: ErrorWithCode = error;
      entry.error = {
        name: error.name,
        message: error.message,
        stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
        code: errorWithCode.code,
      };
    }

    return entry;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry = this.formatLog(level, message, context, error);

    if (process.env.NODE_ENV === 'production') {
      console.log(JSON.stringify(entry));
    } else {
      const prefix = `[${entry.level.toUpperCase()}] [${entry.context?.service}]`;
      const ctx = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
      const err = entry.error ? `\n${entry.error.stack || entry.error.message}` : '';
      console.log(`${prefix} ${entry.message}${ctx}${err}`);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export const bootstrapLogger = new Logger('bootstrap');
export const activatorLogger = new Logger('activator');
export const apiLogger = new Logger('api');
export const watchdogLogger = new Logger('watchdog');

export function setLogLevel(level: LogLevel): void {
  for (const logger of [bootstrapLogger, activatorLogger, apiLogger, watchdogLogger]) {
    logger.setLevel(level);
  }
}
