/**
 * Logger service - structured console logging with timezone-aware timestamps
 * Provides configurable log levels
 */
import { config } from '../config/index';

/**
 * Log level severity ordering
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Parses log level string to enum value
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.toUpperCase();
  switch (normalized) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Formats timestamp in the given timezone
 */
function getTimestamp(timeZone: string): string {
  const now = new Date();
  const options: Intl.DateTimeFormatOptions = {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  };
  const formatter = new Intl.DateTimeFormat('en-CA', options);
  return formatter.format(now).replace(',', '');
}

/**
 * JSON.stringify drops Error fields; flatten errors at any object depth first
 */
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    const serialized: Record<string, unknown> = {
      name: data.name,
      message: data.message,
    };
    if ('details' in data && data.details !== undefined) {
      serialized.details = data.details;
    }
    if (data.stack) {
      serialized.stack = data.stack;
    }
    if (data.cause !== undefined) {
      serialized.cause = serializeData(data.cause);
    }
    return serialized;
  }
  if (typeof data === 'object' && data !== null && Object.getPrototypeOf(data) === Object.prototype) {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => [key, serializeData(value)])
    );
  }
  return data;
}

export interface LoggerOptions {
  level?: string;
  timezone?: string;
}

/**
 * Provides structured logging with configurable log levels
 */
export class LoggerService {
  private readonly logLevel: LogLevel;
  private readonly timezone: string;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = parseLogLevel(options.level ?? config.logging.logLevel);
    this.timezone = options.timezone ?? config.logging.timezone;
  }

  /**
   * Formats log message with timestamp and level
   */
  private formatLogMessage(level: string, message: string, data?: unknown): string {
    const timestamp = getTimestamp(this.timezone);
    const baseMsg = `[${timestamp}] [${level}] ${message}`;
    if (data !== undefined) {
      return `${baseMsg}\n${JSON.stringify(serializeData(data), null, 2)}`;
    }
    return baseMsg;
  }

  debug(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.log(this.formatLogMessage('DEBUG', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(this.formatLogMessage('INFO', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.warn(this.formatLogMessage('WARN', message, data));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.logLevel <= LogLevel.ERROR) {
      console.error(this.formatLogMessage('ERROR', message, error));
    }
  }
}
