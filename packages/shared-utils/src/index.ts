// Date/Time utilities using Luxon
import { DateTime } from 'luxon';

const DEFAULT_TIMEZONE = 'UTC';

/**
 * Timezone used for log lines and snapshot timestamps (ENGINE_TIMEZONE, default UTC)
 */
export function getEngineTimezone(): string {
  return process.env.ENGINE_TIMEZONE || DEFAULT_TIMEZONE;
}

/**
 * Get current time in the engine timezone
 */
export function getNowInEngineTimezone(): DateTime {
  return DateTime.now().setZone(getEngineTimezone());
}

/**
 * Format an epoch-millisecond timestamp as ISO 8601 in the engine timezone
 */
export function formatTimestamp(timestampMs: number, zone: string = getEngineTimezone()): string {
  const iso = DateTime.fromMillis(timestampMs, { zone }).toISO();
  return iso ?? new Date(timestampMs).toISOString();
}

/**
 * Format date as YYYY-MM-DD in the engine timezone
 */
export function formatDate(timestampMs: number, zone: string = getEngineTimezone()): string {
  return DateTime.fromMillis(timestampMs, { zone }).toFormat('yyyy-MM-dd');
}

/**
 * Logger utility
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveThreshold(): LogLevel {
  if (process.env.DEBUG === 'true') {
    return 'debug';
  }
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private formatMessage(level: LogLevel, message: string, args: unknown[]): string {
    const timestamp = getNowInEngineTimezone().toISO();
    const argsStr = args.length > 0 ? ` ${JSON.stringify(args)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}${argsStr}`;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveThreshold()];
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) {
      console.log(this.formatMessage('info', message, args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) {
      console.error(this.formatMessage('error', message, args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) {
      console.warn(this.formatMessage('warn', message, args));
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) {
      console.debug(this.formatMessage('debug', message, args));
    }
  }
}

/**
 * Custom error classes
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, public field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends EngineError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class DeadlineExceededError extends EngineError {
  constructor(operation: string, public deadlineMs: number) {
    super(`${operation} exceeded deadline of ${deadlineMs}ms`, 'DEADLINE_EXCEEDED', 504);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Describe an unknown thrown value for logs and skip reasons
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
