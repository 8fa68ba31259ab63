/**
 * Leveled logging and application errors.
 *
 * Components never reach for a shared instance: the CLI builds one Logger and hands it (or a
 * child of it) to everything it runs.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LogSink {
  write(entry: LogEntry, formatted: string): void;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel;
  sink?: LogSink;
  maxLogs?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',    // Cyan
  info: '\x1b[32m',     // Green
  warn: '\x1b[33m',     // Yellow
  error: '\x1b[31m'     // Red
};
const RESET = '\x1b[0m';

export const consoleSink: LogSink = {
  write(entry, formatted) {
    const line = `${COLORS[entry.level]}${formatted}${RESET}`;
    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
};

function safeStringify(data: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    data,
    (_key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'bigint') return value.toString();
      return value;
    },
    2
  );
}

export interface LoggerState {
  minLevel: LogLevel;
  logs: LogEntry[];
  maxLogs: number;
}

/**
 * Buffers recent entries (bounded) and forwards each one to its sink.
 * Child loggers share the parent's sink, level and buffer.
 */
export class Logger {
  private readonly context?: string;
  private readonly state: LoggerState;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}, sharedState?: LoggerState) {
    this.context = options.context;
    this.sink = options.sink ?? consoleSink;
    this.state = sharedState ?? {
      minLevel: options.level ?? 'info',
      logs: [],
      maxLogs: options.maxLogs ?? 1000
    };
  }

  child(context: string): Logger {
    return new Logger(
      { context: this.context ? `${this.context}:${context}` : context, sink: this.sink },
      this.state
    );
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.state.minLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? ` [${entry.context}]` : '';

    let message = `${timestamp} ${level}${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + safeStringify(entry.data).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (this.state.minLevel === 'debug' && entry.error.stack) {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.state.logs.push(entry);
    if (this.state.logs.length > this.state.maxLogs) {
      this.state.logs.splice(0, this.state.logs.length - this.state.maxLogs);
    }

    this.sink.write(entry, this.formatMessage(entry));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: this.context });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: this.context });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: this.context });
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      data,
      error: error === undefined ? undefined : toError(error),
      context: this.context
    });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.state.logs.filter(log => log.level === level) : [...this.state.logs];
  }

  clear(): void {
    this.state.logs.length = 0;
  }

  setMinLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.state.minLevel;
  }
}

export type AppErrorCode =
  | 'USAGE'
  | 'INVALID_TARGET'
  | 'INVALID_CONFIG'
  | 'LEDGER_WRITE_FAILED'
  | 'INTERNAL_ERROR';

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: AppErrorCode = 'INTERNAL_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: AppErrorCode; exitCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context
    };
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Node system errors carry both a numeric errno and a symbolic code.
 */
export interface SystemErrorDetails {
  message: string;
  errno?: number;
  code?: string;
}

export function describeSystemError(error: unknown): SystemErrorDetails {
  const err = toError(error);
  const details: SystemErrorDetails = { message: err.message };
  if ('errno' in err && typeof err.errno === 'number') {
    details.errno = err.errno;
  }
  if ('code' in err && typeof err.code === 'string') {
    details.code = err.code;
  }
  return details;
}

export function isMissingFileError(error: unknown): boolean {
  return describeSystemError(error).code === 'ENOENT';
}

/**
 * Normalize anything thrown into an AppError, logging it once.
 */
export function handleError(error: unknown, logger: Logger): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, error.context);
    return error;
  }

  const err = toError(error);
  logger.error(err.message, err);
  return new AppError(err.message, 'INTERNAL_ERROR', 1);
}
