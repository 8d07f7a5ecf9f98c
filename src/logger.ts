/**
 * Leveled logging with a pluggable handler.
 */

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export enum LogLevel {
  /** Step-by-step detail of routine operations. */
  trace = 'trace',
  /** Useful when chasing a problem, noise otherwise. */
  debug = 'debug',
  info = 'info',
  warn = 'warn',
  /** An operation failed and its caller receives an error. */
  error = 'error',
  /** Nothing is logged. */
  silent = 'silent',
}

/** Key-value pairs attached to a log message */
export type LogContext = Record<string, unknown>;

export type LogHandler = (message: string, level: LogLevel, context?: LogContext) => void;

export interface LoggerOptions {
  logLevel: LogLevel;
  logHandler?: LogHandler;
}

/**
 * Writes to the console, prefixed with a timestamp and the level.
 */
export const consoleLogHandler: LogHandler = (message, level, context) => {
  const contextString = context ? `, context: ${JSON.stringify(context)}` : '';
  const formatted = `[${new Date().toISOString()}] ${level.toUpperCase()} jsontree: ${message}${contextString}`;

  switch (level) {
    case LogLevel.trace:
    case LogLevel.debug:
      console.log(formatted);
      break;
    case LogLevel.info:
      console.info(formatted);
      break;
    case LogLevel.warn:
      console.warn(formatted);
      break;
    case LogLevel.error:
      console.error(formatted);
      break;
    case LogLevel.silent:
      break;
  }
};

const levelNumbers = new Map<LogLevel, number>([
  [LogLevel.trace, 0],
  [LogLevel.debug, 1],
  [LogLevel.info, 2],
  [LogLevel.warn, 3],
  [LogLevel.error, 4],
  [LogLevel.silent, 5],
]);

/** Numeric rank of a level, throwing on anything that is not a LogLevel */
export function logLevelNumber(level: LogLevel): number {
  const n = levelNumbers.get(level);
  if (n === undefined) {
    throw new Error(`Invalid log level: ${level}`);
  }
  return n;
}

export function makeLogger(options: LoggerOptions): Logger {
  return new LevelLogger(options.logHandler ?? consoleLogHandler, options.logLevel);
}

class LevelLogger implements Logger {
  private readonly handler: LogHandler;
  private readonly threshold: number;

  constructor(handler: LogHandler, level: LogLevel) {
    this.handler = handler;
    this.threshold = logLevelNumber(level);
  }

  trace(message: string, context?: LogContext): void {
    this.write(message, LogLevel.trace, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write(message, LogLevel.debug, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(message, LogLevel.info, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(message, LogLevel.warn, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(message, LogLevel.error, context);
  }

  private write(message: string, level: LogLevel, context?: LogContext): void {
    if (logLevelNumber(level) >= this.threshold) {
      this.handler(message, level, context);
    }
  }
}
