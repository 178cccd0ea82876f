/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output and
 * namespaced loggers per package.
 */

import * as winston from 'winston';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'silly',
}

// Log context interface
export interface LogContext {
  command?: string;
  strategy?: string;
  [key: string]: unknown;
}

/**
 * Runtime logging options, usually taken from the global `-v` and `--logfile` flags
 */
export interface LoggingOptions {
  verbosity?: number;
  logfile?: string;
}

const defaultLevel =
  process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug');

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

// Diagnostics go to stderr so stdout stays free for command output
const consoleTransport = new winston.transports.Console({
  format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
  stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
});

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: defaultLevel,
  format: structuredFormat,
  defaultMeta: { service: 'tradekit' },
  transports: [consoleTransport],
  exitOnError: false,
});

let fileTransport: winston.transports.FileTransportInstance | undefined;

/**
 * Map a `-v` repeat count to a winston level.
 */
export function verbosityToLevel(verbosity: number): LogLevel {
  if (verbosity >= 2) return LogLevel.TRACE;
  if (verbosity === 1) return LogLevel.DEBUG;
  return LogLevel.INFO;
}

/**
 * Apply verbosity and an optional log file to the shared winston logger.
 *
 * Calling it again replaces the previous log file transport.
 */
export function configureLogging(options: LoggingOptions): void {
  winstonLogger.level = verbosityToLevel(options.verbosity ?? 0);

  if (fileTransport) {
    winstonLogger.remove(fileTransport);
    fileTransport = undefined;
  }

  if (options.logfile) {
    fileTransport = new winston.transports.File({
      filename: options.logfile,
      format: structuredFormat,
    });
    winstonLogger.add(fileTransport);
  }
}

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private namespace: string = 'tradekit';

  /**
   * Create a logger with a specific namespace (package name)
   */
  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  private setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Most verbose level, enabled by `-vv`
   */
  trace(message: string, context?: LogContext): void {
    winstonLogger.silly(message, this.mergeContext(context));
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

// Default logger
export const logger = new Logger('tradekit');

export { Logger };

export { winstonLogger };
