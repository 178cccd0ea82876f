/**
 * @tradekit/utils - Shared utilities package
 *
 * Logger utilities and the error hierarchy shared by every package.
 */

export {
  logger,
  Logger,
  LogLevel,
  type LogContext,
  type LoggingOptions,
  winstonLogger,
  createLogger,
  configureLogging,
  verbosityToLevel,
} from './logger.js';

export * from './errors.js';
