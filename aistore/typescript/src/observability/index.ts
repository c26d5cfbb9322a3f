/**
 * Observability module for the AIStore client
 * @module aistore-client/observability
 */

export {
  type Logger,
  type LogLevel,
  type ConsoleLoggerOptions,
  type LoggingConfig,
  ConsoleLogger,
  NoOpLogger,
  configureLogging,
  getLogger,
} from './logger.js';
