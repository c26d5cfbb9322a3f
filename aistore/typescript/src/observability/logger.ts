/**
 * Logging for the AIStore client
 * @module aistore-client/observability/logger
 */

/**
 * Log levels in increasing severity.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Options for ConsoleLogger.
 */
export interface ConsoleLoggerOptions {
  prefix?: string;
  minLevel?: LogLevel;
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Logger writing one line per entry to the console:
 * `<ISO time> <prefix> [LEVEL] message {context}`.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? '[AIS]';
    this.threshold = LEVELS.indexOf(options.minLevel ?? 'info');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < this.threshold) {
      return;
    }
    const suffix = context === undefined ? '' : ` ${JSON.stringify(context)}`;
    WRITERS[level](
      `${new Date().toISOString()} ${this.prefix} [${level.toUpperCase()}] ${message}${suffix}`
    );
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Logger to install */
  logger?: Logger;
  /** Log to the console at debug level when no logger is given */
  debug?: boolean;
}

let globalLogger: Logger = new NoOpLogger();

/**
 * Configures the process-wide logger.
 */
export function configureLogging(config: LoggingConfig): void {
  globalLogger =
    config.logger ?? (config.debug ? new ConsoleLogger({ minLevel: 'debug' }) : new NoOpLogger());
}

/**
 * Gets the process-wide logger.
 */
export function getLogger(): Logger {
  return globalLogger;
}
