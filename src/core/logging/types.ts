/**
 * Structured logger used throughout the operator.
 *
 * Loggers are passed explicitly to reconcilers and clients; components derive
 * children with additional bindings rather than touching a process-wide logger.
 */
export interface OperatorLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: LogMetadata): void;

  /**
   * Log debug level messages
   */
  debug(msg: string, meta?: LogMetadata): void;

  /**
   * Log informational messages
   */
  info(msg: string, meta?: LogMetadata): void;

  /**
   * Log warning messages
   */
  warn(msg: string, meta?: LogMetadata): void;

  /**
   * Log error messages
   */
  error(msg: string, error?: Error, meta?: LogMetadata): void;

  /**
   * Log fatal error messages (most severe)
   */
  fatal(msg: string, error?: Error, meta?: LogMetadata): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: LoggerContext): OperatorLogger;
}

export type LogMetadata = Record<string, unknown>;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Configuration options for the operator logger
 */
export interface LoggerConfig {
  /**
   * Log level threshold
   */
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false in production)
   */
  pretty?: boolean;

  /**
   * Output destination (default: stdout)
   */
  destination?: string;

  /**
   * Additional logger options
   */
  options?: {
    /**
     * Include timestamp in logs (default: true)
     */
    timestamp?: boolean;
  };
}

/**
 * Logger context for binding additional metadata
 */
export interface LoggerContext {
  /**
   * Component or module name
   */
  component?: string;

  /**
   * Reconciled resource, as `namespace/name` or a cluster-scoped name
   */
  resource?: string;

  /**
   * Controller the log line originates from
   */
  controller?: string;

  /**
   * Additional context metadata
   */
  [key: string]: unknown;
}
