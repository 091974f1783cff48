import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { LoggerConfig, LoggerContext, LogMetadata, OperatorLogger } from './types.js';

function serializeError(error: Error): LogMetadata {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...(error.cause instanceof Error && { cause: error.cause.message }),
  };
}

/**
 * Pino-based implementation of OperatorLogger
 */
class PinoLogger implements OperatorLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: LogMetadata): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: LogMetadata): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: LogMetadata): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: LogMetadata): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: Error, meta?: LogMetadata): void {
    this.pinoLogger.error({ ...meta, ...(error && { error: serializeError(error) }) }, msg);
  }

  fatal(msg: string, error?: Error, meta?: LogMetadata): void {
    this.pinoLogger.fatal({ ...meta, ...(error && { error: serializeError(error) }) }, msg);
  }

  child(bindings: LoggerContext): OperatorLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create an operator logger with the specified configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): OperatorLogger {
  const finalConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

/**
 * Create a logger with operator-specific context
 */
export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): OperatorLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: OperatorLogger = createLogger();

/**
 * Create a component-specific logger
 */
export function getComponentLogger(component: string, additionalContext?: LoggerContext): OperatorLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Create a logger bound to one reconciled resource
 */
export function getResourceLogger(
  parent: OperatorLogger,
  resource: string,
  additionalContext?: LoggerContext
): OperatorLogger {
  return parent.child({ resource, ...additionalContext });
}
