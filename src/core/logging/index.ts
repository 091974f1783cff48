export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getResourceLogger,
  logger,
} from './logger.js';
export {
  DEFAULT_LOGGER_CONFIG,
  getLoggerConfigFromEnv,
  LOG_LEVELS,
  validateLoggerConfig,
} from './config.js';
export type { LoggerConfig, LoggerContext, LogLevel, LogMetadata, OperatorLogger } from './types.js';
