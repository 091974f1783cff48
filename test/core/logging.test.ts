import { describe, expect, it } from 'vitest';
import {
  createContextLogger,
  createLogger,
  DEFAULT_LOGGER_CONFIG,
  getComponentLogger,
  getLoggerConfigFromEnv,
  getResourceLogger,
  type LoggerConfig,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('Logging', () => {
  describe('getLoggerConfigFromEnv', () => {
    it('should return defaults for an empty environment', () => {
      expect(getLoggerConfigFromEnv({})).toEqual(DEFAULT_LOGGER_CONFIG);
    });

    it('should read level case-insensitively', () => {
      expect(getLoggerConfigFromEnv({ CERT_OPERATOR_LOG_LEVEL: 'DEBUG' }).level).toBe('debug');
    });

    it('should ignore unknown levels', () => {
      expect(getLoggerConfigFromEnv({ CERT_OPERATOR_LOG_LEVEL: 'verbose' }).level).toBe('info');
    });

    it('should enable pretty output in development or on request', () => {
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ CERT_OPERATOR_LOG_PRETTY: 'true' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'production' }).pretty).toBe(false);
    });

    it('should read destination and timestamp settings', () => {
      const config = getLoggerConfigFromEnv({
        CERT_OPERATOR_LOG_DESTINATION: '/var/log/operator.log',
        CERT_OPERATOR_LOG_TIMESTAMP: 'false',
      });
      expect(config.destination).toBe('/var/log/operator.log');
      expect(config.options).toEqual({ timestamp: false });
    });
  });

  describe('validateLoggerConfig', () => {
    it('should accept the default configuration', () => {
      expect(() => validateLoggerConfig(DEFAULT_LOGGER_CONFIG)).not.toThrow();
    });

    it('should reject a blank destination', () => {
      const config: LoggerConfig = { level: 'info', destination: '  ' };
      expect(() => validateLoggerConfig(config)).toThrow('Log destination must be a non-empty string');
    });
  });

  describe('loggers', () => {
    it('should expose every level and derive children', () => {
      const logger = createLogger({ level: 'fatal' });
      const child = logger.child({ component: 'test' });

      expect(() => {
        child.trace('trace');
        child.debug('debug', { step: 1 });
        child.info('info');
        child.warn('warn');
        child.error('error', new Error('boom', { cause: new Error('root') }), { step: 2 });
      }).not.toThrow();
    });

    it('should build component, context and resource loggers', () => {
      const component = getComponentLogger('reconciler', { controller: 'certificate' });
      const context = createContextLogger({ component: 'manager' }, { level: 'fatal' });
      const resource = getResourceLogger(context, 'shop/web', { generation: 1 });

      expect(typeof component.info).toBe('function');
      expect(typeof resource.child).toBe('function');
    });
  });
});
