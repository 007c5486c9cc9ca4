import { describe, expect, it } from 'vitest';
import {
  createContextLogger,
  createLogger,
  DEFAULT_LOGGER_CONFIG,
  getComponentLogger,
  getLoggerConfigFromEnv,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('Logging', () => {
  describe('getLoggerConfigFromEnv', () => {
    it('uses the defaults without environment variables', () => {
      expect(getLoggerConfigFromEnv({})).toEqual(DEFAULT_LOGGER_CONFIG);
    });

    it('reads the level case-insensitively', () => {
      expect(getLoggerConfigFromEnv({ KUBECONVERGE_LOG_LEVEL: 'DEBUG' }).level).toBe('debug');
    });

    it('ignores an unknown level', () => {
      expect(getLoggerConfigFromEnv({ KUBECONVERGE_LOG_LEVEL: 'verbose' }).level).toBe('info');
    });

    it('turns on pretty output in development', () => {
      expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
      expect(getLoggerConfigFromEnv({ KUBECONVERGE_LOG_PRETTY: 'true' }).pretty).toBe(true);
    });

    it('reads destination and base fields', () => {
      const config = getLoggerConfigFromEnv({
        KUBECONVERGE_LOG_DESTINATION: '/tmp/kubeconverge.log',
        KUBECONVERGE_LOG_PID: 'false',
      });
      expect(config.destination).toBe('/tmp/kubeconverge.log');
      expect(config.options).toEqual({ timestamp: true, hostname: true, pid: false });
    });
  });

  describe('validateLoggerConfig', () => {
    it('rejects an empty destination', () => {
      expect(() => validateLoggerConfig({ level: 'info', pretty: false, destination: ' ' })).toThrow(
        'Log destination must be a non-empty path'
      );
    });
  });

  describe('loggers', () => {
    it('creates loggers with every level and child loggers', () => {
      const logger = createLogger({ level: 'silent' });
      for (const method of ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'child'] as const) {
        expect(typeof logger[method]).toBe('function');
      }
      expect(() => logger.child({ component: 'test' }).error('failed', new Error('boom'), { step: 'x' })).not.toThrow();
    });

    it('binds context', () => {
      expect(() => createContextLogger({ deploymentId: 'shop' }, { level: 'silent' }).info('hello')).not.toThrow();
      expect(() => getComponentLogger('applier', { namespace: 'demo' }).debug('hello')).not.toThrow();
    });
  });
});
