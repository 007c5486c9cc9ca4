import { LOG_LEVELS, type LoggerConfig, type LogLevel } from './types.js';

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  options: {
    timestamp: true,
    hostname: true,
    pid: true,
  },
};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = env.KUBECONVERGE_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  }

  // Pretty printing in development
  if (env.NODE_ENV === 'development' || env.KUBECONVERGE_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  if (env.KUBECONVERGE_LOG_DESTINATION) {
    config.destination = env.KUBECONVERGE_LOG_DESTINATION;
  }

  if (env.KUBECONVERGE_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  if (env.KUBECONVERGE_LOG_HOSTNAME === 'false') {
    config.options = { ...config.options, hostname: false };
  }

  if (env.KUBECONVERGE_LOG_PID === 'false') {
    config.options = { ...config.options, pid: false };
  }

  return config;
}

/**
 * Validate logger configuration
 */
export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(
      `Invalid log level: ${config.level}. Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  if (config.destination !== undefined && config.destination.trim() === '') {
    throw new Error('Log destination must be a non-empty path');
  }
}
