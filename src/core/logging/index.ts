export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getDeploymentLogger,
  logger,
} from './logger.js';
export { LOG_LEVELS } from './types.js';
export type { KubeconvergeLogger, LoggerConfig, LoggerContext, LogLevel } from './types.js';
