import { hostname } from 'node:os';
import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { KubeconvergeLogger, LoggerConfig, LoggerContext } from './types.js';

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...('code' in error && typeof error.code === 'string' && { code: error.code }),
  };
}

/**
 * Pino-based implementation of KubeconvergeLogger
 */
class PinoLogger implements KubeconvergeLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.error({ ...meta, ...(error && { error: serializeError(error) }) }, msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.fatal({ ...meta, ...(error && { error: serializeError(error) }) }, msg);
  }

  child(bindings: Record<string, unknown>): KubeconvergeLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger with the specified configuration, layered over the environment
 */
export function createLogger(config?: Partial<LoggerConfig>): KubeconvergeLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  // pino's base bindings carry pid and hostname
  if (finalConfig.options?.hostname === false || finalConfig.options?.pid === false) {
    pinoOptions.base = {
      ...(finalConfig.options.pid !== false && { pid: process.pid }),
      ...(finalConfig.options.hostname !== false && { hostname: hostname() }),
    };
  }

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
        mkdir: true,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

/**
 * Create a logger with bound context
 */
export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): KubeconvergeLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: KubeconvergeLogger = createLogger();

export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): KubeconvergeLogger {
  return logger.child({ component, ...additionalContext });
}

export function getDeploymentLogger(
  deploymentId: string,
  namespace?: string,
  additionalContext?: Record<string, unknown>
): KubeconvergeLogger {
  return logger.child({ deploymentId, namespace, ...additionalContext });
}
