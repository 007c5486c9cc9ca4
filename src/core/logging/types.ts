/**
 * Structured logger used across the reconciler
 */
export interface KubeconvergeLogger {
  /**
   * Log trace level messages (most verbose)
   */
  trace(msg: string, meta?: Record<string, unknown>): void;

  debug(msg: string, meta?: Record<string, unknown>): void;

  info(msg: string, meta?: Record<string, unknown>): void;

  warn(msg: string, meta?: Record<string, unknown>): void;

  /**
   * Log error messages; the error's name, message and stack are serialized under `error`
   */
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): KubeconvergeLogger;
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Enable pretty printing for development (default: false)
   */
  pretty?: boolean;

  /**
   * Output file (default: stdout)
   */
  destination?: string;

  options?: {
    timestamp?: boolean;
    hostname?: boolean;
    pid?: boolean;
  };
}

/**
 * Context bound to child loggers
 */
export interface LoggerContext {
  component?: string;
  deploymentId?: string;
  namespace?: string;
  resource?: string;
  [key: string]: unknown;
}
