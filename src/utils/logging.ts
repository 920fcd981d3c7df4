/**
 * Logging entry point: a global pino-backed logger and per-module children
 */

import { LoggerInterface, LoggingConfig, LogContext, LogLevel } from "./logger/interfaces.js";
import {
  DEFAULT_PINO_LOGGING_CONFIG,
  PinoLogger,
  isLogLevel,
} from "./logger/pinoLogger.js";
import { ENV_PREFIX } from "../config/appConfig.js";

export type { LogContext, LogLevel, LoggingConfig, LoggerInterface };

export const DEFAULT_LOGGING_CONFIG = DEFAULT_PINO_LOGGING_CONFIG;

/**
 * Create logging configuration from the environment
 */
export function createLoggingConfig(
  env: NodeJS.ProcessEnv = process.env
): LoggingConfig {
  const format = env.LOG_FORMAT === "json" ? "json" : "pretty";
  const level = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_LOGGING_CONFIG.level;
  const filePath = env[`${ENV_PREFIX}LOG_FILE`];

  return {
    ...DEFAULT_LOGGING_CONFIG,
    format,
    level,
    enableFile: Boolean(filePath),
    filePath,
  };
}

/**
 * Logger class wrapping the pino implementation
 */
export class Logger implements LoggerInterface {
  private implementation: LoggerInterface;
  private childLoggerCache = new Map<string, Logger>();

  constructor(
    config: Partial<LoggingConfig> = {},
    implementation?: LoggerInterface
  ) {
    this.implementation = implementation ?? new PinoLogger(config);
  }

  fatal(message: string, context?: LogContext): void {
    this.implementation.fatal(message, context);
  }

  error(message: string, context?: LogContext): void {
    this.implementation.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.implementation.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    this.implementation.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.implementation.debug(message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.implementation.trace(message, context);
  }

  child(bindings: { module?: string; [key: string]: unknown }): Logger {
    const cacheKey = JSON.stringify(bindings);

    const cached = this.childLoggerCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const childLogger = new Logger({}, this.implementation.child(bindings));
    this.childLoggerCache.set(cacheKey, childLogger);
    return childLogger;
  }
}

let globalLogger: Logger | null = null;

/**
 * Get or create the global logger instance
 */
export function getLogger(config?: Partial<LoggingConfig>): Logger {
  if (globalLogger && !config) {
    return globalLogger;
  }

  const finalConfig = { ...createLoggingConfig(), ...config };
  globalLogger = new Logger(finalConfig);
  return globalLogger;
}

/**
 * Create a child logger with module context
 */
export function createChildLogger(bindings: { module: string }): Logger {
  return getLogger().child(bindings);
}

