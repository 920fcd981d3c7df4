/**
 * Pino logging implementation
 *
 * Console output always goes to stderr: stdout belongs to CLI output, and the
 * helper process' own stdout is the protocol channel.
 */

import pino from "pino";
import { join } from "path";
import { homedir } from "os";
import { createHash } from "crypto";
import { APP_TECHNICAL_NAME } from "../../config/appConfig.js";
import {
  LoggerInterface,
  LoggingConfig,
  LogContext,
  LogLevel,
} from "./interfaces.js";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export const DEFAULT_PINO_LOGGING_CONFIG: LoggingConfig = {
  level: process.env.NODE_ENV === "development" ? "debug" : "info",
  enableConsole: true,
  enableFile: false,
  serverName: APP_TECHNICAL_NAME,
  format: "pretty",
};

// Cache for Pino instances by configuration hash, so repeated loggers share
// one transport worker
const pinoInstanceCache = new Map<string, pino.Logger>();

export class PinoLogger implements LoggerInterface {
  private readonly pinoLogger: pino.Logger;
  private readonly config: LoggingConfig;
  private readonly childLoggerCache = new Map<string, PinoLogger>();
  private readonly configHash: string;

  constructor(config: Partial<LoggingConfig> = {}, instance?: pino.Logger) {
    this.config = { ...DEFAULT_PINO_LOGGING_CONFIG, ...config };

    if (process.env.LOG_FORMAT === "json") {
      this.config.format = "json";
    }

    this.configHash = this.calculateConfigHash();
    this.pinoLogger = instance ?? this.getOrCreatePinoInstance();
  }

  private calculateConfigHash(): string {
    const normalizedConfig = {
      level: this.config.level,
      enableConsole: this.config.enableConsole,
      enableFile: this.config.enableFile,
      serverName: this.config.serverName,
      format: this.config.format,
      filePath: this.config.filePath ?? "",
    };

    const configString = JSON.stringify(
      normalizedConfig,
      Object.keys(normalizedConfig).sort()
    );
    return createHash("sha256").update(configString).digest("hex");
  }

  private getOrCreatePinoInstance(): pino.Logger {
    const cachedInstance = pinoInstanceCache.get(this.configHash);
    if (cachedInstance) {
      return cachedInstance;
    }

    const options: pino.LoggerOptions = {
      level: this.config.level,
      base: { serverName: this.config.serverName },
    };

    const transport = this.getTransportConfig();
    if (transport) {
      options.transport = transport;
    } else {
      options.enabled = false;
    }

    const newInstance = pino(options);
    pinoInstanceCache.set(this.configHash, newInstance);
    return newInstance;
  }

  private getTransportConfig():
    | pino.TransportMultiOptions
    | pino.TransportSingleOptions
    | undefined {
    const transports: pino.TransportTargetOptions[] = [];

    if (this.config.enableConsole) {
      transports.push(this.createConsoleTransport());
    }

    if (this.config.enableFile) {
      transports.push({
        target: "pino/file",
        level: this.config.level,
        options: {
          destination: this.getLogFilePath(),
          mkdir: true,
          append: true,
        },
      });
    }

    if (transports.length === 0) {
      return undefined;
    }

    if (transports.length === 1) {
      return transports[0];
    }

    return { targets: transports };
  }

  private createConsoleTransport(): pino.TransportTargetOptions {
    if (this.config.format === "json") {
      return {
        target: "pino/file",
        level: this.config.level,
        options: { destination: 2 },
      };
    }

    return {
      target: "pino-pretty",
      level: this.config.level,
      options: {
        destination: 2,
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname,serverName",
      },
    };
  }

  private getLogFilePath(): string {
    if (this.config.filePath) {
      return this.config.filePath;
    }

    return join(
      homedir(),
      `.${this.config.serverName}`,
      "logs",
      `${this.config.serverName}.log`
    );
  }

  /**
   * Format context for log messages with Error handling
   */
  private formatContext(
    context?: LogContext
  ): Record<string, unknown> | undefined {
    if (context === undefined || context === null) {
      return undefined;
    }

    if (context instanceof Error) {
      return {
        error: {
          name: context.name,
          message: context.message,
          stack: context.stack,
        },
      };
    }

    if (typeof context === "object") {
      return { ...context };
    }

    return { context };
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void {
    const formattedContext = this.formatContext(context);
    if (formattedContext) {
      this.pinoLogger[level](formattedContext, message);
    } else {
      this.pinoLogger[level](message);
    }
  }

  fatal(message: string, context?: LogContext): void {
    this.write("fatal", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write("trace", message, context);
  }

  /**
   * Child loggers reuse the parent's pino instance, so no new transport
   * worker or exit listener is created per module
   */
  child(bindings: { module?: string; [key: string]: unknown }): PinoLogger {
    const cacheKey = JSON.stringify(bindings);

    const cached = this.childLoggerCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const childLogger = new PinoLogger(
      this.config,
      this.pinoLogger.child(bindings)
    );
    this.childLoggerCache.set(cacheKey, childLogger);

    if (this.childLoggerCache.size > 100) {
      const firstKey = this.childLoggerCache.keys().next().value;
      if (firstKey) {
        this.childLoggerCache.delete(firstKey);
      }
    }

    return childLogger;
  }

  getConfig(): LoggingConfig {
    return { ...this.config };
  }
}
