/**
 * Logging system interfaces and types
 */

// Type for log context - can be any serializable object, Error, or unknown value
export type LogContext =
  | Record<string, unknown>
  | string
  | number
  | boolean
  | null
  | undefined
  | Error
  | unknown;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggingConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  serverName: string;
  format: "json" | "pretty";
  /** Absolute path of the log file when enableFile is set */
  filePath?: string;
}

/**
 * Logger surface used across the client
 */
export interface LoggerInterface {
  fatal(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;

  child(bindings: { module?: string; [key: string]: unknown }): LoggerInterface;
}
