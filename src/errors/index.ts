/**
 * Custom error classes
 */

import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class for all client errors. Whether a failure is retried is
 * decided by `isRetryableFailure` alone.
 */
export abstract class McpClientError extends Error {
  public readonly code: string;
  public readonly category: string;
  public readonly timestamp: Date;
  public readonly context?: ErrorContext;

  constructor(
    message: string,
    code: string,
    category: string,
    context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.timestamp = new Date();
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get error details as object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    return this.message;
  }
}

/**
 * Operation attempted on a dead or never-started helper process
 */
export class NotConnectedError extends McpClientError {
  public readonly kind = "not_connected" as const;

  constructor(reason: string = "Not connected to MCP server", context?: ErrorContext) {
    super(reason, "NOT_CONNECTED", "connection", context);
  }

  getUserMessage(): string {
    return `The MCP helper process is not running: ${this.message}`;
  }
}

/**
 * The helper process could not be started
 */
export class SpawnError extends McpClientError {
  public readonly kind = "spawn" as const;
  public readonly command: string;

  constructor(command: string, reason: string, cause?: unknown) {
    super(
      `Failed to start MCP server '${command}': ${reason}`,
      "SPAWN_ERROR",
      "connection",
      { command, reason },
      { cause }
    );
    this.command = command;
  }

  getUserMessage(): string {
    return `Cannot start the MCP helper process '${this.command}'. Check the configured server command.`;
  }
}

/**
 * No response frame arrived before the deadline
 */
export class TimeoutError extends McpClientError {
  public readonly kind = "timeout" as const;
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, context?: ErrorContext) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      "TIMEOUT_ERROR",
      "timeout",
      { ...context, operation, timeoutMs }
    );
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  getUserMessage(): string {
    return `No response from the MCP server for '${this.operation}' (timeout).`;
  }
}

/**
 * Malformed frame, missing result/error or id mismatch
 */
export class ProtocolError extends McpClientError {
  public readonly kind = "protocol" as const;
  public readonly frame?: string;

  constructor(message: string, frame?: string, context?: ErrorContext) {
    super(message, "PROTOCOL_ERROR", "protocol", { ...context, frame });
    this.frame = frame;
  }

  getUserMessage(): string {
    return `Invalid response from the MCP server: ${this.message}`;
  }
}

/**
 * Well-formed error envelope returned by the helper process
 */
export class RemoteError extends McpClientError {
  public readonly kind = "remote" as const;
  public readonly remoteCode: number;
  public readonly remoteMessage: string;
  public readonly data?: unknown;

  constructor(
    method: string,
    remoteCode: number,
    remoteMessage: string,
    data?: unknown
  ) {
    super(
      `Remote error ${remoteCode} for '${method}': ${remoteMessage}`,
      "REMOTE_ERROR",
      "remote",
      { method, remoteCode, data }
    );
    this.remoteCode = remoteCode;
    this.remoteMessage = remoteMessage;
    this.data = data;
  }

  getUserMessage(): string {
    return `MCP server error: ${this.remoteMessage}`;
  }
}

/**
 * Every permitted attempt failed
 */
export class RetryExhaustedError extends McpClientError {
  public readonly operation: string;
  public readonly attempts: number;
  public readonly lastFailure: unknown;

  constructor(operation: string, attempts: number, lastFailure: unknown) {
    const reason =
      lastFailure instanceof Error ? lastFailure.message : String(lastFailure);
    super(
      `Operation '${operation}' failed after ${attempts} attempt(s): ${reason}`,
      "RETRY_EXHAUSTED",
      "retry",
      { operation, attempts },
      { cause: lastFailure }
    );
    this.operation = operation;
    this.attempts = attempts;
    this.lastFailure = lastFailure;
  }

  getUserMessage(): string {
    return `'${this.operation}' kept failing after ${this.attempts} attempt(s). Last cause: ${getUserFriendlyMessage(this.lastFailure)}`;
  }
}

/**
 * Rejected retry policy
 */
export class PolicyInvalidError extends McpClientError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid retry policy: ${issues.join("; ")}`,
      "POLICY_INVALID",
      "validation",
      { issues }
    );
    this.issues = issues;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends McpClientError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "CONFIG_ERROR", "configuration", context);
  }

  getUserMessage(): string {
    return `Configuration issue: ${this.message}`;
  }
}

/**
 * Closed set of failures an exchange with the helper process can produce
 */
export type ExchangeFailure =
  | NotConnectedError
  | SpawnError
  | TimeoutError
  | ProtocolError
  | RemoteError;

export type ExchangeFailureKind = ExchangeFailure["kind"];

/**
 * Decides whether a remote error code is worth another attempt
 */
export type TransientRemotePredicate = (code: number) => boolean;

export const DEFAULT_TRANSIENT_REMOTE_CODES: readonly number[] = [
  ErrorCode.InternalError,
  ErrorCode.RequestTimeout,
  ErrorCode.ConnectionClosed,
];

export function transientCodes(
  codes: readonly number[] = DEFAULT_TRANSIENT_REMOTE_CODES
): TransientRemotePredicate {
  const set = new Set(codes);
  return (code) => set.has(code);
}

export function isExchangeFailure(error: unknown): error is ExchangeFailure {
  return (
    error instanceof NotConnectedError ||
    error instanceof SpawnError ||
    error instanceof TimeoutError ||
    error instanceof ProtocolError ||
    error instanceof RemoteError
  );
}

/**
 * Retry classification for exchange failures. Anything outside the closed
 * variant is not retried.
 */
export function isRetryableFailure(
  error: unknown,
  isTransientRemote: TransientRemotePredicate = transientCodes()
): boolean {
  if (!isExchangeFailure(error)) {
    return false;
  }

  switch (error.kind) {
    case "timeout":
      return true;
    case "remote":
      return isTransientRemote(error.remoteCode);
    case "protocol":
    case "not_connected":
    case "spawn":
      return false;
    default: {
      const unreachable: never = error;
      return unreachable;
    }
  }
}

/**
 * Error codes for easy reference
 */
export const ERROR_CODES = {
  NOT_CONNECTED: "NOT_CONNECTED",
  SPAWN_ERROR: "SPAWN_ERROR",
  TIMEOUT_ERROR: "TIMEOUT_ERROR",
  PROTOCOL_ERROR: "PROTOCOL_ERROR",
  REMOTE_ERROR: "REMOTE_ERROR",
  RETRY_EXHAUSTED: "RETRY_EXHAUSTED",
  POLICY_INVALID: "POLICY_INVALID",
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

/**
 * Utility function to extract error code
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof McpClientError) {
    return error.code;
  }
  return "UNKNOWN_ERROR";
}

/**
 * Utility function to get user-friendly message
 */
export function getUserFriendlyMessage(error: unknown): string {
  if (error instanceof McpClientError) {
    return error.getUserMessage();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred. Please try again.";
}
