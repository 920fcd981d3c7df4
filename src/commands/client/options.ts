/**
 * Global CLI options and how they become a client configuration
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import {
  ClientConfig,
  loadConfigFile,
  loadConfigFromEnv,
  resolveClientConfig,
} from "../../config/clientConfig.js";
import { RpcParams } from "../../connection/rpc/types.js";
import { LogLevel } from "../../utils/logging.js";
import { isLogLevel } from "../../utils/logger/pinoLogger.js";

export interface GlobalOptions {
  server?: string;
  timeout?: number;
  config?: string;
  logLevel?: LogLevel;
  handshake?: boolean;
}

// Below the library default so progress logs stay out of command output
export const CLI_DEFAULT_LOG_LEVEL: LogLevel = "warn";

const jsonObjectSchema = z.record(z.unknown());

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(
      "Must be one of fatal, error, warn, info, debug, trace, silent."
    );
  }
  return value;
}

/**
 * Parse a JSON object argument such as `--args '{"namespace":"kube-system"}'`
 */
export function parseJsonObject(value: string): RpcParams {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(`Not valid JSON: ${reason}`);
  }

  const result = jsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidArgumentError("Must be a JSON object.");
  }
  return result.data;
}

/**
 * Log level from --log-level, then LOG_LEVEL, then the CLI default
 */
export function resolveLogLevel(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (options.logLevel) {
    return options.logLevel;
  }
  return isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : CLI_DEFAULT_LOG_LEVEL;
}

/**
 * Config file, then K3S_MCP_* variables, then command-line flags
 */
export async function resolveCliConfig(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ClientConfig> {
  const fileConfig = options.config ? await loadConfigFile(options.config) : {};

  return resolveClientConfig(fileConfig, loadConfigFromEnv(env), {
    serverCommand: options.server,
    timeoutMs: options.timeout,
    handshake: options.handshake,
    autoConnect: false,
  });
}
