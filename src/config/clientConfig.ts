/**
 * Client configuration: schema, defaults and loading from env or file
 */

import { promises as fs } from "fs";
import { z } from "zod";
import { ConfigurationError, DEFAULT_TRANSIENT_REMOTE_CODES } from "../errors/index.js";
import { ProcessCommand, parseCommandLine } from "../connection/types.js";
import { ENV_PREFIX } from "./appConfig.js";

export const DEFAULT_SERVER_COMMAND = "python -m mcp_k3s_monitor";

const processCommandSchema = z.object({
  command: z.string().min(1, "command must not be empty"),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
});

const retryOptionsSchema = z.object({
  maxAttempts: z.number().optional(),
  baseDelayMs: z.number().optional(),
  maxDelayMs: z.number().optional(),
  multiplier: z.number().optional(),
  jitter: z.boolean().optional(),
  jitterFraction: z.number().optional(),
  strategy: z.enum(["exponential", "linear", "constant"]).optional(),
});

/** Largest delay Node timers honour; longer ones fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

export const clientConfigSchema = z.object({
  serverCommand: z
    .union([z.string().min(1, "serverCommand must not be empty"), processCommandSchema])
    .default(DEFAULT_SERVER_COMMAND),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(30000),
  toolsCacheTtlMs: z.number().int().min(0).default(60000),
  autoConnect: z.boolean().default(true),
  handshake: z.boolean().default(false),
  shutdownGraceMs: z.number().int().min(0).max(MAX_TIMER_MS).default(5000),
  retry: retryOptionsSchema.default({}),
  transientRemoteCodes: z
    .array(z.number().int())
    .default([...DEFAULT_TRANSIENT_REMOTE_CODES]),
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type RetryConfigInput = z.infer<typeof retryOptionsSchema>;

export interface ClientConfig
  extends Omit<z.output<typeof clientConfigSchema>, "serverCommand"> {
  serverCommand: ProcessCommand;
}

/**
 * Merge config sources (later defined values win, `retry` merged key by key),
 * validate and fill defaults
 */
export function resolveClientConfig(...sources: ClientConfigInput[]): ClientConfig {
  const merged: ClientConfigInput = {};
  for (const source of sources) {
    const defined = Object.fromEntries(
      Object.entries(source).filter(([, value]) => value !== undefined)
    );
    Object.assign(merged, defined, {
      retry: { ...merged.retry, ...source.retry },
    });
  }

  const parsed = clientConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
      { issues: parsed.error.issues }
    );
  }

  const { serverCommand, ...rest } = parsed.data;
  return {
    ...rest,
    serverCommand:
      typeof serverCommand === "string" ? parseCommandLine(serverCommand) : serverCommand,
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[`${ENV_PREFIX}${name}`];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${ENV_PREFIX}${name} must be a number, got '${raw}'`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[`${ENV_PREFIX}${name}`];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return ["true", "1", "yes", "on"].includes(raw.trim().toLowerCase());
}

/**
 * Read K3S_MCP_* environment variables. Unset variables are left out so they
 * do not override other sources.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfigInput {
  const config: ClientConfigInput = {};
  const retry: RetryConfigInput = {};

  const serverCommand = env[`${ENV_PREFIX}SERVER_COMMAND`];
  if (serverCommand) config.serverCommand = serverCommand;

  const timeoutMs = readNumber(env, "TIMEOUT_MS");
  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;

  const toolsCacheTtlMs = readNumber(env, "TOOLS_CACHE_TTL_MS");
  if (toolsCacheTtlMs !== undefined) config.toolsCacheTtlMs = toolsCacheTtlMs;

  const handshake = readBoolean(env, "HANDSHAKE");
  if (handshake !== undefined) config.handshake = handshake;

  const maxAttempts = readNumber(env, "MAX_RETRIES");
  if (maxAttempts !== undefined) retry.maxAttempts = maxAttempts;

  const baseDelayMs = readNumber(env, "BASE_DELAY_MS");
  if (baseDelayMs !== undefined) retry.baseDelayMs = baseDelayMs;

  const maxDelayMs = readNumber(env, "MAX_DELAY_MS");
  if (maxDelayMs !== undefined) retry.maxDelayMs = maxDelayMs;

  const jitter = readBoolean(env, "RETRY_JITTER");
  if (jitter !== undefined) retry.jitter = jitter;

  const strategy = env[`${ENV_PREFIX}RETRY_STRATEGY`];
  if (strategy) {
    const parsed = retryOptionsSchema.shape.strategy.safeParse(strategy);
    if (!parsed.success) {
      throw new ConfigurationError(
        `${ENV_PREFIX}RETRY_STRATEGY must be exponential, linear or constant, got '${strategy}'`
      );
    }
    retry.strategy = parsed.data;
  }

  if (Object.keys(retry).length > 0) {
    config.retry = retry;
  }
  return config;
}

/**
 * Read a JSON config file
 */
export async function loadConfigFile(path: string): Promise<ClientConfigInput> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file ${path}: ${reason}`, { path });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${reason}`, {
      path,
    });
  }

  const result = clientConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      `Config file ${path} is invalid: ${result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      { path }
    );
  }
  // partial() leaves absent keys absent, so defaults do not mask other sources
  return result.data;
}

