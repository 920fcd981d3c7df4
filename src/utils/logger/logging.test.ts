/**
 * Tests for the pino-backed logging layer
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";

// Unmock the logging module for these tests to use real implementation
vi.unmock("../logging.js");

import {
  DEFAULT_LOGGING_CONFIG,
  Logger,
  createLoggingConfig,
  getLogger,
} from "../logging.js";
import { PinoLogger, isLogLevel } from "./pinoLogger.js";

describe("PinoLogger", () => {
  let lines: string[];
  let logger: PinoLogger;

  beforeEach(() => {
    lines = [];
    const destination = { write: (line: string) => void lines.push(line) };
    logger = new PinoLogger(
      { level: "debug", serverName: "test" },
      pino({ level: "debug", base: undefined, timestamp: false }, destination)
    );
  });

  const records = () => lines.map((line) => JSON.parse(line));

  it("should write the message with its context", () => {
    logger.info("Started MCP server process", { pid: 42 });

    expect(records()).toEqual([{ level: 30, msg: "Started MCP server process", pid: 42 }]);
  });

  it("should expand errors", () => {
    logger.error("Request failed", new Error("boom"));

    const [record] = records();
    expect(record.msg).toBe("Request failed");
    expect(record.error).toMatchObject({ name: "Error", message: "boom" });
  });

  it("should wrap primitive context", () => {
    logger.warn("Retrying", 3);

    expect(records()).toEqual([{ level: 40, msg: "Retrying", context: 3 }]);
  });

  it("should respect the level", () => {
    logger.trace("too detailed");

    expect(lines).toEqual([]);
  });

  it("should cache children and add their bindings", () => {
    const child = logger.child({ module: "rpc" });

    expect(logger.child({ module: "rpc" })).toBe(child);

    child.debug("Sending request", { id: 1 });
    expect(records()).toEqual([{ level: 20, module: "rpc", msg: "Sending request", id: 1 }]);
  });
});

describe("Logger", () => {
  it("should delegate to its implementation", () => {
    const lines: string[] = [];
    const implementation = new PinoLogger(
      {},
      pino({ level: "info", base: undefined, timestamp: false }, {
        write: (line: string) => void lines.push(line),
      })
    );
    const logger = new Logger({}, implementation);

    logger.child({ module: "client" }).info("connected");

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { level: 30, module: "client", msg: "connected" },
    ]);
  });
});

describe("getLogger", () => {
  it("should keep the global logger until a new config is given", () => {
    const first = getLogger({ enableConsole: false, enableFile: false, level: "warn" });

    expect(getLogger()).toBe(first);

    const second = getLogger({ enableConsole: false, enableFile: false, level: "debug" });
    expect(second).not.toBe(first);
    expect(getLogger()).toBe(second);
  });
});

describe("createLoggingConfig", () => {
  it("should read level, format and log file from the environment", () => {
    expect(
      createLoggingConfig({
        LOG_LEVEL: "debug",
        LOG_FORMAT: "json",
        K3S_MCP_LOG_FILE: "/var/log/k3s-mcp-client.log",
      })
    ).toEqual({
      ...DEFAULT_LOGGING_CONFIG,
      level: "debug",
      format: "json",
      enableFile: true,
      filePath: "/var/log/k3s-mcp-client.log",
    });
  });

  it("should fall back to defaults for unknown values", () => {
    const config = createLoggingConfig({ LOG_LEVEL: "verbose" });

    expect(config.level).toBe(DEFAULT_LOGGING_CONFIG.level);
    expect(config.format).toBe("pretty");
    expect(config.enableFile).toBe(false);
  });
});

describe("isLogLevel", () => {
  it("should accept pino levels and silent", () => {
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
