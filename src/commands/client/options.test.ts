/**
 * Tests for CLI option parsing and config resolution
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  parseJsonObject,
  parseLogLevel,
  parsePositiveInteger,
  resolveCliConfig,
  resolveLogLevel,
} from "./options.js";

describe("argument parsers", () => {
  it("should parse positive integers", () => {
    expect(parsePositiveInteger("250")).toBe(250);
    expect(() => parsePositiveInteger("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInteger("1.5")).toThrow("Must be a positive integer.");
    expect(() => parsePositiveInteger("soon")).toThrow(InvalidArgumentError);
  });

  it("should parse log levels", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(() => parseLogLevel("loud")).toThrow(InvalidArgumentError);
  });

  it("should parse JSON objects", () => {
    expect(parseJsonObject('{"namespace":"kube-system","lines":20}')).toEqual({
      namespace: "kube-system",
      lines: 20,
    });
    expect(() => parseJsonObject("[1,2]")).toThrow("Must be a JSON object.");
    expect(() => parseJsonObject("null")).toThrow("Must be a JSON object.");
    expect(() => parseJsonObject("{")).toThrow(/^Not valid JSON: /);
  });
});

describe("resolveLogLevel", () => {
  it("should prefer the flag, then LOG_LEVEL, then warn", () => {
    expect(resolveLogLevel({ logLevel: "debug" }, { LOG_LEVEL: "error" })).toBe("debug");
    expect(resolveLogLevel({}, { LOG_LEVEL: "error" })).toBe("error");
    expect(resolveLogLevel({}, { LOG_LEVEL: "chatty" })).toBe("warn");
    expect(resolveLogLevel({}, {})).toBe("warn");
  });
});

describe("resolveCliConfig", () => {
  it("should let flags override the environment", async () => {
    const config = await resolveCliConfig(
      { server: "node helper.js --stdio", timeout: 500 },
      { K3S_MCP_TIMEOUT_MS: "100", K3S_MCP_MAX_RETRIES: "1" }
    );

    expect(config.serverCommand).toEqual({ command: "node", args: ["helper.js", "--stdio"] });
    expect(config.timeoutMs).toBe(500);
    expect(config.retry).toEqual({ maxAttempts: 1 });
    expect(config.autoConnect).toBe(false);
  });

  it("should let the environment override the config file", async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), "k3s-mcp-cli-"));
    const path = join(dir, "client.json");
    await fs.writeFile(path, JSON.stringify({ timeoutMs: 100, toolsCacheTtlMs: 5 }));

    try {
      const config = await resolveCliConfig({ config: path }, { K3S_MCP_TIMEOUT_MS: "200" });

      expect(config.timeoutMs).toBe(200);
      expect(config.toolsCacheTtlMs).toBe(5);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
