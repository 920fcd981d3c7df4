/**
 * Tests for request/response round trips against the stub MCP server
 */

import { describe, it, expect, afterEach } from "vitest";
import {
  NotConnectedError,
  ProtocolError,
  RemoteError,
  TimeoutError,
} from "../../errors/index.js";
import { stubCommand, StubMode } from "../../../test/fixtures/stubServer.js";
import { ProcessTransport } from "../transport/process.js";
import { RpcExchange } from "./exchange.js";

describe("RpcExchange", () => {
  let transport: ProcessTransport;

  afterEach(async () => {
    await transport.disconnect();
  });

  async function setup(mode: StubMode = "echo", ...args: Array<string | number>) {
    transport = new ProcessTransport();
    const handle = await transport.connect(stubCommand(mode, ...args));
    return { handle, exchange: new RpcExchange(transport) };
  }

  it("should return the result of a call", async () => {
    const { handle, exchange } = await setup();

    await expect(exchange.call(handle, "echo", { x: 1 }, 5000)).resolves.toEqual({
      echo: { x: 1 },
    });
    expect(exchange.currentId).toBe(1);
  });

  it("should use strictly increasing ids", async () => {
    const { handle, exchange } = await setup();

    await exchange.call(handle, "ping", {}, 5000);
    await exchange.call(handle, "ping", {}, 5000);

    expect(exchange.currentId).toBe(2);
    expect(exchange.nextRequestId()).toBe(3);
  });

  it("should serialize concurrent calls", async () => {
    const { handle, exchange } = await setup();

    const results = await Promise.all(
      [1, 2, 3].map((n) => exchange.call(handle, "echo", { n }, 5000))
    );

    expect(results).toEqual([{ echo: { n: 1 } }, { echo: { n: 2 } }, { echo: { n: 3 } }]);
  });

  it("should time out and keep working afterwards", async () => {
    const { handle, exchange } = await setup("silent-first");

    await expect(exchange.call(handle, "ping", {}, 100)).rejects.toThrow(
      new TimeoutError("ping", 100)
    );
    await expect(exchange.call(handle, "echo", { ok: true }, 5000)).resolves.toEqual({
      echo: { ok: true },
    });
  });

  it("should drop a late reply to a timed-out request", async () => {
    const { handle, exchange } = await setup("slow-first", 100);

    await expect(exchange.call(handle, "ping", {}, 20)).rejects.toBeInstanceOf(TimeoutError);
    await new Promise((resolve) => setTimeout(resolve, 300));

    await expect(exchange.call(handle, "echo", { after: "late" }, 5000)).resolves.toEqual({
      echo: { after: "late" },
    });
  });

  it("should skip a late reply that arrives while the next call waits", async () => {
    const { handle, exchange } = await setup("in-order", 150);

    await expect(exchange.call(handle, "a", {}, 50)).rejects.toBeInstanceOf(TimeoutError);

    await expect(exchange.call(handle, "b", { step: 2 }, 2000)).resolves.toEqual({
      echo: { step: 2 },
    });
    expect(exchange.currentId).toBe(2);
  });

  it("should reject a response with the wrong id", async () => {
    const { handle, exchange } = await setup("wrong-id");

    await expect(exchange.call(handle, "ping", {}, 5000)).rejects.toThrow(
      new ProtocolError("Response id 101 does not match request id 1")
    );
  });

  it("should raise RemoteError for an error envelope", async () => {
    const { handle, exchange } = await setup("error", -32601);

    const failure = await exchange.call(handle, "tools/call", {}, 5000).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RemoteError);
    if (failure instanceof RemoteError) {
      expect(failure.message).toBe("Remote error -32601 for 'tools/call': boom");
      expect(failure.remoteCode).toBe(-32601);
    }
  });

  it("should raise ProtocolError for a malformed frame", async () => {
    const { handle, exchange } = await setup("malformed");

    const failure = await exchange.call(handle, "ping", {}, 5000).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProtocolError);
    if (failure instanceof ProtocolError) {
      expect(
        failure.message.startsWith("Malformed response to 'ping' (unparseable): Invalid JSON")
      ).toBe(true);
      expect(failure.frame).toBe("this is not json");
    }
  });

  it("should refuse to call without a live handle", async () => {
    const { exchange } = await setup();

    await expect(exchange.call(null, "ping", {}, 5000)).rejects.toBeInstanceOf(
      NotConnectedError
    );
    expect(exchange.currentId).toBe(0);
  });

  it("should report a process that exits before responding", async () => {
    const { handle, exchange } = await setup();

    await expect(exchange.call(handle, "stub/exit", { code: 2 }, 5000)).rejects.toThrow(
      new NotConnectedError("MCP server exited before responding")
    );
  });

  it("should send notifications without waiting for a reply", async () => {
    const { handle, exchange } = await setup();

    await exchange.notify(handle, "notifications/initialized");
    const stats = await exchange.call(handle, "stub/stats", {}, 5000);

    expect(stats).toEqual({
      requests: 1,
      toolsListCalls: 0,
      notifications: ["notifications/initialized"],
    });
  });
});
