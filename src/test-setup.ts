/**
 * Global test setup for Vitest
 * Mocks the logging module so tests never start pino transports
 */

import { vi } from "vitest";

vi.mock("./utils/logging.js", async () => {
  const pino = (await import("pino")).default;
  const { PinoLogger } = await import("./utils/logger/pinoLogger.js");

  // Silent unless explicitly verbose; writes straight to stderr, no worker thread
  const testLogger = new PinoLogger(
    { level: process.env.TEST_VERBOSE ? "debug" : "silent", serverName: "test" },
    pino({ level: process.env.TEST_VERBOSE ? "debug" : "silent" }, pino.destination(2))
  );

  return {
    DEFAULT_LOGGING_CONFIG: testLogger.getConfig(),
    Logger: vi.fn(() => testLogger),
    getLogger: vi.fn(() => testLogger),
    createChildLogger: vi.fn((bindings: { module: string }) => testLogger.child(bindings)),
    createLoggingConfig: vi.fn(() => testLogger.getConfig()),
  };
});
