/**
 * Command lines for the stub MCP server fixture
 */

import { fileURLToPath } from "url";
import type { ProcessCommand } from "../../src/connection/types.js";

export const STUB_SERVER_PATH = fileURLToPath(
  new URL("./stub-server.cjs", import.meta.url)
);

export type StubMode =
  | "echo"
  | "silent-first"
  | "slow-first"
  | "in-order"
  | "wrong-id"
  | "flaky"
  | "error"
  | "malformed"
  | "ignore-term";

export function stubCommand(mode: StubMode = "echo", ...args: Array<string | number>): ProcessCommand {
  return {
    command: process.execPath,
    args: [STUB_SERVER_PATH, mode, ...args.map(String)],
  };
}
