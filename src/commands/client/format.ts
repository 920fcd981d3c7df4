/**
 * Console rendering of command results
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { semantic, theme } from "../../utils/theme.js";

export function formatToolLine(tool: Tool): string {
  const description = tool.description
    ? ` - ${theme.muted(tool.description.split("\n")[0])}`
    : "";
  return `   • ${theme.success(tool.name)}${description}`;
}

export function formatToolList(tools: Tool[]): string[] {
  if (tools.length === 0) {
    return [theme.warning("⚠️  The MCP server reported no tools")];
  }

  const noun = tools.length === 1 ? "tool" : "tools";
  return [
    semantic.title(`📦 ${tools.length} ${noun} available`),
    ...tools.map(formatToolLine),
  ];
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? "null";
}

export function formatPing(latencyMs: number): string {
  return `${semantic.statusOk("✓ pong")} ${theme.muted(`(${latencyMs}ms)`)}`;
}
