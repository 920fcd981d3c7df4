/**
 * TypeScript interfaces for the helper process connection
 */

import { ConfigurationError } from "../errors/index.js";

/**
 * How to start the helper process
 */
export interface ProcessCommand {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Connection state enumeration
 */
export enum ConnectionState {
  DISCONNECTED = "disconnected",
  CONNECTING = "connecting",
  CONNECTED = "connected",
  FAILED = "failed",
}

/**
 * Connection status information
 */
export interface ConnectionStatus {
  state: ConnectionState;
  clientId: string;
  command: string;
  pid?: number;
  connectedAt?: Date;
  lastError?: string;
  totalRetries: number;
}

export interface ProcessExitInfo {
  pid?: number;
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Result of waiting for one frame on the helper's stdout
 */
export type ReadResult =
  | { kind: "line"; line: string }
  | { kind: "timeout" }
  | { kind: "closed"; exit?: ProcessExitInfo };

/**
 * Client event types
 */
export type ClientEventType =
  | "connecting"
  | "connected"
  | "disconnected"
  | "failed"
  | "exit"
  | "retry";

/**
 * Client event payload
 */
export interface ClientEvent {
  type: ClientEventType;
  clientId: string;
  timestamp: Date;
  error?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Render a command for logs and error messages
 */
export function formatCommand(command: ProcessCommand): string {
  return [command.command, ...(command.args ?? [])].join(" ");
}

/**
 * Split a configured command line on whitespace
 */
export function parseCommandLine(commandLine: string): ProcessCommand {
  const [command, ...args] = commandLine.trim().split(/\s+/);
  if (!command) {
    throw new ConfigurationError("Server command line is empty");
  }
  return { command, args };
}
