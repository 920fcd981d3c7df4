/**
 * Application identity shared by logging, configuration and the CLI
 */

export const APP_NAME = "k3s MCP Client";
export const APP_TECHNICAL_NAME = "k3s-mcp-client";
export const APP_VERSION = "0.3.0";
export const APP_DESCRIPTION =
  "Resilient stdio JSON-RPC client for the k3s monitoring MCP helper process";

// Prefix for every environment variable the client reads
export const ENV_PREFIX = "K3S_MCP_";
