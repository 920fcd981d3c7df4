/**
 * k3s MCP client library entry point
 */

export {
  ResilientMcpClient,
  withClient,
} from "./client/client.js";
export type {
  ClientDependencies,
  InvokeOptions,
  ListToolsOptions,
} from "./client/client.js";
export { ClusterOperations, CLUSTER_TOOLS, DEFAULT_LOG_LINES } from "./client/cluster.js";
export type { ListPodsOptions, NamespaceOptions, ToolCaller } from "./client/cluster.js";

export {
  DEFAULT_SERVER_COMMAND,
  clientConfigSchema,
  loadConfigFile,
  loadConfigFromEnv,
  resolveClientConfig,
} from "./config/clientConfig.js";
export type { ClientConfig, ClientConfigInput } from "./config/clientConfig.js";

export {
  ProcessHandle,
  ProcessTransport,
  DEFAULT_SHUTDOWN_GRACE_MS,
} from "./connection/transport/process.js";
export type { ProcessTransportOptions } from "./connection/transport/process.js";
export { RpcExchange } from "./connection/rpc/exchange.js";
export {
  decodeResponse,
  encodeNotification,
  encodeRequest,
} from "./connection/rpc/codec.js";
export * from "./connection/rpc/types.js";
export * from "./connection/types.js";

export { CapabilityCache } from "./discovery/cache.js";
export type { CacheEntry, CapabilityCacheStats } from "./discovery/cache.js";

export * from "./errors/index.js";
export * from "./retry/index.js";

export { getLogger, createChildLogger } from "./utils/logging.js";
export type { LoggerInterface, LoggingConfig, LogLevel } from "./utils/logging.js";
