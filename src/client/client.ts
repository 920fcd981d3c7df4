/**
 * Resilient MCP client: protocol-correct, failure-tolerant calls to the
 * helper process
 */

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import {
  LATEST_PROTOCOL_VERSION,
  ListToolsResultSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_TECHNICAL_NAME, APP_VERSION } from "../config/appConfig.js";
import {
  ClientConfig,
  ClientConfigInput,
  resolveClientConfig,
} from "../config/clientConfig.js";
import { ProcessHandle, ProcessTransport } from "../connection/transport/process.js";
import { RpcExchange } from "../connection/rpc/exchange.js";
import { RpcParams } from "../connection/rpc/types.js";
import {
  ClientEvent,
  ClientEventType,
  ConnectionState,
  ConnectionStatus,
  ProcessExitInfo,
  formatCommand,
} from "../connection/types.js";
import { CapabilityCache } from "../discovery/cache.js";
import {
  ProtocolError,
  TransientRemotePredicate,
  isRetryableFailure,
  transientCodes,
} from "../errors/index.js";
import {
  RetryEngine,
  RetryPolicy,
  RetryPolicyOptions,
  RetryStats,
  createRetryPolicy,
  unwrapOutcome,
} from "../retry/index.js";
import { createChildLogger, LoggerInterface } from "../utils/logging.js";
import { ClusterOperations } from "./cluster.js";

export interface ClientDependencies {
  transport?: ProcessTransport;
  engine?: RetryEngine;
  toolsCache?: CapabilityCache<Tool[]>;
  /** Overrides `transientRemoteCodes` from the config */
  isTransientRemote?: TransientRemotePredicate;
  logger?: LoggerInterface;
}

export interface InvokeOptions {
  timeoutMs?: number;
  /** Per-call overrides of the configured retry policy */
  retry?: Omit<RetryPolicyOptions, "retryable">;
}

export interface ListToolsOptions {
  useCache?: boolean;
}

export class ResilientMcpClient extends EventEmitter {
  readonly id = uuidv4();
  readonly config: ClientConfig;
  readonly cluster: ClusterOperations;

  private readonly transport: ProcessTransport;
  private readonly exchange: RpcExchange;
  private readonly engine: RetryEngine;
  private readonly toolsCache: CapabilityCache<Tool[]>;
  private readonly isTransientRemote: TransientRemotePredicate;
  private readonly policy: RetryPolicy;
  private readonly logger: LoggerInterface;

  private handle: ProcessHandle | null = null;
  private state = ConnectionState.DISCONNECTED;
  private connectedAt?: Date;
  private lastError?: string;
  private serverInfo?: unknown;

  constructor(config: ClientConfigInput = {}, deps: ClientDependencies = {}) {
    super();
    this.config = resolveClientConfig(config);
    this.logger = deps.logger ?? createChildLogger({ module: "client" });

    this.transport =
      deps.transport ??
      new ProcessTransport({ graceMs: this.config.shutdownGraceMs });
    this.exchange = new RpcExchange(this.transport);
    this.engine =
      deps.engine ??
      new RetryEngine({
        stats: new RetryStats(),
        onRetry: ({ operation, attempt, delayMs, error }) => {
          this.emit(
            "retry",
            this.createEvent("retry", {
              error: error instanceof Error ? error : undefined,
              metadata: { operation, attempt, delayMs },
            })
          );
        },
      });
    this.toolsCache = deps.toolsCache ?? new CapabilityCache<Tool[]>();
    this.isTransientRemote =
      deps.isTransientRemote ?? transientCodes(this.config.transientRemoteCodes);
    this.policy = this.buildPolicy();
    this.cluster = new ClusterOperations(this);

    this.transport.on("exit", (exit: ProcessExitInfo) => this.handleExit(exit));
  }

  /**
   * Build a client and connect it when `autoConnect` is set
   */
  static async create(
    config: ClientConfigInput = {},
    deps: ClientDependencies = {}
  ): Promise<ResilientMcpClient> {
    const client = new ResilientMcpClient(config, deps);
    if (client.config.autoConnect) {
      await client.connect();
    }
    return client;
  }

  get status(): ConnectionStatus {
    return {
      state: this.state,
      clientId: this.id,
      command: formatCommand(this.config.serverCommand),
      pid: this.handle?.pid,
      connectedAt: this.connectedAt,
      lastError: this.lastError,
      totalRetries: this.totalRetries,
    };
  }

  get totalRetries(): number {
    return this.engine.stats.totalRetries;
  }

  /**
   * Result of the `initialize` handshake, when one was made
   */
  get serverCapabilities(): unknown {
    return this.serverInfo;
  }

  resetStats(): void {
    this.engine.stats.reset();
  }

  isConnected(): boolean {
    return this.transport.isAlive(this.handle);
  }

  /**
   * Start the helper process. Spawn failures are never retried.
   */
  async connect(): Promise<void> {
    if (this.isConnected()) {
      return;
    }

    this.state = ConnectionState.CONNECTING;
    this.emit("connecting", this.createEvent("connecting"));

    try {
      this.handle = await this.transport.connect(this.config.serverCommand);
    } catch (error) {
      this.state = ConnectionState.FAILED;
      this.lastError = error instanceof Error ? error.message : String(error);
      this.emit(
        "failed",
        this.createEvent("failed", { error: error instanceof Error ? error : undefined })
      );
      throw error;
    }

    this.state = ConnectionState.CONNECTED;
    this.connectedAt = new Date();
    this.lastError = undefined;
    this.emit("connected", this.createEvent("connected", { metadata: { pid: this.handle.pid } }));

    if (this.config.handshake) {
      try {
        await this.initialize();
      } catch (error) {
        await this.disconnect();
        throw error;
      }
    }
  }

  async disconnect(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.toolsCache.invalidate();

    if (handle) {
      await this.transport.disconnect(handle);
    }

    if (this.state !== ConnectionState.DISCONNECTED) {
      this.state = ConnectionState.DISCONNECTED;
      this.emit("disconnected", this.createEvent("disconnected"));
    }
  }

  /**
   * MCP handshake: `initialize` followed by `notifications/initialized`
   */
  async initialize(): Promise<unknown> {
    this.serverInfo = await this.invoke("initialize", {
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: APP_TECHNICAL_NAME, version: APP_VERSION },
    });
    await this.exchange.notify(this.handle, "notifications/initialized");
    return this.serverInfo;
  }

  /**
   * Call `method` with retries. Timeouts and transient remote errors are
   * retried; protocol and connection failures surface at once.
   */
  async invoke(
    method: string,
    params: RpcParams = {},
    options: InvokeOptions = {}
  ): Promise<unknown> {
    const policy = options.retry ? this.buildPolicy(options.retry) : this.policy;
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;

    const outcome = await this.engine.execute(
      () => this.exchange.call(this.handle, method, params, timeoutMs),
      policy,
      method
    );
    return unwrapOutcome(outcome, method);
  }

  /**
   * Tool definitions, served from the cache while fresh
   */
  async listTools(options: ListToolsOptions = {}): Promise<Tool[]> {
    const load = async (): Promise<Tool[]> => {
      const result = await this.invoke("tools/list");
      const parsed = ListToolsResultSchema.safeParse(result);
      if (!parsed.success) {
        throw new ProtocolError("tools/list returned an unexpected result", JSON.stringify(result));
      }
      return parsed.data.tools;
    };

    if (options.useCache === false) {
      return this.toolsCache.refresh(load);
    }
    return this.toolsCache.getOrRefresh(load, this.config.toolsCacheTtlMs);
  }

  async callTool(name: string, args: RpcParams = {}): Promise<unknown> {
    return this.invoke("tools/call", { name, arguments: args });
  }

  /**
   * Round-trip time of a `ping` request in ms
   */
  async ping(): Promise<number> {
    const startedAt = Date.now();
    await this.invoke("ping");
    return Date.now() - startedAt;
  }

  private buildPolicy(overrides: Omit<RetryPolicyOptions, "retryable"> = {}): RetryPolicy {
    return createRetryPolicy({
      ...this.config.retry,
      ...overrides,
      retryable: (failure) => isRetryableFailure(failure, this.isTransientRemote),
    });
  }

  private handleExit(exit: ProcessExitInfo): void {
    if (!this.handle || this.handle.pid !== exit.pid) {
      return;
    }

    this.logger.warn("MCP server process exited unexpectedly", exit);
    this.handle = null;
    this.toolsCache.invalidate();
    this.state = ConnectionState.FAILED;
    this.lastError = `Process exited (code ${exit.code ?? "none"}, signal ${exit.signal ?? "none"})`;
    this.emit("exit", this.createEvent("exit", { metadata: { ...exit } }));
  }

  private createEvent(
    type: ClientEventType,
    overrides: Partial<ClientEvent> = {}
  ): ClientEvent {
    return {
      type,
      clientId: this.id,
      timestamp: new Date(),
      ...overrides,
    };
  }
}

/**
 * Scoped use of a client: connect, run `fn`, always disconnect
 */
export async function withClient<T>(
  config: ClientConfigInput,
  fn: (client: ResilientMcpClient) => Promise<T>,
  deps: ClientDependencies = {}
): Promise<T> {
  const client = new ResilientMcpClient({ ...config, autoConnect: false }, deps);
  try {
    await client.connect();
    return await fn(client);
  } finally {
    await client.disconnect();
  }
}
