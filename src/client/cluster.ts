/**
 * Named k3s monitoring operations, each a thin `tools/call` wrapper
 */

import { RpcParams } from "../connection/rpc/types.js";

export interface ToolCaller {
  callTool(name: string, args?: RpcParams): Promise<unknown>;
}

export interface ListPodsOptions {
  namespace?: string;
  labelSelector?: string;
}

export interface NamespaceOptions {
  namespace?: string;
}

export const CLUSTER_TOOLS = {
  health: "get_cluster_health",
  pods: "list_pods",
  podLogs: "get_pod_logs",
  deployments: "list_deployments",
  nodes: "list_nodes",
  namespaces: "list_namespaces",
} as const;

export const DEFAULT_LOG_LINES = 50;

export class ClusterOperations {
  constructor(private readonly client: ToolCaller) {}

  getClusterHealth(): Promise<unknown> {
    return this.client.callTool(CLUSTER_TOOLS.health, {});
  }

  /**
   * Filters are only sent when given
   */
  listPods(options: ListPodsOptions = {}): Promise<unknown> {
    const args: RpcParams = {};
    if (options.namespace) args.namespace = options.namespace;
    if (options.labelSelector) args.label_selector = options.labelSelector;
    return this.client.callTool(CLUSTER_TOOLS.pods, args);
  }

  getPodLogs(
    podName: string,
    namespace: string,
    lines: number = DEFAULT_LOG_LINES
  ): Promise<unknown> {
    return this.client.callTool(CLUSTER_TOOLS.podLogs, {
      pod_name: podName,
      namespace,
      lines,
    });
  }

  listDeployments(options: NamespaceOptions = {}): Promise<unknown> {
    const args: RpcParams = {};
    if (options.namespace) args.namespace = options.namespace;
    return this.client.callTool(CLUSTER_TOOLS.deployments, args);
  }

  listNodes(): Promise<unknown> {
    return this.client.callTool(CLUSTER_TOOLS.nodes, {});
  }

  listNamespaces(): Promise<unknown> {
    return this.client.callTool(CLUSTER_TOOLS.namespaces, {});
  }
}
