/**
 * Client CLI commands: each runs one operation against a fresh helper process
 */

import { Command } from "commander";
import { ResilientMcpClient, withClient } from "../../client/client.js";
import { RpcParams } from "../../connection/rpc/types.js";
import { getUserFriendlyMessage, getErrorCode } from "../../errors/index.js";
import { createChildLogger } from "../../utils/logging.js";
import { semantic, theme } from "../../utils/theme.js";
import { formatJson, formatPing, formatToolList } from "./format.js";
import { GlobalOptions, parseJsonObject, resolveCliConfig } from "./options.js";

/**
 * Resolve config from the command's global options, run `action` with a
 * connected client and report failures on stderr with exit code 1
 */
export async function runClientAction(
  command: Command,
  action: (client: ResilientMcpClient) => Promise<void>
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  try {
    const config = await resolveCliConfig(options);
    await withClient(config, action);
  } catch (error) {
    createChildLogger({ module: "cli" }).debug("Command failed", {
      command: command.name(),
      code: getErrorCode(error),
    });
    console.error(semantic.messageError(`❌ ${command.name()} failed:`));
    console.error(theme.error(`   ${getUserFriendlyMessage(error)}`));
    process.exitCode = 1;
  }
}

export function createToolsCommand(): Command {
  return new Command("tools")
    .description("List the tools the MCP server exposes")
    .option("--no-cache", "Always ask the server instead of the tool cache")
    .option("--json", "Print the raw tool definitions as JSON")
    .action(async (options: { cache: boolean; json?: boolean }, command: Command) => {
      await runClientAction(command, async (client) => {
        const tools = await client.listTools({ useCache: options.cache });
        const lines = options.json ? [formatJson(tools)] : formatToolList(tools);
        for (const line of lines) {
          console.log(line);
        }
      });
    });
}

export function createCallCommand(): Command {
  return new Command("call")
    .description("Call a tool by name")
    .argument("<tool>", "Tool name, e.g. list_pods")
    .option("--args <json>", "Tool arguments as a JSON object", parseJsonObject)
    .action(
      async (tool: string, options: { args?: RpcParams }, command: Command) => {
        await runClientAction(command, async (client) => {
          console.log(formatJson(await client.callTool(tool, options.args ?? {})));
        });
      }
    );
}

export function createInvokeCommand(): Command {
  return new Command("invoke")
    .description("Send any JSON-RPC method with retries")
    .argument("<method>", "JSON-RPC method, e.g. tools/list")
    .option("--params <json>", "Request params as a JSON object", parseJsonObject)
    .action(
      async (method: string, options: { params?: RpcParams }, command: Command) => {
        await runClientAction(command, async (client) => {
          console.log(formatJson(await client.invoke(method, options.params ?? {})));
        });
      }
    );
}

export function createPingCommand(): Command {
  return new Command("ping")
    .description("Check that the MCP server answers")
    .action(async (_options: unknown, command: Command) => {
      await runClientAction(command, async (client) => {
        console.log(formatPing(await client.ping()));
      });
    });
}

export function createHealthCommand(): Command {
  return new Command("health")
    .description("Show cluster health reported by the MCP server")
    .action(async (_options: unknown, command: Command) => {
      await runClientAction(command, async (client) => {
        console.log(formatJson(await client.cluster.getClusterHealth()));
      });
    });
}
