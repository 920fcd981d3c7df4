/**
 * Command-line program for the k3s MCP client
 */

import { Command } from "commander";
import {
  APP_DESCRIPTION,
  APP_TECHNICAL_NAME,
  APP_VERSION,
} from "./config/appConfig.js";
import {
  createCallCommand,
  createHealthCommand,
  createInvokeCommand,
  createPingCommand,
  createToolsCommand,
} from "./commands/client/index.js";
import {
  GlobalOptions,
  parseLogLevel,
  parsePositiveInteger,
  resolveLogLevel,
} from "./commands/client/options.js";
import { getLogger } from "./utils/logging.js";
import { theme } from "./utils/theme.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name(APP_TECHNICAL_NAME)
    .description(theme.info(APP_DESCRIPTION))
    .version(APP_VERSION)
    .option(
      "--server <command>",
      "Command line that starts the MCP server (overrides K3S_MCP_SERVER_COMMAND)"
    )
    .option("--timeout <ms>", "Per-request timeout in milliseconds", parsePositiveInteger)
    .option("--config <path>", "JSON config file")
    .option("--handshake", "Send the MCP initialize handshake after connecting")
    .option("--log-level <level>", "Log level for stderr output", parseLogLevel);

  program.hook("preAction", (_thisCommand, actionCommand) => {
    getLogger({ level: resolveLogLevel(actionCommand.optsWithGlobals<GlobalOptions>()) });
  });

  program.addCommand(createToolsCommand());
  program.addCommand(createCallCommand());
  program.addCommand(createInvokeCommand());
  program.addCommand(createPingCommand());
  program.addCommand(createHealthCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
