/**
 * assist-deploy CLI -- List Command
 *
 * Lists the tools this installer knows about and whether each one is
 * installed for the current user.
 */

import { Command } from "commander";
import {
  DEFAULT_TOOL,
  errorMessage,
  getTool,
  listTools,
} from "@assist-deploy/engine";
import { CliRuntime, openSession } from "../session";
import { colors, printBlank, printError, printInfo } from "../output";

export interface ListCommandOptions {
  localDir?: string;
  config?: string;
  verbose: boolean;
}

export function runList(
  opts: ListCommandOptions,
  runtime: CliRuntime = {},
): number {
  try {
    const { context } = openSession({ ...opts, tool: DEFAULT_TOOL }, runtime);
    printInfo("Available tools:");
    printBlank();
    for (const name of listTools()) {
      const tool = getTool(name);
      const status = tool.checkInstalled(context)
        ? colors.success("installed")
        : colors.dim("not installed");
      console.log(`  ${name} - ${tool.displayName} [${status}]`);
    }
    return 0;
  } catch (err: unknown) {
    printError(errorMessage(err));
    return 1;
  }
}

export function registerListCommand(
  program: Command,
  runtime: CliRuntime = {},
): void {
  program
    .command("list")
    .description("List available tools and their installation status")
    .option("--local-dir <dir>", "Bundled local/ directory")
    .option("--config <file>", "Installer configuration file (YAML)")
    .option("--verbose", "Show detailed output", false)
    .action((opts: ListCommandOptions) => {
      process.exitCode = runList(opts, runtime);
    });
}
