/**
 * assist-deploy CLI -- Uninstall Command
 *
 * Removes an installed tool. The tool's own uninstall command runs first;
 * its install directory is removed when that fails.
 *
 * Usage:
 *   assist-deploy uninstall
 *   assist-deploy uninstall --tool assistant-cli
 */

import { Command } from "commander";
import { DEFAULT_TOOL, errorMessage } from "@assist-deploy/engine";
import { CliRuntime, openSession } from "../session";
import {
  colors,
  createSpinner,
  printError,
  printSuccess,
  printWarn,
} from "../output";

export interface UninstallCommandOptions {
  tool: string;
  localDir?: string;
  config?: string;
  verbose: boolean;
}

export async function runUninstall(
  opts: UninstallCommandOptions,
  runtime: CliRuntime = {},
): Promise<number> {
  const spinner = createSpinner("Uninstalling...");
  try {
    const { tool, context } = openSession(opts, runtime);
    spinner.text = `Uninstalling ${tool.displayName}...`;
    spinner.start();
    const result = await tool.uninstall(context);
    spinner.stop();

    if (result.method === "not_installed") {
      printWarn(result.message);
      return 1;
    }
    printSuccess(
      `${colors.app(tool.displayName)} uninstalled ${colors.dim(`(${result.message})`)}`,
    );
    return 0;
  } catch (err: unknown) {
    spinner.stop();
    printError(`Uninstall failed: ${errorMessage(err)}`);
    return 1;
  }
}

export function registerUninstallCommand(
  program: Command,
  runtime: CliRuntime = {},
): void {
  program
    .command("uninstall")
    .description("Uninstall a tool")
    .option("-t, --tool <name>", "Tool to uninstall", DEFAULT_TOOL)
    .option("--local-dir <dir>", "Bundled local/ directory")
    .option("--config <file>", "Installer configuration file (YAML)")
    .option("--verbose", "Show detailed output", false)
    .action(async (opts: UninstallCommandOptions) => {
      process.exitCode = await runUninstall(opts, runtime);
    });
}
