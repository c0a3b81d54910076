/**
 * assist-deploy CLI -- Configure Command
 *
 * Re-applies the bundled enterprise configuration (settings, certificates,
 * environment) without reinstalling the tool.
 *
 * Usage:
 *   assist-deploy configure
 *   assist-deploy configure --local-dir ./local
 */

import { Command } from "commander";
import {
  ConfigureResult,
  DEFAULT_TOOL,
  DeployedItemKind,
  errorMessage,
} from "@assist-deploy/engine";
import { CliRuntime, openSession } from "../session";
import {
  colors,
  isDebugMode,
  printBlank,
  printError,
  printInfo,
  printStageInfo,
  printStageSuccess,
  printStageWarn,
  printSuccess,
} from "../output";

const ITEM_LABELS: Record<DeployedItemKind, string> = {
  assistant_settings: "assistant settings",
  certificate: "certificate",
  editor_settings: "editor settings",
};

export function printConfiguration(result: ConfigureResult): void {
  const { deployment, environment } = result;

  if (!deployment.found) {
    printStageWarn(`No bundled configuration at ${deployment.user_dir}`);
  }
  for (const item of deployment.items) {
    const verb = item.action === "merged" ? "Merged" : "Copied";
    printStageSuccess(
      `${verb} ${ITEM_LABELS[item.kind]} ${colors.dim(item.destination)}`,
    );
  }

  for (const entry of environment) {
    switch (entry.status) {
      case "applied":
        printStageSuccess(`Set ${entry.name}=${entry.value}`);
        break;
      case "unchanged":
        printStageInfo(`${entry.name} already contains ${entry.value}`);
        break;
      case "manual":
        printStageInfo(
          `Add to your shell profile: ${entry.hint ?? entry.value}`,
        );
        break;
      case "failed":
        printStageWarn(
          `Could not set ${entry.name}: ${entry.message ?? "unknown error"}`,
        );
        break;
    }
  }
}

export interface ConfigureCommandOptions {
  tool: string;
  localDir?: string;
  config?: string;
  verbose: boolean;
}

export async function runConfigure(
  opts: ConfigureCommandOptions,
  runtime: CliRuntime = {},
): Promise<number> {
  try {
    const { tool, context } = openSession(opts, runtime);
    printInfo(`Configuring ${colors.app(tool.displayName)}...`);
    printBlank();
    const result = await tool.configure(context);
    printConfiguration(result);
    printBlank();
    printSuccess("Configuration complete!");
    return 0;
  } catch (err: unknown) {
    printError(`Configuration failed: ${errorMessage(err)}`);
    if (isDebugMode() && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    return 1;
  }
}

export function registerConfigureCommand(
  program: Command,
  runtime: CliRuntime = {},
): void {
  program
    .command("configure")
    .description("Apply the bundled configuration without reinstalling")
    .option("-t, --tool <name>", "Tool to configure", DEFAULT_TOOL)
    .option("--local-dir <dir>", "Bundled local/ directory")
    .option("--config <file>", "Installer configuration file (YAML)")
    .option("--verbose", "Show detailed output", false)
    .action(async (opts: ConfigureCommandOptions) => {
      process.exitCode = await runConfigure(opts, runtime);
    });
}
