/**
 * assist-deploy CLI -- Install Command
 *
 * Installs a tool through the download pipeline and deploys its bundled
 * configuration.
 *
 * Usage:
 *   assist-deploy install               Install the latest release
 *   assist-deploy install stable        Install the stable channel
 *   assist-deploy install 2.0.14        Install a specific version
 *
 * Output:
 *
 *   Installing Assistant CLI (latest)
 *
 *     ✔ Resolved latest → 2.0.14 (remote)
 *     ✔ Fetched manifest (remote)
 *     ✔ Downloaded binary (local fallback)
 *     ✔ Verified checksum
 *     ... installer output ...
 *     ✔ Copied assistant settings ~/.claude/settings.json
 *
 *   ✔ Installed Assistant CLI 2.0.14 in 4.2s
 */

import { Command } from "commander";
import {
  DEFAULT_TOOL,
  EngineEvent,
  errorMessage,
  isSupportedPlatformKey,
  isValidTarget,
  PipelineFailure,
  PipelineState,
  ToolInstallResult,
} from "@assist-deploy/engine";
import { CliRuntime, openSession, Session } from "../session";
import {
  colors,
  createSpinner,
  formatBytes,
  formatDuration,
  formatErrorKind,
  formatSource,
  formatState,
  isDebugMode,
  printBlank,
  printDebug,
  printDetail,
  printError,
  printHeader,
  printInfo,
  printStageSuccess,
  printStageWarn,
  printSuccess,
  printWarn,
  stateLabel,
} from "../output";
import { reportPrerequisites } from "./check";
import { printConfiguration } from "./configure";

export interface InstallCommandOptions {
  tool: string;
  localDir?: string;
  config?: string;
  skipPrerequisites: boolean;
  skipConfig: boolean;
  verbose: boolean;
}

/** Spinner text while a stage is running */
const STAGE_MESSAGES: Partial<Record<PipelineState, string>> = {
  RESOLVING_VERSION: "Resolving version...",
  FETCHING_MANIFEST: "Fetching manifest...",
  SELECTING_PLATFORM: "Selecting platform...",
  DOWNLOADING: "Downloading binary...",
  VERIFYING: "Verifying checksum...",
};

/**
 * Run the install command and return the process exit code: 0 on
 * success, the installer's own code when it failed, 1 otherwise.
 */
export async function runInstall(
  target: string,
  opts: InstallCommandOptions,
  runtime: CliRuntime = {},
): Promise<number> {
  if (!isValidTarget(target)) {
    printError(
      `Invalid target "${target}". Use stable, latest or a version like 1.2.3`,
    );
    return 1;
  }

  let session: Session;
  try {
    session = openSession(opts, runtime);
  } catch (err: unknown) {
    printError(errorMessage(err));
    return 1;
  }
  const { tool, context } = session;

  if (!isSupportedPlatformKey(context.platform_key)) {
    printWarn(
      `Platform ${context.platform_key} is not officially supported. The release manifest decides.`,
    );
  }

  if (!opts.skipPrerequisites) {
    const satisfied = await reportPrerequisites(context.platform, runtime);
    if (!satisfied) {
      return 1;
    }
  }

  printHeader(`Installing ${colors.app(tool.displayName)} (${target})`);

  const spinner = createSpinner("Starting...");
  context.on_event = (event: EngineEvent) => {
    switch (event.type) {
      case "state_change": {
        const { state, message } = event.data;
        if (state === "INSTALLING") {
          // The installer writes straight to the terminal
          spinner.stop();
          printStageSuccess("Verified checksum");
        }
        const stageMsg = STAGE_MESSAGES[state];
        if (stageMsg) {
          spinner.text = stageMsg;
        }
        printDebug(message ? `${state}: ${message}` : state);
        break;
      }
      case "source": {
        const { stage, source, detail } = event.data;
        spinner.stop();
        if (stage === "pointer") {
          printStageSuccess(
            `Resolved ${target} → ${colors.version(detail)} (${formatSource(source)})`,
          );
        } else if (stage === "manifest") {
          printStageSuccess(`Fetched manifest (${formatSource(source)})`);
        } else {
          printStageSuccess(`Downloaded binary (${formatSource(source)})`);
        }
        printDebug(`${stage}: ${detail}`);
        spinner.start();
        break;
      }
      case "progress": {
        const { percent, bytes_downloaded, bytes_total } = event.data;
        spinner.text =
          bytes_total > 0
            ? `Downloading binary... ${percent}% of ${formatBytes(bytes_total)}`
            : `Downloading binary... ${formatBytes(bytes_downloaded)}`;
        break;
      }
    }
  };

  spinner.start();
  const startTime = Date.now();

  let result: ToolInstallResult;
  try {
    result = await tool.install(context, {
      target,
      skip_config: opts.skipConfig,
    });
  } catch (err: unknown) {
    spinner.stop();
    printBlank();
    printError(`Unexpected error during installation: ${errorMessage(err)}`);
    if (isDebugMode() && err instanceof Error && err.stack) {
      console.error(err.stack);
    } else {
      printInfo(`Use ${colors.bold("--verbose")} to see the full stack trace.`);
    }
    return 1;
  }
  spinner.stop();

  const { pipeline } = result;
  for (const warning of pipeline.warnings) {
    printStageWarn(`Could not remove ${warning.path}: ${warning.message}`);
  }

  if (pipeline.error) {
    printFailure(pipeline.error);
    return failureExitCode(pipeline.error);
  }

  if (result.configuration) {
    printConfiguration(result.configuration);
  } else if (opts.skipConfig) {
    printDetail("Configuration", "skipped");
  }

  printBlank();
  printSuccess(
    `Installed ${colors.app(tool.displayName)} ${colors.version(pipeline.version ?? target)} in ${formatDuration(Date.now() - startTime)}`,
  );
  return 0;
}

function printFailure(error: PipelineFailure): void {
  printBlank();
  printError(
    `Install failed while ${stateLabel(error.stage).toLowerCase()}: ${error.message}`,
  );
  printDetail("Reason", formatErrorKind(error.kind));
  printDetail("Stage", formatState(error.stage));
}

/** The installer's own status passes through; everything else is 1 */
export function failureExitCode(error: PipelineFailure): number {
  if (
    error.kind === "INSTALLER_FAILED" &&
    error.exit_code !== undefined &&
    error.exit_code > 0
  ) {
    return error.exit_code;
  }
  return 1;
}

export function registerInstallCommand(
  program: Command,
  runtime: CliRuntime = {},
): void {
  program
    .command("install [target]")
    .alias("i")
    .description("Install a tool: latest, stable or a specific version")
    .option("-t, --tool <name>", "Tool to install", DEFAULT_TOOL)
    .option("--local-dir <dir>", "Bundled local/ directory")
    .option("--config <file>", "Installer configuration file (YAML)")
    .option("--skip-prerequisites", "Do not check for VS Code and Git", false)
    .option("--skip-config", "Install without deploying configuration", false)
    .option("--verbose", "Show detailed output", false)
    .action(async (target: string | undefined, opts: InstallCommandOptions) => {
      process.exitCode = await runInstall(target ?? "latest", opts, runtime);
    });
}
