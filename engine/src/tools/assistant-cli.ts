/**
 * assist-deploy engine -- Assistant CLI Tool
 *
 * Installs the coding-assistant CLI through the download pipeline, then
 * deploys the bundled enterprise settings, certificates and environment.
 */

import * as fs from "fs";
import * as path from "path";
import { execFile } from "child_process";
import { promisify } from "util";
import { DeployEngine } from "../engine";
import { errorMessage } from "../errors";
import { deployConfigs } from "../side-effects/config-deployer";
import {
  ConfigureResult,
  InstallableTool,
  ToolContext,
  ToolInstallOptions,
  ToolInstallResult,
  ToolUninstallResult,
} from "./base-tool";

const execFileAsync = promisify(execFile);

export class AssistantCliTool extends InstallableTool {
  readonly name = "assistant-cli";
  readonly displayName = "Assistant CLI";

  /** Where the binary lands after its own `install` step */
  installedBinaryPath(context: ToolContext): string {
    return path.join(
      context.paths.install_bin_dir,
      context.platform.executableName(context.engine_options.binary_name),
    );
  }

  checkInstalled(context: ToolContext): boolean {
    return fs.existsSync(this.installedBinaryPath(context));
  }

  async install(
    context: ToolContext,
    options: ToolInstallOptions,
  ): Promise<ToolInstallResult> {
    const engine = new DeployEngine(
      context.engine_options,
      { logger: context.logger, ...context.engine_dependencies },
    );
    if (context.on_event) {
      engine.on(context.on_event);
    }

    const pipeline = await engine.run(options.target, context.platform_key);
    if (pipeline.final_state === "FAILED" || options.skip_config) {
      return { tool: this.name, pipeline };
    }

    const configuration = await this.configure(context);
    return { tool: this.name, pipeline, configuration };
  }

  async configure(context: ToolContext): Promise<ConfigureResult> {
    const deployment = deployConfigs(
      {
        local_dir: context.engine_options.local_dir,
        platform: context.platform,
        paths: context.paths,
        extra_environment: context.extra_environment,
      },
      context.logger,
    );

    const writer = context.platform.environmentWriter(context.logger);
    const environment = await writer.apply(deployment.environment);
    return { deployment, environment };
  }

  async uninstall(context: ToolContext): Promise<ToolUninstallResult> {
    const binary = this.installedBinaryPath(context);
    if (!fs.existsSync(binary)) {
      return {
        tool: this.name,
        method: "not_installed",
        message: `${this.displayName} is not installed at ${binary}`,
      };
    }

    try {
      await execFileAsync(binary, ["uninstall"], { windowsHide: true });
      context.logger.info({ binary }, "Tool uninstalled itself");
      return {
        tool: this.name,
        method: "self",
        exit_code: 0,
        message: `Ran ${binary} uninstall`,
      };
    } catch (err: unknown) {
      context.logger.warn(
        { binary, error: errorMessage(err) },
        "Tool uninstall command failed, removing install directory",
      );
    }

    fs.rmSync(context.paths.install_bin_dir, { recursive: true, force: true });
    return {
      tool: this.name,
      method: "removed",
      message: `Removed ${context.paths.install_bin_dir}`,
    };
  }
}
