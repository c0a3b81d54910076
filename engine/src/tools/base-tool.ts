/**
 * assist-deploy engine -- Installable Tool Interface
 *
 * Each tool the installer can deploy implements this class. A tool owns
 * its own install flow (usually a DeployEngine run) and the enterprise
 * configuration that goes with it.
 */

import { EngineDependencies } from "../engine";
import { PlatformCapabilities, PlatformPaths } from "../platform/types";
import { DeploymentReport } from "../side-effects/config-deployer";
import { EnvWriteResult } from "../side-effects/env-manager";
import { EngineEventHandler, EngineOptions, PipelineResult } from "../types";
import { Logger } from "../utils/logger";

export interface ToolContext {
  platform: PlatformCapabilities;
  paths: PlatformPaths;
  /** Manifest key of this host, e.g. "darwin-arm64" */
  platform_key: string;
  engine_options: EngineOptions;
  logger: Logger;
  /** User-level variables from installer configuration */
  extra_environment?: Record<string, string>;
  /** Subscribed to the DeployEngine of an install run */
  on_event?: EngineEventHandler;
  /** Overrides for the engine's remote and fallback sources */
  engine_dependencies?: EngineDependencies;
}

export interface ToolInstallOptions {
  /** "latest", "stable" or a version */
  target: string;
  skip_config: boolean;
}

export interface ConfigureResult {
  deployment: DeploymentReport;
  environment: EnvWriteResult[];
}

export interface ToolInstallResult {
  tool: string;
  pipeline: PipelineResult;
  /** Absent when the pipeline failed or configuration was skipped */
  configuration?: ConfigureResult;
}

export type UninstallMethod = "self" | "removed" | "not_installed";

export interface ToolUninstallResult {
  tool: string;
  method: UninstallMethod;
  /** Exit code of the tool's own uninstall command */
  exit_code?: number;
  message: string;
}

export abstract class InstallableTool {
  abstract readonly name: string;
  abstract readonly displayName: string;

  abstract checkInstalled(context: ToolContext): boolean;

  abstract install(
    context: ToolContext,
    options: ToolInstallOptions,
  ): Promise<ToolInstallResult>;

  abstract uninstall(context: ToolContext): Promise<ToolUninstallResult>;

  /** Deploy bundled configuration and apply the environment it needs */
  abstract configure(context: ToolContext): Promise<ConfigureResult>;
}
