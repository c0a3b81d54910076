/**
 * assist-deploy CLI -- Command Session
 *
 * Everything a command needs before it can talk to a tool: the logger,
 * the resolved local/ bundle, the validated configuration, the platform
 * capability set and the tool itself.
 */

import {
  CommandProbe,
  createLogger,
  EngineDependencies,
  getTool,
  InstallableTool,
  Logger,
  PlatformCapabilities,
  selectPlatform,
  ToolContext,
} from "@assist-deploy/engine";
import {
  buildToolContext,
  defaultConfigPath,
  InstallerConfig,
  loadInstallerConfig,
  resolveLocalDir,
} from "./config";
import { setDebugMode } from "./output";

/** Shared by every command that acts on a tool */
export interface CommonOptions {
  tool: string;
  localDir?: string;
  config?: string;
  verbose: boolean;
}

/** Host facts, replaceable in tests */
export interface CliRuntime {
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  platform?: PlatformCapabilities;
  platformKey?: string;
  probe?: CommandProbe;
  pathExists?: (filePath: string) => boolean;
  engineDependencies?: EngineDependencies;
  localDirCandidates?: string[];
}

export interface Session {
  tool: InstallableTool;
  context: ToolContext;
  config: InstallerConfig;
  logger: Logger;
}

/**
 * @throws Error for an unknown tool or an unreadable configuration file
 */
export function openSession(
  options: CommonOptions,
  runtime: CliRuntime = {},
): Session {
  setDebugMode(options.verbose);
  const logger = createLogger({ verbose: options.verbose });

  const tool = getTool(options.tool);
  const localDir = resolveLocalDir(options.localDir, runtime.localDirCandidates);
  const config = loadInstallerConfig(
    options.config ?? defaultConfigPath(localDir),
    options.config !== undefined,
  );

  const context = buildToolContext({
    config,
    local_dir: localDir,
    platform: runtime.platform ?? selectPlatform(),
    logger,
    verbose: options.verbose,
    homeDir: runtime.homeDir,
    env: runtime.env,
    platformKey: runtime.platformKey,
  });
  if (runtime.engineDependencies) {
    context.engine_dependencies = runtime.engineDependencies;
  }

  logger.debug(
    { tool: tool.name, local_dir: localDir, platform: context.platform_key },
    "Session opened",
  );
  return { tool, context, config, logger };
}
