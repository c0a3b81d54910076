/**
 * assist-deploy engine -- macOS and Linux Platforms
 *
 * Neither edits shell profiles: environment changes come back as manual
 * `export` lines for the user (or their provisioning tooling) to apply.
 */

import * as path from "path";
import {
  EnvironmentWriter,
  ManualEnvironmentWriter,
} from "../side-effects/env-manager";
import { Logger } from "../utils/logger";
import { PlatformCapabilities, PlatformPaths } from "./types";

abstract class PosixPlatform implements PlatformCapabilities {
  abstract readonly os: "macos" | "linux";
  abstract readonly configSubdir: "MACOS" | "LINUX";
  abstract readonly editorInstallPaths: readonly string[];
  abstract readonly installInstructions: readonly string[];

  protected abstract editorSettingsRelative(): string[];

  paths(homeDir: string): PlatformPaths {
    return {
      home_dir: homeDir,
      assistant_config_dir: path.join(homeDir, ".claude"),
      install_bin_dir: path.join(homeDir, ".claude", "bin"),
      editor_settings_dir: path.join(homeDir, ...this.editorSettingsRelative()),
      certs_dir: path.join(homeDir, "certs"),
    };
  }

  editorSettingsSource(userDir: string): string {
    return path.join(userDir, ...this.editorSettingsRelative(), "settings.json");
  }

  executableName(base: string): string {
    return base;
  }

  environmentWriter(logger: Logger): EnvironmentWriter {
    return new ManualEnvironmentWriter(logger);
  }
}

export class MacosPlatform extends PosixPlatform {
  readonly os = "macos" as const;
  readonly configSubdir = "MACOS" as const;
  readonly editorInstallPaths = ["/Applications/Visual Studio Code.app"];
  readonly installInstructions = [
    "Please install the missing software via Self-Service:",
    "  1. Open Self-Service from your Applications folder or Dock",
    "  2. Search for and install:",
    "     - Visual Studio Code",
    "     - Git (or Xcode Command Line Tools)",
    "Once installed, run this command again.",
  ];

  protected editorSettingsRelative(): string[] {
    return ["Library", "Application Support", "Code", "User"];
  }
}

/** Development hosts only; enterprise rollouts target Windows and macOS */
export class LinuxPlatform extends PosixPlatform {
  readonly os = "linux" as const;
  readonly configSubdir = "LINUX" as const;
  readonly editorInstallPaths: readonly string[] = [];
  readonly installInstructions = [
    "Please install Visual Studio Code and Git with your package manager,",
    "then run this command again.",
  ];

  protected editorSettingsRelative(): string[] {
    return [".config", "Code", "User"];
  }
}
