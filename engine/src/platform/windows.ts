/**
 * assist-deploy engine -- Windows Platform
 */

import * as path from "path";
import {
  EnvironmentWriter,
  WindowsEnvironmentWriter,
} from "../side-effects/env-manager";
import { Logger } from "../utils/logger";
import { PlatformCapabilities, PlatformPaths } from "./types";

export class WindowsPlatform implements PlatformCapabilities {
  readonly os = "windows" as const;
  readonly configSubdir = "WIN" as const;
  readonly editorInstallPaths = [
    "C:\\Program Files\\Microsoft VS Code\\Code.exe",
    "C:\\Program Files (x86)\\Microsoft VS Code\\Code.exe",
  ];
  readonly installInstructions = [
    "Please install the missing software via Software Center:",
    "  1. Open Software Center from the Start menu",
    "  2. Search for and install:",
    "     - Visual Studio Code",
    "     - Git for Windows",
    "Once installed, run this command again.",
  ];

  paths(homeDir: string, env: NodeJS.ProcessEnv): PlatformPaths {
    const appData = env.APPDATA || path.join(homeDir, "AppData", "Roaming");
    return {
      home_dir: homeDir,
      assistant_config_dir: path.join(homeDir, ".claude"),
      install_bin_dir: path.join(homeDir, ".claude", "bin"),
      editor_settings_dir: path.join(appData, "Code", "User"),
      // NODE_EXTRA_CA_CERTS points here; no trust-store import on Windows
      certs_dir: path.join(homeDir, ".continue", "certs"),
    };
  }

  editorSettingsSource(userDir: string): string {
    return path.join(
      userDir,
      "AppData",
      "Roaming",
      "Code",
      "User",
      "settings.json",
    );
  }

  executableName(base: string): string {
    return base.toLowerCase().endsWith(".exe") ? base : `${base}.exe`;
  }

  environmentWriter(logger: Logger): EnvironmentWriter {
    return new WindowsEnvironmentWriter(logger);
  }
}
