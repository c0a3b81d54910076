/**
 * assist-deploy engine -- Platform Capability Set
 *
 * Everything that differs between operating systems lives behind this
 * interface. One implementation is selected at startup; nothing else in
 * the engine branches on `process.platform`.
 */

import { EnvironmentWriter } from "../side-effects/env-manager";
import { Logger } from "../utils/logger";

export type OsFamily = "windows" | "macos" | "linux";

export interface PlatformPaths {
  home_dir: string;
  /** ~/.claude -- assistant settings */
  assistant_config_dir: string;
  /** Directory holding the assistant binary after its own install step */
  install_bin_dir: string;
  /** Editor user settings directory */
  editor_settings_dir: string;
  /** Where enterprise certificates are copied */
  certs_dir: string;
}

export interface PlatformCapabilities {
  readonly os: OsFamily;
  /** Per-OS directory inside the bundle, e.g. local/WIN/USER-DIRECTORY */
  readonly configSubdir: "WIN" | "MACOS" | "LINUX";
  /** Well-known editor install locations checked before `code --version` */
  readonly editorInstallPaths: readonly string[];
  /** Shown when prerequisites are missing */
  readonly installInstructions: readonly string[];

  paths(homeDir: string, env: NodeJS.ProcessEnv): PlatformPaths;

  /** Editor settings file inside a bundled USER-DIRECTORY tree */
  editorSettingsSource(userDir: string): string;

  /** File name of an executable on this OS */
  executableName(base: string): string;

  environmentWriter(logger: Logger): EnvironmentWriter;
}
