/**
 * assist-deploy engine -- Prerequisite Checks
 *
 * The assistant needs an editor (VS Code) and Git on the machine. Both are
 * presence checks only; nothing is installed here.
 */

import * as fs from "fs";
import { exec } from "child_process";
import { promisify } from "util";
import { PlatformCapabilities } from "./platform/types";

const execAsync = promisify(exec);

export type PrerequisiteName = "editor" | "git";

export interface PrerequisiteStatus {
  name: PrerequisiteName;
  label: string;
  installed: boolean;
  /** How it was found: a file path or the command that answered */
  found_by?: string;
}

export interface PrerequisiteReport {
  satisfied: boolean;
  checks: PrerequisiteStatus[];
}

/** Resolves true when `command` runs and exits 0 */
export type CommandProbe = (command: string) => Promise<boolean>;

export const probeCommand: CommandProbe = async (command) => {
  try {
    await execAsync(command, { windowsHide: true, timeout: 15_000 });
    return true;
  } catch {
    return false;
  }
};

export interface PrerequisiteOptions {
  probe?: CommandProbe;
  pathExists?: (filePath: string) => boolean;
}

export async function checkPrerequisites(
  platform: PlatformCapabilities,
  options: PrerequisiteOptions = {},
): Promise<PrerequisiteReport> {
  const probe = options.probe ?? probeCommand;
  const pathExists = options.pathExists ?? fs.existsSync;

  const editor = await checkEditor(platform, probe, pathExists);
  const git = await checkCommand("git", "Git", "git --version", probe);
  const checks = [editor, git];

  return {
    satisfied: checks.every((check) => check.installed),
    checks,
  };
}

async function checkEditor(
  platform: PlatformCapabilities,
  probe: CommandProbe,
  pathExists: (filePath: string) => boolean,
): Promise<PrerequisiteStatus> {
  const installPath = platform.editorInstallPaths.find((p) => pathExists(p));
  if (installPath) {
    return {
      name: "editor",
      label: "VS Code",
      installed: true,
      found_by: installPath,
    };
  }
  return checkCommand("editor", "VS Code", "code --version", probe);
}

async function checkCommand(
  name: PrerequisiteName,
  label: string,
  command: string,
  probe: CommandProbe,
): Promise<PrerequisiteStatus> {
  const installed = await probe(command);
  return installed
    ? { name, label, installed, found_by: command }
    : { name, label, installed };
}
