/**
 * assist-deploy CLI -- Entry Point
 *
 * Installs the coding-assistant CLI on managed machines, with a bundled
 * local/ mirror to fall back on when the release bucket is unreachable.
 *
 * Commands:
 *   assist-deploy check              Check prerequisites (VS Code, Git)
 *   assist-deploy install [target]   Download, verify and install
 *   assist-deploy uninstall          Remove an installed tool
 *   assist-deploy configure          Re-apply bundled configuration
 *   assist-deploy list               List tools and their status
 */

import { Command } from "commander";
import { registerCheckCommand } from "./commands/check";
import { registerInstallCommand } from "./commands/install";
import { registerUninstallCommand } from "./commands/uninstall";
import { registerConfigureCommand } from "./commands/configure";
import { registerListCommand } from "./commands/list";
import { CliRuntime } from "./session";

export const VERSION = "0.1.0";

export function createProgram(runtime: CliRuntime = {}): Command {
  const program = new Command();

  program
    .name("assist-deploy")
    .description("Enterprise installer for the coding-assistant CLI")
    .version(VERSION);

  registerCheckCommand(program, runtime);
  registerInstallCommand(program, runtime);
  registerUninstallCommand(program, runtime);
  registerConfigureCommand(program, runtime);
  registerListCommand(program, runtime);

  return program;
}
