/**
 * assist-deploy CLI -- Check Command
 *
 * Verifies the prerequisites (VS Code and Git) without installing
 * anything.
 *
 * Usage:
 *   assist-deploy check
 */

import { Command } from "commander";
import {
  checkPrerequisites,
  PlatformCapabilities,
  selectPlatform,
} from "@assist-deploy/engine";
import { CliRuntime } from "../session";
import {
  colors,
  printBlank,
  printError,
  printInfo,
  printStageError,
  printStageSuccess,
  printSuccess,
} from "../output";

/**
 * Print one line per prerequisite and, when something is missing, the
 * platform's install instructions. Resolves true when all are present.
 */
export async function reportPrerequisites(
  platform: PlatformCapabilities,
  runtime: CliRuntime = {},
): Promise<boolean> {
  printInfo("Checking prerequisites...");
  const report = await checkPrerequisites(platform, {
    probe: runtime.probe,
    pathExists: runtime.pathExists,
  });

  for (const check of report.checks) {
    if (check.installed) {
      printStageSuccess(`${check.label} ${colors.dim(`(${check.found_by})`)}`);
    } else {
      printStageError(`${check.label} not found`);
    }
  }

  if (!report.satisfied) {
    printBlank();
    printError("Prerequisites not met.");
    printBlank();
    for (const line of platform.installInstructions) {
      console.log(`  ${line}`);
    }
  }
  return report.satisfied;
}

export async function runCheck(runtime: CliRuntime = {}): Promise<number> {
  const platform = runtime.platform ?? selectPlatform();
  const satisfied = await reportPrerequisites(platform, runtime);
  if (!satisfied) {
    return 1;
  }
  printBlank();
  printSuccess("All prerequisites satisfied!");
  return 0;
}

export function registerCheckCommand(
  program: Command,
  runtime: CliRuntime = {},
): void {
  program
    .command("check")
    .description("Check prerequisites (VS Code, Git)")
    .action(async () => {
      process.exitCode = await runCheck(runtime);
    });
}
