/**
 * assist-deploy engine -- Installer Subprocess
 *
 * Runs the verified binary as `<binary> install <target>`, passing the
 * target exactly as the user requested it so the tool applies its own
 * channel/pinning rules. Output goes straight to the user's terminal.
 *
 * The artifact is removed once the child has exited, whatever the exit
 * code. A removal failure is returned as a warning.
 *
 * SIGINT and SIGTERM received while the child runs are passed on to it,
 * and this process waits for the child either way. On a terminal, Ctrl-C
 * already reaches the child through the foreground process group, so
 * SIGINT is only re-sent when stdin is not a TTY.
 */

import * as fs from "fs";
import * as os from "os";
import { spawn } from "child_process";
import { errorMessage } from "./errors";
import { InstallerOutcome, VerifiedArtifact } from "./types";
import { removeArtifact } from "./utils/cleanup";
import { Logger } from "./utils/logger";

const FORWARDED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface RunInstallerOptions {
  logger: Logger;
  /** Called when the child has exited, before the artifact is removed */
  onExit?: () => void;
  /** Defaults to whether stdin is a TTY */
  interactive?: boolean;
}

export async function runInstaller(
  artifact: VerifiedArtifact,
  target: string,
  options: RunInstallerOptions,
): Promise<InstallerOutcome> {
  const { logger } = options;
  const args = ["install", target];
  let outcome: Omit<InstallerOutcome, "warnings">;

  try {
    if (process.platform !== "win32") {
      fs.chmodSync(artifact.file_path, 0o755);
    }
    logger.info({ file: artifact.file_path, args }, "Running installer");
    outcome = await spawnInstaller(
      artifact.file_path,
      args,
      options.interactive ?? Boolean(process.stdin.isTTY),
    );
  } catch (err: unknown) {
    outcome = {
      exit_code: -1,
      message: `Failed to prepare installer: ${errorMessage(err)}`,
    };
  }

  logger.info(
    { exit_code: outcome.exit_code, signal: outcome.signal },
    "Installer exited",
  );
  options.onExit?.();

  const warning = removeArtifact(artifact.file_path, logger);
  return { ...outcome, warnings: warning ? [warning] : [] };
}

function spawnInstaller(
  file: string,
  args: string[],
  interactive: boolean,
): Promise<Omit<InstallerOutcome, "warnings">> {
  return new Promise((resolve) => {
    const child = spawn(file, args, { stdio: "inherit", windowsHide: true });
    let settled = false;

    const listeners = FORWARDED_SIGNALS.map((signal) => {
      const forward = () => {
        if (signal === "SIGINT" && interactive) return;
        if (child.exitCode === null) {
          child.kill(signal);
        }
      };
      process.on(signal, forward);
      return { signal, forward };
    });

    const finish = (result: Omit<InstallerOutcome, "warnings">) => {
      if (settled) return;
      settled = true;
      for (const { signal, forward } of listeners) {
        process.removeListener(signal, forward);
      }
      resolve(result);
    };

    child.on("close", (code, signal) => {
      if (code !== null) {
        finish({ exit_code: code });
        return;
      }
      const signo = signal ? os.constants.signals[signal] : undefined;
      finish({
        exit_code: signo ? 128 + signo : 1,
        signal: signal ?? undefined,
        message: `Installer terminated by ${signal ?? "unknown signal"}`,
      });
    });

    child.on("error", (err) => {
      finish({
        exit_code: -1,
        message: `Failed to launch installer: ${err.message}`,
      });
    });
  });
}
