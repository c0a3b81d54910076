/**
 * assist-deploy engine -- Environment Variable Writers
 *
 * The deployer describes the environment it wants as an immutable
 * snapshot; a writer applies it and reports one result per variable or
 * PATH entry. The current process environment is never modified.
 *
 * Windows persists user-level values with
 * [Environment]::SetEnvironmentVariable(..., 'User'). macOS and Linux
 * return the `export` lines to add by hand (shell profiles are not edited).
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { errorMessage } from "../errors";
import { Logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

export interface DesiredEnvironment {
  readonly variables: Readonly<Record<string, string>>;
  /** Directories that must be on the user PATH */
  readonly path_additions: readonly string[];
}

export type EnvWriteStatus = "applied" | "unchanged" | "manual" | "failed";

export interface EnvWriteResult {
  /** Variable name, or "PATH" for path additions */
  name: string;
  value: string;
  status: EnvWriteStatus;
  previous_value?: string;
  /** Shell line to apply by hand (manual status) */
  hint?: string;
  /** Failure reason (failed status) */
  message?: string;
}

export interface EnvironmentWriter {
  apply(desired: DesiredEnvironment): Promise<EnvWriteResult[]>;
}

export function createDesiredEnvironment(
  variables: Record<string, string>,
  pathAdditions: string[],
): DesiredEnvironment {
  return Object.freeze({
    variables: Object.freeze({ ...variables }),
    path_additions: Object.freeze([...pathAdditions]),
  });
}

// ─── Windows ─────────────────────────────────────────────────────

/** Runs a PowerShell snippet and resolves with its stdout */
export type PowerShellRunner = (script: string) => Promise<string>;

export const runPowerShell: PowerShellRunner = async (script) => {
  const { stdout } = await execFileAsync(
    "powershell",
    ["-NoProfile", "-NonInteractive", "-Command", script],
    { windowsHide: true },
  );
  return stdout;
};

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class WindowsEnvironmentWriter implements EnvironmentWriter {
  private readonly logger: Logger;
  private readonly run: PowerShellRunner;

  constructor(logger: Logger, run: PowerShellRunner = runPowerShell) {
    this.logger = logger;
    this.run = run;
  }

  async apply(desired: DesiredEnvironment): Promise<EnvWriteResult[]> {
    const results: EnvWriteResult[] = [];

    for (const [name, value] of Object.entries(desired.variables)) {
      results.push(await this.setVariable(name, value));
    }

    if (desired.path_additions.length > 0) {
      results.push(...(await this.extendPath(desired.path_additions)));
    }

    return results;
  }

  private async getVariable(name: string): Promise<string | undefined> {
    const stdout = await this.run(
      `[Environment]::GetEnvironmentVariable(${quote(name)}, 'User')`,
    );
    const value = stdout.trim();
    return value || undefined;
  }

  private async setVariable(
    name: string,
    value: string,
  ): Promise<EnvWriteResult> {
    try {
      const previous = await this.getVariable(name);
      if (previous === value) {
        this.logger.debug({ name }, "Environment variable already set");
        return { name, value, status: "unchanged", previous_value: previous };
      }

      await this.run(
        `[Environment]::SetEnvironmentVariable(${quote(name)}, ${quote(value)}, 'User')`,
      );
      this.logger.info({ name, value }, "Set environment variable");
      return { name, value, status: "applied", previous_value: previous };
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.error(
        { name, error: message },
        "Failed to set environment variable",
      );
      return { name, value, status: "failed", message };
    }
  }

  /**
   * Append directories to the user Path, skipping entries that are
   * already present (compared case-insensitively).
   */
  private async extendPath(dirs: readonly string[]): Promise<EnvWriteResult[]> {
    let current: string;
    try {
      current = (await this.getVariable("Path")) ?? "";
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.error({ error: message }, "Failed to read user PATH");
      return dirs.map((dir) => ({
        name: "PATH",
        value: dir,
        status: "failed" as const,
        message,
      }));
    }

    const entries = current.split(";").filter((entry) => entry.length > 0);
    const results: EnvWriteResult[] = [];
    const added: string[] = [];

    for (const dir of dirs) {
      const present = [...entries, ...added].some(
        (entry) => entry.toLowerCase() === dir.toLowerCase(),
      );
      if (present) {
        results.push({ name: "PATH", value: dir, status: "unchanged" });
      } else {
        added.push(dir);
      }
    }

    if (added.length === 0) {
      return results;
    }

    const updated = [...entries, ...added].join(";");
    try {
      await this.run(
        `[Environment]::SetEnvironmentVariable('Path', ${quote(updated)}, 'User')`,
      );
      this.logger.info({ added }, "Updated user PATH");
      for (const dir of added) {
        results.push({
          name: "PATH",
          value: dir,
          status: "applied",
          previous_value: current,
        });
      }
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger.error({ error: message }, "Failed to update user PATH");
      for (const dir of added) {
        results.push({ name: "PATH", value: dir, status: "failed", message });
      }
    }

    return results;
  }
}

// ─── macOS / Linux ───────────────────────────────────────────────

export class ManualEnvironmentWriter implements EnvironmentWriter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async apply(desired: DesiredEnvironment): Promise<EnvWriteResult[]> {
    const results: EnvWriteResult[] = [];

    for (const [name, value] of Object.entries(desired.variables)) {
      results.push({
        name,
        value,
        status: "manual",
        hint: `export ${name}="${value}"`,
      });
    }

    for (const dir of desired.path_additions) {
      results.push({
        name: "PATH",
        value: dir,
        status: "manual",
        hint: `export PATH="${dir}:$PATH"`,
      });
    }

    this.logger.debug(
      { count: results.length },
      "Environment changes left for manual application",
    );
    return results;
  }
}
