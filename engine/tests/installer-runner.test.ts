/**
 * assist-deploy engine -- Installer Subprocess Tests
 *
 * The "binary" is a shell script, so these run on POSIX hosts only.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { runInstaller } from "../src/installer-runner";
import { VerifiedArtifact } from "../src/types";
import {
  installerScript,
  makeTempDir,
  selfReplacingScript,
  sha256,
  silentLogger,
} from "./helpers";

const posixOnly = it.skipIf(process.platform === "win32");

let workDir: string;
let argsFile: string;

function artifactFor(script: string): VerifiedArtifact {
  const filePath = path.join(workDir, "claude-2.0.1-linux-x64");
  fs.writeFileSync(filePath, script);
  return {
    file_path: filePath,
    checksum: sha256(script),
    version: "2.0.1",
    platform: "linux-x64",
    source: "remote",
    bytes: Buffer.byteLength(script),
  };
}

beforeEach(() => {
  workDir = makeTempDir("installer");
  argsFile = path.join(workDir, "args.txt");
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe("runInstaller", () => {
  posixOnly("runs `install <target>` and removes the artifact", async () => {
    const artifact = artifactFor(installerScript(argsFile, 0));
    const exits: string[] = [];

    const outcome = await runInstaller(artifact, "stable", {
      logger: silentLogger,
      onExit: () => exits.push(fs.existsSync(artifact.file_path) ? "present" : "gone"),
    });

    expect(outcome).toEqual({ exit_code: 0, warnings: [] });
    expect(fs.readFileSync(argsFile, "utf-8")).toBe("install stable\n");
    expect(exits).toEqual(["present"]);
    expect(fs.existsSync(artifact.file_path)).toBe(false);
  });

  posixOnly("passes the installer's exit code through", async () => {
    const artifact = artifactFor(installerScript(argsFile, 3));

    const outcome = await runInstaller(artifact, "2.0.1", { logger: silentLogger });
    expect(outcome.exit_code).toBe(3);
    expect(fs.readFileSync(argsFile, "utf-8")).toBe("install 2.0.1\n");
    expect(fs.existsSync(artifact.file_path)).toBe(false);
  });

  posixOnly("reports a signal-terminated installer as 128 + signal number", async () => {
    const artifact = artifactFor("#!/bin/sh\nkill -TERM $$\n");

    const outcome = await runInstaller(artifact, "latest", { logger: silentLogger });
    expect(outcome).toEqual({
      exit_code: 143,
      signal: "SIGTERM",
      message: "Installer terminated by SIGTERM",
      warnings: [],
    });
  });

  posixOnly("reports a missing binary without starting anything", async () => {
    const artifact = artifactFor(installerScript(argsFile));
    fs.rmSync(artifact.file_path);

    const outcome = await runInstaller(artifact, "latest", { logger: silentLogger });
    expect(outcome.exit_code).toBe(-1);
    expect(outcome.message).toMatch(/^Failed to prepare installer: ENOENT/);
    expect(fs.existsSync(argsFile)).toBe(false);
  });

  posixOnly("returns a warning when the artifact cannot be removed", async () => {
    const artifact = artifactFor(selfReplacingScript(argsFile));

    const outcome = await runInstaller(artifact, "latest", { logger: silentLogger });

    expect(outcome.exit_code).toBe(0);
    expect(outcome.warnings).toHaveLength(1);
    expect(outcome.warnings[0]).toMatchObject({
      kind: "cleanup",
      path: artifact.file_path,
    });
    expect(fs.statSync(artifact.file_path).isDirectory()).toBe(true);
  });
});

describe("signal forwarding", () => {
  posixOnly("passes SIGTERM on to the installer and detaches afterwards", async () => {
    const artifact = artifactFor("#!/bin/sh\nexec sleep 5\n");
    const before = {
      SIGINT: process.listenerCount("SIGINT"),
      SIGTERM: process.listenerCount("SIGTERM"),
    };

    const running = runInstaller(artifact, "latest", {
      logger: silentLogger,
      interactive: false,
    });
    expect(process.listenerCount("SIGTERM")).toBe(before.SIGTERM + 1);
    process.emit("SIGTERM");
    const outcome = await running;

    expect(outcome.exit_code).toBe(143);
    expect(outcome.signal).toBe("SIGTERM");
    expect(fs.existsSync(artifact.file_path)).toBe(false);
    expect(process.listenerCount("SIGINT")).toBe(before.SIGINT);
    expect(process.listenerCount("SIGTERM")).toBe(before.SIGTERM);
  });

  posixOnly("passes SIGINT on when stdin is not a terminal", async () => {
    const artifact = artifactFor("#!/bin/sh\nexec sleep 5\n");

    const running = runInstaller(artifact, "latest", {
      logger: silentLogger,
      interactive: false,
    });
    process.emit("SIGINT");
    const outcome = await running;

    expect(outcome.exit_code).toBe(130);
    expect(outcome.signal).toBe("SIGINT");
  });

  posixOnly("leaves SIGINT to the terminal when interactive", async () => {
    const artifact = artifactFor("#!/bin/sh\nexec sleep 1\n");
    const before = process.listenerCount("SIGINT");

    const running = runInstaller(artifact, "latest", {
      logger: silentLogger,
      interactive: true,
    });
    expect(process.listenerCount("SIGINT")).toBe(before + 1);
    process.emit("SIGINT");
    const outcome = await running;

    expect(outcome).toEqual({ exit_code: 0, warnings: [] });
    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});
