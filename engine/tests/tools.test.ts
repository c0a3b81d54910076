/**
 * assist-deploy engine -- Tool Registry and Assistant CLI Tool Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { LocalFallbackStore } from "../src/fallback-store";
import { LinuxPlatform } from "../src/platform";
import { AssistantCliTool, getTool, listTools, ToolContext } from "../src/tools";
import {
  BUCKET,
  FakeRemote,
  installerScript,
  makeTempDir,
  manifestJson,
  silentLogger,
  writeTree,
} from "./helpers";

const posixOnly = it.skipIf(process.platform === "win32");

let workDir: string;
let homeDir: string;
let localDir: string;
let remote: FakeRemote;

function createContext(): ToolContext {
  const platform = new LinuxPlatform();
  return {
    platform,
    paths: platform.paths(homeDir),
    platform_key: "linux-x64",
    engine_options: {
      bucket_url: BUCKET,
      local_dir: localDir,
      download_dir: path.join(workDir, "downloads"),
      binary_name: "claude",
      verbose: false,
    },
    logger: silentLogger,
    extra_environment: { ASSISTANT_ORG: "test-org" },
    engine_dependencies: {
      remote,
      fallback: new LocalFallbackStore(localDir),
    },
  };
}

beforeEach(() => {
  workDir = makeTempDir("tools");
  homeDir = path.join(workDir, "home");
  localDir = path.join(workDir, "local");
  remote = new FakeRemote();
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

describe("tool registry", () => {
  it("lists the registered tools", () => {
    expect(listTools()).toEqual(["assistant-cli"]);
    expect(getTool("assistant-cli")).toBeInstanceOf(AssistantCliTool);
  });

  it("names the supported tools for an unknown name", () => {
    expect(() => getTool("copilot")).toThrow(
      'Unknown tool "copilot". Supported tools: assistant-cli',
    );
  });
});

describe("AssistantCliTool", () => {
  const tool = new AssistantCliTool();

  posixOnly("installs through the pipeline, then configures", async () => {
    const argsFile = path.join(workDir, "args.txt");
    const binary = installerScript(argsFile);
    remote.files.set("2.0.1/manifest.json", manifestJson("2.0.1", { "linux-x64": binary }));
    remote.files.set("2.0.1/linux-x64/claude", binary);
    const userDir = path.join(localDir, "LINUX", "USER-DIRECTORY");
    writeTree(userDir, ".claude/settings.json", '{"model":"enterprise"}');
    const context = createContext();

    const result = await tool.install(context, { target: "2.0.1", skip_config: false });

    expect(result.tool).toBe("assistant-cli");
    expect(result.pipeline.final_state).toBe("DONE");
    expect(result.configuration?.deployment.items.map((i) => i.kind)).toEqual([
      "assistant_settings",
    ]);
    expect(result.configuration?.environment.map((e) => e.hint)).toEqual([
      'export ASSISTANT_ORG="test-org"',
      `export PATH="${context.paths.install_bin_dir}:$PATH"`,
    ]);
    expect(fs.existsSync(path.join(homeDir, ".claude", "settings.json"))).toBe(true);
  });

  it("skips configuration when the pipeline fails", async () => {
    remote.offline = true;
    writeTree(localDir, "LINUX/USER-DIRECTORY/.claude/settings.json", "{}");

    const result = await tool.install(createContext(), { target: "latest", skip_config: false });

    expect(result.pipeline.final_state).toBe("FAILED");
    expect(result.configuration).toBeUndefined();
    expect(fs.existsSync(path.join(homeDir, ".claude"))).toBe(false);
  });

  it("forwards engine events to the context handler", async () => {
    remote.offline = true;
    const context = createContext();
    const seen: string[] = [];
    context.on_event = (event) => seen.push(event.type);

    await tool.install(context, { target: "latest", skip_config: true });
    expect(seen).toEqual(["state_change", "state_change", "state_change"]);
  });

  it("checks for the binary in the install bin directory", () => {
    const context = createContext();
    expect(tool.checkInstalled(context)).toBe(false);

    writeTree(context.paths.install_bin_dir, "claude", "binary");
    expect(tool.checkInstalled(context)).toBe(true);
  });

  it("reports nothing to uninstall when the binary is absent", async () => {
    const result = await tool.uninstall(createContext());
    expect(result.method).toBe("not_installed");
  });

  posixOnly("lets the installed binary uninstall itself", async () => {
    const context = createContext();
    const argsFile = path.join(workDir, "uninstall-args.txt");
    const binary = writeTree(context.paths.install_bin_dir, "claude", installerScript(argsFile));
    fs.chmodSync(binary, 0o755);

    const result = await tool.uninstall(context);

    expect(result).toMatchObject({ method: "self", exit_code: 0 });
    expect(fs.readFileSync(argsFile, "utf-8")).toBe("uninstall\n");
  });

  posixOnly("removes the install directory when self-uninstall fails", async () => {
    const context = createContext();
    const binary = writeTree(
      context.paths.install_bin_dir,
      "claude",
      installerScript(path.join(workDir, "args.txt"), 1),
    );
    fs.chmodSync(binary, 0o755);

    const result = await tool.uninstall(context);

    expect(result.method).toBe("removed");
    expect(fs.existsSync(context.paths.install_bin_dir)).toBe(false);
  });
});
