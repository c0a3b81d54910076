/**
 * assist-deploy CLI -- Configuration
 *
 * Central location for CLI paths, defaults and the optional installer
 * configuration file. Downloads and logs live under ~/.assist-deploy
 * (%USERPROFILE%\.assist-deploy on Windows).
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  detectPlatformKey,
  EngineOptions,
  errorMessage,
  Logger,
  PlatformCapabilities,
  ToolContext,
} from "@assist-deploy/engine";

export const APP_DIR_NAME = ".assist-deploy";
export const CONFIG_FILE_NAME = "assist-deploy.yaml";
export const LOCAL_DIR_NAME = "local";

export const DEFAULT_BUCKET_URL =
  "https://storage.googleapis.com/claude-code-dist-86c565f3-f756-42ad-8dfa-d59b1c096819/claude-code-releases";

export function appHome(homeDir: string = os.homedir()): string {
  return path.join(homeDir, APP_DIR_NAME);
}

export function appPaths(homeDir: string = os.homedir()) {
  const root = appHome(homeDir);
  return {
    root,
    /** Binaries waiting for verification */
    downloads: path.join(root, "downloads"),
    logs: path.join(root, "logs"),
  };
}

// ─── Installer Configuration File ───────────────────────────

export const InstallerConfigSchema = z
  .object({
    bucket_url: z.string().url().default(DEFAULT_BUCKET_URL),
    allow_insecure_mirror: z.boolean().default(false),
    download_dir: z.string().min(1).optional(),
    binary_name: z
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, "must be a plain file name")
      .default("claude"),
    request_timeout_ms: z.number().int().positive().default(60_000),
    environment: z
      .record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/), z.string())
      .default({}),
  })
  .strict()
  .refine(
    (config) =>
      config.bucket_url.startsWith("https://") ||
      (config.allow_insecure_mirror && config.bucket_url.startsWith("http://")),
    {
      message:
        "must use https:// (http:// needs allow_insecure_mirror: true)",
      path: ["bucket_url"],
    },
  );

export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;

/**
 * Load the YAML configuration. A missing default file yields the
 * defaults; a missing explicit file is an error.
 */
export function loadInstallerConfig(
  filePath: string,
  explicit: boolean,
): InstallerConfig {
  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw new Error(`Config file not found: ${filePath}`);
    }
    return InstallerConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new Error(`Failed to parse ${filePath}: ${errorMessage(err)}`);
  }

  const parsed = InstallerConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new Error(`Invalid config ${filePath} at ${where}: ${issue.message}`);
  }
  return parsed.data;
}

// ─── Bundled local/ directory ───────────────────────────────

/**
 * The bundle ships a local/ directory next to the executable. An explicit
 * --local-dir wins; otherwise the first existing candidate is used, and
 * the last candidate when none exists.
 */
export function resolveLocalDir(
  explicit: string | undefined,
  candidates: string[] = defaultLocalDirCandidates(),
): string {
  if (explicit) {
    return path.resolve(explicit);
  }
  const found = candidates.find((dir) => fs.existsSync(dir));
  return path.resolve(found ?? candidates[candidates.length - 1]);
}

export function defaultLocalDirCandidates(): string[] {
  const candidates: string[] = [];
  const script = process.argv[1];
  if (script) {
    candidates.push(path.join(path.dirname(script), LOCAL_DIR_NAME));
  }
  candidates.push(path.join(process.cwd(), LOCAL_DIR_NAME));
  return candidates;
}

/** assist-deploy.yaml sits beside the local/ directory */
export function defaultConfigPath(localDir: string): string {
  return path.join(path.dirname(localDir), CONFIG_FILE_NAME);
}

// ─── Tool Context ───────────────────────────────────────────

export interface ContextInputs {
  config: InstallerConfig;
  local_dir: string;
  platform: PlatformCapabilities;
  logger: Logger;
  verbose: boolean;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  platformKey?: string;
}

export function buildEngineOptions(
  config: InstallerConfig,
  localDir: string,
  verbose: boolean,
  homeDir: string = os.homedir(),
): EngineOptions {
  return {
    bucket_url: config.bucket_url,
    local_dir: localDir,
    download_dir: config.download_dir ?? appPaths(homeDir).downloads,
    binary_name: config.binary_name,
    allow_insecure: config.allow_insecure_mirror,
    request_timeout_ms: config.request_timeout_ms,
    verbose,
  };
}

export function buildToolContext(inputs: ContextInputs): ToolContext {
  const homeDir = inputs.homeDir ?? os.homedir();
  return {
    platform: inputs.platform,
    paths: inputs.platform.paths(homeDir, inputs.env ?? process.env),
    platform_key:
      inputs.platformKey ?? detectPlatformKey(process.platform, process.arch),
    engine_options: buildEngineOptions(
      inputs.config,
      inputs.local_dir,
      inputs.verbose,
      homeDir,
    ),
    logger: inputs.logger,
    extra_environment: inputs.config.environment,
  };
}
