/**
 * assist-deploy engine -- Enterprise Configuration Deployment
 *
 * Copies the settings bundled under local/<OS>/USER-DIRECTORY into the
 * user's profile:
 *
 *   .claude/settings.json              -> assistant config dir (merged)
 *   .continue/certs/*.crt, certs/*.crt -> certs dir
 *   <editor settings>/settings.json    -> editor settings dir (merged)
 *     (or vscode-settings.json at the top of USER-DIRECTORY)
 *
 * Existing JSON settings are merged key by key; bundled values win.
 * Deployment also computes the environment the install needs, but does
 * not write it -- see env-manager.ts.
 */

import * as fs from "fs";
import * as path from "path";
import { errorMessage } from "../errors";
import { PlatformCapabilities, PlatformPaths } from "../platform/types";
import { Logger } from "../utils/logger";
import { createDesiredEnvironment, DesiredEnvironment } from "./env-manager";

export type DeployedItemKind =
  | "assistant_settings"
  | "certificate"
  | "editor_settings";

export interface DeployedItem {
  kind: DeployedItemKind;
  source: string;
  destination: string;
  action: "copied" | "merged";
}

export interface DeploymentReport {
  /** Bundled USER-DIRECTORY that was read */
  user_dir: string;
  /** False when the bundle has no directory for this OS */
  found: boolean;
  items: DeployedItem[];
  environment: DesiredEnvironment;
}

export interface DeployOptions {
  local_dir: string;
  platform: PlatformCapabilities;
  paths: PlatformPaths;
  /** Extra user-level variables from installer configuration */
  extra_environment?: Record<string, string>;
}

/** Checked in order; the first one present becomes NODE_EXTRA_CA_CERTS */
export const CA_BUNDLE_CANDIDATES = [
  "ZscalerRootCertificate-2048-SHA256.crt",
  "zscaler-root.crt",
];

export function userDirectory(
  localDir: string,
  platform: PlatformCapabilities,
): string {
  return path.join(localDir, platform.configSubdir, "USER-DIRECTORY");
}

export function deployConfigs(
  options: DeployOptions,
  logger: Logger,
): DeploymentReport {
  const { platform, paths } = options;
  const userDir = userDirectory(options.local_dir, platform);

  if (!fs.existsSync(userDir)) {
    logger.warn({ dir: userDir }, "No platform-specific configs found");
    return {
      user_dir: userDir,
      found: false,
      items: [],
      environment: planEnvironment(paths, options.extra_environment),
    };
  }

  const items: DeployedItem[] = [];

  const assistantSettings = deploySettingsFile(
    path.join(userDir, ".claude", "settings.json"),
    paths.assistant_config_dir,
    "assistant_settings",
    logger,
  );
  if (assistantSettings) items.push(assistantSettings);

  items.push(...deployCertificates(userDir, paths.certs_dir, logger));

  const editorSource = [
    platform.editorSettingsSource(userDir),
    path.join(userDir, "vscode-settings.json"),
  ].find((candidate) => fs.existsSync(candidate));
  if (editorSource) {
    const editorSettings = deploySettingsFile(
      editorSource,
      paths.editor_settings_dir,
      "editor_settings",
      logger,
    );
    if (editorSettings) items.push(editorSettings);
  } else {
    logger.debug("No editor settings to deploy");
  }

  return {
    user_dir: userDir,
    found: true,
    items,
    environment: planEnvironment(paths, options.extra_environment),
  };
}

function deploySettingsFile(
  source: string,
  destDir: string,
  kind: DeployedItemKind,
  logger: Logger,
): DeployedItem | null {
  if (!fs.existsSync(source)) {
    logger.debug({ source }, "Settings file not bundled");
    return null;
  }

  fs.mkdirSync(destDir, { recursive: true });
  const destination = path.join(destDir, "settings.json");

  if (fs.existsSync(destination)) {
    mergeJsonSettings(source, destination);
    logger.info({ source, destination }, "Merged settings");
    return { kind, source, destination, action: "merged" };
  }

  fs.copyFileSync(source, destination);
  logger.info({ source, destination }, "Deployed settings");
  return { kind, source, destination, action: "copied" };
}

function deployCertificates(
  userDir: string,
  certsDir: string,
  logger: Logger,
): DeployedItem[] {
  const items: DeployedItem[] = [];
  const sources = [
    path.join(userDir, ".continue", "certs"),
    path.join(userDir, "certs"),
  ];

  for (const sourceDir of sources) {
    if (!fs.existsSync(sourceDir)) continue;

    const certs = fs
      .readdirSync(sourceDir)
      .filter((name) => name.endsWith(".crt") && !name.startsWith("._"))
      .sort();

    if (certs.length === 0) continue;
    fs.mkdirSync(certsDir, { recursive: true });

    for (const name of certs) {
      const source = path.join(sourceDir, name);
      const destination = path.join(certsDir, name);
      fs.copyFileSync(source, destination);
      logger.info({ certificate: name, destination }, "Deployed certificate");
      items.push({ kind: "certificate", source, destination, action: "copied" });
    }
  }

  if (items.length === 0) {
    logger.debug("No certificates to deploy");
  }

  return items;
}

/**
 * Shallow-merge `source` into `dest` and rewrite `dest`. Both files must
 * hold JSON objects.
 */
export function mergeJsonSettings(source: string, dest: string): void {
  const incoming = readJsonObject(source);
  const existing = readJsonObject(dest);
  const merged = { ...existing, ...incoming };
  fs.writeFileSync(dest, JSON.stringify(merged, null, 2) + "\n", "utf-8");
}

function readJsonObject(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new Error(
      `Failed to parse settings JSON ${filePath}: ${errorMessage(err)}`,
    );
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Settings file ${filePath} is not a JSON object`);
  }
  return { ...parsed };
}

/**
 * The user environment an install needs: the corporate CA bundle for
 * Node-based tooling, the assistant's bin directory on PATH, and any
 * configured extras.
 */
export function planEnvironment(
  paths: PlatformPaths,
  extra: Record<string, string> = {},
): DesiredEnvironment {
  const variables: Record<string, string> = { ...extra };

  const caBundle = CA_BUNDLE_CANDIDATES.map((name) =>
    path.join(paths.certs_dir, name),
  ).find((candidate) => fs.existsSync(candidate));
  if (caBundle) {
    variables.NODE_EXTRA_CA_CERTS = caBundle;
  }

  return createDesiredEnvironment(variables, [paths.install_bin_dir]);
}
