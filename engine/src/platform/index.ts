/**
 * assist-deploy engine -- Platform Selection
 */

import * as path from "path";
import { PlatformKey } from "../types";
import { PlatformCapabilities } from "./types";
import { WindowsPlatform } from "./windows";
import { LinuxPlatform, MacosPlatform } from "./posix";

export type { PlatformCapabilities, PlatformPaths, OsFamily } from "./types";
export { WindowsPlatform } from "./windows";
export { MacosPlatform, LinuxPlatform } from "./posix";

const SUPPORTED_KEYS: readonly PlatformKey[] = [
  "win32-x64",
  "win32-arm64",
  "darwin-x64",
  "darwin-arm64",
  "linux-x64",
  "linux-arm64",
];

/**
 * Select the capability set for a Node platform string. Anything that is
 * neither Windows nor macOS gets the Linux (development) implementation.
 */
export function selectPlatform(
  nodePlatform: NodeJS.Platform = process.platform,
): PlatformCapabilities {
  switch (nodePlatform) {
    case "win32":
      return new WindowsPlatform();
    case "darwin":
      return new MacosPlatform();
    default:
      return new LinuxPlatform();
  }
}

/**
 * Manifest key for a host, e.g. "darwin-arm64". Unknown combinations are
 * returned verbatim so the manifest lookup reports them as unsupported.
 */
export function detectPlatformKey(
  nodePlatform: string = process.platform,
  arch: string = process.arch,
): string {
  return `${nodePlatform}-${arch}`;
}

export function isSupportedPlatformKey(key: string): key is PlatformKey {
  return SUPPORTED_KEYS.some((supported) => supported === key);
}

/** Name of the binary published under a platform directory */
export function binaryFileName(base: string, platformKey: string): string {
  if (platformKey.startsWith("win32-") && !base.toLowerCase().endsWith(".exe")) {
    return `${base}.exe`;
  }
  return base;
}

/**
 * Download cache name, unique per (version, platform):
 *   claude-2.0.1-darwin-arm64, claude-2.0.1-win32-x64.exe
 */
export function artifactFileName(
  binaryFile: string,
  version: string,
  platformKey: string,
): string {
  const ext = path.extname(binaryFile);
  const base = path.basename(binaryFile, ext);
  return `${base}-${version}-${platformKey}${ext}`;
}
