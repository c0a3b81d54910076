/**
 * assist-deploy engine -- Local Fallback Store
 *
 * A directory bundled with the installer that mirrors the bucket layout,
 * used when the release bucket is unreachable (offline / air-gapped):
 *
 *   local/latest
 *   local/{version}/manifest.json
 *   local/{version}/{platform}/<binary>
 */

import * as fs from "fs";
import * as path from "path";

export class LocalFallbackStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  pointerPath(channel: string): string {
    return path.join(this.root, channel);
  }

  manifestPath(version: string): string {
    return path.join(this.root, version, "manifest.json");
  }

  binaryPath(version: string, platform: string, fileName: string): string {
    return path.join(this.root, version, platform, fileName);
  }

  /**
   * Contents of a channel pointer file, or null when the store has none.
   */
  readPointer(channel: string): string | null {
    return readIfPresent(this.pointerPath(channel));
  }

  readManifest(version: string): string | null {
    return readIfPresent(this.manifestPath(version));
  }

  /**
   * Copy a mirrored binary to `destPath`.
   *
   * @returns number of bytes copied
   * @throws if the store has no binary for this version/platform
   */
  copyBinary(
    version: string,
    platform: string,
    fileName: string,
    destPath: string,
  ): number {
    const source = this.binaryPath(version, platform, fileName);
    if (!fs.existsSync(source)) {
      throw new Error(`No local binary at ${source}`);
    }

    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    fs.copyFileSync(source, destPath);
    return fs.statSync(destPath).size;
  }
}

function readIfPresent(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    if (isMissing(err)) return null;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}
