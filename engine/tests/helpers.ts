/**
 * Shared fixtures for engine tests: a temporary workspace, an in-memory
 * bucket and a local fallback tree.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DownloadResult,
  ProgressCallback,
  RemoteSource,
} from "../src/remote";
import { createLogger } from "../src/utils/logger";

export const silentLogger = createLogger({ level: "silent" });

export const BUCKET = "https://releases.example.test/assistant";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `assist-deploy-${prefix}-`));
}

export function sha256(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

export function manifestJson(
  version: string,
  platforms: Record<string, string | Buffer>,
): string {
  const entries: Record<string, { checksum: string; size: number }> = {};
  for (const [key, content] of Object.entries(platforms)) {
    entries[key] = {
      checksum: sha256(content),
      size: Buffer.byteLength(content),
    };
  }
  return JSON.stringify({ version, buildDate: "2026-01-15", platforms: entries });
}

/**
 * In-memory bucket. Paths not in `files` answer 404; `offline` makes every
 * request fail as if the host were unreachable.
 */
export class FakeRemote implements RemoteSource {
  readonly files = new Map<string, string | Buffer>();
  readonly requests: string[] = [];
  offline = false;

  urlFor(relativePath: string): string {
    return `${BUCKET}/${relativePath}`;
  }

  async fetchText(relativePath: string): Promise<string> {
    return this.lookup(relativePath).toString();
  }

  async download(
    relativePath: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult> {
    const body = this.lookup(relativePath);
    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    fs.writeFileSync(destPath, body);
    const bytes = Buffer.byteLength(body);
    onProgress?.({ bytes_downloaded: bytes, bytes_total: bytes, percent: 100 });
    return { file_path: destPath, bytes_downloaded: bytes, duration_ms: 1 };
  }

  private lookup(relativePath: string): string | Buffer {
    this.requests.push(relativePath);
    if (this.offline) {
      throw new Error(
        `Request failed for ${this.urlFor(relativePath)}: getaddrinfo ENOTFOUND`,
      );
    }
    const body = this.files.get(relativePath);
    if (body === undefined) {
      throw new Error(`HTTP 404 for ${this.urlFor(relativePath)}`);
    }
    return body;
  }
}

/** pino destination collecting parsed JSON lines */
export function memoryDestination() {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    write(msg: string): void {
      lines.push(JSON.parse(msg));
    },
  };
}

/** Write a file under `root`, creating parent directories */
export function writeTree(
  root: string,
  relativePath: string,
  content: string | Buffer,
): string {
  const filePath = path.join(root, ...relativePath.split("/"));
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/**
 * POSIX shell script standing in for the assistant binary. It records its
 * arguments to `argsFile`, one line per run, and exits with `exitCode`.
 */
export function installerScript(argsFile: string, exitCode = 0): string {
  return `#!/bin/sh\necho "$@" >> "${argsFile}"\nexit ${exitCode}\n`;
}

/**
 * Like installerScript, but the script then replaces its own file with a
 * non-empty directory so that removing the artifact fails.
 */
export function selfReplacingScript(argsFile: string): string {
  return `#!/bin/sh\necho "$@" >> "${argsFile}"\nrm "$0"\nmkdir "$0"\ntouch "$0/leftover"\nexit 0\n`;
}
