/**
 * assist-deploy engine -- Remote Release Source
 *
 * Reads the release bucket over HTTPS:
 *
 *   {bucket}/latest                          version pointer (text)
 *   {bucket}/{version}/manifest.json         checksums per platform
 *   {bucket}/{version}/{platform}/<binary>   platform binary
 *
 * HTTP URLs are rejected unless the bucket is explicitly configured as an
 * insecure internal mirror. Redirects are followed up to 5 hops.
 */

import * as fs from "fs";
import * as path from "path";
import * as http from "http";
import * as https from "https";
import { pipeline } from "stream/promises";
import { Logger } from "./utils/logger";
import { removeArtifact } from "./utils/cleanup";

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

/**
 * Anything that can serve the bucket layout. The fetcher only talks to
 * this interface.
 */
export interface RemoteSource {
  /** Absolute URL for a path relative to the bucket */
  urlFor(relativePath: string): string;
  fetchText(relativePath: string): Promise<string>;
  download(
    relativePath: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult>;
}

export interface HttpRemoteOptions {
  allowInsecure?: boolean;
  timeoutMs?: number;
  logger: Logger;
}

const MAX_REDIRECTS = 5;
export const DEFAULT_TIMEOUT_MS = 60_000;

export class HttpRemoteSource implements RemoteSource {
  private readonly baseUrl: string;
  private readonly allowInsecure: boolean;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(baseUrl: string, options: HttpRemoteOptions) {
    this.allowInsecure = options.allowInsecure ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
    this.assertAllowed(baseUrl);
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  urlFor(relativePath: string): string {
    return `${this.baseUrl}/${relativePath.replace(/^\/+/, "")}`;
  }

  async fetchText(relativePath: string): Promise<string> {
    const url = this.urlFor(relativePath);
    this.logger.debug({ url }, "Fetching");

    const response = await this.get(url, 0);
    const chunks: Buffer[] = [];

    return new Promise<string>((resolve, reject) => {
      response.on("data", (chunk: Buffer) => chunks.push(chunk));
      response.on("end", () =>
        resolve(Buffer.concat(chunks).toString("utf-8")),
      );
      response.on("error", (err) =>
        reject(new Error(`Failed reading response from ${url}: ${err.message}`)),
      );
    });
  }

  /**
   * Stream a file to `destPath`. A partially written file is removed
   * before the error is rethrown.
   */
  async download(
    relativePath: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult> {
    const url = this.urlFor(relativePath);
    fs.mkdirSync(path.dirname(destPath), { recursive: true });

    this.logger.info({ url, dest: destPath }, "Starting download");
    const startTime = Date.now();
    let downloadedBytes = 0;

    try {
      const response = await this.get(url, 0);
      const totalBytes = parseInt(
        response.headers["content-length"] || "0",
        10,
      );

      response.on("data", (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        if (onProgress && totalBytes > 0) {
          onProgress({
            bytes_downloaded: downloadedBytes,
            bytes_total: totalBytes,
            percent: Math.round((downloadedBytes / totalBytes) * 100),
          });
        }
      });

      await pipeline(response, fs.createWriteStream(destPath));
    } catch (err: unknown) {
      removeArtifact(destPath, this.logger);
      throw err;
    }

    const duration = Date.now() - startTime;
    this.logger.info(
      { dest: destPath, bytes: downloadedBytes, duration_ms: duration },
      "Download complete",
    );

    return {
      file_path: destPath,
      bytes_downloaded: downloadedBytes,
      duration_ms: duration,
    };
  }

  private assertAllowed(url: string): void {
    if (url.startsWith("https://")) return;
    if (url.startsWith("http://") && this.allowInsecure) return;
    throw new Error(`Release URL must be HTTPS. Got: ${url}`);
  }

  /**
   * GET with redirect handling. Resolves with a 200 response whose body
   * has not been consumed yet.
   */
  private get(url: string, hops: number): Promise<http.IncomingMessage> {
    const client = url.startsWith("https://") ? https : http;

    return new Promise<http.IncomingMessage>((resolve, reject) => {
      const request = client.get(url, (response) => {
        const status = response.statusCode ?? 0;

        if (status >= 300 && status < 400 && response.headers.location) {
          response.resume();
          if (hops >= MAX_REDIRECTS) {
            reject(new Error(`Too many redirects for ${url}`));
            return;
          }
          const redirectUrl = new URL(response.headers.location, url).toString();
          try {
            this.assertAllowed(redirectUrl);
          } catch (err: unknown) {
            reject(err);
            return;
          }
          this.logger.debug({ redirect: redirectUrl }, "Following redirect");
          this.get(redirectUrl, hops + 1).then(resolve, reject);
          return;
        }

        if (status !== 200) {
          response.resume();
          reject(new Error(`HTTP ${status} for ${url}`));
          return;
        }

        resolve(response);
      });

      request.on("error", (err) => {
        reject(new Error(`Request failed for ${url}: ${err.message}`));
      });

      request.setTimeout(this.timeoutMs, () => {
        request.destroy(
          new Error(`Timed out after ${this.timeoutMs} ms`),
        );
      });
    });
  }
}
