/**
 * assist-deploy engine -- Versioned Artifact Fetcher
 *
 * Resolves a version, fetches its manifest and downloads the platform
 * binary. Each of the three stages tries the release bucket first and the
 * bundled fallback store second, once each: there are no retries. The
 * source used by every stage is reported back so the CLI can tell the
 * user where each piece came from.
 *
 * A checksum mismatch is never answered with the fallback copy. The file
 * is deleted and the run stops.
 */

import * as fs from "fs";
import * as path from "path";
import {
  ChecksumMismatchError,
  DownloadError,
  errorMessage,
  ManifestError,
  ResolutionError,
} from "./errors";
import { LocalFallbackStore } from "./fallback-store";
import { parseManifest } from "./manifest";
import { artifactFileName, binaryFileName } from "./platform";
import { ProgressCallback, RemoteSource } from "./remote";
import {
  ArtifactSource,
  ChecksumEntry,
  FetchedManifest,
  PointerSource,
  ResolvedVersion,
  StageSources,
  VerifiedArtifact,
} from "./types";
import { removeArtifact } from "./utils/cleanup";
import { Logger } from "./utils/logger";
import {
  isChannel,
  isConcreteVersion,
  isValidTarget,
} from "./utils/version";
import { VerificationResult, verifyChecksum } from "./verifier";

export interface FetcherOptions {
  remote: RemoteSource;
  fallback: LocalFallbackStore;
  /** Download cache; artifacts are named per version and platform */
  download_dir: string;
  /** Base binary name, e.g. "claude" ("claude.exe" on win32 keys) */
  binary_name: string;
  logger: Logger;
  /** Called once per stage with the source that served it */
  onSource?: (
    stage: keyof StageSources,
    source: PointerSource,
    detail: string,
  ) => void;
  onProgress?: ProgressCallback;
}

export interface DownloadHooks {
  /** Fired after the file is on disk, before hashing starts */
  onVerifying?: () => void;
}

export class VersionedArtifactFetcher {
  private readonly options: FetcherOptions;
  private readonly logger: Logger;

  constructor(options: FetcherOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  // ─── Version ─────────────────────────────────────────────────

  /**
   * A concrete version is returned untouched without any I/O. A channel is
   * looked up in the bucket, then in the fallback store.
   */
  async resolveVersion(requested: string): Promise<ResolvedVersion> {
    if (!isValidTarget(requested)) {
      throw new ResolutionError(
        `Invalid target "${requested}": expected stable, latest or a version like 1.2.3`,
      );
    }

    if (!isChannel(requested)) {
      this.report("pointer", "pinned", requested);
      return { requested, version: requested, source: "pinned" };
    }

    const { remote, fallback } = this.options;
    let raw: string;
    let source: ArtifactSource;

    try {
      raw = await remote.fetchText(requested);
      source = "remote";
    } catch (err: unknown) {
      const remoteError = errorMessage(err);
      this.logger.warn(
        { channel: requested, error: remoteError },
        "Remote version pointer unavailable, trying local fallback",
      );

      let local: string | null;
      try {
        local = fallback.readPointer(requested);
      } catch (readErr: unknown) {
        throw new ResolutionError(
          `Could not read local pointer ${fallback.pointerPath(requested)}: ${errorMessage(readErr)}`,
          { cause: readErr },
        );
      }

      if (local === null) {
        throw new ResolutionError(
          `Could not resolve "${requested}": remote unavailable (${remoteError}) and no local pointer at ${fallback.pointerPath(requested)}`,
          { cause: err },
        );
      }
      raw = local;
      source = "local_fallback";
    }

    const version = raw.trim();
    if (!isConcreteVersion(version)) {
      throw new ResolutionError(
        `Pointer "${requested}" (${source}) does not contain a version: "${version.slice(0, 40)}"`,
      );
    }

    this.logger.info({ channel: requested, version, source }, "Resolved version");
    this.report("pointer", source, version);
    return { requested, version, source };
  }

  // ─── Manifest ────────────────────────────────────────────────

  /**
   * Transport failures fall back to the local copy. Malformed content is a
   * ManifestError straight away, whichever source it came from.
   */
  async fetchManifest(version: string): Promise<FetchedManifest> {
    if (!isConcreteVersion(version)) {
      throw new ManifestError(`Cannot fetch manifest for "${version}"`);
    }

    const { remote, fallback } = this.options;
    const relativePath = `${version}/manifest.json`;
    let raw: string;
    let source: ArtifactSource;
    let origin: string;

    try {
      raw = await remote.fetchText(relativePath);
      source = "remote";
      origin = remote.urlFor(relativePath);
    } catch (err: unknown) {
      const remoteError = errorMessage(err);
      this.logger.warn(
        { version, error: remoteError },
        "Remote manifest unavailable, trying local fallback",
      );

      let local: string | null;
      try {
        local = fallback.readManifest(version);
      } catch (readErr: unknown) {
        throw new ManifestError(
          `Could not read local manifest ${fallback.manifestPath(version)}: ${errorMessage(readErr)}`,
          { cause: readErr },
        );
      }

      if (local === null) {
        throw new ManifestError(
          `Manifest for ${version} unavailable: remote (${remoteError}) and no local copy at ${fallback.manifestPath(version)}`,
          { cause: err },
        );
      }
      raw = local;
      source = "local_fallback";
      origin = fallback.manifestPath(version);
    }

    const manifest = parseManifest(raw, origin);
    this.logger.info(
      { version, source, platforms: Object.keys(manifest.platforms) },
      "Fetched manifest",
    );
    this.report("manifest", source, origin);
    return { manifest, source };
  }

  // ─── Binary ──────────────────────────────────────────────────

  /** Where the artifact for (version, platform) is written */
  artifactPath(version: string, platform: string): string {
    const fileName = binaryFileName(this.options.binary_name, platform);
    return path.join(
      this.options.download_dir,
      artifactFileName(fileName, version, platform),
    );
  }

  /**
   * Download (or copy from the fallback store) and verify the binary.
   * On any failure no file is left at the artifact path.
   */
  async downloadAndVerify(
    version: string,
    entry: ChecksumEntry,
    hooks: DownloadHooks = {},
  ): Promise<VerifiedArtifact> {
    const source = await this.download(version, entry.platform);
    hooks.onVerifying?.();
    return this.verify(version, entry, source);
  }

  private async download(
    version: string,
    platform: string,
  ): Promise<ArtifactSource> {
    const { remote, fallback, onProgress } = this.options;
    const fileName = binaryFileName(this.options.binary_name, platform);
    const destPath = this.artifactPath(version, platform);
    const relativePath = `${version}/${platform}/${fileName}`;

    try {
      fs.mkdirSync(this.options.download_dir, { recursive: true });
    } catch (err: unknown) {
      throw new DownloadError(
        `Cannot create download directory ${this.options.download_dir}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    try {
      await remote.download(relativePath, destPath, onProgress);
      this.report("binary", "remote", remote.urlFor(relativePath));
      return "remote";
    } catch (err: unknown) {
      const remoteError = errorMessage(err);
      this.logger.warn(
        { version, platform, error: remoteError },
        "Remote download failed, trying local fallback",
      );
      removeArtifact(destPath, this.logger);

      try {
        const bytes = fallback.copyBinary(version, platform, fileName, destPath);
        this.logger.info(
          { version, platform, bytes, dest: destPath },
          "Copied binary from local fallback",
        );
        this.report(
          "binary",
          "local_fallback",
          fallback.binaryPath(version, platform, fileName),
        );
        return "local_fallback";
      } catch (copyErr: unknown) {
        removeArtifact(destPath, this.logger);
        throw new DownloadError(
          `Binary ${fileName} for ${platform} unavailable: remote (${remoteError}); local fallback (${errorMessage(copyErr)})`,
          { cause: copyErr },
        );
      }
    }
  }

  private async verify(
    version: string,
    entry: ChecksumEntry,
    source: ArtifactSource,
  ): Promise<VerifiedArtifact> {
    const filePath = this.artifactPath(version, entry.platform);

    let result: VerificationResult;
    try {
      result = await verifyChecksum(filePath, entry.checksum, entry.size);
    } catch (err: unknown) {
      removeArtifact(filePath, this.logger);
      throw new DownloadError(
        `Could not verify ${filePath}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (!result.valid) {
      this.logger.error(
        { file: filePath, expected: result.expected, actual: result.actual },
        "Checksum MISMATCH",
      );
      removeArtifact(filePath, this.logger);
      throw new ChecksumMismatchError(filePath, result.expected, result.actual);
    }

    if (!result.size_matches) {
      this.logger.warn(
        { file: filePath, expected_size: entry.size, actual_size: result.bytes },
        "Binary size differs from the manifest",
      );
    }

    this.logger.info(
      { file: filePath, sha256: result.actual, source },
      "Checksum verified",
    );

    return {
      file_path: filePath,
      checksum: result.actual,
      version,
      platform: entry.platform,
      source,
      bytes: result.bytes,
    };
  }

  private report(
    stage: keyof StageSources,
    source: PointerSource,
    detail: string,
  ): void {
    this.options.onSource?.(stage, source, detail);
  }
}
