/**
 * assist-deploy engine -- Pipeline Errors
 *
 * Each fatal condition has its own class so callers can branch on
 * `instanceof` or on `kind`. Messages are one line and name the thing
 * that failed; the stage is carried separately for the CLI.
 */

import { PipelineErrorKind, PipelineState } from "./types";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly stage: PipelineState;

  constructor(
    kind: PipelineErrorKind,
    stage: PipelineState,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.stage = stage;
  }
}

/** Version pointer unavailable both remotely and locally */
export class ResolutionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RESOLUTION_ERROR", "RESOLVING_VERSION", message, options);
  }
}

/** Manifest unavailable from both sources, or unparsable */
export class ManifestError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MANIFEST_ERROR", "FETCHING_MANIFEST", message, options);
  }
}

export class UnsupportedPlatformError extends PipelineError {
  readonly platform: string;
  readonly available: string[];

  constructor(platform: string, available: string[]) {
    super(
      "UNSUPPORTED_PLATFORM",
      "SELECTING_PLATFORM",
      available.length > 0
        ? `Platform "${platform}" is not in the manifest (available: ${available.join(", ")})`
        : `Platform "${platform}" is not supported`,
    );
    this.platform = platform;
    this.available = available;
  }
}

/** Binary unavailable from both sources */
export class DownloadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DOWNLOAD_ERROR", "DOWNLOADING", message, options);
  }
}

/**
 * The binary on disk does not hash to the manifest checksum. Always fatal:
 * it may be corrupt or tampered with, so it is never re-fetched.
 */
export class ChecksumMismatchError extends PipelineError {
  readonly expected: string;
  readonly actual: string;

  constructor(filePath: string, expected: string, actual: string) {
    super(
      "CHECKSUM_MISMATCH",
      "VERIFYING",
      `Checksum mismatch for ${filePath}: expected ${expected}, got ${actual}`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class InstallerSubprocessError extends PipelineError {
  readonly exitCode: number;

  constructor(exitCode: number, message?: string) {
    super(
      "INSTALLER_FAILED",
      "INSTALLING",
      message ?? `Installer exited with code ${exitCode}`,
    );
    this.exitCode = exitCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
