/**
 * assist-deploy engine -- Core Type Definitions
 *
 * Shared by the fetcher, the engine state machine, the tools and the CLI.
 */

// ─── Platforms ───────────────────────────────────────────────────

export type PlatformKey =
  | "win32-x64"
  | "win32-arm64"
  | "darwin-x64"
  | "darwin-arm64"
  | "linux-x64"
  | "linux-arm64";

// ─── Provenance ──────────────────────────────────────────────────

export type ArtifactSource = "remote" | "local_fallback";

/** A concrete requested version needs no pointer lookup at all */
export type PointerSource = ArtifactSource | "pinned";

export interface ResolvedVersion {
  /** The target as requested ("latest", "stable" or a version) */
  requested: string;
  /** Concrete version used for manifest and binary lookups */
  version: string;
  source: PointerSource;
}

export interface StageSources {
  pointer?: PointerSource;
  manifest?: ArtifactSource;
  binary?: ArtifactSource;
}

// ─── Manifest ────────────────────────────────────────────────────

export interface ManifestPlatformEntry {
  /** Lowercase hex SHA-256 of the platform binary */
  checksum: string;
  size?: number;
}

export interface Manifest {
  version?: string;
  buildDate?: string;
  platforms: Record<string, ManifestPlatformEntry>;
}

export interface ChecksumEntry {
  platform: string;
  checksum: string;
  size?: number;
}

export interface FetchedManifest {
  manifest: Manifest;
  source: ArtifactSource;
}

// ─── Artifacts ───────────────────────────────────────────────────

export interface VerifiedArtifact {
  file_path: string;
  checksum: string;
  version: string;
  platform: string;
  source: ArtifactSource;
  bytes: number;
}

export interface InstallerOutcome {
  /** -1 when the binary could not be started at all */
  exit_code: number;
  signal?: string;
  message?: string;
  warnings: CleanupWarning[];
}

export interface CleanupWarning {
  kind: "cleanup";
  path: string;
  message: string;
}

// ─── Pipeline Lifecycle ──────────────────────────────────────────

export type PipelineState =
  | "IDLE"
  | "RESOLVING_VERSION"
  | "FETCHING_MANIFEST"
  | "SELECTING_PLATFORM"
  | "DOWNLOADING"
  | "VERIFYING"
  | "INSTALLING"
  | "CLEANUP"
  | "DONE"
  | "FAILED";

export type PipelineErrorKind =
  | "RESOLUTION_ERROR"
  | "MANIFEST_ERROR"
  | "UNSUPPORTED_PLATFORM"
  | "DOWNLOAD_ERROR"
  | "CHECKSUM_MISMATCH"
  | "INSTALLER_FAILED"
  | "UNEXPECTED_ERROR";

export interface PipelineFailure {
  kind: PipelineErrorKind;
  stage: PipelineState;
  message: string;
  exit_code?: number;
}

export interface PipelineResult {
  run_id: string;
  target: string;
  platform: string;
  version?: string;
  final_state: "DONE" | "FAILED";
  sources: StageSources;
  /** Exit status of the installer subprocess, when it ran */
  exit_code?: number;
  error?: PipelineFailure;
  warnings: CleanupWarning[];
  started_at: string;
  finished_at: string;
}

// ─── Engine Options ──────────────────────────────────────────────

export interface EngineOptions {
  /** Base URL of the release bucket (no trailing slash needed) */
  bucket_url: string;
  /** Directory mirroring the bucket layout, bundled with the installer */
  local_dir: string;
  /** Where binaries are downloaded before verification */
  download_dir: string;
  /** Base name of the binary inside each platform directory */
  binary_name: string;
  /** Permit an http:// bucket (internal mirrors only) */
  allow_insecure?: boolean;
  /** Per-request timeout */
  request_timeout_ms?: number;
  verbose: boolean;
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEventType = "state_change" | "progress" | "source";

export interface StateChangeData {
  run_id: string;
  state: PipelineState;
  message?: string;
}

export interface ProgressData {
  run_id: string;
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface SourceData {
  run_id: string;
  stage: keyof StageSources;
  source: PointerSource;
  detail: string;
}

export type EngineEvent =
  | { type: "state_change"; timestamp: string; data: StateChangeData }
  | { type: "progress"; timestamp: string; data: ProgressData }
  | { type: "source"; timestamp: string; data: SourceData };

export type EngineEventHandler = (event: EngineEvent) => void;
