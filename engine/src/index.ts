/**
 * assist-deploy engine -- Public API
 *
 * The single entry point for the engine package. The CLI imports from
 * here, never from internal modules.
 */

// Pipeline
export { DeployEngine } from "./engine";
export type { EngineDependencies } from "./engine";
export { VersionedArtifactFetcher } from "./fetcher";
export type { FetcherOptions, DownloadHooks } from "./fetcher";
export { runInstaller } from "./installer-runner";
export type { RunInstallerOptions } from "./installer-runner";

// Types
export type {
  PlatformKey,
  ArtifactSource,
  PointerSource,
  ResolvedVersion,
  StageSources,
  ManifestPlatformEntry,
  Manifest,
  ChecksumEntry,
  FetchedManifest,
  VerifiedArtifact,
  InstallerOutcome,
  CleanupWarning,
  PipelineState,
  PipelineErrorKind,
  PipelineFailure,
  PipelineResult,
  EngineOptions,
  EngineEvent,
  EngineEventType,
  EngineEventHandler,
  StateChangeData,
  ProgressData,
  SourceData,
} from "./types";

// Errors
export {
  PipelineError,
  ResolutionError,
  ManifestError,
  UnsupportedPlatformError,
  DownloadError,
  ChecksumMismatchError,
  InstallerSubprocessError,
  errorMessage,
} from "./errors";

// Sources
export { HttpRemoteSource, DEFAULT_TIMEOUT_MS } from "./remote";
export type {
  RemoteSource,
  HttpRemoteOptions,
  DownloadProgress,
  DownloadResult,
  ProgressCallback,
} from "./remote";
export { LocalFallbackStore } from "./fallback-store";
export { parseManifest, selectPlatformEntry, ManifestSchema } from "./manifest";
export {
  hashFile,
  normalizeDigest,
  verifyChecksum,
  SHA256_PATTERN,
} from "./verifier";
export type { FileDigest, VerificationResult } from "./verifier";

// Platforms
export {
  selectPlatform,
  detectPlatformKey,
  isSupportedPlatformKey,
  binaryFileName,
  artifactFileName,
  WindowsPlatform,
  MacosPlatform,
  LinuxPlatform,
} from "./platform";
export type {
  PlatformCapabilities,
  PlatformPaths,
  OsFamily,
} from "./platform";

// Configuration deployment and environment
export {
  deployConfigs,
  mergeJsonSettings,
  planEnvironment,
  userDirectory,
  CA_BUNDLE_CANDIDATES,
} from "./side-effects/config-deployer";
export type {
  DeployedItem,
  DeployedItemKind,
  DeploymentReport,
  DeployOptions,
} from "./side-effects/config-deployer";
export {
  createDesiredEnvironment,
  WindowsEnvironmentWriter,
  ManualEnvironmentWriter,
  runPowerShell,
} from "./side-effects/env-manager";
export type {
  DesiredEnvironment,
  EnvironmentWriter,
  EnvWriteResult,
  EnvWriteStatus,
  PowerShellRunner,
} from "./side-effects/env-manager";

// Prerequisites
export { checkPrerequisites, probeCommand } from "./prerequisites";
export type {
  CommandProbe,
  PrerequisiteName,
  PrerequisiteOptions,
  PrerequisiteReport,
  PrerequisiteStatus,
} from "./prerequisites";

// Tools
export {
  getTool,
  listTools,
  DEFAULT_TOOL,
  InstallableTool,
  AssistantCliTool,
} from "./tools";
export type {
  ConfigureResult,
  ToolContext,
  ToolInstallOptions,
  ToolInstallResult,
  ToolUninstallResult,
  UninstallMethod,
} from "./tools";

// Utilities
export { createLogger, levelFor, runLogger } from "./utils/logger";
export type { Logger, LogLevel, LoggerOptions } from "./utils/logger";
export {
  CHANNELS,
  isChannel,
  isConcreteVersion,
  isValidTarget,
} from "./utils/version";
export type { Channel } from "./utils/version";
