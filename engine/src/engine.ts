/**
 * assist-deploy engine -- Deploy Engine
 *
 * Drives one install run through the pipeline:
 *
 *   IDLE → RESOLVING_VERSION → FETCHING_MANIFEST → SELECTING_PLATFORM →
 *   DOWNLOADING → VERIFYING → INSTALLING → CLEANUP → DONE
 *
 * Any fatal error moves straight to FAILED; later stages never run. Each
 * stage does one remote attempt and at most one fallback attempt, one
 * after the other.
 *
 * The engine has NO UI logic. It reports through event callbacks and the
 * returned PipelineResult.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import {
  errorMessage,
  InstallerSubprocessError,
  PipelineError,
} from "./errors";
import { LocalFallbackStore } from "./fallback-store";
import { VersionedArtifactFetcher } from "./fetcher";
import { runInstaller } from "./installer-runner";
import { selectPlatformEntry } from "./manifest";
import { HttpRemoteSource, RemoteSource } from "./remote";
import {
  CleanupWarning,
  EngineEvent,
  EngineEventHandler,
  EngineOptions,
  PipelineFailure,
  PipelineResult,
  PipelineState,
  StageSources,
  VerifiedArtifact,
} from "./types";
import { removeArtifact } from "./utils/cleanup";
import { createLogger, Logger, runLogger } from "./utils/logger";

export interface EngineDependencies {
  remote?: RemoteSource;
  fallback?: LocalFallbackStore;
  logger?: Logger;
}

export class DeployEngine {
  private readonly options: EngineOptions;
  private readonly logger: Logger;
  private readonly remote: RemoteSource;
  private readonly fallback: LocalFallbackStore;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions, deps: EngineDependencies = {}) {
    this.options = options;
    this.logger =
      deps.logger ??
      createLogger({ verbose: options.verbose });
    this.remote =
      deps.remote ??
      new HttpRemoteSource(options.bucket_url, {
        allowInsecure: options.allow_insecure,
        timeoutMs: options.request_timeout_ms,
        logger: this.logger,
      });
    this.fallback = deps.fallback ?? new LocalFallbackStore(options.local_dir);
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this to render progress.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.debug(
          { error: errorMessage(err) },
          "Event handler threw; ignoring",
        );
      }
    }
  }

  // ─── Run ─────────────────────────────────────────────────────

  /**
   * Install `target` ("latest", "stable" or a version) for `platform`
   * (a manifest key such as "darwin-arm64").
   */
  async run(target: string, platform: string): Promise<PipelineResult> {
    const runId = crypto.randomUUID();
    const log = runLogger(this.logger, runId);
    const startedAt = new Date().toISOString();
    const sources: StageSources = {};
    const warnings: CleanupWarning[] = [];
    let state: PipelineState = "IDLE";
    let version: string | undefined;
    let artifact: VerifiedArtifact | undefined;
    let exitCode: number | undefined;

    const transition = (next: PipelineState, message?: string) => {
      state = next;
      log.debug({ state: next }, "State change");
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { run_id: runId, state: next, message },
      });
    };

    const fetcher = new VersionedArtifactFetcher({
      remote: this.remote,
      fallback: this.fallback,
      download_dir: this.options.download_dir,
      binary_name: this.options.binary_name,
      logger: log,
      onSource: (stage, source, detail) => {
        this.emit({
          type: "source",
          timestamp: new Date().toISOString(),
          data: { run_id: runId, stage, source, detail },
        });
      },
      onProgress: (progress) => {
        this.emit({
          type: "progress",
          timestamp: new Date().toISOString(),
          data: { run_id: runId, ...progress },
        });
      },
    });

    const finish = (error?: PipelineFailure): PipelineResult => ({
      run_id: runId,
      target,
      platform,
      version,
      final_state: error ? "FAILED" : "DONE",
      sources,
      exit_code: exitCode,
      error,
      warnings,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
    });

    transition("IDLE");
    log.info({ target, platform }, "Starting install run");

    try {
      transition("RESOLVING_VERSION");
      const resolved = await fetcher.resolveVersion(target);
      version = resolved.version;
      sources.pointer = resolved.source;

      transition("FETCHING_MANIFEST");
      const fetched = await fetcher.fetchManifest(resolved.version);
      sources.manifest = fetched.source;

      transition("SELECTING_PLATFORM");
      const entry = selectPlatformEntry(fetched.manifest, platform);

      transition("DOWNLOADING");
      artifact = await fetcher.downloadAndVerify(resolved.version, entry, {
        onVerifying: () => transition("VERIFYING"),
      });
      sources.binary = artifact.source;

      transition("INSTALLING");
      const outcome = await runInstaller(artifact, target, {
        logger: log,
        onExit: () => transition("CLEANUP"),
      });
      artifact = undefined;
      exitCode = outcome.exit_code;
      warnings.push(...outcome.warnings);

      if (outcome.exit_code !== 0) {
        throw new InstallerSubprocessError(outcome.exit_code, outcome.message);
      }
    } catch (err: unknown) {
      if (artifact && fs.existsSync(artifact.file_path)) {
        const warning = removeArtifact(artifact.file_path, log);
        if (warning) warnings.push(warning);
      }

      const failure = toFailure(err, state);
      log.debug({ err, stage: state }, "Pipeline error detail");
      log.error(
        { kind: failure.kind, stage: failure.stage, error: failure.message },
        "Install run failed",
      );
      transition("FAILED", failure.message);
      return finish(failure);
    }

    transition("DONE");
    log.info({ version, sources }, "Install run complete");
    return finish();
  }
}

function toFailure(err: unknown, state: PipelineState): PipelineFailure {
  if (err instanceof InstallerSubprocessError) {
    return {
      kind: err.kind,
      stage: err.stage,
      message: err.message,
      exit_code: err.exitCode,
    };
  }
  if (err instanceof PipelineError) {
    return { kind: err.kind, stage: err.stage, message: err.message };
  }
  return { kind: "UNEXPECTED_ERROR", stage: state, message: errorMessage(err) };
}
