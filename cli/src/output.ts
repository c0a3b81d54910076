/**
 * assist-deploy CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners and the
 * labels for pipeline states, error kinds and sources. Uses chalk (v4,
 * CommonJS compatible) for ANSI colors and ora for spinners.
 *
 * All user-visible output flows through this module.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import {
  PipelineErrorKind,
  PipelineState,
  PointerSource,
} from "@assist-deploy/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let debugMode = false;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugMode(): boolean {
  return debugMode;
}

// ─── Colors and Marks ───────────────────────────────────────

export const colors = {
  success: chalk.green,
  warn: chalk.yellow,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

type Tone = "success" | "error" | "warn" | "info";

// Plain BMP symbols; they render in cmd.exe and PowerShell
const MARKS: Record<Tone, string> = {
  success: chalk.green("\u2714"),
  error: chalk.red("\u2716"),
  // \u26A0 renders one column wide but is followed by two spaces
  warn: chalk.yellow("\u26A0") + " ",
  info: chalk.cyan("\u2139"),
};

/**
 * Errors go to stderr at the top level only; stage lines sit under a
 * header and always go to stdout.
 */
function say(tone: Tone, msg: string, nested = false): void {
  const line = `${nested ? "  " : ""}${MARKS[tone]} ${msg}`;
  if (tone === "error" && !nested) {
    console.error(line);
  } else {
    console.log(line);
  }
}

// ─── Top-level Lines ────────────────────────────────────────

export const printSuccess = (msg: string): void => say("success", msg);
export const printError = (msg: string): void => say("error", msg);
export const printWarn = (msg: string): void => say("warn", msg);
export const printInfo = (msg: string): void => say("info", msg);

/** Only visible with --verbose */
export function printDebug(msg: string): void {
  if (debugMode) console.log(colors.muted(`  [debug] ${msg}`));
}

export function printBlank(): void {
  console.log();
}

/** `  Reason: <value>` under a failed stage */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(`${label}:`)} ${value}`);
}

// ─── Stage Lines ────────────────────────────────────────────

/**
 *   ✔ Resolved latest → 2.0.14 (remote)
 *   ✔ Verified checksum
 */
export const printStageSuccess = (msg: string): void =>
  say("success", msg, true);
export const printStageError = (msg: string): void => say("error", msg, true);
export const printStageWarn = (msg: string): void => say("warn", msg, true);
export const printStageInfo = (msg: string): void =>
  say("info", colors.dim(msg), true);

export function printHeader(msg: string): void {
  console.log(`\n  ${colors.bold(msg)}\n`);
}

// ─── Spinner ────────────────────────────────────────────────

/** Download and uninstall spinner; ora writes it to stderr */
export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan", indent: 2 });
}

// ─── State Labels ───────────────────────────────────────────

const STATE_COLORS: Record<PipelineState, chalk.Chalk> = {
  IDLE: chalk.gray,
  RESOLVING_VERSION: chalk.cyan,
  FETCHING_MANIFEST: chalk.cyan,
  SELECTING_PLATFORM: chalk.cyan,
  DOWNLOADING: chalk.blue,
  VERIFYING: chalk.blue,
  INSTALLING: chalk.yellow,
  CLEANUP: chalk.yellow,
  DONE: chalk.green,
  FAILED: chalk.red,
};

export const STATE_LABELS: Record<PipelineState, string> = {
  IDLE: "Starting",
  RESOLVING_VERSION: "Resolving version",
  FETCHING_MANIFEST: "Fetching manifest",
  SELECTING_PLATFORM: "Selecting platform",
  DOWNLOADING: "Downloading",
  VERIFYING: "Verifying checksum",
  INSTALLING: "Running installer",
  CLEANUP: "Cleaning up",
  DONE: "Done",
  FAILED: "Failed",
};

export function stateLabel(state: PipelineState): string {
  return STATE_LABELS[state];
}

export function formatState(state: PipelineState): string {
  return STATE_COLORS[state](STATE_LABELS[state]);
}

// ─── Error Kind Labels ──────────────────────────────────────

const ERROR_LABELS: Record<PipelineErrorKind, string> = {
  RESOLUTION_ERROR: "Could not resolve the requested version",
  MANIFEST_ERROR: "Release manifest unavailable or invalid",
  UNSUPPORTED_PLATFORM: "This platform is not supported",
  DOWNLOAD_ERROR: "Binary download failed",
  CHECKSUM_MISMATCH: "File integrity check failed",
  INSTALLER_FAILED: "Installer exited with an error",
  UNEXPECTED_ERROR: "Unexpected error",
};

export function formatErrorKind(kind: PipelineErrorKind): string {
  return ERROR_LABELS[kind];
}

// ─── Sources ────────────────────────────────────────────────

const SOURCE_LABELS: Record<PointerSource, string> = {
  remote: "remote",
  local_fallback: "local fallback",
  pinned: "pinned",
};

export function formatSource(source: PointerSource): string {
  const label = SOURCE_LABELS[source];
  return source === "local_fallback" ? colors.warn(label) : colors.dim(label);
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(1024)),
    units.length - 1,
  );
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
