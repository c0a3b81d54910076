/**
 * assist-deploy engine -- Version Identifiers
 *
 * An install target is either a release channel ("stable", "latest") or a
 * concrete semantic version with an optional pre-release suffix
 * (e.g. "2.0.1", "1.4.0-beta.2"). Targets are validated before they are
 * used as URL or path segments.
 */

export const CHANNELS = ["stable", "latest"] as const;

export type Channel = (typeof CHANNELS)[number];

/** Concrete version: major.minor.patch with optional -prerelease */
export const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

/** Anything the CLI accepts as a positional target */
export const TARGET_PATTERN =
  /^(stable|latest|(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?)$/;

export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}

export function isConcreteVersion(value: string): boolean {
  return SEMVER_PATTERN.test(value);
}

export function isValidTarget(value: string): boolean {
  return TARGET_PATTERN.test(value);
}
