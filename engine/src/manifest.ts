/**
 * assist-deploy engine -- Release Manifest
 *
 * Every release publishes `{version}/manifest.json`:
 *
 *   {
 *     "version": "2.0.1",
 *     "buildDate": "2026-09-30T12:00:00Z",
 *     "platforms": {
 *       "darwin-arm64": { "checksum": "<sha256>", "size": 12345 },
 *       ...
 *     }
 *   }
 *
 * Only `platforms.<key>.checksum` is required.
 */

import { z } from "zod";
import { ManifestError, UnsupportedPlatformError } from "./errors";
import { ChecksumEntry, Manifest } from "./types";

const PlatformEntrySchema = z.object({
  checksum: z
    .string()
    .regex(/^[a-fA-F0-9]{64}$/, "must be a hex SHA-256 digest")
    .transform((value) => value.toLowerCase()),
  size: z.number().int().nonnegative().optional(),
});

export const ManifestSchema = z.object({
  version: z.string().optional(),
  buildDate: z.string().optional(),
  platforms: z.record(z.string(), PlatformEntrySchema),
});

/**
 * Parse raw manifest text. Anything that is not JSON, or JSON of the wrong
 * shape, is a ManifestError.
 *
 * @param origin - where the text came from, for the error message
 */
export function parseManifest(raw: string, origin: string): Manifest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ManifestError(`Manifest from ${origin} is not valid JSON`, {
      cause: err,
    });
  }

  const parsed = ManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ManifestError(
      `Manifest from ${origin} is malformed at ${where}: ${issue.message}`,
    );
  }

  return parsed.data;
}

/**
 * Look up the checksum for a platform. A missing entry is fatal: there is
 * nothing to verify a download against.
 */
export function selectPlatformEntry(
  manifest: Manifest,
  platform: string,
): ChecksumEntry {
  const entry = Object.prototype.hasOwnProperty.call(
    manifest.platforms,
    platform,
  )
    ? manifest.platforms[platform]
    : undefined;

  if (!entry) {
    throw new UnsupportedPlatformError(
      platform,
      Object.keys(manifest.platforms).sort(),
    );
  }

  return { platform, checksum: entry.checksum, size: entry.size };
}
