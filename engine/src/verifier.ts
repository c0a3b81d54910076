/**
 * assist-deploy engine -- Artifact Verification
 *
 * The gate between download and execution: nothing runs unless its
 * SHA-256 digest equals the one the manifest records for its platform.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import { Writable } from "stream";
import { pipeline } from "stream/promises";
import { errorMessage } from "./errors";

export const SHA256_PATTERN = /^[a-f0-9]{64}$/;

export interface FileDigest {
  sha256: string;
  bytes: number;
}

export interface VerificationResult {
  valid: boolean;
  expected: string;
  actual: string;
  file_path: string;
  bytes: number;
  /** False when the manifest lists a size and the file differs from it */
  size_matches: boolean;
}

/** Normalize a manifest digest; null when it is not 64 hex characters */
export function normalizeDigest(value: string): string | null {
  const digest = value.trim().toLowerCase();
  return SHA256_PATTERN.test(digest) ? digest : null;
}

/**
 * Stream a file through SHA-256, counting its bytes on the way.
 */
export async function hashFile(filePath: string): Promise<FileDigest> {
  const hash = crypto.createHash("sha256");
  let bytes = 0;

  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      bytes += chunk.length;
      callback();
    },
  });

  try {
    await pipeline(fs.createReadStream(filePath), sink);
  } catch (err: unknown) {
    throw new Error(
      `Failed to read ${filePath} for hashing: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return { sha256: hash.digest("hex"), bytes };
}

/**
 * Compare a file against its manifest entry. Only the digest decides
 * validity; a size disagreement is reported alongside.
 *
 * @throws if `expected` is not a SHA-256 digest or the file is missing
 */
export async function verifyChecksum(
  filePath: string,
  expected: string,
  expectedSize?: number,
): Promise<VerificationResult> {
  const digest = normalizeDigest(expected);
  if (digest === null) {
    throw new Error(
      `Invalid SHA-256 hash format: "${expected}". Expected 64 hex characters.`,
    );
  }

  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const { sha256, bytes } = await hashFile(filePath);

  return {
    valid: sha256 === digest,
    expected: digest,
    actual: sha256,
    file_path: filePath,
    bytes,
    size_matches: expectedSize === undefined || expectedSize === bytes,
  };
}
