/**
 * assist-deploy engine -- Artifact Cleanup
 *
 * Downloaded binaries never outlive the run. Removal problems are reported
 * as warnings; they never change the outcome of an install.
 */

import * as fs from "fs";
import { CleanupWarning } from "../types";
import { errorMessage } from "../errors";
import { Logger } from "./logger";

/**
 * Delete `filePath` if it exists. Returns a warning instead of throwing.
 */
export function removeArtifact(
  filePath: string,
  logger: Logger,
): CleanupWarning | null {
  try {
    fs.rmSync(filePath, { force: true });
    logger.debug({ path: filePath }, "Removed temporary artifact");
    return null;
  } catch (err: unknown) {
    const message = errorMessage(err);
    logger.warn(
      { path: filePath, error: message },
      "Failed to remove temporary artifact",
    );
    return { kind: "cleanup", path: filePath, message };
  }
}
