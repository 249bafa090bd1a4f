import crypto from "node:crypto";
import path from "node:path";

import fse from "fs-extra";

import { EmissionError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

const TMP_SUFFIX = ".tmp";

/**
 * Write a file through a sibling temp file and a rename, so readers only ever see
 * the previous or the new content. On failure the temp file is removed and an
 * EMISSION_ERROR is raised; the previous file stays as it was.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const tmpPath = tempPathFor(filePath);

  try {
    await fse.ensureDir(path.dirname(filePath));
    await fse.writeFile(tmpPath, content, "utf8");
    await fse.rename(tmpPath, filePath);
  } catch (err) {
    // The temp file is never created when the directory itself cannot be made.
    if (await fse.pathExists(tmpPath)) await fse.remove(tmpPath);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.emission,
      title: "Failed to write configuration.",
      message: `Could not write ${filePath}.`,
      hint: "Check that the build directory is writable and the disk is not full.",
      cause: new EmissionError(`Atomic write of ${filePath} failed`, err),
    });
  }
}

function tempPathFor(filePath: string): string {
  const rand = crypto.randomBytes(6).toString("hex");
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${rand}${TMP_SUFFIX}`);
}
