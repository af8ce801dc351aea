import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { errorMessage } from "./errors.js";

export const TEMP_DIR_PREFIX = "tubequiz-audio-";

/** Each download gets its own directory so concurrent pipelines never share files. */
export function createTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), TEMP_DIR_PREFIX));
}

/**
 * Best-effort removal of a downloaded file and the temporary directory that
 * holds it. Never throws, also not for a missing or empty path.
 */
export async function cleanupTempFile(filePath: string | null | undefined): Promise<void> {
  if (!filePath) return;

  try {
    await rm(filePath, { force: true });

    const parentDir = path.dirname(filePath);
    if (
      path.dirname(parentDir) === os.tmpdir() &&
      path.basename(parentDir).startsWith(TEMP_DIR_PREFIX)
    ) {
      await rm(parentDir, { recursive: true, force: true });
    }
  } catch (err: unknown) {
    console.warn(`Could not remove temporary file ${filePath}: ${errorMessage(err)}`);
  }
}
