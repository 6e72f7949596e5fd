/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, stat } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Why `path` cannot be walked as a directory, or null when it can
 */
export async function directoryProblem(path: string): Promise<string | null> {
  try {
    const stats = await stat(path);
    if (!stats.isDirectory()) {
      return `${path} is not a directory`;
    }
    await access(path, constants.R_OK | constants.X_OK);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}
