/**
 * Cleanup Module
 * Removes the destination tree so every build can start from nothing
 */

import path from "node:path";
import { realpath, rm } from "fs/promises";
import { isInside } from "../utils/map-path";
import { UnsafeTargetError } from "../utils/errors";

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Resolve symlinks in the longest existing prefix of `target`
 */
async function resolveReal(target: string): Promise<string> {
  const absolute = path.resolve(target);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = await realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (error) {
      if (!isMissing(error)) throw error;

      const parent = path.dirname(current);
      if (parent === current) return absolute;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Throw UnsafeTargetError unless `destRoot` can be deleted without touching `sourceRoot`
 *
 * @returns The resolved destination root
 */
export async function assertSafeTarget(
  destRoot: string,
  sourceRoot: string,
): Promise<string> {
  const target = await resolveReal(destRoot);
  const source = await resolveReal(sourceRoot);

  if (path.parse(target).root === target) {
    throw new UnsafeTargetError(target, `Refusing to use filesystem root ${target} as output`);
  }
  if (target === source) {
    throw new UnsafeTargetError(target, `Output ${target} is the source root`);
  }
  if (isInside(target, source)) {
    throw new UnsafeTargetError(target, `Output ${target} contains the source root ${source}`);
  }

  return target;
}

/**
 * Recursively remove `destRoot`. A missing directory is not an error.
 * Nothing is deleted when the target is unsafe.
 */
export async function clean(destRoot: string, sourceRoot: string): Promise<void> {
  const target = await assertSafeTarget(destRoot, sourceRoot);
  await rm(target, { recursive: true, force: true });
}
