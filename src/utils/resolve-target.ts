import path from "node:path";
import { z } from "zod";
import type { BuildConfig, BuildTarget } from "../types";

/**
 * A package name is a single directory name below the source and output directories
 */
export const PackageNameSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/,
    "Package name must be a single directory name (letters, digits, '_', '.', '-')",
  );

/**
 * Work out which directories a build (or clean) of `packageName` touches.
 * Without a package the whole source directory is built.
 */
export function resolveTarget(
  config: BuildConfig,
  packageName?: string,
  cwd: string = process.cwd(),
): BuildTarget {
  const sourceBase = path.resolve(cwd, config.source.directory);
  const outputBase = path.resolve(cwd, config.output.directory);

  if (packageName === undefined) {
    return { sourceRoot: sourceBase, destRoot: outputBase, assets: config.source.assets };
  }

  const name = PackageNameSchema.parse(packageName);
  return {
    sourceRoot: path.join(sourceBase, name),
    destRoot: path.join(outputBase, name),
    assets: config.source.assets,
  };
}
