import path from "node:path";
import { PathOutsideRootError } from "./errors";

/**
 * Check whether `candidate` lies strictly below `root`
 */
export function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return (
    relative !== "" &&
    !relative.startsWith(`..${path.sep}`) &&
    relative !== ".." &&
    !path.isAbsolute(relative)
  );
}

/**
 * Map a file under the source root to its place under the destination root
 *
 * @param destinationExtension - Replaces the final extension when given
 *
 * @example
 * mapPath("/src", "/dist", "/src/app/main.py", ".pyc");
 * // "/dist/app/main.pyc"
 */
export function mapPath(
  sourceRoot: string,
  destRoot: string,
  absolutePath: string,
  destinationExtension?: string | null,
): string {
  const root = path.resolve(sourceRoot);
  const file = path.resolve(absolutePath);

  if (!isInside(root, file)) {
    throw new PathOutsideRootError(absolutePath, sourceRoot);
  }

  let relative = path.relative(root, file);

  if (destinationExtension) {
    const extension = path.extname(relative);
    relative = relative.slice(0, relative.length - extension.length) + destinationExtension;
  }

  return path.join(path.resolve(destRoot), relative);
}
